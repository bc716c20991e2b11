import type { ConfigStore } from "@/config-store";
import type { HistoryStore } from "@/history-store";
import { formatCompletedAt, withCumulativePomodoros } from "@/lib/history";
import type { FocusRecord } from "@/lib/history-types";
import { PHASE_LABELS, type Phase, type TimerState } from "@/lib/pomodoro";
import type { PomodoroTimer } from "@/lib/pomodoro-timer";

export type HostLogger = Pick<Console, "warn" | "error">;

export type PomodoroHostOptions = {
  timer: PomodoroTimer;
  history: Pick<HistoryStore, "append" | "load">;
  session?: Pick<ConfigStore, "loadSession" | "saveSession">;
  notify?: (phase: Phase) => void;
  logger?: HostLogger;
};

export type HostDisplay = {
  phase: Phase;
  phaseLabel: string;
  state: TimerState;
  remaining: string;
  progress: number;
  completedPomodoros: number;
  pomodorosBeforeLong: number;
  task: string;
};

/**
 * Drives a `PomodoroTimer` from the frame loop and owns everything around it:
 * the current task label, the read-only history cache and best-effort writes
 * to the stores. Persistence failures are logged and never reach the timer.
 */
export class PomodoroHost {
  private readonly timer: PomodoroTimer;
  private readonly store: PomodoroHostOptions["history"];
  private readonly session: PomodoroHostOptions["session"];
  private readonly notify: (phase: Phase) => void;
  private readonly logger: HostLogger;

  private _task = "";
  private _history: FocusRecord[] = [];

  constructor(options: PomodoroHostOptions) {
    this.timer = options.timer;
    this.store = options.history;
    this.session = options.session;
    this.notify = options.notify ?? (() => {});
    this.logger = options.logger ?? console;
  }

  get task(): string { return this._task; }

  init(): void {
    this.reloadHistory();
    this.restoreSession();
  }

  /** Advances the timer to `now`; returns the phase that just ended, if any. */
  frame(now: number): Phase | null {
    this.timer.tick(now);
    const focusDuration = this.timer.takeLastCompletedFocusDuration();
    const finished = this.timer.takeFinishedPhase();
    if (focusDuration !== null) {
      this.recordFocus({
        task: this._task,
        durationSeconds: focusDuration,
        completedAt: formatCompletedAt(now),
        completedPomodoros: this.timer.completedPomodoros,
      });
    }
    if (finished !== null) {
      this.notify(finished);
    }
    return finished;
  }

  start(): void {
    this.timer.start();
  }

  togglePause(): void {
    this.timer.togglePause();
  }

  stop(): void {
    this.timer.stop();
  }

  reset(): void {
    this.timer.resetPomodorosAndStop();
  }

  /** Phase selection only applies while idle; returns whether it did. */
  selectPhase(phase: Phase): boolean {
    if (this.timer.state !== "idle") return false;
    this.timer.setPhase(phase);
    return true;
  }

  setTask(task: string): void {
    this._task = task.trim();
  }

  history() {
    return withCumulativePomodoros(this._history);
  }

  reloadHistory(): void {
    try {
      this._history = this.store.load(0);
    } catch (error) {
      this.logger.warn("Failed to load focus history", error);
      this._history = [];
    }
  }

  display(): HostDisplay {
    const phase = this.timer.phase;
    return {
      phase,
      phaseLabel: PHASE_LABELS[phase],
      state: this.timer.state,
      remaining: this.timer.remainingDisplay(),
      progress: this.timer.progress(),
      completedPomodoros: this.timer.completedPomodoros,
      pomodorosBeforeLong: this.timer.config.pomodorosBeforeLong,
      task: this._task,
    };
  }

  saveSession(): void {
    if (!this.session) return;
    try {
      this.session.saveSession({ ...this.timer.snapshot(), task: this._task });
    } catch (error) {
      this.logger.warn("Failed to save session", error);
    }
  }

  dispose(): void {
    this.saveSession();
  }

  private restoreSession(): void {
    if (!this.session) return;
    try {
      const snapshot = this.session.loadSession();
      if (!snapshot) return;
      this.timer.restore(snapshot);
      this._task = snapshot.task;
    } catch (error) {
      this.logger.warn("Failed to restore session", error);
    }
  }

  private recordFocus(record: FocusRecord): void {
    this._history.push(record);
    try {
      this.store.append(record);
    } catch (error) {
      this.logger.warn("Failed to save focus record", error);
    }
  }
}
