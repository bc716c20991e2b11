import {
  DEFAULT_POMODORO_CONFIG,
  formatTime,
  getPhaseSeconds,
  type Phase,
  type PomodoroConfig,
  type TimerState,
} from "@/lib/pomodoro";

/** Milliseconds since the epoch, as returned by `Date.now()`. */
export type Clock = () => number;

export type TimerSnapshot = {
  phase: Phase;
  state: TimerState;
  remainingSeconds: number;
  phaseTotalSeconds: number;
  completedPomodoros: number;
};

export type PomodoroTimerOptions = {
  clock?: Clock;
};

const toNonNegativeInteger = (value: number) =>
  Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;

/**
 * Pomodoro state machine driven by caller-supplied timestamps.
 *
 * The countdown advances only in `tick(now)`, by whole seconds between the
 * previous tick and `now`, so the host may call it at any cadence. A finished
 * phase is reported through two drain-on-read slots (`takeFinishedPhase`,
 * `takeLastCompletedFocusDuration`) rather than callbacks.
 */
export class PomodoroTimer {
  readonly config: PomodoroConfig;
  private readonly clock: Clock;

  private _phase: Phase = "focus";
  private _state: TimerState = "idle";
  private _remainingSeconds = 0;
  private _phaseTotalSeconds = 0;
  private _completedPomodoros = 0;
  private _lastTickAt: number | null = null;
  private _finishedPhase: Phase | null = null;
  private _lastCompletedFocusDuration: number | null = null;

  constructor(
    config: PomodoroConfig = DEFAULT_POMODORO_CONFIG,
    options: PomodoroTimerOptions = {},
  ) {
    this.config = { ...config };
    this.clock = options.clock ?? Date.now;
  }

  get phase(): Phase { return this._phase; }
  get state(): TimerState { return this._state; }
  get remainingSeconds(): number { return this._remainingSeconds; }
  get phaseTotalSeconds(): number { return this._phaseTotalSeconds; }
  get completedPomodoros(): number { return this._completedPomodoros; }
  get lastTickAt(): number | null { return this._lastTickAt; }

  /** Starts the current phase from its full duration, restarting it if already running. */
  start(): void {
    const total = getPhaseSeconds(this._phase, this.config);
    this._phaseTotalSeconds = total;
    this._remainingSeconds = total;
    this._state = "running";
    this._lastTickAt = this.clock();
  }

  togglePause(): void {
    switch (this._state) {
      case "running":
        this._state = "paused";
        this._lastTickAt = null;
        return;
      case "paused":
        this._state = "running";
        this._lastTickAt = this.clock();
        return;
      case "idle":
        return;
    }
  }

  stop(): void {
    this._state = "idle";
    this._remainingSeconds = 0;
    this._phaseTotalSeconds = 0;
    this._lastTickAt = null;
  }

  resetPomodorosAndStop(): void {
    this._completedPomodoros = 0;
    this._phase = "focus";
    this.stop();
  }

  setPhase(phase: Phase): void {
    this._phase = phase;
    this.stop();
  }

  tick(now: number): void {
    if (this._state !== "running" || this._lastTickAt === null) return;
    const elapsed = Math.trunc((now - this._lastTickAt) / 1000);
    // Same-second re-entry and clocks stepping backwards are ignored.
    if (!(elapsed > 0)) return;
    this._lastTickAt = now;
    this._remainingSeconds = Math.max(0, this._remainingSeconds - elapsed);
    if (this._remainingSeconds === 0) {
      this.finishPhase();
    }
  }

  takeFinishedPhase(): Phase | null {
    const phase = this._finishedPhase;
    this._finishedPhase = null;
    return phase;
  }

  takeLastCompletedFocusDuration(): number | null {
    const duration = this._lastCompletedFocusDuration;
    this._lastCompletedFocusDuration = null;
    return duration;
  }

  remainingDisplay(): string {
    return formatTime(this._remainingSeconds);
  }

  /** Fraction of the current phase already elapsed, 0 when nothing is started. */
  progress(): number {
    if (this._phaseTotalSeconds <= 0) return 0;
    const remaining = Math.max(0, this._remainingSeconds);
    const fraction = (this._phaseTotalSeconds - remaining) / this._phaseTotalSeconds;
    return Math.min(1, Math.max(0, fraction));
  }

  snapshot(): TimerSnapshot {
    return {
      phase: this._phase,
      state: this._state,
      remainingSeconds: this._remainingSeconds,
      phaseTotalSeconds: this._phaseTotalSeconds,
      completedPomodoros: this._completedPomodoros,
    };
  }

  /**
   * Restores persisted fields. A running snapshot comes back paused: time that
   * passed while nothing was ticking is never consumed from the countdown.
   */
  restore(snapshot: TimerSnapshot): void {
    this._phase = snapshot.phase;
    this._completedPomodoros = Math.min(
      toNonNegativeInteger(snapshot.completedPomodoros),
      Math.max(0, this.config.pomodorosBeforeLong - 1),
    );
    this._finishedPhase = null;
    this._lastCompletedFocusDuration = null;

    const total = toNonNegativeInteger(snapshot.phaseTotalSeconds);
    if (snapshot.state === "idle" || total === 0) {
      this.stop();
      return;
    }
    const remaining = Math.min(total, toNonNegativeInteger(snapshot.remainingSeconds));
    if (remaining === 0) {
      this.stop();
      return;
    }
    this._phaseTotalSeconds = total;
    this._remainingSeconds = remaining;
    this._state = "paused";
    this._lastTickAt = null;
  }

  private finishPhase(): void {
    const finished = this._phase;
    const total = this._phaseTotalSeconds;

    this._state = "idle";
    this._remainingSeconds = 0;
    this._phaseTotalSeconds = 0;
    this._lastTickAt = null;
    this._finishedPhase = finished;

    if (finished === "focus") {
      this._lastCompletedFocusDuration = total;
      this._completedPomodoros += 1;
      if (this._completedPomodoros >= this.config.pomodorosBeforeLong) {
        this._phase = "longBreak";
        this._completedPomodoros = 0;
      } else {
        this._phase = "shortBreak";
      }
      return;
    }

    this._phase = "focus";
  }
}
