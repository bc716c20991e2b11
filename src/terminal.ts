import type { HistoryStore } from "@/history-store";
import type { HostLogger, PomodoroHost } from "@/host";
import { PHASES, type TimerState } from "@/lib/pomodoro";

// Each tick drops the sub-second remainder, so a short frame keeps the
// overrun per phase small.
export const FRAME_INTERVAL_MS = 100;

const PROGRESS_BAR_WIDTH = 20;
const CLEAR_LINE = "\r\x1b[2K";

const STATE_LABELS: Record<TimerState, string> = {
  idle: "idle",
  running: "running",
  paused: "paused",
};

export type KeyPress = {
  name?: string;
  ctrl?: boolean;
};

export type TaskAnswer =
  | { kind: "answer"; task: string }
  | { kind: "cancel" }
  | { kind: "interrupt" };

/** Terminal side effects, kept behind one seam so the session can run without a TTY. */
export type TerminalIO = {
  write: (text: string) => void;
  setRawMode: (enabled: boolean) => void;
  pause: () => void;
  resume: () => void;
  askTask: () => Promise<TaskAnswer>;
  /** Closes a prompt still waiting for input, if there is one. */
  closePrompt: () => void;
};

export type TerminalSessionOptions = {
  host: PomodoroHost;
  history: Pick<HistoryStore, "close">;
  io: TerminalIO;
  printHistory: () => void;
  printAbout: () => void;
  frameIntervalMs?: number;
  now?: () => number;
  logger?: HostLogger;
};

export const renderBar = (progress: number) => {
  const filled = Math.round(progress * PROGRESS_BAR_WIDTH);
  return `${"#".repeat(filled)}${"-".repeat(PROGRESS_BAR_WIDTH - filled)}`;
};

/**
 * Interactive loop around a `PomodoroHost`: the frame interval, key commands
 * and the task prompt. Every way out goes through `quit`, which saves the
 * session and closes the history store exactly once.
 */
export class TerminalSession {
  private readonly host: PomodoroHost;
  private readonly history: Pick<HistoryStore, "close">;
  private readonly io: TerminalIO;
  private readonly printHistory: () => void;
  private readonly printAbout: () => void;
  private readonly frameIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: HostLogger;

  private interval: ReturnType<typeof setInterval> | null = null;
  private _prompting = false;
  private _closed = false;

  constructor(options: TerminalSessionOptions) {
    this.host = options.host;
    this.history = options.history;
    this.io = options.io;
    this.printHistory = options.printHistory;
    this.printAbout = options.printAbout;
    this.frameIntervalMs = options.frameIntervalMs ?? FRAME_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? console;
  }

  get prompting(): boolean { return this._prompting; }
  get closed(): boolean { return this._closed; }

  run(): void {
    if (this._closed || this.interval) return;
    this.io.setRawMode(true);
    this.interval = setInterval(() => this.frame(), this.frameIntervalMs);
    this.render();
  }

  frame(): void {
    this.host.frame(this.now());
    this.render();
  }

  render(): void {
    if (this._prompting || this._closed) return;
    const display = this.host.display();
    const task = display.task ? `  ${display.task}` : "";
    const line =
      `${display.phaseLabel.padEnd(11)} ${display.remaining} [${renderBar(display.progress)}] ` +
      `${STATE_LABELS[display.state].padEnd(7)} ${display.completedPomodoros}/${display.pomodorosBeforeLong}${task}`;
    this.io.write(`${CLEAR_LINE}${line}`);
  }

  handleKey(key: KeyPress | undefined): void {
    if (this._prompting || this._closed || !key) return;
    if ((key.ctrl && key.name === "c") || key.name === "q") {
      this.quit();
      return;
    }
    switch (key.name) {
      case "s":
        this.host.start();
        break;
      case "space":
        this.host.togglePause();
        break;
      case "x":
        this.host.stop();
        break;
      case "r":
        this.host.reset();
        break;
      case "1":
      case "2":
      case "3":
        this.host.selectPhase(PHASES[Number(key.name) - 1]);
        break;
      case "t":
        this.promptTask().catch((error: unknown) => {
          this.logger.error("Failed to read task", error);
        });
        return;
      case "h":
        this.printAbove(this.printHistory);
        return;
      case "a":
        this.printAbove(this.printAbout);
        return;
    }
    this.render();
  }

  async promptTask(): Promise<void> {
    if (this._prompting || this._closed) return;
    this._prompting = true;
    this.io.setRawMode(false);
    this.io.write(CLEAR_LINE);
    let answer: TaskAnswer;
    try {
      answer = await this.io.askTask();
    } catch (error) {
      this.logger.warn("Failed to read task", error);
      answer = { kind: "cancel" };
    }
    this._prompting = false;

    if (answer.kind === "interrupt") {
      this.quit();
      return;
    }
    if (answer.kind === "answer") {
      this.host.setTask(answer.task);
    }
    if (this._closed) return;
    this.io.setRawMode(true);
    this.io.resume();
    this.render();
  }

  quit(): void {
    if (this._closed) return;
    this._closed = true;
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.host.dispose();
    this.history.close();
    this.io.closePrompt();
    this.io.setRawMode(false);
    this.io.pause();
    this.io.write("\n");
  }

  private printAbove(print: () => void): void {
    this.io.write(CLEAR_LINE);
    print();
    this.render();
  }
}
