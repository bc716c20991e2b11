export const PHASES = ["focus", "shortBreak", "longBreak"] as const;
export type Phase = (typeof PHASES)[number];

export const TIMER_STATES = ["idle", "running", "paused"] as const;
export type TimerState = (typeof TIMER_STATES)[number];

export type PomodoroConfig = {
  focusSeconds: number;
  shortBreakSeconds: number;
  longBreakSeconds: number;
  pomodorosBeforeLong: number;
};

export type PomodoroMinutes = {
  focusMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  pomodorosBeforeLong: number;
};

export const PHASE_LABELS: Record<Phase, string> = {
  focus: "Focus",
  shortBreak: "Short Break",
  longBreak: "Long Break",
};

export const MIN_TIMER_MINUTES = 1;
export const MAX_TIMER_MINUTES = 120;
export const DEFAULT_FOCUS_MINUTES = 25;
export const DEFAULT_SHORT_BREAK_MINUTES = 5;
export const DEFAULT_LONG_BREAK_MINUTES = 15;

export const MIN_POMODOROS_BEFORE_LONG = 1;
export const MAX_POMODOROS_BEFORE_LONG = 12;
export const DEFAULT_POMODOROS_BEFORE_LONG = 4;

export const clampTimerMinutes = (value: number) => {
  if (!Number.isFinite(value)) return MIN_TIMER_MINUTES;
  const rounded = Math.round(value);
  return Math.min(MAX_TIMER_MINUTES, Math.max(MIN_TIMER_MINUTES, rounded));
};

export const clampPomodorosBeforeLong = (value: number) => {
  if (!Number.isFinite(value)) return DEFAULT_POMODOROS_BEFORE_LONG;
  const rounded = Math.round(value);
  return Math.min(
    MAX_POMODOROS_BEFORE_LONG,
    Math.max(MIN_POMODOROS_BEFORE_LONG, rounded),
  );
};

export const createPomodoroConfig = (
  minutes: PomodoroMinutes,
): PomodoroConfig => ({
  focusSeconds: clampTimerMinutes(minutes.focusMinutes) * 60,
  shortBreakSeconds: clampTimerMinutes(minutes.shortBreakMinutes) * 60,
  longBreakSeconds: clampTimerMinutes(minutes.longBreakMinutes) * 60,
  pomodorosBeforeLong: clampPomodorosBeforeLong(minutes.pomodorosBeforeLong),
});

export const DEFAULT_POMODORO_CONFIG: PomodoroConfig = createPomodoroConfig({
  focusMinutes: DEFAULT_FOCUS_MINUTES,
  shortBreakMinutes: DEFAULT_SHORT_BREAK_MINUTES,
  longBreakMinutes: DEFAULT_LONG_BREAK_MINUTES,
  pomodorosBeforeLong: DEFAULT_POMODOROS_BEFORE_LONG,
});

export const getPhaseSeconds = (phase: Phase, config: PomodoroConfig) => {
  switch (phase) {
    case "focus":
      return config.focusSeconds;
    case "shortBreak":
      return config.shortBreakSeconds;
    case "longBreak":
      return config.longBreakSeconds;
  }
};

export const isPhase = (value: unknown): value is Phase =>
  typeof value === "string" && (PHASES as readonly string[]).includes(value);

export const isTimerState = (value: unknown): value is TimerState =>
  typeof value === "string" &&
  (TIMER_STATES as readonly string[]).includes(value);

export const formatTime = (totalSeconds: number) => {
  const safeSeconds = Math.max(0, Math.floor(totalSeconds));
  const minutes = Math.floor(safeSeconds / 60);
  const seconds = safeSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
};
