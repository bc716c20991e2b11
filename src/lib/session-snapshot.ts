import { isPhase, isTimerState } from "@/lib/pomodoro";
import type { TimerSnapshot } from "@/lib/pomodoro-timer";

export type SessionSnapshot = TimerSnapshot & {
  task: string;
};

const isNonNegativeNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value) && value >= 0;

/**
 * Reads a stored snapshot. Anything unreadable yields `null` so the caller
 * starts fresh; a running snapshot is handed back paused.
 */
export const parseSessionSnapshot = (value: unknown): SessionSnapshot | null => {
  if (!value || typeof value !== "object") return null;
  const candidate = value as {
    task?: unknown;
    phase?: unknown;
    state?: unknown;
    remainingSeconds?: unknown;
    phaseTotalSeconds?: unknown;
    completedPomodoros?: unknown;
  };
  if (
    !isPhase(candidate.phase) ||
    !isTimerState(candidate.state) ||
    !isNonNegativeNumber(candidate.remainingSeconds) ||
    !isNonNegativeNumber(candidate.phaseTotalSeconds) ||
    !isNonNegativeNumber(candidate.completedPomodoros)
  ) {
    return null;
  }
  return {
    task: typeof candidate.task === "string" ? candidate.task : "",
    phase: candidate.phase,
    state: candidate.state === "running" ? "paused" : candidate.state,
    remainingSeconds: Math.floor(candidate.remainingSeconds),
    phaseTotalSeconds: Math.floor(candidate.phaseTotalSeconds),
    completedPomodoros: Math.floor(candidate.completedPomodoros),
  };
};
