import { describe, expect, it } from "vitest";
import {
  DEFAULT_POMODORO_CONFIG,
  clampPomodorosBeforeLong,
  clampTimerMinutes,
  createPomodoroConfig,
  formatTime,
  getPhaseSeconds,
  isPhase,
  isTimerState,
} from "@/lib/pomodoro";

describe("pomodoro settings", () => {
  it("defaults to 25/5/15 minutes with a long break every 4", () => {
    expect(DEFAULT_POMODORO_CONFIG).toEqual({
      focusSeconds: 1500,
      shortBreakSeconds: 300,
      longBreakSeconds: 900,
      pomodorosBeforeLong: 4,
    });
  });

  it("clamps and rounds timer minutes", () => {
    expect(clampTimerMinutes(0)).toBe(1);
    expect(clampTimerMinutes(24.6)).toBe(25);
    expect(clampTimerMinutes(500)).toBe(120);
    expect(clampTimerMinutes(Number.NaN)).toBe(1);
  });

  it("clamps the long break interval", () => {
    expect(clampPomodorosBeforeLong(0)).toBe(1);
    expect(clampPomodorosBeforeLong(3.4)).toBe(3);
    expect(clampPomodorosBeforeLong(40)).toBe(12);
    expect(clampPomodorosBeforeLong(Number.POSITIVE_INFINITY)).toBe(4);
  });

  it("builds a config in seconds", () => {
    const config = createPomodoroConfig({
      focusMinutes: 50,
      shortBreakMinutes: 10,
      longBreakMinutes: 0,
      pomodorosBeforeLong: 2,
    });
    expect(config).toEqual({
      focusSeconds: 3000,
      shortBreakSeconds: 600,
      longBreakSeconds: 60,
      pomodorosBeforeLong: 2,
    });
    expect(getPhaseSeconds("focus", config)).toBe(3000);
    expect(getPhaseSeconds("shortBreak", config)).toBe(600);
    expect(getPhaseSeconds("longBreak", config)).toBe(60);
  });
});

describe("formatTime", () => {
  it("pads minutes and seconds", () => {
    expect(formatTime(0)).toBe("00:00");
    expect(formatTime(65)).toBe("01:05");
    expect(formatTime(1500)).toBe("25:00");
  });

  it("clamps negative values and keeps long minutes", () => {
    expect(formatTime(-12)).toBe("00:00");
    expect(formatTime(7200)).toBe("120:00");
  });
});

describe("guards", () => {
  it("recognises phases and timer states", () => {
    expect(isPhase("shortBreak")).toBe(true);
    expect(isPhase("ShortBreak")).toBe(false);
    expect(isPhase(1)).toBe(false);
    expect(isTimerState("paused")).toBe(true);
    expect(isTimerState("finished")).toBe(false);
  });
});
