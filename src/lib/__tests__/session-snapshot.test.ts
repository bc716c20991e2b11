import { describe, expect, it } from "vitest";
import { parseSessionSnapshot } from "@/lib/session-snapshot";

describe("parseSessionSnapshot", () => {
  const stored = {
    task: "write report",
    phase: "focus",
    state: "paused",
    remainingSeconds: 600,
    phaseTotalSeconds: 1500,
    completedPomodoros: 2,
  };

  it("reads a stored snapshot", () => {
    expect(parseSessionSnapshot(stored)).toEqual(stored);
  });

  it("downgrades a running snapshot to paused", () => {
    expect(parseSessionSnapshot({ ...stored, state: "running" })).toEqual(stored);
  });

  it("defaults a missing task to an empty label", () => {
    const { task: _task, ...withoutTask } = stored;
    expect(parseSessionSnapshot(withoutTask)?.task).toBe("");
  });

  it("floors fractional numbers", () => {
    expect(
      parseSessionSnapshot({ ...stored, remainingSeconds: 599.8 })?.remainingSeconds,
    ).toBe(599);
  });

  it("returns null for anything unreadable", () => {
    expect(parseSessionSnapshot(undefined)).toBeNull();
    expect(parseSessionSnapshot("focus")).toBeNull();
    expect(parseSessionSnapshot({ ...stored, phase: "Focus" })).toBeNull();
    expect(parseSessionSnapshot({ ...stored, state: "finished" })).toBeNull();
    expect(parseSessionSnapshot({ ...stored, remainingSeconds: -1 })).toBeNull();
    expect(parseSessionSnapshot({ ...stored, completedPomodoros: "2" })).toBeNull();
  });
});
