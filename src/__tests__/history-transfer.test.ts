import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openHistoryStore, type HistoryStore } from "@/history-store";
import { exportHistory, importHistory } from "@/history-transfer";
import type { FocusRecord } from "@/lib/history-types";

const record = (task: string, completedAt: string): FocusRecord => ({
  task,
  durationSeconds: 1500,
  completedAt,
  completedPomodoros: 1,
});

describe("history transfer", () => {
  let dir: string;
  let store: HistoryStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tomato-transfer-"));
    store = openHistoryStore(":memory:");
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const file = (name: string) => path.join(dir, name);

  describe("exportHistory", () => {
    it("writes every record oldest first", async () => {
      store.append(record("B", "2026-10-19T10:00:00+08:00"));
      store.append(record("A", "2026-10-19T09:00:00+08:00"));
      const target = file("export.json");

      const result = await exportHistory(store, target, new Date("2026-10-19T03:00:00.000Z"));

      expect(result).toEqual({ ok: true, count: 2, filePath: target });
      expect(JSON.parse(fs.readFileSync(target, "utf8"))).toEqual({
        version: 1,
        exportedAt: "2026-10-19T03:00:00.000Z",
        records: [
          record("A", "2026-10-19T09:00:00+08:00"),
          record("B", "2026-10-19T10:00:00+08:00"),
        ],
      });
    });

    it("reports a write failure", async () => {
      const result = await exportHistory(store, path.join(dir, "missing", "export.json"));
      expect(result).toEqual({ ok: false, reason: "write-failed" });
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it("reports a failing store as a read failure", async () => {
      const broken = {
        listAll: () => {
          throw new Error("database is locked");
        },
      };
      expect(await exportHistory(broken, file("export.json"))).toEqual({
        ok: false,
        reason: "read-failed",
      });
    });
  });

  describe("importHistory", () => {
    const writeJson = (name: string, value: unknown) => {
      fs.writeFileSync(file(name), JSON.stringify(value), "utf8");
      return file(name);
    };

    it("merges by default", async () => {
      store.append(record("A", "2026-10-19T09:00:00+08:00"));
      const source = writeJson("history.json", {
        version: 1,
        records: [
          record("A", "2026-10-19T09:00:00+08:00"),
          record("B", "2026-10-19T10:00:00+08:00"),
        ],
      });

      expect(await importHistory(store, source)).toEqual({
        ok: true,
        count: 1,
        filePath: source,
      });
      expect(store.load().map((entry) => entry.task)).toEqual(["B", "A"]);
    });

    it("replaces the history in overwrite mode", async () => {
      store.append(record("old", "2026-10-18T09:00:00+08:00"));
      const source = writeJson("history.json", {
        records: [record("new", "2026-10-19T09:00:00+08:00")],
      });

      const result = await importHistory(store, source, "overwrite");

      expect(result.count).toBe(1);
      expect(store.listAll()).toEqual([record("new", "2026-10-19T09:00:00+08:00")]);
    });

    it("accepts an empty records array", async () => {
      const source = writeJson("empty.json", { records: [] });
      expect(await importHistory(store, source)).toEqual({
        ok: true,
        count: 0,
        filePath: source,
      });
    });

    it("rejects a file that is not JSON", async () => {
      fs.writeFileSync(file("broken.json"), "{ records: ", "utf8");
      expect(await importHistory(store, file("broken.json"))).toEqual({
        ok: false,
        reason: "invalid-format",
      });
    });

    it("rejects a payload without usable records", async () => {
      const unrecognized = writeJson("other.json", { sessions: [] });
      const allInvalid = writeJson("invalid.json", { records: [{ task: 1 }] });
      expect((await importHistory(store, unrecognized)).reason).toBe("invalid-format");
      expect((await importHistory(store, allInvalid)).reason).toBe("invalid-format");
      expect(store.load()).toEqual([]);
    });

    it("reports a missing file as a read failure", async () => {
      expect(await importHistory(store, file("nope.json"))).toEqual({
        ok: false,
        reason: "read-failed",
      });
    });
  });
});
