import fs from "node:fs/promises";
import type { HistoryStore } from "@/history-store";
import { extractFocusRecords } from "@/lib/history";
import type {
  FocusRecord,
  HistoryImportMode,
  HistoryTransferResult,
} from "@/lib/history-types";

export const EXPORT_VERSION = 1;

export const exportHistory = async (
  store: Pick<HistoryStore, "listAll">,
  filePath: string,
  now: Date = new Date(),
): Promise<HistoryTransferResult> => {
  let records: FocusRecord[];
  try {
    records = store.listAll();
  } catch (error) {
    console.error("Failed to read focus history", error);
    return { ok: false, reason: "read-failed" };
  }

  const payload = {
    version: EXPORT_VERSION,
    exportedAt: now.toISOString(),
    records,
  };

  try {
    await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf8");
    return { ok: true, count: records.length, filePath };
  } catch (error) {
    console.error("Failed to export focus history", error);
    return { ok: false, reason: "write-failed" };
  }
};

export const importHistory = async (
  store: Pick<HistoryStore, "merge" | "replace">,
  filePath: string,
  mode: HistoryImportMode = "merge",
): Promise<HistoryTransferResult> => {
  let raw = "";
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    console.error("Failed to read history file", error);
    return { ok: false, reason: "read-failed" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    console.error("Failed to parse history file", error);
    return { ok: false, reason: "invalid-format" };
  }

  const { records, recognized, sourceCount } = extractFocusRecords(parsed);
  if (!recognized || (sourceCount > 0 && records.length === 0)) {
    return { ok: false, reason: "invalid-format" };
  }

  try {
    const count =
      mode === "overwrite" ? store.replace(records) : store.merge(records);
    return { ok: true, count, filePath };
  } catch (error) {
    console.error("Failed to import focus history", error);
    return { ok: false, reason: "write-failed" };
  }
};
