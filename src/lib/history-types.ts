export type FocusRecord = {
  task: string;
  durationSeconds: number;
  completedAt: string;
  completedPomodoros: number;
};

export type FocusEntry = FocusRecord & {
  id: number;
};

export type WithCumulativePomodoros<T extends FocusRecord> = T & {
  cumulativePomodoros: number;
};

export type HistoryImportMode = "merge" | "overwrite";

export type HistoryTransferResult = {
  ok: boolean;
  count?: number;
  filePath?: string;
  reason?: "invalid-format" | "read-failed" | "write-failed";
};

export type FocusTotals = {
  seconds: number;
  records: number;
};

export type FocusSummary = {
  today: FocusTotals;
  week: FocusTotals;
  month: FocusTotals;
};
