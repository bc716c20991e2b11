import type {
  FocusRecord,
  WithCumulativePomodoros,
} from "@/lib/history-types";

// Completion times are stored and grouped on a fixed UTC+8 calendar.
export const COMPLETED_AT_OFFSET = "+08:00";
const OFFSET_MS = 8 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Formats an instant as `YYYY-MM-DDTHH:mm:ss+08:00`. */
export const formatCompletedAt = (value: Date | number) => {
  const time = typeof value === "number" ? value : value.getTime();
  const shifted = new Date(time + OFFSET_MS).toISOString();
  return `${shifted.slice(0, 19)}${COMPLETED_AT_OFFSET}`;
};

/** Midnight (UTC+8) `daysBack` days before the day containing `now`. */
export const startOfDay = (now: Date | number, daysBack = 0) => {
  const time = typeof now === "number" ? now : now.getTime();
  const shiftedMidnight = Math.floor((time + OFFSET_MS) / DAY_MS) * DAY_MS;
  return formatCompletedAt(shiftedMidnight - OFFSET_MS - daysBack * DAY_MS);
};

export const compareCompletedAt = (a: FocusRecord, b: FocusRecord) => {
  const aTime = Date.parse(a.completedAt);
  const bTime = Date.parse(b.completedAt);
  if (!Number.isFinite(aTime) || !Number.isFinite(bTime)) {
    return a.completedAt.localeCompare(b.completedAt);
  }
  return aTime - bTime;
};

/**
 * Attaches a running per-task tomato count to each record. Sums are built
 * oldest first, then the list is returned newest first; each record adds at
 * least 1 even when its stored counter is 0.
 */
export const withCumulativePomodoros = <T extends FocusRecord>(
  records: readonly T[],
): WithCumulativePomodoros<T>[] => {
  const totals = new Map<string, number>();
  const ascending = records
    .slice()
    .sort(compareCompletedAt)
    .map((record) => {
      const cumulativePomodoros =
        (totals.get(record.task) ?? 0) + Math.max(1, record.completedPomodoros);
      totals.set(record.task, cumulativePomodoros);
      return { ...record, cumulativePomodoros };
    });
  return ascending.reverse();
};

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

export const parseFocusRecord = (entry: unknown): FocusRecord | null => {
  if (!entry || typeof entry !== "object") return null;
  const candidate = entry as {
    task?: unknown;
    durationSeconds?: unknown;
    completedAt?: unknown;
    completedPomodoros?: unknown;
  };
  if (
    typeof candidate.task !== "string" ||
    !isPositiveInteger(candidate.durationSeconds) ||
    typeof candidate.completedAt !== "string"
  ) {
    return null;
  }
  const completedAt = Date.parse(candidate.completedAt);
  if (!Number.isFinite(completedAt)) return null;
  return {
    task: candidate.task,
    durationSeconds: candidate.durationSeconds,
    completedAt: formatCompletedAt(completedAt),
    completedPomodoros: isNonNegativeInteger(candidate.completedPomodoros)
      ? candidate.completedPomodoros
      : 0,
  };
};

export const extractFocusRecords = (
  payload: unknown,
): { records: FocusRecord[]; recognized: boolean; sourceCount: number } => {
  if (!payload || typeof payload !== "object") {
    return { records: [], recognized: false, sourceCount: 0 };
  }

  const root = payload as { records?: unknown };
  if (!Array.isArray(root.records)) {
    return { records: [], recognized: false, sourceCount: 0 };
  }

  const records = root.records
    .map(parseFocusRecord)
    .filter((record): record is FocusRecord => record !== null);

  return {
    records,
    recognized: true,
    sourceCount: root.records.length,
  };
};

export const createRecordKey = (record: FocusRecord) =>
  `${record.task}::${record.completedAt}`;
