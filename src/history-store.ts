import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { createRecordKey, startOfDay } from "@/lib/history";
import type {
  FocusEntry,
  FocusRecord,
  FocusSummary,
  FocusTotals,
} from "@/lib/history-types";

export const HISTORY_DB_FILENAME = "tomato-timer.sqlite";

export type HistoryStore = {
  append: (record: FocusRecord) => number;
  load: (limit?: number) => FocusEntry[];
  listAll: () => FocusRecord[];
  replace: (records: FocusRecord[]) => number;
  merge: (records: FocusRecord[]) => number;
  summary: (now?: Date | number) => FocusSummary;
  close: () => void;
};

export type HistoryStoreOptions = {
  // Deletes an existing database (and its WAL files) before the first open.
  freshStart?: boolean;
};

type FocusRow = {
  id: number;
  task: string;
  durationSeconds: number;
  completedAt: string;
  completedPomodoros: number;
};

const SELECT_COLUMNS = `
  id,
  task,
  duration_seconds AS durationSeconds,
  completed_at AS completedAt,
  completed_pomodoros AS completedPomodoros
`;

const INSERT_RECORD =
  "INSERT INTO focus_records (task, duration_seconds, completed_at, completed_pomodoros) VALUES (?, ?, ?, ?)";

const toEntry = (row: FocusRow): FocusEntry => ({
  id: Number(row.id),
  task: row.task,
  durationSeconds: Number(row.durationSeconds),
  completedAt: row.completedAt,
  completedPomodoros: Number(row.completedPomodoros),
});

/**
 * Opens the focus history database lazily: nothing touches the disk until the
 * first call, so a missing or unwritable data directory surfaces as an error
 * from that call.
 */
export const openHistoryStore = (
  filename: string,
  options: HistoryStoreOptions = {},
): HistoryStore => {
  let db: Database.Database | null = null;
  let didApplyFreshStart = false;
  const inMemory = filename === ":memory:";

  const ensureDb = () => {
    if (db) return db;
    if (!inMemory) {
      if (options.freshStart && !didApplyFreshStart) {
        didApplyFreshStart = true;
        fs.rmSync(filename, { force: true });
        fs.rmSync(`${filename}-wal`, { force: true });
        fs.rmSync(`${filename}-shm`, { force: true });
      }
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    const database = new Database(filename);
    if (!inMemory) {
      database.pragma("journal_mode = WAL");
    }
    database.exec(`
      CREATE TABLE IF NOT EXISTS focus_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        task TEXT NOT NULL,
        duration_seconds INTEGER NOT NULL,
        completed_at TEXT NOT NULL,
        completed_pomodoros INTEGER NOT NULL
      );
    `);
    database.exec(
      "CREATE INDEX IF NOT EXISTS focus_records_completed_at ON focus_records(completed_at)",
    );
    db = database;
    return database;
  };

  const insertAll = (database: Database.Database, records: FocusRecord[]) => {
    const insert = database.prepare(INSERT_RECORD);
    for (const record of records) {
      insert.run(
        record.task,
        record.durationSeconds,
        record.completedAt,
        record.completedPomodoros,
      );
    }
  };

  const totalsSince = (database: Database.Database, sinceIso: string): FocusTotals => {
    const row = database
      .prepare(
        `
        SELECT
          COALESCE(SUM(duration_seconds), 0) AS seconds,
          COUNT(*) AS records
        FROM focus_records
        WHERE completed_at >= ?
        `,
      )
      .get(sinceIso) as { seconds: number; records: number } | undefined;
    return {
      seconds: Number(row?.seconds ?? 0),
      records: Number(row?.records ?? 0),
    };
  };

  const append = (record: FocusRecord) => {
    const database = ensureDb();
    const info = database
      .prepare(INSERT_RECORD)
      .run(
        record.task,
        record.durationSeconds,
        record.completedAt,
        record.completedPomodoros,
      );
    return Number(info.lastInsertRowid);
  };

  const load = (limit = 0) => {
    const database = ensureDb();
    // Anything below one row means all rows; LIMIT -1 is "no limit" in SQLite.
    const safeLimit = Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : -1;
    const rows = database
      .prepare(
        `SELECT ${SELECT_COLUMNS} FROM focus_records ORDER BY completed_at DESC, id DESC LIMIT ?`,
      )
      .all(safeLimit) as FocusRow[];
    return rows.map(toEntry);
  };

  const listAll = (): FocusRecord[] => {
    const database = ensureDb();
    const rows = database
      .prepare(
        `SELECT ${SELECT_COLUMNS} FROM focus_records ORDER BY completed_at ASC, id ASC`,
      )
      .all() as FocusRow[];
    return rows.map((row) => ({
      task: row.task,
      durationSeconds: Number(row.durationSeconds),
      completedAt: row.completedAt,
      completedPomodoros: Number(row.completedPomodoros),
    }));
  };

  const replace = (records: FocusRecord[]) => {
    const database = ensureDb();
    const run = database.transaction((entries: FocusRecord[]) => {
      database.exec("DELETE FROM focus_records");
      database.exec("DELETE FROM sqlite_sequence WHERE name = 'focus_records'");
      insertAll(database, entries);
    });
    run(records);
    return records.length;
  };

  const merge = (records: FocusRecord[]) => {
    const database = ensureDb();
    const existingKeys = new Set(listAll().map(createRecordKey));
    const uniqueRecords = records.filter((record) => {
      const key = createRecordKey(record);
      if (existingKeys.has(key)) {
        return false;
      }
      existingKeys.add(key);
      return true;
    });
    if (uniqueRecords.length === 0) {
      return 0;
    }
    const run = database.transaction((entries: FocusRecord[]) => {
      insertAll(database, entries);
    });
    run(uniqueRecords);
    return uniqueRecords.length;
  };

  const summary = (now: Date | number = Date.now()): FocusSummary => {
    const database = ensureDb();
    return {
      today: totalsSince(database, startOfDay(now)),
      week: totalsSince(database, startOfDay(now, 6)),
      month: totalsSince(database, startOfDay(now, 29)),
    };
  };

  const close = () => {
    if (!db) return;
    db.close();
    db = null;
  };

  return {
    append,
    load,
    listAll,
    replace,
    merge,
    summary,
    close,
  };
};
