#!/usr/bin/env tsx
import path from "node:path";
import readline from "node:readline";
import { parseArgs } from "node:util";
import { createConfigStore, type AppConfig } from "@/config-store";
import {
  HISTORY_DB_FILENAME,
  openHistoryStore,
  type HistoryStore,
} from "@/history-store";
import { exportHistory, importHistory } from "@/history-transfer";
import { PomodoroHost } from "@/host";
import type { FocusTotals } from "@/lib/history-types";
import {
  PHASE_LABELS,
  createPomodoroConfig,
  formatTime,
} from "@/lib/pomodoro";
import { PomodoroTimer } from "@/lib/pomodoro-timer";
import { TerminalSession, type TaskAnswer, type TerminalIO } from "@/terminal";

const DEFAULT_HISTORY_LIMIT = 20;

const USAGE = `Usage: tomato-timer [options]

  -t, --task <label>     label recorded with completed focus intervals
      --focus <min>      focus length in minutes (saved)
      --short <min>      short break length in minutes (saved)
      --long <min>       long break length in minutes (saved)
      --every <n>        focus intervals before a long break (saved)
      --history          print recent focus records and exit
      --limit <n>        number of records for --history (0 = all)
      --summary          print focus totals for today, 7 and 30 days and exit
      --about            print where settings and history are stored and exit
      --export <file>    write the focus history to a JSON file and exit
      --import <file>    merge focus history from a JSON file and exit
      --overwrite        with --import, replace the stored history
  -h, --help             show this help

Keys: s start  space pause/resume  x stop  r reset  1/2/3 phase  t task
      h history  a about  q quit`;

const parseNumberFlag = (value: string | undefined) => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const formatTotals = (label: string, totals: FocusTotals) =>
  `${label.padEnd(8)} ${formatTime(totals.seconds).padStart(6)}  (${totals.records} records)`;

const printHistory = (host: PomodoroHost, limit: number) => {
  const entries = host.history();
  const visible = limit >= 1 ? entries.slice(0, Math.floor(limit)) : entries;
  if (visible.length === 0) {
    console.log("No focus records yet.");
    return;
  }
  for (const entry of visible) {
    const task = entry.task || "(no task)";
    console.log(
      `${entry.completedAt}  ${formatTime(entry.durationSeconds)}  #${entry.cumulativePomodoros}  ${task}`,
    );
  }
};

const printAbout = (dataDir: string, settingsPath: string, dbPath: string) => {
  console.log("tomato-timer: Pomodoro timer with a local focus history");
  console.log(`Data directory: ${dataDir}`);
  console.log(`Settings:       ${settingsPath}`);
  console.log(`History:        ${dbPath}`);
  console.log("Copy the data directory to move your history to another machine.");
};

const createTerminalIO = (): TerminalIO => {
  const { stdin, stdout } = process;
  let prompt: readline.Interface | null = null;

  return {
    write: (text) => {
      stdout.write(text);
    },
    setRawMode: (enabled) => {
      if (stdin.isTTY) stdin.setRawMode(enabled);
    },
    pause: () => {
      stdin.pause();
    },
    resume: () => {
      stdin.resume();
    },
    askTask: () =>
      new Promise<TaskAnswer>((resolve) => {
        const rl = readline.createInterface({ input: stdin, output: stdout });
        prompt = rl;
        let answer: TaskAnswer = { kind: "cancel" };
        // Ctrl-C at the prompt quits like it does everywhere else.
        rl.on("SIGINT", () => {
          answer = { kind: "interrupt" };
          rl.close();
        });
        rl.once("close", () => {
          prompt = null;
          resolve(answer);
        });
        rl.question("Task: ", (task) => {
          answer = { kind: "answer", task };
          rl.close();
        });
      }),
    closePrompt: () => {
      prompt?.close();
    },
  };
};

const runInteractive = (
  host: PomodoroHost,
  history: HistoryStore,
  about: () => void,
) => {
  const session = new TerminalSession({
    host,
    history,
    io: createTerminalIO(),
    printHistory: () => printHistory(host, DEFAULT_HISTORY_LIMIT),
    printAbout: about,
  });

  const quit = () => {
    process.off("SIGINT", quit);
    process.off("SIGTERM", quit);
    session.quit();
  };

  readline.emitKeypressEvents(process.stdin);
  process.stdin.on("keypress", (_input: string | undefined, key: readline.Key | undefined) => {
    session.handleKey(key);
    if (session.closed) quit();
  });
  process.once("SIGINT", quit);
  process.once("SIGTERM", quit);
  session.run();
};

const main = async () => {
  const { values } = parseArgs({
    options: {
      task: { type: "string", short: "t" },
      focus: { type: "string" },
      short: { type: "string" },
      long: { type: "string" },
      every: { type: "string" },
      history: { type: "boolean" },
      limit: { type: "string" },
      summary: { type: "boolean" },
      about: { type: "boolean" },
      export: { type: "string" },
      import: { type: "string" },
      overwrite: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const freshStart = process.env.FRESH_START === "1";
  const configStore = createConfigStore({ freshStart });
  const overrides: Partial<AppConfig> = {
    focusMinutes: parseNumberFlag(values.focus),
    shortBreakMinutes: parseNumberFlag(values.short),
    longBreakMinutes: parseNumberFlag(values.long),
    pomodorosBeforeLong: parseNumberFlag(values.every),
  };
  const config = Object.values(overrides).some((value) => value !== undefined)
    ? configStore.setConfig(overrides)
    : configStore.getConfig();

  const dbPath = path.join(configStore.dataDir, HISTORY_DB_FILENAME);
  const history = openHistoryStore(dbPath, {
    freshStart,
  });
  const about = () => printAbout(configStore.dataDir, configStore.path, dbPath);

  if (values.about) {
    about();
    return;
  }

  if (values.export) {
    const result = await exportHistory(history, values.export);
    history.close();
    if (!result.ok) {
      console.error(`Export failed: ${result.reason}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Exported ${result.count} records to ${result.filePath}`);
    return;
  }

  if (values.import) {
    const mode = values.overwrite ? "overwrite" : "merge";
    const result = await importHistory(history, values.import, mode);
    history.close();
    if (!result.ok) {
      console.error(`Import failed: ${result.reason}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Imported ${result.count} records (${mode})`);
    return;
  }

  if (values.summary) {
    try {
      const summary = history.summary();
      console.log(formatTotals("Today", summary.today));
      console.log(formatTotals("7 days", summary.week));
      console.log(formatTotals("30 days", summary.month));
    } finally {
      history.close();
    }
    return;
  }

  const timer = new PomodoroTimer(createPomodoroConfig(config));
  const host = new PomodoroHost({
    timer,
    history,
    session: configStore,
    notify: (phase) => {
      if (config.bell) process.stdout.write("\x07");
      process.stdout.write(`\r\x1b[2K${PHASE_LABELS[phase]} finished.\n`);
    },
  });
  host.init();
  if (values.task !== undefined) {
    host.setTask(values.task);
  }

  if (values.history) {
    const limit = parseNumberFlag(values.limit) ?? DEFAULT_HISTORY_LIMIT;
    printHistory(host, limit);
    history.close();
    return;
  }

  runInteractive(host, history, about);
};

main().catch((error) => {
  console.error("tomato-timer failed", error);
  process.exitCode = 1;
});
