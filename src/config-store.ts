import Conf from "conf";
import path from "node:path";
import {
  DEFAULT_FOCUS_MINUTES,
  DEFAULT_LONG_BREAK_MINUTES,
  DEFAULT_POMODOROS_BEFORE_LONG,
  DEFAULT_SHORT_BREAK_MINUTES,
  clampPomodorosBeforeLong,
  clampTimerMinutes,
  type PomodoroMinutes,
} from "@/lib/pomodoro";
import {
  parseSessionSnapshot,
  type SessionSnapshot,
} from "@/lib/session-snapshot";

export const PROJECT_NAME = "tomato-timer";

export type AppConfig = PomodoroMinutes & {
  bell: boolean;
};

type StoreShape = AppConfig & {
  session?: SessionSnapshot;
};

export const DEFAULT_CONFIG: AppConfig = {
  focusMinutes: DEFAULT_FOCUS_MINUTES,
  shortBreakMinutes: DEFAULT_SHORT_BREAK_MINUTES,
  longBreakMinutes: DEFAULT_LONG_BREAK_MINUTES,
  pomodorosBeforeLong: DEFAULT_POMODOROS_BEFORE_LONG,
  bell: true,
};

export type ConfigStore = {
  /** Settings file on disk. */
  readonly path: string;
  /** Directory holding the settings file and the history database. */
  readonly dataDir: string;
  getConfig: () => AppConfig;
  setConfig: (value: Partial<AppConfig>) => AppConfig;
  loadSession: () => SessionSnapshot | null;
  saveSession: (snapshot: SessionSnapshot) => void;
  clearSession: () => void;
};

export type ConfigStoreOptions = {
  cwd?: string;
  // Drops the saved session so the timer starts from scratch.
  freshStart?: boolean;
};

const numberOr = (value: unknown, fallback: number) =>
  typeof value === "number" && Number.isFinite(value) ? value : fallback;

const normalizeConfig = (value: Partial<AppConfig>): AppConfig => ({
  focusMinutes: clampTimerMinutes(
    numberOr(value.focusMinutes, DEFAULT_FOCUS_MINUTES),
  ),
  shortBreakMinutes: clampTimerMinutes(
    numberOr(value.shortBreakMinutes, DEFAULT_SHORT_BREAK_MINUTES),
  ),
  longBreakMinutes: clampTimerMinutes(
    numberOr(value.longBreakMinutes, DEFAULT_LONG_BREAK_MINUTES),
  ),
  pomodorosBeforeLong: clampPomodorosBeforeLong(
    numberOr(value.pomodorosBeforeLong, DEFAULT_POMODOROS_BEFORE_LONG),
  ),
  bell: typeof value.bell === "boolean" ? value.bell : DEFAULT_CONFIG.bell,
});

export const createConfigStore = (
  options: ConfigStoreOptions = {},
): ConfigStore => {
  const configStore = new Conf<StoreShape>({
    projectName: PROJECT_NAME,
    cwd: options.cwd ?? process.env.TOMATO_TIMER_HOME,
    defaults: DEFAULT_CONFIG,
    // A corrupt settings file is replaced by the defaults.
    clearInvalidConfig: true,
  });

  const getConfig = (): AppConfig =>
    normalizeConfig({
      focusMinutes: configStore.get("focusMinutes"),
      shortBreakMinutes: configStore.get("shortBreakMinutes"),
      longBreakMinutes: configStore.get("longBreakMinutes"),
      pomodorosBeforeLong: configStore.get("pomodorosBeforeLong"),
      bell: configStore.get("bell"),
    });

  const setConfig = (value: Partial<AppConfig>) => {
    const current = getConfig();
    const nextConfig = normalizeConfig({
      focusMinutes: value.focusMinutes ?? current.focusMinutes,
      shortBreakMinutes: value.shortBreakMinutes ?? current.shortBreakMinutes,
      longBreakMinutes: value.longBreakMinutes ?? current.longBreakMinutes,
      pomodorosBeforeLong:
        value.pomodorosBeforeLong ?? current.pomodorosBeforeLong,
      bell: value.bell ?? current.bell,
    });
    configStore.set(nextConfig);
    return nextConfig;
  };

  const loadSession = () => parseSessionSnapshot(configStore.get("session"));

  const saveSession = (snapshot: SessionSnapshot) => {
    configStore.set("session", snapshot);
  };

  const clearSession = () => {
    configStore.delete("session");
  };

  if (options.freshStart) {
    clearSession();
  }

  return {
    path: configStore.path,
    dataDir: path.dirname(configStore.path),
    getConfig,
    setConfig,
    loadSession,
    saveSession,
    clearSession,
  };
};
