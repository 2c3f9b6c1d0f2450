import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

import { settingsSchema } from "../types/schemas";
import { ConfigurationError } from "./errors";

const parseBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "y", "on"].includes(value.toLowerCase());
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseAppEnv = (value: string | undefined): "dev" | "test" | "prod" => {
  const normalized = (value ?? "dev").toLowerCase();
  if (normalized === "test" || normalized === "prod") return normalized;
  return "dev";
};

const isTestRuntime = (env: NodeJS.ProcessEnv): boolean => {
  const appEnv = (env.APP_ENV ?? "").toLowerCase();
  const nodeEnv = (env.NODE_ENV ?? "").toLowerCase();
  return appEnv === "test" || nodeEnv === "test" || Boolean(env.VITEST);
};

const buildSettings = (env: NodeJS.ProcessEnv) => {
  const testRuntime = isTestRuntime(env);

  return {
    appName: env.APP_NAME ?? "oi-signal-bot",
    appHost: env.APP_HOST ?? "127.0.0.1",
    appPort: parseNumber(env.APP_PORT, 8000),
    appEnv: testRuntime ? "test" : parseAppEnv(env.APP_ENV),
    timezone: env.TIMEZONE ?? "Asia/Kolkata",

    dbPath: env.DB_PATH ?? (testRuntime ? ":memory:" : "./data/oi_signal_bot.sqlite"),
    jsonlAuditPath:
      env.JSONL_AUDIT_PATH ?? (testRuntime ? "./data/audit.test.jsonl" : "./data/audit.jsonl"),
    apiLogRetentionDays: parseNumber(env.API_LOG_RETENTION_DAYS, 14),

    pollIntervalSeconds: parseNumber(env.POLL_INTERVAL_SECONDS, 60),
    fetchTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, 10_000),

    underlyingInstrument: env.UNDERLYING_INSTRUMENT ?? "NSE_INDEX|Nifty 50",
    upstoxAccessToken: env.UPSTOX_ACCESS_TOKEN ?? "",
    upstoxBaseUrl: env.UPSTOX_BASE_URL ?? "https://api.upstox.com",
    strikeGap: parseNumber(env.STRIKE_GAP, 50),
    strikeRange: parseNumber(env.STRIKE_RANGE, 2),
    lotSize: parseNumber(env.LOT_SIZE, 75),

    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? "",
    telegramChatId: env.TELEGRAM_CHAT_ID ?? "",
    telegramBaseUrl: env.TELEGRAM_BASE_URL ?? "https://api.telegram.org",

    paperTrading: parseBool(env.PAPER_TRADING, true),
    sessionStart: env.SESSION_START ?? "09:15",
    sessionEnd: env.SESSION_END ?? "15:30",
    expiryWeekday: parseNumber(env.EXPIRY_WEEKDAY, 2),

    rollingWindowSize: parseNumber(env.ROLLING_WINDOW_SIZE, 30),
    minVwapSamples: parseNumber(env.MIN_VWAP_SAMPLES, 3),
    directionBandPct: parseNumber(env.DIRECTION_BAND_PCT, 0.1),
    oiChangeThresholdPct: parseNumber(env.OI_CHANGE_THRESHOLD_PCT, 1),
    pcrSupportZone: parseNumber(env.PCR_SUPPORT_ZONE, 2.5),
    pcrResistanceZone: parseNumber(env.PCR_RESISTANCE_ZONE, 0.5),

    stopLossPct: parseNumber(env.STOP_LOSS_PCT, 0.3),
    targetPct: parseNumber(env.TARGET_PCT, 0.6),
    expiryStopLossPct: parseNumber(env.EXPIRY_STOP_LOSS_PCT, 0.2),
    expiryTargetPct: parseNumber(env.EXPIRY_TARGET_PCT, 0.4),

    dailySignalCeiling: parseNumber(env.DAILY_SIGNAL_CEILING, 3),
    minConfidence: parseNumber(env.MIN_CONFIDENCE, 70),
    expiryMinConfidence: parseNumber(env.EXPIRY_MIN_CONFIDENCE, 85),
    signalCooldownSeconds: parseNumber(env.SIGNAL_COOLDOWN_SECONDS, 180)
  };
};

export type AppSettings = ReturnType<typeof buildSettings>;

export const loadSettings = (env: NodeJS.ProcessEnv): AppSettings => buildSettings(env);

/** Throws {@link ConfigurationError} listing every invalid setting. */
export const assertValidSettings = (config: AppSettings): AppSettings => {
  const result = settingsSchema.safeParse(config);
  if (result.success) return config;
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new ConfigurationError(issues);
};

const ensureStoragePaths = (config: AppSettings): void => {
  if (config.dbPath !== ":memory:") mkdirSync(dirname(config.dbPath), { recursive: true });
  mkdirSync(dirname(config.jsonlAuditPath), { recursive: true });
};

export const settings: AppSettings = buildSettings(process.env);
ensureStoragePaths(settings);
