import { inspect } from "node:util";

const LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
type Level = (typeof LEVELS)[number];
type MessageLevel = Exclude<Level, "silent">;
type LogFormat = "pretty" | "json";

const isLevel = (value: string): value is Level =>
  LEVELS.some((level) => level === value);

const parseLevel = (value: string | undefined): Level => {
  const normalized = String(value ?? "info").toLowerCase();
  return isLevel(normalized) ? normalized : "info";
};

const parseFormat = (value: string | undefined): LogFormat => {
  const normalized = String(value ?? "").toLowerCase();
  if (normalized === "json") return "json";
  if (normalized === "pretty") return "pretty";
  return process.env.APP_ENV === "prod" ? "json" : "pretty";
};

const shouldLog = (messageLevel: MessageLevel, configured: Level): boolean =>
  LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(configured);

const configuredLevel = parseLevel(process.env.LOG_LEVEL);
const configuredFormat = parseFormat(process.env.LOG_FORMAT);
const appName = (): string => process.env.APP_NAME ?? "oi-signal-bot";

const supportColor =
  Boolean(process.stdout.isTTY) &&
  process.env.NO_COLOR === undefined &&
  process.env.TERM !== "dumb";

const levelColor: Record<MessageLevel, number> = {
  debug: 90,
  info: 36,
  warn: 33,
  error: 31
};

const colorize = (text: string, colorCode: number): string =>
  supportColor ? `\u001b[${colorCode}m${text}\u001b[0m` : text;

const stamp = (): string => new Date().toISOString();

const toJsonSafe = (value: unknown, seen = new WeakSet<object>()): unknown => {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: toJsonSafe(value.cause, seen)
    };
  }
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "function") return `[Function ${value.name || "anonymous"}]`;
  if (!value || typeof value !== "object") return value;
  if (seen.has(value)) return "[Circular]";
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => toJsonSafe(item, seen));
  }

  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    out[key] = toJsonSafe(item, seen);
  }
  return out;
};

const inspectMeta = (value: unknown): string =>
  inspect(value, {
    colors: supportColor,
    depth: 6,
    compact: 3,
    breakLength: 110,
    maxArrayLength: 30
  });

const splitMessageAndMeta = (args: unknown[]): { message: string; meta: unknown[] } => {
  if (args.length === 0) return { message: "", meta: [] };
  if (typeof args[0] === "string") {
    return { message: args[0], meta: args.slice(1) };
  }
  return { message: "log", meta: args };
};

const sinkFor = (level: MessageLevel): NodeJS.WriteStream =>
  level === "warn" || level === "error" ? process.stderr : process.stdout;

const writePretty = (level: MessageLevel, scope: string | null, args: unknown[]): void => {
  const { message, meta } = splitMessageAndMeta(args);
  const levelLabel = colorize(level.toUpperCase().padEnd(5), levelColor[level]);
  const scopeLabel = scope ? ` ${colorize(scope, 35)}` : "";
  const header = `${stamp()} ${levelLabel} [${appName()}]${scopeLabel} ${message}`;
  if (meta.length === 0) {
    sinkFor(level).write(`${header}\n`);
    return;
  }

  const lines = meta.map((entry, index) => {
    const branch = index === meta.length - 1 ? "└─" : "├─";
    return `  ${branch} ${inspectMeta(entry)}`;
  });
  sinkFor(level).write(`${header}\n${lines.join("\n")}\n`);
};

const writeJson = (level: MessageLevel, scope: string | null, args: unknown[]): void => {
  const { message, meta } = splitMessageAndMeta(args);
  const payload = {
    timestamp: stamp(),
    level,
    app: appName(),
    scope: scope ?? undefined,
    message,
    meta: meta.length > 0 ? toJsonSafe(meta) : undefined
  };
  sinkFor(level).write(`${JSON.stringify(payload)}\n`);
};

const writeLog = (level: MessageLevel, scope: string | null, args: unknown[]): void => {
  if (!shouldLog(level, configuredLevel)) return;
  if (configuredFormat === "json") writeJson(level, scope, args);
  else writePretty(level, scope, args);
};

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  scope: (name: string) => Logger;
}

const createLogger = (scope: string | null): Logger => ({
  debug: (...args: unknown[]) => writeLog("debug", scope, args),
  info: (...args: unknown[]) => writeLog("info", scope, args),
  warn: (...args: unknown[]) => writeLog("warn", scope, args),
  error: (...args: unknown[]) => writeLog("error", scope, args),
  scope: (name: string) => createLogger(scope ? `${scope}:${name}` : name)
});

export const logger: Logger = createLogger(null);
