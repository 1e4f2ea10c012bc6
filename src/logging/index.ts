import fs from "node:fs";
import path from "node:path";
import { type ILogObj, Logger } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type BridgeLogger = Logger<ILogObj>;

// tslog ids: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
const LEVEL_IDS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "error",
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = String(value ?? "").trim().toLowerCase();
  return LEVEL_ALIASES[normalized] ?? fallback;
}

export function isLogLevelName(value: string): boolean {
  return String(value).trim().toLowerCase() in LEVEL_ALIASES;
}

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  file?: string;
  type?: "pretty" | "json" | "hidden";
}

function toLine(logObj: ILogObj, meta: { date: Date; logLevelName: string; name?: string }): string {
  const args = Object.keys(logObj)
    .filter((key) => /^\d+$/.test(key))
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => logObj[key]);
  const [first, ...rest] = args;
  return JSON.stringify({
    time: meta.date.toISOString(),
    level: meta.logLevelName.toLowerCase(),
    name: meta.name ?? "",
    message: typeof first === "string" ? first : JSON.stringify(first ?? ""),
    ...(rest.length > 0 ? { data: rest } : {}),
  });
}

export function createLogger(options: CreateLoggerOptions = {}): BridgeLogger {
  const logger = new Logger<ILogObj>({
    name: options.name ?? "chatbridge",
    minLevel: LEVEL_IDS[options.level ?? "info"],
    type: options.type ?? "pretty",
    hideLogPositionForProduction: true,
  });

  if (options.file) {
    const file = path.resolve(options.file);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    logger.attachTransport((logObj) => {
      const meta = logObj._meta;
      fs.appendFileSync(file, `${toLine(logObj, meta)}\n`, "utf8");
    });
  }
  return logger;
}

export function createSilentLogger(): BridgeLogger {
  return createLogger({ type: "hidden", level: "error" });
}
