import process from "node:process";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_COLOR: Record<Exclude<LogLevel, "silent">, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return fallback;
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  }
  return parts.length > 0 ? " " + chalk.dim(parts.join(" ")) : "";
}

export type StderrLoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  /** Sink for formatted lines; defaults to process.stderr so stdout stays clean for streamed output */
  write?: (line: string) => void;
};

/**
 * Log to stderr only (never stdout): `ask` streams answer text on stdout.
 */
export function createLogger(options: StderrLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const prefix = options.prefix ?? "relay";
  const write = options.write ?? ((line: string) => process.stderr.write(line));

  const emit = (level: Exclude<LogLevel, "silent">, msg: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const tag = LEVEL_COLOR[level](`[${prefix}] ${level.toUpperCase()}`);
    write(`${tag} ${msg}${formatFields(fields)}\n`);
  };

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
    child: (scope) => createLogger({ ...options, prefix: `${prefix}:${scope}`, write })
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
