import { createWriteStream, mkdirSync, openSync, type WriteStream } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LoggerConfig = {
  level: LogLevel;
  format: "json" | "pretty";
  color: boolean;
  timeZone?: string;
  baseContext?: Record<string, unknown>;
};

type LogEntry = {
  level: LogLevel;
  msg: string;
  ts: string;
  data?: Record<string, unknown>;
};

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let config: LoggerConfig = {
  level: "info",
  format: "json",
  color: false,
  timeZone: undefined,
  baseContext: {}
};

let fileSink: WriteStream | undefined;

export function setLoggerConfig(next: Partial<LoggerConfig>) {
  config = { ...config, ...next };
}

export function getLoggerConfig(): LoggerConfig {
  return config;
}

/**
 * Opens the run's append-only log file. Every line logged until
 * `closeLogFile` is mirrored there without color codes.
 */
export function openLogFile(dir: string, now = new Date()) {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, `renovate-updater_${formatFileStamp(now)}.log`);
  // Opened synchronously so an unwritable path throws here.
  const fd = openSync(path, "a");
  const sink = createWriteStream(path, { fd });
  sink.on("error", (error) => {
    if (fileSink === sink) fileSink = undefined;
    console.error(`Log file ${path} failed: ${error.message}`);
  });
  fileSink = sink;
  return path;
}

export function closeLogFile(): Promise<void> {
  const sink = fileSink;
  fileSink = undefined;
  if (!sink) return Promise.resolve();
  return new Promise((resolve, reject) => {
    sink.once("error", reject);
    sink.end(() => resolve());
  });
}

export function log(level: LogLevel, msg: string, data?: Record<string, unknown>) {
  if (levelWeight[level] < levelWeight[config.level]) {
    return;
  }
  const entry: LogEntry = {
    level,
    msg,
    ts: formatTimestamp(new Date(), config.timeZone),
    data: mergeContext(config.baseContext, data)
  };

  const line = formatLine(entry, config.color);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
  fileSink?.write(`${formatLine(entry, false)}\n`);
}

export const logger = {
  debug: (msg: string, data?: Record<string, unknown>) => log("debug", msg, data),
  info: (msg: string, data?: Record<string, unknown>) => log("info", msg, data),
  warn: (msg: string, data?: Record<string, unknown>) => log("warn", msg, data),
  error: (msg: string, data?: Record<string, unknown>) => log("error", msg, data),
  withContext: (context: Record<string, unknown>) => {
    return {
      debug: (msg: string, data?: Record<string, unknown>) =>
        log("debug", msg, mergeContext(context, data)),
      info: (msg: string, data?: Record<string, unknown>) =>
        log("info", msg, mergeContext(context, data)),
      warn: (msg: string, data?: Record<string, unknown>) =>
        log("warn", msg, mergeContext(context, data)),
      error: (msg: string, data?: Record<string, unknown>) =>
        log("error", msg, mergeContext(context, data))
    };
  }
};

export type ContextLogger = ReturnType<typeof logger.withContext>;

function mergeContext(
  base?: Record<string, unknown>,
  extra?: Record<string, unknown>
) {
  if (!base && !extra) return undefined;
  if (!base) return extra;
  if (!extra) return base;
  return { ...base, ...extra };
}

function formatLine(entry: LogEntry, color: boolean) {
  if (config.format === "pretty") {
    return formatPretty(entry, color);
  }
  return JSON.stringify(entry);
}

function formatPretty(entry: LogEntry, color: boolean) {
  const level = color ? colorLevel(entry.level) : entry.level;
  const msg = color ? colorMsg(entry.msg) : entry.msg;
  const header = `[${entry.ts}] ${level} ${msg}`;
  if (!entry.data || Object.keys(entry.data).length === 0) {
    return header;
  }
  const dataJson = JSON.stringify(entry.data, null, 2);
  return `${header}\n${dataJson}`;
}

const colors = {
  reset: "\u001b[0m",
  red: "\u001b[31m",
  yellow: "\u001b[33m",
  green: "\u001b[32m",
  blue: "\u001b[34m",
  magenta: "\u001b[35m"
};

function colorLevel(level: LogLevel) {
  switch (level) {
    case "debug":
      return `${colors.magenta}${level}${colors.reset}`;
    case "info":
      return `${colors.green}${level}${colors.reset}`;
    case "warn":
      return `${colors.yellow}${level}${colors.reset}`;
    case "error":
      return `${colors.red}${level}${colors.reset}`;
    default:
      return level;
  }
}

function colorMsg(msg: string) {
  return `${colors.blue}${msg}${colors.reset}`;
}

export function formatTimestamp(date: Date, timeZone?: string) {
  if (!timeZone) {
    return date.toISOString();
  }
  const parts = new Intl.DateTimeFormat("sv-SE", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false
  }).formatToParts(date);
  const map = Object.fromEntries(parts.map((part) => [part.type, part.value]));
  const ms = String(date.getMilliseconds()).padStart(3, "0");
  return `${map.year}-${map.month}-${map.day}T${map.hour}:${map.minute}:${map.second}.${ms} ${timeZone}`;
}

// Local time, e.g. 2026-03-04_09-05-07
export function formatFileStamp(date: Date) {
  const pad = (value: number) => String(value).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
