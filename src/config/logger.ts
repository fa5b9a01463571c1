import "./env";
import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  // Directory for the per-run log file; console only when unset
  logDir?: string;
  // Replaces console output (tests, embedding callers)
  write?: (line: string, level: LogLevel) => void;
}

const order: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const value = raw?.trim().toLowerCase();
  return order.find((lvl) => lvl === value) ?? fallback;
}

function consoleWrite(line: string, lvl: LogLevel): void {
  // eslint-disable-next-line no-console
  console[lvl === "debug" ? "log" : lvl](line);
}

function openRunFile(logsDir: string): fs.WriteStream | null {
  const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    return fs.createWriteStream(path.join(logsDir, `run-${runStamp}.log`), { flags: "a" });
  } catch (err) {
    consoleWrite(`[logger] file logging disabled: ${err instanceof Error ? err.message : String(err)}`, "warn");
    return null;
  }
}

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const minIdx = order.indexOf(level);
  const write = options.write ?? consoleWrite;

  let fileStream = options.logDir ? openRunFile(options.logDir) : null;
  fileStream?.on("error", (err) => {
    consoleWrite(`[logger] file logging disabled: ${err.message}`, "warn");
    fileStream = null;
  });

  function shouldLog(lvl: LogLevel): boolean {
    return order.indexOf(lvl) >= minIdx;
  }

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (!shouldLog(lvl)) return;
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : "";
    const ts = new Date().toISOString();
    const line = `${ts} [${lvl}] ${msg}${payload}`;
    write(line, lvl);
    fileStream?.write(line + "\n");
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}

export default createLogger;

let shared: Logger | undefined;

function sharedLogger(): Logger {
  shared ??= createLogger(parseLogLevel(process.env.LOG_LEVEL), { logDir: process.env.LOG_DIR || undefined });
  return shared;
}

// Built on first use, from the environment as it stands then
export const logger: Logger = {
  debug: (msg, ctx) => sharedLogger().debug(msg, ctx),
  info: (msg, ctx) => sharedLogger().info(msg, ctx),
  warn: (msg, ctx) => sharedLogger().warn(msg, ctx),
  error: (msg, ctx) => sharedLogger().error(msg, ctx),
};
