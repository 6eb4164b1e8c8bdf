import type { LogLevel } from "./config.js";

const RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
}

function line(level: string, msg: string): string {
  const ts = new Date().toISOString();
  return `[${ts}] [duplexfs] ${level}: ${msg}`;
}

export function createLogger(level: LogLevel): Logger {
  const enabled = (l: LogLevel) => RANK[l] <= RANK[level];
  return {
    debug(msg) {
      if (enabled("debug")) console.debug(line("DEBUG", msg));
    },
    info(msg) {
      if (enabled("info")) console.log(line("INFO", msg));
    },
    warn(msg) {
      if (enabled("warn")) console.warn(line("WARN", msg));
    },
    error(msg, err) {
      if (!enabled("error")) return;
      const errStr = err instanceof Error ? err.message : String(err ?? "");
      console.error(line("ERROR", `${msg}${errStr ? ` (${errStr})` : ""}`));
    },
  };
}
