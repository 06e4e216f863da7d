/* eslint-disable no-console */

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LogLevel = keyof Logger;

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

// stderr so that stdout stays clean for JSON output
export function consoleLogger(prefix = "cloudspend", minLevel: LogLevel = "info"): Logger {
  const min = ORDER.indexOf(minLevel);
  const line = (level: LogLevel) => (msg: string) => {
    if (ORDER.indexOf(level) < min) return;
    console.error(level === "info" ? `[${prefix}] ${msg}` : `[${prefix}] ${level}: ${msg}`);
  };

  return {
    debug: line("debug"),
    info: line("info"),
    warn: line("warn"),
    error: line("error"),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
