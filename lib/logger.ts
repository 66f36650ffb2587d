type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function getMinLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";
  return isLogLevel(raw) ? raw : "info";
}

export type Logger = {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
};

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, meta?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[getMinLevel()]) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (meta === undefined) sink(line);
    else sink(line, meta);
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}
