// ─── Scoped console logger ───
// Level comes from LOG_LEVEL; Jest runs (NODE_ENV=test) stay silent by default.

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.LOG_LEVEL || "").toLowerCase();
  if (isLogLevel(raw)) return raw;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (lvl: Exclude<LogLevel, "silent">, message: string, details?: Record<string, unknown>) => {
    if (LEVEL_ORDER[lvl] < threshold) return;
    const line = `[${scope}] ${message}`;
    const sink = lvl === "debug" ? console.debug : lvl === "info" ? console.info : lvl === "warn" ? console.warn : console.error;
    if (details) sink(line, details);
    else sink(line);
  };
  return {
    debug: (m, d) => write("debug", m, d),
    info: (m, d) => write("info", m, d),
    warn: (m, d) => write("warn", m, d),
    error: (m, d) => write("error", m, d),
  };
}
