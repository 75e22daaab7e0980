import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

const LEVELS = new Set<string>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(x: string): x is LevelWithSilent {
  return LEVELS.has(x);
}

export type LoggerOptions = {
  name?: string;
  level?: LevelWithSilent;
};

/**
 * Default logger for the core. Level falls back to LOG_LEVEL, then "info".
 * Callers that already run pino should pass their own instance instead.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const envLevel = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  const level = opts.level ?? (isLevel(envLevel) ? envLevel : "info");

  return pino({
    name: opts.name ?? "token-core",
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
