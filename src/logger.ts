import { pino, type Logger } from "pino";

import { loadLogLevel, type LogLevel } from "./config.js";

export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  if (env.VITEST && env.LOG_LEVEL === undefined) return "silent";
  return loadLogLevel(env);
}

const base = pino({ name: "prefix-dictionary", level: resolveLogLevel() });

/** Child logger tagged with the calling module's name. */
export function createLogger(module: string): Logger {
  return base.child({ module });
}
