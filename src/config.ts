import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const logLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info");

export type LogLevel = z.infer<typeof logLevel>;

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: logLevel,
  /** JSON snapshot loaded at startup and written on shutdown. */
  SNAPSHOT_PATH: z.string().min(1).optional(),
  /** Upper bound on the edit distance a client may ask for. */
  MAX_EDIT_DISTANCE: z.coerce.number().int().min(1).max(3).default(2),
  /** Lowercase words on ingestion. */
  LOWERCASE: booleanFlag.default("true"),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  return parseEnv(configSchema, env);
}

/** Only `LOG_LEVEL`; loggers are created before the rest of the config is read. */
export function loadLogLevel(env: Env = process.env): LogLevel {
  return parseEnv(configSchema.pick({ LOG_LEVEL: true }), env).LOG_LEVEL;
}

function parseEnv<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, env: Env): T {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid environment: ${details}`);
  }
  return parsed.data;
}
