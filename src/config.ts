import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    HOST: z.string().min(1).default("0.0.0.0"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    JSON_BODY_LIMIT: z.string().min(1).default("1mb"),
    UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    // 0 turns the limiter off
    RATE_LIMIT_MAX: z.coerce.number().int().min(0).default(600),
    SEED_DEMO_DATA: z.enum(["0", "1"]).default("0")
  })
  .transform((env) => ({
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    jsonBodyLimit: env.JSON_BODY_LIMIT,
    uploadMaxBytes: env.UPLOAD_MAX_BYTES,
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX },
    seedDemoData: env.SEED_DEMO_DATA === "1"
  }));

export type AppConfig = z.output<typeof EnvSchema>;

/** Blank variables fall back to their defaults. Throws ZodError on an invalid value. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );
  return EnvSchema.parse(present);
}
