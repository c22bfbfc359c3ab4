import * as os from "node:os";
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface GameMasterConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  parallel: {
    enabled: boolean;
    /** Worker processes for a parallel batch (already resolved from 0 = all cores) */
    maxWorkers: number;
    /** Batches smaller than this run in-process */
    minSimulations: number;
  };
  batch: {
    defaultSize: number;
    maxSize: number;
  };
  /** Fixed-window limit per client IP */
  rateLimit: {
    enabled: boolean;
    requests: number;
    windowSeconds: number;
  };
}

const booleanFlag = z.enum(["true", "false"]).transform(v => v === "true");

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3001),
    HOST: z.string().min(1).default("0.0.0.0"),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    ENABLE_PARALLEL: booleanFlag.default("true"),
    MAX_WORKERS: z.coerce.number().int().nonnegative().default(0),
    MIN_PARALLEL_SIMULATIONS: z.coerce.number().int().positive().default(200),
    DEFAULT_BATCH_SIZE: z.coerce.number().int().positive().default(300),
    MAX_BATCH_SIZE: z.coerce.number().int().positive().default(10000),
    RATE_LIMIT_ENABLED: booleanFlag.default("true"),
    RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  })
  .refine(env => env.DEFAULT_BATCH_SIZE <= env.MAX_BATCH_SIZE, {
    message: "must not exceed MAX_BATCH_SIZE",
    path: ["DEFAULT_BATCH_SIZE"],
  });

/**
 * Read the gamemaster configuration from environment variables. Unset or
 * empty variables take their defaults; anything malformed throws.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameMasterConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const result = EnvSchema.safeParse(present);

  if (!result.success) {
    const errors = result.error.errors
      .map(e => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    parallel: {
      enabled: vars.ENABLE_PARALLEL,
      maxWorkers: vars.MAX_WORKERS === 0 ? os.availableParallelism() : vars.MAX_WORKERS,
      minSimulations: vars.MIN_PARALLEL_SIMULATIONS,
    },
    batch: {
      defaultSize: vars.DEFAULT_BATCH_SIZE,
      maxSize: vars.MAX_BATCH_SIZE,
    },
    rateLimit: {
      enabled: vars.RATE_LIMIT_ENABLED,
      requests: vars.RATE_LIMIT_REQUESTS,
      windowSeconds: vars.RATE_LIMIT_WINDOW_SECONDS,
    },
  };
}
