import crypto from "node:crypto";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { LogLevel } from "./logger.js";

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const parsed = Number.parseInt(value, 10);
      if (!Number.isFinite(parsed) || parsed < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a non-negative integer, got "${value}"` });
        return z.NEVER;
      }
      return parsed;
    });

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value));

export const EnvSchema = z.object({
  DIGESTFLOW_DB_PATH: optionalPath,
  DIGESTFLOW_PIPELINE_FILE: optionalPath,
  DIGESTFLOW_TRAIL_DIR: optionalPath,
  DIGESTFLOW_HOLDER_ID: z.string().optional(),
  DIGESTFLOW_LEASE_GRACE_MS: intFromEnv(5_000),
  DIGESTFLOW_TICK_MS: intFromEnv(250),
  DIGESTFLOW_SWEEP_MS: intFromEnv(1_000),
  DIGESTFLOW_MAX_IN_FLIGHT: intFromEnv(64),
  DIGESTFLOW_QUEUE_TIMEOUT_MS: intFromEnv(30_000),
  DIGESTFLOW_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export type PipelineConfig = {
  /** sql.js database file; undefined keeps the ledger in memory. */
  dbPath: string | undefined;
  /** JSON pipeline definition; undefined uses the built-in stages. */
  pipelineFile: string | undefined;
  /** Per-request paper trail directory; undefined disables it. */
  trailDir: string | undefined;
  holderId: string;
  leaseGraceMs: number;
  tickIntervalMs: number;
  sweepIntervalMs: number;
  maxInFlight: number;
  queueTimeoutMs: number;
  logLevel: LogLevel;
};

export function defaultHolderId(): string {
  return `orchestrator-${crypto.randomUUID()}`;
}

/**
 * Build the runtime configuration from environment variables.
 * @throws ConfigurationError when a variable is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid environment configuration", { issues: parsed.error.issues });
  }
  const e = parsed.data;
  if (e.DIGESTFLOW_MAX_IN_FLIGHT < 1) {
    throw new ConfigurationError("DIGESTFLOW_MAX_IN_FLIGHT must be at least 1");
  }
  return {
    dbPath: e.DIGESTFLOW_DB_PATH,
    pipelineFile: e.DIGESTFLOW_PIPELINE_FILE,
    trailDir: e.DIGESTFLOW_TRAIL_DIR,
    holderId: e.DIGESTFLOW_HOLDER_ID ?? defaultHolderId(),
    leaseGraceMs: e.DIGESTFLOW_LEASE_GRACE_MS,
    tickIntervalMs: e.DIGESTFLOW_TICK_MS,
    sweepIntervalMs: e.DIGESTFLOW_SWEEP_MS,
    maxInFlight: e.DIGESTFLOW_MAX_IN_FLIGHT,
    queueTimeoutMs: e.DIGESTFLOW_QUEUE_TIMEOUT_MS,
    logLevel: e.DIGESTFLOW_LOG_LEVEL
  };
}
