import { z } from "zod";
import type { StageDescriptor } from "../types.js";

export const STAGE_NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;

export const BackoffPolicySchema = z
  .object({
    baseMs: z.number().int().positive(),
    capMs: z.number().int().positive()
  })
  .refine((b) => b.capMs >= b.baseMs, { message: "capMs must be >= baseMs" });

export const StageDescriptorSchema = z.object({
  name: z.string().regex(STAGE_NAME_PATTERN, "stage names are lower-case identifiers"),
  position: z.number().int().nonnegative(),
  endpoint: z.string().url().optional(),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().nonnegative(),
  backoff: BackoffPolicySchema,
  maxConcurrency: z.number().int().positive(),
  idempotent: z.boolean(),
  accepts: z.array(z.string().min(1)).optional()
});

/**
 * Descriptor as written in a pipeline file: everything but the name is optional
 * and falls back to the stage defaults.
 */
export const StageDescriptorInputSchema = z.object({
  name: z.string().regex(STAGE_NAME_PATTERN, "stage names are lower-case identifiers"),
  position: z.number().int().nonnegative().optional(),
  endpoint: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  backoff: BackoffPolicySchema.optional(),
  maxConcurrency: z.number().int().positive().optional(),
  idempotent: z.boolean().optional(),
  accepts: z.array(z.string().min(1)).optional()
});

export type StageDescriptorInput = z.infer<typeof StageDescriptorInputSchema>;

export const PipelineFileSchema = z.object({
  stages: z.array(StageDescriptorInputSchema).min(1)
});

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

export const STAGE_DEFAULTS = {
  timeoutMs: 30_000,
  maxRetries: 2,
  backoff: { baseMs: 500, capMs: 30_000 },
  maxConcurrency: 4,
  idempotent: true
} as const;

/**
 * Fill in defaults for a pipeline-file entry. Entries without a position take
 * their index in the file.
 */
export function normalizeDescriptor(input: StageDescriptorInput, index: number): StageDescriptor {
  const descriptor: StageDescriptor = {
    name: input.name,
    position: input.position ?? index,
    timeoutMs: input.timeoutMs ?? STAGE_DEFAULTS.timeoutMs,
    maxRetries: input.maxRetries ?? STAGE_DEFAULTS.maxRetries,
    backoff: input.backoff ?? { ...STAGE_DEFAULTS.backoff },
    maxConcurrency: input.maxConcurrency ?? STAGE_DEFAULTS.maxConcurrency,
    idempotent: input.idempotent ?? STAGE_DEFAULTS.idempotent
  };
  if (input.endpoint !== undefined) descriptor.endpoint = input.endpoint;
  if (input.accepts !== undefined) descriptor.accepts = [...input.accepts];
  return descriptor;
}
