import { z } from "zod";

/**
 * Shapes used to validate rows read back from a durable store.
 */

export const StageErrorSchema = z.object({
  message: z.string(),
  permanent: z.boolean(),
  code: z.string().optional()
});

const AttemptOutcomeSchema = z.enum(["SUCCEEDED", "FAILED", "TIMED_OUT"]);

export const StageHistoryEntrySchema = z.object({
  stage: z.string(),
  attempt: z.number().int().positive(),
  outcome: AttemptOutcomeSchema,
  timestamp: z.string(),
  outputRef: z.string().optional(),
  error: StageErrorSchema.optional()
});

export const RequestSchema = z.object({
  id: z.string(),
  payloadRef: z.string(),
  currentStage: z.string(),
  phase: z.enum(["PENDING", "IN_PROGRESS", "SUCCEEDED", "RETRY_WAIT"]).nullable(),
  attemptCount: z.number().int().nonnegative(),
  stageHistory: z.array(StageHistoryEntrySchema),
  outputs: z.record(z.string()),
  nextAttemptAt: z.number().optional(),
  failure: z
    .object({
      stage: z.string(),
      attempts: z.number().int().nonnegative(),
      reason: z.string(),
      permanent: z.boolean()
    })
    .optional(),
  abortReason: z.string().optional(),
  result: z
    .object({
      requestId: z.string(),
      payloadRef: z.string(),
      outputs: z.array(z.object({ stage: z.string(), outputRef: z.string() }))
    })
    .optional(),
  createdAt: z.string(),
  updatedAt: z.string()
});

export const LeaseSchema = z.object({
  requestId: z.string(),
  holderId: z.string(),
  acquiredAt: z.number(),
  expiresAt: z.number()
});

export const JournalledOutcomeSchema = z.object({
  type: AttemptOutcomeSchema,
  outputRef: z.string().optional(),
  error: StageErrorSchema.optional()
});
