/**
 * Core data model shared by the ledger, orchestrator, invoker and accumulator.
 */

export type TerminalState = "COMPLETED" | "FAILED" | "ABORTED";

export const TERMINAL_STATES: readonly TerminalState[] = ["COMPLETED", "FAILED", "ABORTED"];

/**
 * Phase of a request inside its current (non-terminal) stage.
 * - PENDING: waiting for its first dispatch (only the first stage, at intake)
 * - IN_PROGRESS: dispatched under a lease, awaiting a result event
 * - SUCCEEDED: stage output merged, waiting to be advanced to the next stage
 * - RETRY_WAIT: attempt failed, waiting for the backoff to elapse
 */
export type StagePhase = "PENDING" | "IN_PROGRESS" | "SUCCEEDED" | "RETRY_WAIT";

export type AttemptOutcome = "SUCCEEDED" | "FAILED" | "TIMED_OUT";

export type StageError = {
  message: string;
  permanent: boolean;
  code?: string;
};

export type StageHistoryEntry = {
  stage: string;
  attempt: number;
  outcome: AttemptOutcome;
  timestamp: string;
  outputRef?: string;
  error?: StageError;
};

export type FailureInfo = {
  stage: string;
  attempts: number;
  reason: string;
  permanent: boolean;
};

export type StageOutput = {
  stage: string;
  outputRef: string;
};

/**
 * Final integrated record produced on COMPLETED. Outputs are listed in
 * pipeline order.
 */
export type CompositeResult = {
  requestId: string;
  payloadRef: string;
  outputs: StageOutput[];
};

export type Request = {
  id: string;
  payloadRef: string;
  /** Stage name while the request is live, otherwise a terminal marker. */
  currentStage: string;
  /** null once the request is terminal. */
  phase: StagePhase | null;
  /** Failed attempts of the current stage; reset to 0 on a new stage. */
  attemptCount: number;
  stageHistory: StageHistoryEntry[];
  /** Accumulated output reference per completed stage. */
  outputs: Record<string, string>;
  /** Epoch ms before which a RETRY_WAIT request must not be redispatched. */
  nextAttemptAt?: number;
  failure?: FailureInfo;
  abortReason?: string;
  result?: CompositeResult;
  createdAt: string;
  updatedAt: string;
};

export type Lease = {
  requestId: string;
  holderId: string;
  acquiredAt: number;
  expiresAt: number;
};

export type BackoffPolicy = {
  baseMs: number;
  capMs: number;
};

export type StageDescriptor = {
  name: string;
  /** Position in pipeline order (lower runs first). */
  position: number;
  /** Worker address, for HTTP transports. */
  endpoint?: string;
  timeoutMs: number;
  maxRetries: number;
  backoff: BackoffPolicy;
  /** Concurrent calls a single invoker will make to this stage. */
  maxConcurrency: number;
  /** Stage tolerates repeated invocation with the same request id. */
  idempotent: boolean;
  /** Payload-ref schemes this stage accepts as input ("blob", "repo", ...). */
  accepts?: string[];
};

export type PipelineEventType = "DISPATCHED" | "SUCCEEDED" | "FAILED" | "TIMED_OUT";

/**
 * Immutable message on the result topics.
 */
export type PipelineEvent = {
  requestId: string;
  stage: string;
  attempt: number;
  type: PipelineEventType;
  timestamp: string;
  outputRef?: string;
  error?: StageError;
};

/**
 * Orchestrator -> invoker trigger on the dispatch topics.
 */
export type DispatchCommand = {
  requestId: string;
  stage: string;
  attempt: number;
  payloadRef: string;
  /** Outputs of the stages completed so far, keyed by stage. */
  inputs: Record<string, string>;
  issuedBy: string;
  issuedAt: string;
};

export function isTerminalState(stage: string): stage is TerminalState {
  return (TERMINAL_STATES as readonly string[]).includes(stage);
}

export function isTerminal(request: Pick<Request, "currentStage">): boolean {
  return isTerminalState(request.currentStage);
}

/**
 * Renders the state label used for conditional writes,
 * e.g. "classifier_IN_PROGRESS" or "COMPLETED".
 */
export function stateLabel(request: Pick<Request, "currentStage" | "phase">): string {
  if (request.phase === null || isTerminalState(request.currentStage)) return request.currentStage;
  return `${request.currentStage}_${request.phase}`;
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function payloadScheme(payloadRef: string): string | undefined {
  const idx = payloadRef.indexOf(":");
  if (idx <= 0) return undefined;
  return payloadRef.slice(0, idx);
}
