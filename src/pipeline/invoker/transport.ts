/**
 * Abstract "invoke stage" RPC consumed by the Stage Invoker.
 */

import type { StageDescriptor } from "../types.js";

export type StageCallRequest = {
  requestId: string;
  stage: string;
  attempt: number;
  payloadRef: string;
  stageConfig: StageDescriptor;
  /** Outputs of the stages completed so far. */
  inputs: Record<string, string>;
};

/**
 * Worker reply. "accepted" means the worker took the job and will report the
 * outcome later through the result callback.
 */
export type StageCallResponse =
  | { status: "success"; outputRef: string }
  | { status: "failure"; error: string; retryable?: boolean }
  | { status: "accepted" };

export interface StageTransport {
  /**
   * Call the stage worker. Must be safe to repeat for the same
   * (requestId, stage). Implementations throw TransientStageError or
   * PermanentStageError for failures they detect themselves and honour
   * `signal` for timeouts.
   */
  call(request: StageCallRequest, signal: AbortSignal): Promise<StageCallResponse>;
}

export type LocalStageHandler = (request: StageCallRequest, signal: AbortSignal) => Promise<StageCallResponse>;

/**
 * Routes calls to in-process handlers by stage name. Stages without a
 * handler use the fallback, which by default echoes a deterministic output
 * ref so a run can be exercised end to end.
 */
export class LocalStageTransport implements StageTransport {
  private readonly handlers = new Map<string, LocalStageHandler>();
  private readonly fallback: LocalStageHandler;

  constructor(handlers: Record<string, LocalStageHandler> = {}, fallback?: LocalStageHandler) {
    for (const [stage, handler] of Object.entries(handlers)) {
      this.handlers.set(stage, handler);
    }
    this.fallback = fallback ?? (async (request) => ({ status: "success", outputRef: defaultOutputRef(request) }));
  }

  register(stage: string, handler: LocalStageHandler): void {
    this.handlers.set(stage, handler);
  }

  call(request: StageCallRequest, signal: AbortSignal): Promise<StageCallResponse> {
    const handler = this.handlers.get(request.stage) ?? this.fallback;
    return handler(request, signal);
  }
}

export function defaultOutputRef(request: Pick<StageCallRequest, "requestId" | "stage">): string {
  return `local://${request.requestId}/${request.stage}`;
}
