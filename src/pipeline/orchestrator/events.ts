import type { Logger } from "../logger.js";
import type { CompositeResult, FailureInfo, StageError } from "../types.js";

// ============================================================================
// Lifecycle events
// ============================================================================

export type LifecycleEventType =
  | "request_submitted"
  | "stage_dispatched"
  | "stage_succeeded"
  | "stage_retry_scheduled"
  | "request_completed"
  | "request_failed"
  | "request_aborted";

export type LifecycleEventBase = {
  type: LifecycleEventType;
  timestamp: string;
  requestId: string;
};

export type RequestSubmittedEvent = LifecycleEventBase & {
  type: "request_submitted";
  payloadRef: string;
  firstStage: string;
};

export type StageDispatchedEvent = LifecycleEventBase & {
  type: "stage_dispatched";
  stage: string;
  attempt: number;
  holderId: string;
};

export type StageSucceededEvent = LifecycleEventBase & {
  type: "stage_succeeded";
  stage: string;
  attempt: number;
  outputRef: string;
};

export type StageRetryScheduledEvent = LifecycleEventBase & {
  type: "stage_retry_scheduled";
  stage: string;
  attempt: number;
  delayMs: number;
  error: StageError;
};

export type RequestCompletedEvent = LifecycleEventBase & {
  type: "request_completed";
  result: CompositeResult;
};

export type RequestFailedEvent = LifecycleEventBase & {
  type: "request_failed";
  failure: FailureInfo;
};

export type RequestAbortedEvent = LifecycleEventBase & {
  type: "request_aborted";
  reason: string;
};

export type LifecycleEvent =
  | RequestSubmittedEvent
  | StageDispatchedEvent
  | StageSucceededEvent
  | StageRetryScheduledEvent
  | RequestCompletedEvent
  | RequestFailedEvent
  | RequestAbortedEvent;

export type LifecycleEventHandler = (event: LifecycleEvent) => void | Promise<void>;

export type LifecycleEventOptions = {
  onEvent?: LifecycleEventHandler;
  /** Whether to emit stage_dispatched events (default true). */
  emitStageDispatched?: boolean;
  /** Whether to emit stage_retry_scheduled events (default true). */
  emitRetryScheduled?: boolean;
};

const TYPE_TO_OPTION: Record<LifecycleEventType, keyof LifecycleEventOptions | null> = {
  request_submitted: null,
  stage_dispatched: "emitStageDispatched",
  stage_succeeded: null,
  stage_retry_scheduled: "emitRetryScheduled",
  request_completed: null,
  request_failed: null,
  request_aborted: null
};

/**
 * Fire-and-forget delivery to the observer, isolated in a microtask so a
 * handler can neither throw into nor re-enter the orchestrator.
 */
export function emitEvent(options: LifecycleEventOptions | undefined, event: LifecycleEvent, logger: Logger): void {
  if (!options?.onEvent) return;

  const optionKey = TYPE_TO_OPTION[event.type];
  if (optionKey && options[optionKey] === false) return;

  const handler = options.onEvent;
  const report = (err: unknown) => {
    logger.warn("lifecycle observer failed", {
      event: event.type,
      requestId: event.requestId,
      error: err instanceof Error ? err.message : String(err)
    });
  };
  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (err) {
      report(err);
    }
  });
}
