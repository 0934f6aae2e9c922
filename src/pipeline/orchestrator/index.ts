/**
 * Orchestrator module - request lifecycle driver.
 *
 * Exports:
 * - PipelineOrchestrator: lease-based dispatch, result folding and recovery sweep
 * - computeBackoff: retry delay policy
 * - Lifecycle event types and the observer helper
 */

export { PipelineOrchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, SubmitOptions } from "./orchestrator.js";

export { computeBackoff } from "./backoff.js";

export { emitEvent } from "./events.js";
export type {
  LifecycleEvent,
  LifecycleEventType,
  LifecycleEventHandler,
  LifecycleEventOptions,
  RequestSubmittedEvent,
  StageDispatchedEvent,
  StageSucceededEvent,
  StageRetryScheduledEvent,
  RequestCompletedEvent,
  RequestFailedEvent,
  RequestAbortedEvent
} from "./events.js";
