/**
 * Pipeline Orchestrator - drives every request through the ordered stages.
 *
 * The orchestrator never calls a stage itself. It claims ready requests
 * under a lease, moves them to `<stage>_IN_PROGRESS` and publishes a
 * dispatch command; result events coming back from the invokers are folded
 * into the ledger with conditional writes. A sweep turns in-progress
 * requests whose lease ran out into TIMED_OUT attempts, which is how work
 * held by a crashed instance gets picked up again.
 */

import { buildComposite, type ResultAccumulator } from "../accumulator/resultAccumulator.js";
import { ALL_RESULT_TOPICS, ORCHESTRATOR_GROUP, dispatchTopic } from "../bus/topics.js";
import type { EventBus, Subscription } from "../bus/types.js";
import { ConfigurationError, LeaseExpiredError, PipelineError, StaleTransitionError } from "../errors.js";
import type { LedgerRecord } from "../ledger/types.js";
import type { RequestLedger, TransitionChange } from "../ledger/requestLedger.js";
import { createLogger, type Logger } from "../logger.js";
import type { StageRegistry } from "../registry/stageRegistry.js";
import {
  isTerminal,
  payloadScheme,
  stateLabel,
  type AttemptOutcome,
  type DispatchCommand,
  type PipelineEvent,
  type Request,
  type StageError,
  type StageHistoryEntry
} from "../types.js";
import { computeBackoff } from "./backoff.js";
import { emitEvent, type LifecycleEventOptions } from "./events.js";

/** Re-reads of a request after a conflicting write before giving up. */
const MAX_STALE_RETRIES = 8;

export type OrchestratorOptions = {
  ledger: RequestLedger;
  registry: StageRegistry;
  accumulator: ResultAccumulator;
  dispatches: EventBus<DispatchCommand>;
  results: EventBus<PipelineEvent>;
  holderId: string;
  /** Added to the stage timeout to form the lease TTL. */
  leaseGraceMs?: number;
  /** Leases this holder may own at once. */
  maxInFlight?: number;
  tickMs?: number;
  sweepMs?: number;
  now?: () => number;
  random?: () => number;
  logger?: Logger;
  events?: LifecycleEventOptions;
};

export type SubmitOptions = {
  requestId?: string;
};

type ApplyResult = "applied" | "stale";

export class PipelineOrchestrator {
  private readonly ledger: RequestLedger;
  private readonly registry: StageRegistry;
  private readonly accumulator: ResultAccumulator;
  private readonly dispatches: EventBus<DispatchCommand>;
  private readonly results: EventBus<PipelineEvent>;
  readonly holderId: string;
  private readonly leaseGraceMs: number;
  private readonly maxInFlight: number;
  private readonly tickMs: number;
  private readonly sweepMs: number;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly logger: Logger;
  private readonly events: LifecycleEventOptions | undefined;

  private subscription: Subscription | undefined;
  private tickTimer: ReturnType<typeof setInterval> | undefined;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private ticking = false;
  private sweeping = false;

  constructor(options: OrchestratorOptions) {
    this.ledger = options.ledger;
    this.registry = options.registry;
    this.accumulator = options.accumulator;
    this.dispatches = options.dispatches;
    this.results = options.results;
    this.holderId = options.holderId;
    this.leaseGraceMs = options.leaseGraceMs ?? 5_000;
    this.maxInFlight = options.maxInFlight ?? 64;
    this.tickMs = options.tickMs ?? 250;
    this.sweepMs = options.sweepMs ?? 1_000;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createLogger("orchestrator");
    this.events = options.events;
    if (this.maxInFlight < 1) {
      throw new ConfigurationError("maxInFlight must be at least 1", { maxInFlight: this.maxInFlight });
    }
  }

  private iso(): string {
    return new Date(this.now()).toISOString();
  }

  /**
   * @throws ConfigurationError when the registry is empty or inconsistent
   */
  validateConfiguration(): void {
    this.registry.validate();
  }

  // ==========================================================================
  // Control API
  // ==========================================================================

  async submit(payloadRef: string, options: SubmitOptions = {}): Promise<string> {
    if (payloadRef.trim() === "") {
      throw new PipelineError("BAD_REQUEST", "payloadRef must not be empty");
    }
    const firstStage = this.registry.first();
    if (firstStage === undefined) {
      throw new ConfigurationError("No stages registered");
    }
    const descriptor = this.registry.require(firstStage);
    if (descriptor.accepts && descriptor.accepts.length > 0) {
      const scheme = payloadScheme(payloadRef);
      if (scheme === undefined || !descriptor.accepts.includes(scheme)) {
        throw new PipelineError("BAD_REQUEST", `Stage "${firstStage}" does not accept payload ${payloadRef}`, {
          payloadRef,
          accepts: descriptor.accepts
        });
      }
    }

    const request = await this.ledger.create(
      options.requestId !== undefined ? { payloadRef, firstStage, id: options.requestId } : { payloadRef, firstStage }
    );
    this.logger.info("request submitted", { requestId: request.id, payloadRef, firstStage });
    emitEvent(
      this.events,
      { type: "request_submitted", timestamp: this.iso(), requestId: request.id, payloadRef, firstStage },
      this.logger
    );
    return request.id;
  }

  /**
   * @throws PipelineError REQUEST_NOT_FOUND
   */
  async status(requestId: string): Promise<Request> {
    return this.ledger.get(requestId);
  }

  /**
   * Unconditionally abort. Results that arrive afterwards are ignored.
   */
  async abort(requestId: string, reason?: string): Promise<Request> {
    const before = await this.ledger.get(requestId);
    const after = await this.ledger.abort(requestId, reason);
    if (!isTerminal(before) && after.currentStage === "ABORTED") {
      this.logger.info("request aborted", { requestId, from: stateLabel(before) });
      emitEvent(
        this.events,
        { type: "request_aborted", timestamp: this.iso(), requestId, reason: after.abortReason ?? "aborted" },
        this.logger
      );
    }
    return after;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Dispatch ready requests while this holder is under its in-flight limit.
   * Returns the number of dispatch commands published.
   */
  async tick(): Promise<number> {
    const held = await this.ledger.countLeasesHeldBy(this.holderId);
    const budget = this.maxInFlight - held;
    if (budget <= 0) {
      this.logger.debug("in-flight limit reached", { held, maxInFlight: this.maxInFlight });
      return 0;
    }

    let dispatched = 0;
    for (const record of await this.ledger.listReady()) {
      if (dispatched >= budget) break;
      if (await this.dispatch(record.request)) dispatched++;
    }
    return dispatched;
  }

  private async dispatch(request: Request): Promise<boolean> {
    const fromState = stateLabel(request);
    const id = request.id;

    if (!this.registry.has(request.currentStage)) {
      await this.failUnregistered(request);
      return false;
    }

    let stage = request.currentStage;
    if (request.phase === "SUCCEEDED") {
      const next = this.nextStage(request);
      if (next === undefined) {
        // Stages after this one were removed since it succeeded.
        await this.complete(request, fromState);
        return false;
      }
      stage = next;
    }

    const descriptor = this.registry.require(stage);
    const lease = await this.ledger.acquireLease(id, this.holderId, descriptor.timeoutMs + this.leaseGraceMs);
    if (!lease) return false;

    const result = await this.ledger.transition(id, fromState, {
      to: { stage, phase: "IN_PROGRESS" },
      expectedAttemptCount: request.attemptCount
    });
    if (!result.ok) {
      await this.ledger.releaseLease(id, this.holderId);
      this.logger.debug("dispatch lost to a concurrent write", { requestId: id, expected: fromState });
      return false;
    }

    const updated = result.request;
    const attempt = updated.attemptCount + 1;
    const command: DispatchCommand = {
      requestId: id,
      stage,
      attempt,
      payloadRef: updated.payloadRef,
      inputs: { ...updated.outputs },
      issuedBy: this.holderId,
      issuedAt: this.iso()
    };
    try {
      await this.dispatches.publish(dispatchTopic(stage), command);
    } catch (err) {
      // The lease expires and the sweep turns this attempt into a timeout.
      this.logger.error("dispatch publish failed", {
        requestId: id,
        stage,
        attempt,
        error: err instanceof Error ? err.message : String(err)
      });
      return false;
    }

    this.logger.debug("stage dispatched", { requestId: id, stage, attempt });
    emitEvent(
      this.events,
      { type: "stage_dispatched", timestamp: this.iso(), requestId: id, stage, attempt, holderId: this.holderId },
      this.logger
    );
    return true;
  }

  // ==========================================================================
  // Result events
  // ==========================================================================

  /**
   * Fold one result event into the ledger. Events of terminal requests, and
   * events for an attempt other than the one in progress, are ignored.
   *
   * @throws StaleTransitionError when the request keeps changing underneath
   */
  async handleEvent(event: PipelineEvent): Promise<void> {
    if (event.type === "DISPATCHED") {
      this.logger.debug("stage call started", { requestId: event.requestId, stage: event.stage, attempt: event.attempt });
      return;
    }

    const failureOutcome: Exclude<AttemptOutcome, "SUCCEEDED"> = event.type === "TIMED_OUT" ? "TIMED_OUT" : "FAILED";
    const failureError: StageError = event.error ?? {
      message: event.type === "SUCCEEDED" ? "stage reported success without an output" : "stage failed",
      permanent: false
    };

    for (let i = 0; i < MAX_STALE_RETRIES; i++) {
      const request = await this.ledger.find(event.requestId);
      if (!request) {
        this.logger.warn("event for unknown request", { requestId: event.requestId, stage: event.stage });
        return;
      }
      if (isTerminal(request)) {
        this.logger.debug("ignoring event for terminal request", {
          requestId: request.id,
          state: request.currentStage,
          event: event.type
        });
        return;
      }
      if (
        request.phase !== "IN_PROGRESS" ||
        request.currentStage !== event.stage ||
        request.attemptCount + 1 !== event.attempt
      ) {
        this.logger.debug("ignoring event for attempt not in progress", {
          requestId: request.id,
          state: stateLabel(request),
          stage: event.stage,
          attempt: event.attempt
        });
        return;
      }

      const applied =
        event.type === "SUCCEEDED" && event.outputRef !== undefined
          ? await this.applySuccess(request, event.attempt, event.outputRef)
          : await this.applyFailure(request, event.attempt, failureOutcome, failureError);
      if (applied === "applied") return;
    }
    const current = await this.ledger.find(event.requestId);
    throw new StaleTransitionError(event.requestId, `${event.stage}_IN_PROGRESS`, current ? stateLabel(current) : undefined);
  }

  private async applySuccess(request: Request, attempt: number, outputRef: string): Promise<ApplyResult> {
    const stage = request.currentStage;
    const fromState = stateLabel(request);

    const merge = await this.accumulator.merge(request.id, stage, outputRef);
    if (merge.kind === "conflict") {
      this.logger.warn("stage output already recorded, keeping the first", {
        requestId: request.id,
        stage,
        existingRef: merge.existingRef,
        rejectedRef: outputRef
      });
    }

    const history: StageHistoryEntry = { stage, attempt, outcome: "SUCCEEDED", timestamp: this.iso(), outputRef };
    // An unregistered stage parks in SUCCEEDED; the next dispatch fails it.
    const next = this.registry.has(stage) ? this.nextStage(request) : stage;

    if (next === undefined) {
      return (await this.complete(request, fromState, history, attempt)) ? "applied" : "stale";
    }

    const result = await this.ledger.transition(request.id, fromState, {
      to: { stage, phase: "SUCCEEDED" },
      history,
      lease: "release",
      expectedAttemptCount: request.attemptCount
    });
    if (!result.ok) return "stale";

    this.logger.info("stage succeeded", { requestId: request.id, stage, attempt, next });
    emitEvent(
      this.events,
      { type: "stage_succeeded", timestamp: this.iso(), requestId: request.id, stage, attempt, outputRef },
      this.logger
    );
    return "applied";
  }

  private async complete(
    request: Request,
    fromState: string,
    history?: StageHistoryEntry,
    attempt?: number
  ): Promise<boolean> {
    const outputs = await this.accumulator.outputs(request.id);
    const composite = buildComposite({ ...request, outputs }, this.registry.pipelineOrder());
    const change: TransitionChange = {
      to: { terminal: "COMPLETED" },
      patch: { result: composite },
      expectedAttemptCount: request.attemptCount
    };
    if (history) change.history = history;
    const result = await this.ledger.transition(request.id, fromState, change);
    if (!result.ok) return false;

    if (history && attempt !== undefined && history.outputRef !== undefined) {
      emitEvent(
        this.events,
        {
          type: "stage_succeeded",
          timestamp: this.iso(),
          requestId: request.id,
          stage: history.stage,
          attempt,
          outputRef: history.outputRef
        },
        this.logger
      );
    }
    this.logger.info("request completed", { requestId: request.id, outputs: composite.outputs.length });
    emitEvent(
      this.events,
      { type: "request_completed", timestamp: this.iso(), requestId: request.id, result: composite },
      this.logger
    );
    return true;
  }

  /**
   * The retry rule: a permanent failure, or a failure past the stage's retry
   * budget, fails the request; anything else waits out a backoff and is
   * dispatched again.
   */
  private async applyFailure(
    request: Request,
    attempt: number,
    outcome: Exclude<AttemptOutcome, "SUCCEEDED">,
    error: StageError,
    guard: { requireExpiredLease?: boolean } = {}
  ): Promise<ApplyResult> {
    const stage = request.currentStage;
    const fromState = stateLabel(request);
    const descriptor = this.registry.resolve(stage);
    const attemptCount = request.attemptCount + 1;
    const history: StageHistoryEntry = { stage, attempt, outcome, timestamp: this.iso(), error };

    if (error.permanent || !descriptor || attemptCount > descriptor.maxRetries) {
      const failure = {
        stage,
        attempts: attemptCount,
        reason: descriptor ? error.message : `stage "${stage}" is no longer registered`,
        permanent: error.permanent || !descriptor
      };
      const result = await this.ledger.transition(request.id, fromState, {
        to: { terminal: "FAILED" },
        attemptCount,
        history,
        failure,
        expectedAttemptCount: request.attemptCount,
        ...guard
      });
      if (!result.ok) return "stale";
      this.logger.warn("request failed", { requestId: request.id, ...failure });
      emitEvent(this.events, { type: "request_failed", timestamp: this.iso(), requestId: request.id, failure }, this.logger);
      return "applied";
    }

    const delayMs = computeBackoff(descriptor.backoff, attemptCount, this.random);
    const result = await this.ledger.transition(request.id, fromState, {
      to: { stage, phase: "RETRY_WAIT" },
      attemptCount,
      history,
      nextAttemptAt: this.now() + delayMs,
      lease: "release",
      expectedAttemptCount: request.attemptCount,
      ...guard
    });
    if (!result.ok) return "stale";
    this.logger.info("stage retry scheduled", {
      requestId: request.id,
      stage,
      attempt,
      delayMs,
      error: error.message
    });
    emitEvent(
      this.events,
      { type: "stage_retry_scheduled", timestamp: this.iso(), requestId: request.id, stage, attempt, delayMs, error },
      this.logger
    );
    return "applied";
  }

  private async failUnregistered(request: Request): Promise<void> {
    const failure = {
      stage: request.currentStage,
      attempts: request.attemptCount,
      reason: `stage "${request.currentStage}" is no longer registered`,
      permanent: true
    };
    const result = await this.ledger.transition(request.id, stateLabel(request), {
      to: { terminal: "FAILED" },
      failure,
      expectedAttemptCount: request.attemptCount
    });
    if (!result.ok) return;
    this.logger.error("request failed", { requestId: request.id, ...failure });
    emitEvent(this.events, { type: "request_failed", timestamp: this.iso(), requestId: request.id, failure }, this.logger);
  }

  /**
   * The registered stage after the current one, skipping any stage this
   * request already finished. A stage that was re-registered further down
   * the pipeline is never run twice.
   */
  private nextStage(request: Request): string | undefined {
    const finished = new Set(request.stageHistory.filter((h) => h.outcome === "SUCCEEDED").map((h) => h.stage));
    finished.add(request.currentStage);
    let next = this.registry.next(request.currentStage);
    while (next !== undefined && finished.has(next)) {
      next = this.registry.next(next);
    }
    return next;
  }

  // ==========================================================================
  // Recovery
  // ==========================================================================

  /**
   * Treat every in-progress request whose lease expired as a timed-out
   * attempt. Returns the number of requests recovered.
   */
  async sweep(): Promise<number> {
    let recovered = 0;
    for (const record of await this.ledger.listExpiredInProgress()) {
      if (await this.recover(record)) recovered++;
    }
    return recovered;
  }

  /**
   * The sweep works from an earlier scan, so the write only lands while the
   * request is still on the same attempt and nobody holds a live lease.
   */
  private async recover({ request, lease }: LedgerRecord): Promise<boolean> {
    const expiredAt = lease ? new Date(lease.expiresAt).toISOString() : "unknown";
    const marker = new LeaseExpiredError(request.id, lease?.holderId ?? "none", expiredAt);

    const applied = await this.applyFailure(
      request,
      request.attemptCount + 1,
      "TIMED_OUT",
      { message: `lease expired at ${expiredAt}`, permanent: false, code: marker.code },
      { requireExpiredLease: true }
    );
    if (applied === "stale") {
      this.logger.debug("expired lease already handled", { requestId: request.id, stage: request.currentStage });
      return false;
    }
    this.logger.info(marker.message, { requestId: request.id, stage: request.currentStage });
    return true;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.subscription) return;
    this.validateConfiguration();
    this.subscription = this.results.subscribe({
      topics: [ALL_RESULT_TOPICS],
      group: ORCHESTRATOR_GROUP,
      memberId: this.holderId,
      handler: (event) => this.handleEvent(event)
    });
    this.tickTimer = setInterval(() => this.runTick(), this.tickMs);
    this.tickTimer.unref();
    this.sweepTimer = setInterval(() => this.runSweep(), this.sweepMs);
    this.sweepTimer.unref();
    this.logger.info("orchestrator started", {
      holderId: this.holderId,
      stages: this.registry.pipelineOrder(),
      maxInFlight: this.maxInFlight
    });
  }

  stop(): void {
    clearInterval(this.tickTimer);
    clearInterval(this.sweepTimer);
    this.tickTimer = undefined;
    this.sweepTimer = undefined;
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }

  get running(): boolean {
    return this.subscription !== undefined;
  }

  private runTick(): void {
    if (this.ticking) return;
    this.ticking = true;
    void this.tick()
      .catch((err: unknown) => {
        this.logger.error("tick failed", { error: err instanceof Error ? err.message : String(err) });
      })
      .finally(() => {
        this.ticking = false;
      });
  }

  private runSweep(): void {
    if (this.sweeping) return;
    this.sweeping = true;
    void this.sweep()
      .catch((err: unknown) => {
        this.logger.error("sweep failed", { error: err instanceof Error ? err.message : String(err) });
      })
      .finally(() => {
        this.sweeping = false;
      });
  }
}
