/**
 * Stage Invoker - performs the call to a stage worker and turns the reply
 * into pipeline events.
 *
 * For every attempt it publishes DISPATCHED before calling out and exactly
 * one terminal event (SUCCEEDED / FAILED / TIMED_OUT) afterwards. The
 * attempt journal, keyed by (requestId, stage, attempt), keeps a re-issued
 * call from publishing a second terminal event for an attempt that was
 * already resolved.
 */

import { ALL_DISPATCH_TOPICS, INVOKER_GROUP, resultTopic } from "../bus/topics.js";
import type { EventBus, Subscription } from "../bus/types.js";
import { ConfigurationError, isRetryable, toPipelineError } from "../errors.js";
import type { AttemptJournal, AttemptKey, JournalledOutcome } from "../ledger/types.js";
import { createLogger, type Logger } from "../logger.js";
import type { StageRegistry } from "../registry/stageRegistry.js";
import type { DispatchCommand, PipelineEvent, StageDescriptor, StageError } from "../types.js";
import { KeyedConcurrencyLimiter, type LimiterStats } from "../utils/concurrencyLimiter.js";
import type { StageCallResponse, StageTransport } from "./transport.js";

export type InvocationOutcome =
  | { kind: "accepted" }
  | { kind: "succeeded"; outputRef: string }
  | { kind: "failed"; reason: string; permanent: boolean }
  | { kind: "timed_out"; timeoutMs: number };

export type InvokeOptions = {
  attempt: number;
  inputs?: Record<string, string>;
};

export type StageInvokerDeps = {
  transport: StageTransport;
  journal: AttemptJournal;
  results: EventBus<PipelineEvent>;
  /** Needed only for worker mode (start/stop). */
  dispatches?: EventBus<DispatchCommand>;
  registry: StageRegistry;
  /** Max wait for a stage slot before the dispatch is handed back to the bus. */
  queueTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
  memberId?: string;
};

type TerminalOutcome = Exclude<InvocationOutcome, { kind: "accepted" }>;

function toJournalled(outcome: TerminalOutcome): JournalledOutcome {
  switch (outcome.kind) {
    case "succeeded":
      return { type: "SUCCEEDED", outputRef: outcome.outputRef };
    case "failed":
      return { type: "FAILED", error: { message: outcome.reason, permanent: outcome.permanent } };
    case "timed_out":
      return {
        type: "TIMED_OUT",
        error: { message: `stage timed out after ${outcome.timeoutMs}ms`, permanent: false, code: "TIMEOUT" }
      };
  }
}

function fromJournalled(outcome: JournalledOutcome, timeoutMs: number): TerminalOutcome {
  switch (outcome.type) {
    case "SUCCEEDED":
      return { kind: "succeeded", outputRef: outcome.outputRef ?? "" };
    case "FAILED":
      return {
        kind: "failed",
        reason: outcome.error?.message ?? "stage failed",
        permanent: outcome.error?.permanent ?? false
      };
    case "TIMED_OUT":
      return { kind: "timed_out", timeoutMs };
  }
}

function fromResponse(response: Exclude<StageCallResponse, { status: "accepted" }>): TerminalOutcome {
  if (response.status === "success") return { kind: "succeeded", outputRef: response.outputRef };
  return { kind: "failed", reason: response.error, permanent: response.retryable === false };
}

export class StageInvoker {
  private readonly transport: StageTransport;
  private readonly journal: AttemptJournal;
  private readonly results: EventBus<PipelineEvent>;
  private readonly dispatches: EventBus<DispatchCommand> | undefined;
  private readonly registry: StageRegistry;
  private readonly limiter: KeyedConcurrencyLimiter;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly memberId: string | undefined;
  private subscription: Subscription | undefined;

  constructor(deps: StageInvokerDeps) {
    this.transport = deps.transport;
    this.journal = deps.journal;
    this.results = deps.results;
    this.dispatches = deps.dispatches;
    this.registry = deps.registry;
    this.limiter = new KeyedConcurrencyLimiter({ queueTimeoutMs: deps.queueTimeoutMs ?? 0 });
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger("invoker");
    this.memberId = deps.memberId;
  }

  /**
   * Call `descriptor`'s worker for one attempt. An attempt the journal has
   * already resolved returns its recorded outcome without calling out or
   * publishing anything.
   */
  async invoke(
    requestId: string,
    descriptor: StageDescriptor,
    payloadRef: string,
    options: InvokeOptions
  ): Promise<InvocationOutcome> {
    const key: AttemptKey = { requestId, stage: descriptor.name, attempt: options.attempt };
    const entry = await this.journal.begin(key, this.now());
    if (entry.status === "resolved") {
      this.logger.debug("attempt already resolved, skipping call", { ...key, outcome: entry.outcome.type });
      return fromJournalled(entry.outcome, descriptor.timeoutMs);
    }

    await this.publish(key, { type: "DISPATCHED" });

    const outcome = await this.callWithTimeout(key, descriptor, payloadRef, options.inputs ?? {});
    if (outcome.kind === "accepted") {
      this.logger.debug("stage accepted work, awaiting callback", { ...key });
      return outcome;
    }
    await this.settle(key, outcome);
    return outcome;
  }

  /**
   * Resolve an attempt whose worker answered "accepted" earlier.
   * Returns false when the attempt was already resolved (duplicate callback).
   */
  async reportResult(key: AttemptKey, response: Exclude<StageCallResponse, { status: "accepted" }>): Promise<boolean> {
    return this.settle(key, fromResponse(response));
  }

  /**
   * Worker mode: consume dispatch commands for every stage.
   */
  start(): void {
    if (this.subscription) return;
    if (!this.dispatches) {
      throw new ConfigurationError("StageInvoker.start() needs a dispatch bus");
    }
    const options = {
      topics: [ALL_DISPATCH_TOPICS],
      group: INVOKER_GROUP,
      handler: (command: DispatchCommand) => this.handleDispatch(command)
    };
    this.subscription = this.dispatches.subscribe(
      this.memberId !== undefined ? { ...options, memberId: this.memberId } : options
    );
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
    this.limiter.clear();
  }

  limiterStats(): Record<string, LimiterStats> {
    return this.limiter.stats();
  }

  /**
   * Throws (and so gets the command redelivered) only when no stage slot
   * frees up within the queue timeout.
   */
  async handleDispatch(command: DispatchCommand): Promise<void> {
    const descriptor = this.registry.resolve(command.stage);
    if (!descriptor) {
      const key = { requestId: command.requestId, stage: command.stage, attempt: command.attempt };
      this.logger.error("dispatch for unregistered stage", { ...key });
      await this.settle(key, { kind: "failed", reason: `stage "${command.stage}" is not registered`, permanent: true });
      return;
    }
    await this.limiter.run(descriptor.name, descriptor.maxConcurrency, () =>
      this.invoke(command.requestId, descriptor, command.payloadRef, {
        attempt: command.attempt,
        inputs: command.inputs
      })
    );
  }

  private async callWithTimeout(
    key: AttemptKey,
    descriptor: StageDescriptor,
    payloadRef: string,
    inputs: Record<string, string>
  ): Promise<InvocationOutcome> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<InvocationOutcome>((resolve) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        resolve({ kind: "timed_out", timeoutMs: descriptor.timeoutMs });
      }, descriptor.timeoutMs);
    });

    const call = this.transport
      .call(
        { requestId: key.requestId, stage: key.stage, attempt: key.attempt, payloadRef, stageConfig: descriptor, inputs },
        controller.signal
      )
      .then(
        (response): InvocationOutcome => (response.status === "accepted" ? { kind: "accepted" } : fromResponse(response)),
        (err: unknown): InvocationOutcome => {
          if (controller.signal.aborted) return { kind: "timed_out", timeoutMs: descriptor.timeoutMs };
          const pipelineErr = toPipelineError(err);
          const permanent = !isRetryable(err);
          this.logger.warn("stage call failed", { ...key, code: pipelineErr.code, error: pipelineErr.message });
          return { kind: "failed", reason: pipelineErr.message, permanent };
        }
      );

    try {
      return await Promise.race([call, timedOut]);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async settle(key: AttemptKey, outcome: TerminalOutcome): Promise<boolean> {
    const journalled = toJournalled(outcome);
    const first = await this.journal.resolve(key, journalled, this.now());
    if (!first) {
      this.logger.debug("duplicate resolution ignored", { ...key, outcome: journalled.type });
      return false;
    }
    const extra: { outputRef?: string; error?: StageError } = {};
    if (journalled.outputRef !== undefined) extra.outputRef = journalled.outputRef;
    if (journalled.error !== undefined) extra.error = journalled.error;
    await this.publish(key, { type: journalled.type, ...extra });
    return true;
  }

  private async publish(
    key: AttemptKey,
    body: Pick<PipelineEvent, "type"> & { outputRef?: string; error?: StageError }
  ): Promise<void> {
    const event: PipelineEvent = {
      requestId: key.requestId,
      stage: key.stage,
      attempt: key.attempt,
      timestamp: new Date(this.now()).toISOString(),
      ...body
    };
    await this.results.publish(resultTopic(key.stage), event);
  }
}
