import { setTimeout as sleep } from "node:timers/promises";
import { ResultAccumulator } from "./accumulator/resultAccumulator.js";
import { PaperTrail } from "./audit/paperTrail.js";
import { InMemoryEventBus } from "./bus/memoryBus.js";
import type { PipelineConfig } from "./config.js";
import { PipelineError } from "./errors.js";
import { HttpStageTransport, RoutingStageTransport } from "./invoker/httpTransport.js";
import { StageInvoker } from "./invoker/stageInvoker.js";
import { LocalStageTransport, type StageCallResponse, type StageTransport } from "./invoker/transport.js";
import { MemoryPipelineStore } from "./ledger/memoryStore.js";
import { RequestLedger, type LedgerStats } from "./ledger/requestLedger.js";
import { SqlitePipelineStore } from "./ledger/sqliteStore.js";
import type { AttemptJournal, AttemptKey, LedgerStore } from "./ledger/types.js";
import { createLogger, type Logger } from "./logger.js";
import type { LifecycleEvent, LifecycleEventOptions } from "./orchestrator/events.js";
import { PipelineOrchestrator } from "./orchestrator/orchestrator.js";
import { createRegistry } from "./registry/loader.js";
import type { StageRegistry } from "./registry/stageRegistry.js";
import { isTerminal, type DispatchCommand, type PipelineEvent, type Request } from "./types.js";
import type { LimiterStats } from "./utils/concurrencyLimiter.js";

export type PipelineStore = LedgerStore & AttemptJournal;

export type EngineOptions = {
  config: PipelineConfig;
  /** Defaults to the pipeline file from config, or the built-in stages. */
  registry?: StageRegistry;
  /** Defaults to HTTP for stages with an endpoint and local no-op workers otherwise. */
  transport?: StageTransport;
  /** Defaults to sql.js at config.dbPath, or memory when unset. */
  store?: PipelineStore;
  /** Forwarded to HTTP workers so they can report accepted work. */
  callbackUrl?: string;
  now?: () => number;
  random?: () => number;
  events?: LifecycleEventOptions;
  logger?: Logger;
};

export type EngineHealth = {
  status: "ok" | "stopped";
  holderId: string;
  stages: string[];
  ledger: LedgerStats;
  deadLetters: { dispatch: number; result: number };
  limiters: Record<string, LimiterStats>;
};

export type WaitOptions = {
  pollMs?: number;
  timeoutMs?: number;
};

export type ResultReport = AttemptKey & Exclude<StageCallResponse, { status: "accepted" }>;

/**
 * Wires one orchestrator instance and one invoker worker around a shared
 * ledger and a pair of in-process buses.
 */
export class PipelineEngine {
  readonly config: PipelineConfig;
  readonly registry: StageRegistry;
  readonly store: PipelineStore;
  readonly ledger: RequestLedger;
  readonly accumulator: ResultAccumulator;
  readonly dispatches: InMemoryEventBus<DispatchCommand>;
  readonly results: InMemoryEventBus<PipelineEvent>;
  readonly invoker: StageInvoker;
  readonly orchestrator: PipelineOrchestrator;
  readonly trail: PaperTrail | undefined;
  private readonly logger: Logger;
  private initialized = false;

  constructor(options: EngineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger("engine");
    const now = options.now ?? Date.now;

    this.registry = options.registry ?? createRegistry(this.config.pipelineFile);
    this.store = options.store ?? (this.config.dbPath ? new SqlitePipelineStore(this.config.dbPath) : new MemoryPipelineStore());
    this.ledger = new RequestLedger(this.store, { now });
    this.accumulator = new ResultAccumulator(this.store);
    this.dispatches = new InMemoryEventBus<DispatchCommand>({ logger: this.logger.child("dispatch-bus"), now });
    this.results = new InMemoryEventBus<PipelineEvent>({ logger: this.logger.child("result-bus"), now });
    this.trail = this.config.trailDir ? new PaperTrail(this.config.trailDir) : undefined;

    const transport =
      options.transport ??
      new RoutingStageTransport(
        new HttpStageTransport(options.callbackUrl !== undefined ? { callbackUrl: options.callbackUrl } : {}),
        new LocalStageTransport()
      );

    this.invoker = new StageInvoker({
      transport,
      journal: this.store,
      results: this.results,
      dispatches: this.dispatches,
      registry: this.registry,
      queueTimeoutMs: this.config.queueTimeoutMs,
      now,
      logger: this.logger.child("invoker")
    });

    const orchestratorOptions = {
      ledger: this.ledger,
      registry: this.registry,
      accumulator: this.accumulator,
      dispatches: this.dispatches,
      results: this.results,
      holderId: this.config.holderId,
      leaseGraceMs: this.config.leaseGraceMs,
      maxInFlight: this.config.maxInFlight,
      tickMs: this.config.tickIntervalMs,
      sweepMs: this.config.sweepIntervalMs,
      now,
      logger: this.logger.child("orchestrator"),
      events: this.observer(options.events)
    };
    this.orchestrator = new PipelineOrchestrator(
      options.random ? { ...orchestratorOptions, random: options.random } : orchestratorOptions
    );
  }

  private observer(events: LifecycleEventOptions | undefined): LifecycleEventOptions {
    const trail = this.trail;
    const downstream = events?.onEvent;
    return {
      ...events,
      onEvent: (event: LifecycleEvent) => {
        trail?.record(event);
        return downstream?.(event);
      }
    };
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    if (this.store instanceof SqlitePipelineStore) {
      await this.store.init();
    }
    this.initialized = true;
  }

  /**
   * @throws ConfigurationError when the registry fails validation
   */
  async start(): Promise<void> {
    await this.init();
    this.orchestrator.start();
    this.invoker.start();
    this.logger.info("engine started", {
      holderId: this.config.holderId,
      store: this.store instanceof SqlitePipelineStore ? (this.store.path ?? "sqlite:memory") : "memory"
    });
  }

  async stop(): Promise<void> {
    this.orchestrator.stop();
    this.invoker.stop();
    await this.dispatches.close();
    await this.results.close();
    if (this.store instanceof SqlitePipelineStore) {
      await this.store.flush();
      this.store.close();
    }
    this.logger.info("engine stopped", { holderId: this.config.holderId });
  }

  // Control API

  submit(payloadRef: string): Promise<string> {
    return this.orchestrator.submit(payloadRef);
  }

  status(requestId: string): Promise<Request> {
    return this.orchestrator.status(requestId);
  }

  abort(requestId: string, reason?: string): Promise<Request> {
    return this.orchestrator.abort(requestId, reason);
  }

  /**
   * Completion callback for stage workers that answered "accepted".
   * Returns false for a duplicate report.
   */
  reportResult(report: ResultReport): Promise<boolean> {
    const key: AttemptKey = { requestId: report.requestId, stage: report.stage, attempt: report.attempt };
    if (report.status === "success") {
      return this.invoker.reportResult(key, { status: "success", outputRef: report.outputRef });
    }
    return this.invoker.reportResult(
      key,
      report.retryable !== undefined
        ? { status: "failure", error: report.error, retryable: report.retryable }
        : { status: "failure", error: report.error }
    );
  }

  /**
   * Poll until the request is terminal.
   * @throws PipelineError INTERNAL when `timeoutMs` elapses first
   */
  async waitForTerminal(requestId: string, options: WaitOptions = {}): Promise<Request> {
    const pollMs = options.pollMs ?? 50;
    const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : undefined;
    for (;;) {
      const request = await this.status(requestId);
      if (isTerminal(request)) return request;
      if (deadline !== undefined && Date.now() >= deadline) {
        throw new PipelineError("INTERNAL", `Request ${requestId} still ${request.currentStage} after ${options.timeoutMs}ms`, {
          requestId,
          currentStage: request.currentStage,
          phase: request.phase
        });
      }
      await sleep(pollMs);
    }
  }

  async health(): Promise<EngineHealth> {
    return {
      status: this.orchestrator.running ? "ok" : "stopped",
      holderId: this.config.holderId,
      stages: this.registry.pipelineOrder(),
      ledger: await this.ledger.stats(),
      deadLetters: {
        dispatch: this.dispatches.deadLetters().length,
        result: this.results.deadLetters().length
      },
      limiters: this.invoker.limiterStats()
    };
  }
}
