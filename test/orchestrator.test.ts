import { describe, expect, it } from "vitest";
import { ResultAccumulator } from "../src/pipeline/accumulator/resultAccumulator.js";
import { InMemoryEventBus } from "../src/pipeline/bus/memoryBus.js";
import { ALL_DISPATCH_TOPICS, ALL_RESULT_TOPICS, ORCHESTRATOR_GROUP } from "../src/pipeline/bus/topics.js";
import { StageInvoker } from "../src/pipeline/invoker/stageInvoker.js";
import { LocalStageTransport, type LocalStageHandler } from "../src/pipeline/invoker/transport.js";
import { MemoryPipelineStore } from "../src/pipeline/ledger/memoryStore.js";
import { RequestLedger } from "../src/pipeline/ledger/requestLedger.js";
import type { LedgerRecord } from "../src/pipeline/ledger/types.js";
import { PipelineOrchestrator } from "../src/pipeline/orchestrator/orchestrator.js";
import type { LifecycleEvent } from "../src/pipeline/orchestrator/events.js";
import { defaultStageDescriptors } from "../src/pipeline/registry/defaults.js";
import { ConfigurationError } from "../src/pipeline/errors.js";
import { StageRegistry } from "../src/pipeline/registry/stageRegistry.js";
import { stateLabel, type DispatchCommand, type PipelineEvent, type StageDescriptor } from "../src/pipeline/types.js";
import { FakeClock, stage } from "./helpers.js";

type Shared = {
  clock: FakeClock;
  store: MemoryPipelineStore;
  ledger: RequestLedger;
  registry: StageRegistry;
  dispatches: InMemoryEventBus<DispatchCommand>;
  results: InMemoryEventBus<PipelineEvent>;
  transport: LocalStageTransport;
};

/**
 * Runs `between` once, after the next scan has taken its snapshot and before
 * the caller sees it.
 */
class InterleavingStore extends MemoryPipelineStore {
  private between: (() => Promise<void>) | undefined;

  afterNextScan(fn: () => Promise<void>): void {
    this.between = fn;
  }

  override async scan(): Promise<LedgerRecord[]> {
    const snapshot = await super.scan();
    const fn = this.between;
    this.between = undefined;
    if (fn) await fn();
    return snapshot;
  }
}

function shared(
  stages: StageDescriptor[],
  handlers: Record<string, LocalStageHandler> = {},
  store: MemoryPipelineStore = new MemoryPipelineStore()
): Shared {
  const clock = new FakeClock();
  return {
    clock,
    store,
    ledger: new RequestLedger(store, { now: clock.now }),
    registry: new StageRegistry(stages),
    dispatches: new InMemoryEventBus<DispatchCommand>({ now: clock.now }),
    results: new InMemoryEventBus<PipelineEvent>({ now: clock.now }),
    transport: new LocalStageTransport(handlers)
  };
}

function orchestrator(
  env: Shared,
  holderId: string,
  options: { maxInFlight?: number; onEvent?: (event: LifecycleEvent) => void; subscribe?: boolean } = {}
): PipelineOrchestrator {
  const orch = new PipelineOrchestrator({
    ledger: env.ledger,
    registry: env.registry,
    accumulator: new ResultAccumulator(env.store),
    dispatches: env.dispatches,
    results: env.results,
    holderId,
    leaseGraceMs: 500,
    maxInFlight: options.maxInFlight ?? 64,
    now: env.clock.now,
    random: () => 0,
    ...(options.onEvent && { events: { onEvent: options.onEvent } })
  });
  if (options.subscribe !== false) {
    env.results.subscribe({
      topics: [ALL_RESULT_TOPICS],
      group: ORCHESTRATOR_GROUP,
      memberId: holderId,
      handler: (event) => orch.handleEvent(event)
    });
  }
  return orch;
}

function startInvoker(env: Shared): StageInvoker {
  const invoker = new StageInvoker({
    transport: env.transport,
    journal: env.store,
    results: env.results,
    dispatches: env.dispatches,
    registry: env.registry,
    now: env.clock.now
  });
  invoker.start();
  return invoker;
}

async function step(env: Shared, orch: PipelineOrchestrator): Promise<number> {
  const dispatched = await orch.tick();
  await env.dispatches.drain();
  await env.results.drain();
  return dispatched;
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")));
  });
}

const retryable = { maxRetries: 3, backoff: { baseMs: 100, capMs: 1_000 } };

describe("PipelineOrchestrator", () => {
  it("retries a transient failure with backoff and completes", async () => {
    let classifierCalls = 0;
    const env = shared([stage("intake", 0), stage("classifier", 1, retryable), stage("safety", 2)], {
      classifier: async (request) => {
        classifierCalls++;
        if (classifierCalls <= 2) return { status: "failure", error: `model overloaded (${classifierCalls})` };
        return { status: "success", outputRef: `blob:${request.requestId}/classes` };
      }
    });
    const lifecycle: LifecycleEvent[] = [];
    const orch = orchestrator(env, "orch-1", { onEvent: (e) => void lifecycle.push(e) });
    startInvoker(env);

    const id = await orch.submit("repo:acme/widgets", { requestId: "r1" });
    expect(stateLabel(await orch.status(id))).toBe("intake_PENDING");

    expect(await step(env, orch)).toBe(1);
    expect(stateLabel(await orch.status(id))).toBe("intake_SUCCEEDED");

    await step(env, orch);
    let request = await orch.status(id);
    expect(stateLabel(request)).toBe("classifier_RETRY_WAIT");
    expect(request.attemptCount).toBe(1);
    expect(request.nextAttemptAt).toBe(env.clock.value + 50);

    expect(await step(env, orch)).toBe(0);
    env.clock.advance(50);
    await step(env, orch);
    request = await orch.status(id);
    expect(request.attemptCount).toBe(2);
    expect(request.nextAttemptAt).toBe(env.clock.value + 100);

    env.clock.advance(100);
    await step(env, orch);
    expect(stateLabel(await orch.status(id))).toBe("classifier_SUCCEEDED");

    await step(env, orch);
    request = await orch.status(id);
    expect(request.currentStage).toBe("COMPLETED");
    expect(request.phase).toBeNull();
    expect(request.stageHistory.map((h) => `${h.stage}#${h.attempt}:${h.outcome}`)).toEqual([
      "intake#1:SUCCEEDED",
      "classifier#1:FAILED",
      "classifier#2:FAILED",
      "classifier#3:SUCCEEDED",
      "safety#1:SUCCEEDED"
    ]);
    expect(request.result).toEqual({
      requestId: "r1",
      payloadRef: "repo:acme/widgets",
      outputs: [
        { stage: "intake", outputRef: "local://r1/intake" },
        { stage: "classifier", outputRef: "blob:r1/classes" },
        { stage: "safety", outputRef: "local://r1/safety" }
      ]
    });

    const positions = request.stageHistory.map((h) => env.registry.positionOf(h.stage));
    expect(positions).toEqual([...positions].sort((a, b) => a - b));
    expect((await env.ledger.record(id))?.lease).toBeNull();

    expect(lifecycle.map((e) => e.type)).toEqual([
      "request_submitted",
      "stage_dispatched",
      "stage_succeeded",
      "stage_dispatched",
      "stage_retry_scheduled",
      "stage_dispatched",
      "stage_retry_scheduled",
      "stage_dispatched",
      "stage_succeeded",
      "stage_dispatched",
      "stage_succeeded",
      "request_completed"
    ]);
  });

  it("fails the request on a permanent stage failure", async () => {
    const env = shared([stage("intake", 0), stage("classifier", 1), stage("safety", 2, retryable)], {
      safety: async () => ({ status: "failure", error: "license forbids analysis", retryable: false })
    });
    const lifecycle: LifecycleEvent[] = [];
    const orch = orchestrator(env, "orch-1", { onEvent: (e) => void lifecycle.push(e) });
    startInvoker(env);

    const id = await orch.submit("repo:acme/widgets");
    for (let i = 0; i < 4; i++) await step(env, orch);

    const request = await orch.status(id);
    expect(request.currentStage).toBe("FAILED");
    expect(request.failure).toEqual({
      stage: "safety",
      attempts: 1,
      reason: "license forbids analysis",
      permanent: true
    });
    expect(request.outputs).toEqual({ intake: `local://${id}/intake`, classifier: `local://${id}/classifier` });
    expect(request.result).toBeUndefined();
    expect(lifecycle.at(-1)).toMatchObject({ type: "request_failed", requestId: id });
  });

  it("fails after maxRetries + 1 timed-out attempts", async () => {
    const env = shared(
      [stage("intake", 0), stage("classifier", 1, { timeoutMs: 20, maxRetries: 2, backoff: { baseMs: 10, capMs: 10 } })],
      { classifier: (_request, signal) => waitForAbort(signal) }
    );
    const orch = orchestrator(env, "orch-1");
    startInvoker(env);

    const id = await orch.submit("blob:sample");
    for (let i = 0; i < 6; i++) {
      await step(env, orch);
      env.clock.advance(1_000);
    }

    const request = await orch.status(id);
    expect(request.currentStage).toBe("FAILED");
    expect(request.failure).toEqual({
      stage: "classifier",
      attempts: 3,
      reason: "stage timed out after 20ms",
      permanent: false
    });
    expect(request.stageHistory.filter((h) => h.stage === "classifier").map((h) => h.outcome)).toEqual([
      "TIMED_OUT",
      "TIMED_OUT",
      "TIMED_OUT"
    ]);
  });

  it("ignores results that arrive after an abort", async () => {
    const env = shared([stage("intake", 0), stage("classifier", 1)], {
      intake: async () => ({ status: "accepted" })
    });
    const lifecycle: LifecycleEvent[] = [];
    const orch = orchestrator(env, "orch-1", { onEvent: (e) => void lifecycle.push(e) });
    const invoker = startInvoker(env);

    const id = await orch.submit("blob:sample");
    await step(env, orch);
    expect(stateLabel(await orch.status(id))).toBe("intake_IN_PROGRESS");

    const aborted = await orch.abort(id, "operator cancelled");
    expect(aborted.currentStage).toBe("ABORTED");

    expect(await invoker.reportResult({ requestId: id, stage: "intake", attempt: 1 }, { status: "success", outputRef: "blob:late" })).toBe(true);
    await env.results.drain();

    const request = await orch.status(id);
    expect(request.currentStage).toBe("ABORTED");
    expect(request.abortReason).toBe("operator cancelled");
    expect(request.outputs).toEqual({});
    expect(request.stageHistory).toEqual([]);
    expect(await orch.tick()).toBe(0);

    const again = await orch.abort(id, "second");
    expect(again.abortReason).toBe("operator cancelled");
    await Promise.resolve();
    expect(lifecycle.filter((e) => e.type === "request_aborted")).toHaveLength(1);
  });

  it("ignores results for an attempt that is no longer current", async () => {
    const env = shared([stage("intake", 0, retryable), stage("classifier", 1)]);
    const orch = orchestrator(env, "orch-1");

    const id = await orch.submit("blob:sample");
    await orch.tick();
    await orch.handleEvent({
      requestId: id,
      stage: "intake",
      attempt: 1,
      type: "FAILED",
      timestamp: "t",
      error: { message: "flaky", permanent: false }
    });
    expect(stateLabel(await orch.status(id))).toBe("intake_RETRY_WAIT");

    // Replay of the same failure and a stray success for the old attempt.
    await orch.handleEvent({ requestId: id, stage: "intake", attempt: 1, type: "FAILED", timestamp: "t" });
    await orch.handleEvent({ requestId: id, stage: "intake", attempt: 1, type: "SUCCEEDED", timestamp: "t", outputRef: "blob:x" });

    const request = await orch.status(id);
    expect(request.attemptCount).toBe(1);
    expect(request.stageHistory).toHaveLength(1);
    expect(request.outputs).toEqual({});
  });

  it("recovers work held by a crashed orchestrator once its lease expires", async () => {
    const env = shared([stage("intake", 0, { timeoutMs: 1_000, ...retryable }), stage("classifier", 1)]);
    const crashed = orchestrator(env, "orch-crashed", { subscribe: false });

    const id = await crashed.submit("blob:sample");
    expect(await crashed.tick()).toBe(1);
    expect((await env.ledger.record(id))?.lease).toMatchObject({ holderId: "orch-crashed", expiresAt: env.clock.value + 1_500 });

    const survivor = orchestrator(env, "orch-survivor");
    startInvoker(env);

    expect(await survivor.tick()).toBe(0);
    env.clock.advance(1_499);
    expect(await survivor.sweep()).toBe(0);
    env.clock.advance(1);
    expect(await survivor.sweep()).toBe(1);

    let request = await survivor.status(id);
    expect(stateLabel(request)).toBe("intake_RETRY_WAIT");
    expect(request.stageHistory[0]).toMatchObject({
      stage: "intake",
      attempt: 1,
      outcome: "TIMED_OUT",
      error: { code: "LEASE_EXPIRED", permanent: false }
    });

    env.clock.advance(1_000);
    await step(env, survivor);
    await step(env, survivor);
    request = await survivor.status(id);
    expect(request.currentStage).toBe("COMPLETED");
    expect(request.stageHistory.map((h) => `${h.stage}#${h.attempt}:${h.outcome}`)).toEqual([
      "intake#1:TIMED_OUT",
      "intake#2:SUCCEEDED",
      "classifier#1:SUCCEEDED"
    ]);
  });

  it("leaves a retried attempt alone when a slower sweep read the expired one", async () => {
    const store = new InterleavingStore();
    const env = shared([stage("x", 0, { timeoutMs: 1_000, maxRetries: 3, backoff: { baseMs: 10, capMs: 10 } })], {}, store);
    const a = orchestrator(env, "orch-a", { subscribe: false });
    const b = orchestrator(env, "orch-b", { subscribe: false });

    const id = await a.submit("blob:sample");
    expect(await a.tick()).toBe(1);
    env.clock.advance(1_500);

    store.afterNextScan(async () => {
      expect(await b.sweep()).toBe(1);
      env.clock.advance(5);
      expect(await b.tick()).toBe(1);
    });
    expect(await a.sweep()).toBe(0);

    const record = await env.ledger.record(id);
    expect(record?.request && stateLabel(record.request)).toBe("x_IN_PROGRESS");
    expect(record?.request.attemptCount).toBe(1);
    expect(record?.lease?.holderId).toBe("orch-b");
    expect(record?.request.stageHistory.map((h) => [h.attempt, h.outcome])).toEqual([[1, "TIMED_OUT"]]);

    await a.handleEvent({ requestId: id, stage: "x", attempt: 2, type: "SUCCEEDED", timestamp: "t", outputRef: "blob:x" });
    const request = await a.status(id);
    expect(request.currentStage).toBe("COMPLETED");
    expect(request.stageHistory.map((h) => `${h.stage}#${h.attempt}:${h.outcome}`)).toEqual(["x#1:TIMED_OUT", "x#2:SUCCEEDED"]);
  });

  it("does not dispatch from a ready snapshot another orchestrator already acted on", async () => {
    const store = new InterleavingStore();
    const env = shared([stage("x", 0, retryable)], {}, store);
    const a = orchestrator(env, "orch-a", { subscribe: false });
    const b = orchestrator(env, "orch-b", { subscribe: false });

    const id = await a.submit("blob:sample");
    expect(await b.tick()).toBe(1);
    await b.handleEvent({
      requestId: id,
      stage: "x",
      attempt: 1,
      type: "FAILED",
      timestamp: "t",
      error: { message: "flaky", permanent: false }
    });
    env.clock.advance(50);

    // a's countLeasesHeldBy scan comes first; arm the hook for listReady.
    const ticks: number[] = [];
    store.afterNextScan(async () => {
      store.afterNextScan(async () => {
        ticks.push(await b.tick());
        await b.handleEvent({
          requestId: id,
          stage: "x",
          attempt: 2,
          type: "FAILED",
          timestamp: "t",
          error: { message: "flaky again", permanent: false }
        });
      });
    });
    ticks.push(await a.tick());

    expect(ticks).toEqual([1, 0]);
    const record = await env.ledger.record(id);
    expect(record?.request && stateLabel(record.request)).toBe("x_RETRY_WAIT");
    expect(record?.request.attemptCount).toBe(2);
    expect(record?.lease).toBeNull();
  });

  it("applies registry updates to requests already in flight", async () => {
    const env = shared([stage("intake", 0, retryable), stage("classifier", 1)], {
      intake: async () => ({ status: "failure", error: "cold start" })
    });
    const orch = orchestrator(env, "orch-1");
    startInvoker(env);

    const id = await orch.submit("blob:sample");
    await step(env, orch);
    expect(stateLabel(await orch.status(id))).toBe("intake_RETRY_WAIT");

    env.registry.update("intake", { maxRetries: 1 });
    env.clock.advance(50);
    await step(env, orch);

    const request = await orch.status(id);
    expect(request.currentStage).toBe("FAILED");
    expect(request.failure).toEqual({ stage: "intake", attempts: 2, reason: "cold start", permanent: false });
  });

  it("never sends a request back to a stage it finished when the pipeline changes", async () => {
    const env = shared([stage("a", 0), stage("b", 1), stage("c", 2)], {
      b: async () => ({ status: "accepted" })
    });
    const orch = orchestrator(env, "orch-1");
    const invoker = startInvoker(env);

    const id = await orch.submit("blob:sample");
    await step(env, orch);
    await step(env, orch);
    expect(stateLabel(await orch.status(id))).toBe("b_IN_PROGRESS");

    expect(() => env.registry.update("a", { position: 5 })).toThrow(ConfigurationError);
    env.registry.unregister("a");
    env.registry.register(stage("a", 5));
    expect(env.registry.pipelineOrder()).toEqual(["b", "c", "a"]);

    await invoker.reportResult({ requestId: id, stage: "b", attempt: 1 }, { status: "success", outputRef: "blob:b" });
    await env.results.drain();
    await step(env, orch);
    await step(env, orch);

    const request = await orch.status(id);
    expect(request.currentStage).toBe("COMPLETED");
    expect(request.stageHistory.map((h) => `${h.stage}#${h.attempt}:${h.outcome}`)).toEqual([
      "a#1:SUCCEEDED",
      "b#1:SUCCEEDED",
      "c#1:SUCCEEDED"
    ]);
    expect((await env.ledger.record(id))?.lease).toBeNull();
  });

  it("hands each request to exactly one of several orchestrators", async () => {
    const env = shared([stage("intake", 0), stage("classifier", 1)]);
    const a = orchestrator(env, "orch-a", { subscribe: false });
    const b = orchestrator(env, "orch-b", { subscribe: false });
    const seen: DispatchCommand[] = [];
    env.dispatches.subscribe({ topics: [ALL_DISPATCH_TOPICS], group: "spy", handler: (c) => void seen.push(c) });

    for (let i = 0; i < 5; i++) await a.submit("blob:sample", { requestId: `r${i}` });
    const [fromA, fromB] = await Promise.all([a.tick(), b.tick()]);
    await env.dispatches.drain();

    expect(fromA + fromB).toBe(5);
    expect(seen.map((c) => c.requestId).sort()).toEqual(["r0", "r1", "r2", "r3", "r4"]);
    expect((await env.ledger.countLeasesHeldBy("orch-a")) + (await env.ledger.countLeasesHeldBy("orch-b"))).toBe(5);
  });

  it("stops dispatching at maxInFlight", async () => {
    const env = shared([stage("intake", 0)]);
    const orch = orchestrator(env, "orch-1", { maxInFlight: 2, subscribe: false });

    for (let i = 0; i < 5; i++) await orch.submit("blob:sample");
    expect(await orch.tick()).toBe(2);
    expect(await orch.tick()).toBe(0);
    expect(await env.ledger.countLeasesHeldBy("orch-1")).toBe(2);
    expect((await env.ledger.list({ state: "intake_PENDING" })).length).toBe(3);
  });

  it("validates submissions", async () => {
    const env = shared([stage("intake", 0, { accepts: ["repo", "blob"] })]);
    const orch = orchestrator(env, "orch-1", { subscribe: false });

    await expect(orch.submit("  ")).rejects.toMatchObject({ code: "BAD_REQUEST" });
    await expect(orch.submit("ftp:somewhere")).rejects.toMatchObject({ code: "BAD_REQUEST" });
    await expect(orch.submit("no-scheme")).rejects.toMatchObject({ code: "BAD_REQUEST" });
    await expect(orch.status("missing")).rejects.toMatchObject({ code: "REQUEST_NOT_FOUND" });
    await expect(orch.abort("missing")).rejects.toMatchObject({ code: "REQUEST_NOT_FOUND" });
    expect(await orch.submit("repo:acme/widgets", { requestId: "ok" })).toBe("ok");
  });

  it("fails requests whose stage was unregistered", async () => {
    const env = shared([stage("intake", 0), stage("classifier", 1)]);
    const orch = orchestrator(env, "orch-1", { subscribe: false });
    const id = await orch.submit("blob:sample");

    env.registry.unregister("intake");
    expect(await orch.tick()).toBe(0);

    const request = await orch.status(id);
    expect(request.currentStage).toBe("FAILED");
    expect(request.failure).toEqual({
      stage: "intake",
      attempts: 0,
      reason: 'stage "intake" is no longer registered',
      permanent: true
    });
  });

  it("does not let a throwing observer disturb the pipeline", async () => {
    const env = shared([stage("intake", 0)]);
    const orch = orchestrator(env, "orch-1", {
      onEvent: () => {
        throw new Error("observer down");
      }
    });
    startInvoker(env);

    const id = await orch.submit("blob:sample");
    await step(env, orch);
    expect((await orch.status(id)).currentStage).toBe("COMPLETED");
  });

  it("rejects an empty registry on start", () => {
    const env = shared([]);
    const orch = orchestrator(env, "orch-1", { subscribe: false });
    expect(() => orch.start()).toThrow();
    expect(orch.running).toBe(false);
  });
});

describe("default digest pipeline", () => {
  async function runSteps(env: Shared, orch: PipelineOrchestrator, count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await step(env, orch);
      env.clock.advance(60_000);
    }
  }

  it("advances to graph_extract after two transient classifier failures", async () => {
    let classifierCalls = 0;
    const env = shared(defaultStageDescriptors(), {
      classifier: async () => {
        classifierCalls++;
        return classifierCalls <= 2
          ? { status: "failure", error: "classifier backend unavailable" }
          : { status: "success", outputRef: "blob:labels" };
      },
      graph_extract: async () => ({ status: "accepted" })
    });
    const orch = orchestrator(env, "orch-1");
    startInvoker(env);

    const id = await orch.submit("repo:acme/widgets", { requestId: "R1" });
    await runSteps(env, orch, 6);

    const request = await orch.status(id);
    expect(stateLabel(request)).toBe("graph_extract_IN_PROGRESS");
    expect(request.stageHistory.filter((h) => h.stage === "classifier").map((h) => h.outcome)).toEqual([
      "FAILED",
      "FAILED",
      "SUCCEEDED"
    ]);
  });

  it("stops at safety on a permanent rejection", async () => {
    const env = shared(defaultStageDescriptors(), {
      safety: async () => ({ status: "failure", error: "payload contains malware", retryable: false })
    });
    const orch = orchestrator(env, "orch-1");
    startInvoker(env);

    const id = await orch.submit("repo:acme/widgets", { requestId: "R2" });
    await runSteps(env, orch, 10);

    const request = await orch.status(id);
    expect(request.currentStage).toBe("FAILED");
    expect(request.failure?.stage).toBe("safety");
    expect(request.stageHistory.at(-1)).toMatchObject({ stage: "safety", outcome: "FAILED" });
    expect(request.stageHistory.some((h) => h.stage === "runner")).toBe(false);
  });

  it("stays aborted when embeddings reports late", async () => {
    const env = shared(defaultStageDescriptors(), {
      embeddings: async () => ({ status: "accepted" })
    });
    const orch = orchestrator(env, "orch-1");
    const invoker = startInvoker(env);

    const id = await orch.submit("repo:acme/widgets", { requestId: "R3" });
    await runSteps(env, orch, 4);
    expect(stateLabel(await orch.status(id))).toBe("embeddings_IN_PROGRESS");

    await orch.abort(id);
    await invoker.reportResult({ requestId: id, stage: "embeddings", attempt: 1 }, { status: "success", outputRef: "blob:vectors" });
    await env.results.drain();
    await runSteps(env, orch, 2);

    const request = await orch.status(id);
    expect(request.currentStage).toBe("ABORTED");
    expect(request.outputs.embeddings).toBeUndefined();
    expect(request.stageHistory.map((h) => h.stage)).toEqual(["intake", "classifier", "graph_extract"]);
  });
});
