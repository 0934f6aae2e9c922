import { describe, expect, it, beforeEach } from "vitest";
import { ResultAccumulator, buildComposite } from "../src/pipeline/accumulator/resultAccumulator.js";
import { MemoryPipelineStore } from "../src/pipeline/ledger/memoryStore.js";
import { RequestLedger } from "../src/pipeline/ledger/requestLedger.js";
import { computeBackoff } from "../src/pipeline/orchestrator/backoff.js";

describe("ResultAccumulator", () => {
  let store: MemoryPipelineStore;
  let ledger: RequestLedger;
  let accumulator: ResultAccumulator;

  beforeEach(async () => {
    store = new MemoryPipelineStore();
    ledger = new RequestLedger(store);
    accumulator = new ResultAccumulator(store);
    await ledger.create({ payloadRef: "repo:acme/widgets", firstStage: "intake", id: "r1" });
  });

  it("merges one output per stage", async () => {
    expect(await accumulator.merge("r1", "intake", "blob:intake-1")).toEqual({ kind: "merged" });
    expect(await accumulator.merge("r1", "classifier", "blob:class-1")).toEqual({ kind: "merged" });
    expect(await accumulator.outputs("r1")).toEqual({ intake: "blob:intake-1", classifier: "blob:class-1" });
  });

  it("treats a replayed output as a duplicate", async () => {
    await accumulator.merge("r1", "intake", "blob:intake-1");
    expect(await accumulator.merge("r1", "intake", "blob:intake-1")).toEqual({ kind: "duplicate" });
  });

  it("keeps the first output on a conflicting ref", async () => {
    await accumulator.merge("r1", "intake", "blob:intake-1");
    expect(await accumulator.merge("r1", "intake", "blob:intake-2")).toEqual({
      kind: "conflict",
      existingRef: "blob:intake-1"
    });
    expect((await ledger.get("r1")).outputs).toEqual({ intake: "blob:intake-1" });
  });

  it("preserves the lease and bumps the version", async () => {
    await ledger.acquireLease("r1", "holder-a", 60_000);
    const before = await ledger.record("r1");
    await accumulator.merge("r1", "intake", "blob:intake-1");
    const after = await ledger.record("r1");
    expect(after?.lease?.holderId).toBe("holder-a");
    expect(after?.version).toBe((before?.version ?? 0) + 1);
  });

  it("merges concurrent outputs of different stages", async () => {
    await Promise.all([
      accumulator.merge("r1", "intake", "blob:a"),
      accumulator.merge("r1", "classifier", "blob:b"),
      accumulator.merge("r1", "safety", "blob:c")
    ]);
    expect(await accumulator.outputs("r1")).toEqual({ intake: "blob:a", classifier: "blob:b", safety: "blob:c" });
  });

  it("throws REQUEST_NOT_FOUND for unknown requests", async () => {
    await expect(accumulator.merge("nope", "intake", "blob:a")).rejects.toMatchObject({ code: "REQUEST_NOT_FOUND" });
    await expect(accumulator.outputs("nope")).rejects.toMatchObject({ code: "REQUEST_NOT_FOUND" });
  });
});

describe("buildComposite", () => {
  it("lists outputs in pipeline order and appends retired stages", () => {
    const composite = buildComposite(
      {
        id: "r1",
        payloadRef: "repo:acme/widgets",
        outputs: { safety: "blob:s", retired: "blob:old", intake: "blob:i" }
      },
      ["intake", "classifier", "safety"]
    );
    expect(composite).toEqual({
      requestId: "r1",
      payloadRef: "repo:acme/widgets",
      outputs: [
        { stage: "intake", outputRef: "blob:i" },
        { stage: "safety", outputRef: "blob:s" },
        { stage: "retired", outputRef: "blob:old" }
      ]
    });
  });
});

describe("computeBackoff", () => {
  const policy = { baseMs: 100, capMs: 1_000 };

  it("doubles per failure and caps", () => {
    expect(computeBackoff(policy, 1, () => 1)).toBe(100);
    expect(computeBackoff(policy, 2, () => 1)).toBe(200);
    expect(computeBackoff(policy, 4, () => 1)).toBe(800);
    expect(computeBackoff(policy, 5, () => 1)).toBe(1_000);
    expect(computeBackoff(policy, 30, () => 1)).toBe(1_000);
  });

  it("applies jitter between half and the full delay", () => {
    expect(computeBackoff(policy, 3, () => 0)).toBe(200);
    expect(computeBackoff(policy, 3, () => 0.5)).toBe(300);
    expect(computeBackoff(policy, 3, () => 5)).toBe(400);
    expect(computeBackoff(policy, 0, () => 0)).toBe(50);
  });
});
