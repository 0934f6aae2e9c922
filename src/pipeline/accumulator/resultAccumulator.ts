import { PipelineError } from "../errors.js";
import type { LedgerStore } from "../ledger/types.js";
import type { CompositeResult, Request, StageOutput } from "../types.js";

const MAX_CAS_RETRIES = 16;

export type MergeOutcome =
  | { kind: "merged" }
  | { kind: "duplicate" }
  | { kind: "conflict"; existingRef: string };

/**
 * Collects one output reference per completed stage on the request record.
 *
 * Keyed by (request, stage) and append-only: a replayed SUCCEEDED event for
 * an already merged stage is a no-op, and a different ref for the same stage
 * never replaces the first one.
 */
export class ResultAccumulator {
  private readonly store: LedgerStore;

  constructor(store: LedgerStore) {
    this.store = store;
  }

  async merge(requestId: string, stage: string, outputRef: string): Promise<MergeOutcome> {
    for (let i = 0; i < MAX_CAS_RETRIES; i++) {
      const record = await this.store.read(requestId);
      if (!record) {
        throw new PipelineError("REQUEST_NOT_FOUND", `Request ${requestId} not found`, { requestId });
      }
      const existing = record.request.outputs[stage];
      if (existing !== undefined) {
        return existing === outputRef ? { kind: "duplicate" } : { kind: "conflict", existingRef: existing };
      }
      const request: Request = {
        ...record.request,
        outputs: { ...record.request.outputs, [stage]: outputRef }
      };
      if (await this.store.compareAndSet(requestId, record.version, { request, lease: record.lease })) {
        return { kind: "merged" };
      }
    }
    throw new PipelineError("STALE_TRANSITION", `Could not merge ${stage} output for ${requestId}`, {
      requestId,
      stage
    });
  }

  async outputs(requestId: string): Promise<Record<string, string>> {
    const record = await this.store.read(requestId);
    if (!record) {
      throw new PipelineError("REQUEST_NOT_FOUND", `Request ${requestId} not found`, { requestId });
    }
    return { ...record.request.outputs };
  }
}

/**
 * Composite record in pipeline order. Stages without an output are skipped;
 * outputs of stages that are no longer in the order go last.
 */
export function buildComposite(request: Pick<Request, "id" | "payloadRef" | "outputs">, order: string[]): CompositeResult {
  const outputs: StageOutput[] = [];
  for (const stage of order) {
    const outputRef = request.outputs[stage];
    if (outputRef !== undefined) outputs.push({ stage, outputRef });
  }
  for (const [stage, outputRef] of Object.entries(request.outputs)) {
    if (!order.includes(stage)) outputs.push({ stage, outputRef });
  }
  return { requestId: request.id, payloadRef: request.payloadRef, outputs };
}
