/**
 * Request Ledger - source of truth for request state, history and leases.
 *
 * Every mutation is a read-modify-write guarded by the record version, and
 * every state-changing call names the state the caller expects. A mismatch
 * comes back as `stale_transition`, never as a silent no-op.
 */

import crypto from "node:crypto";
import { PipelineError, StaleTransitionError } from "../errors.js";
import {
  isTerminal,
  stateLabel,
  type FailureInfo,
  type Lease,
  type Request,
  type StageHistoryEntry,
  type StagePhase,
  type TerminalState
} from "../types.js";
import type { LedgerRecord, LedgerStore, LedgerWriteResult } from "./types.js";

/** Bound on internal compare-and-set retries for unconditional writes. */
const MAX_CAS_RETRIES = 16;

export type CreateRequestInput = {
  payloadRef: string;
  firstStage: string;
  id?: string;
};

/**
 * Target of a transition: either a stage phase or a terminal marker.
 */
export type TransitionTarget =
  | { stage: string; phase: StagePhase }
  | { terminal: TerminalState };

export type TransitionChange = {
  to: TransitionTarget;
  /** Overrides the attempt counter; defaults to 0 on a stage change, unchanged otherwise. */
  attemptCount?: number;
  /** History entry appended in the same write. */
  history?: StageHistoryEntry;
  nextAttemptAt?: number;
  failure?: FailureInfo;
  /** Extra fields merged into the request (outputs, result). */
  patch?: Partial<Pick<Request, "outputs" | "result">>;
  /** What happens to the lease; defaults to "keep". */
  lease?: "keep" | "release";
  /** Write only while the attempt counter still holds the value the caller read. */
  expectedAttemptCount?: number;
  /** Write only while no unexpired lease is held. */
  requireExpiredLease?: boolean;
};

export type LedgerFilter = {
  state?: string;
  stage?: string;
  terminal?: boolean;
};

export type LedgerStats = {
  total: number;
  byState: Record<string, number>;
  leased: number;
};

export class RequestLedger {
  private readonly store: LedgerStore;
  private readonly now: () => number;

  constructor(store: LedgerStore, options: { now?: () => number } = {}) {
    this.store = store;
    this.now = options.now ?? Date.now;
  }

  private iso(): string {
    return new Date(this.now()).toISOString();
  }

  async create(input: CreateRequestInput): Promise<Request> {
    const timestamp = this.iso();
    const request: Request = {
      id: input.id ?? crypto.randomUUID(),
      payloadRef: input.payloadRef,
      currentStage: input.firstStage,
      phase: "PENDING",
      attemptCount: 0,
      stageHistory: [],
      outputs: {},
      createdAt: timestamp,
      updatedAt: timestamp
    };
    const inserted = await this.store.insert(request);
    if (!inserted) {
      throw new PipelineError("BAD_REQUEST", `Request ${request.id} already exists`, { requestId: request.id });
    }
    return request;
  }

  async find(id: string): Promise<Request | undefined> {
    return (await this.store.read(id))?.request;
  }

  /**
   * @throws PipelineError REQUEST_NOT_FOUND
   */
  async get(id: string): Promise<Request> {
    const request = await this.find(id);
    if (!request) {
      throw new PipelineError("REQUEST_NOT_FOUND", `Request ${id} not found`, { requestId: id });
    }
    return request;
  }

  async record(id: string): Promise<LedgerRecord | undefined> {
    return this.store.read(id);
  }

  /**
   * Append a history entry while the request is still in `expectedState`.
   * The entry must belong to the current stage, so history never moves
   * back to an earlier stage.
   */
  async appendHistory(id: string, expectedState: string, entry: StageHistoryEntry): Promise<LedgerWriteResult> {
    const record = await this.store.read(id);
    if (!record) return { ok: false, reason: "not_found" };
    const { request } = record;
    if (stateLabel(request) !== expectedState || entry.stage !== request.currentStage) {
      return { ok: false, reason: "stale_transition", current: request };
    }
    const next: Request = {
      ...request,
      stageHistory: [...request.stageHistory, { ...entry }],
      updatedAt: this.iso()
    };
    const applied = await this.store.compareAndSet(id, record.version, { request: next, lease: record.lease });
    if (!applied) return { ok: false, reason: "stale_transition", current: (await this.find(id)) ?? request };
    return { ok: true, request: next };
  }

  /**
   * Move a request from `fromState` to `change.to` in one conditional write.
   * Terminal requests never transition. The state label alone repeats across
   * attempts of a stage, so callers acting on an earlier read also pass
   * `expectedAttemptCount`.
   */
  async transition(id: string, fromState: string, change: TransitionChange): Promise<LedgerWriteResult> {
    const record = await this.store.read(id);
    if (!record) return { ok: false, reason: "not_found" };
    const { request, lease: held } = record;
    if (
      isTerminal(request) ||
      stateLabel(request) !== fromState ||
      (change.expectedAttemptCount !== undefined && request.attemptCount !== change.expectedAttemptCount) ||
      (change.requireExpiredLease === true && held !== null && held.expiresAt > this.now())
    ) {
      return { ok: false, reason: "stale_transition", current: request };
    }

    const next: Request = {
      ...request,
      ...change.patch,
      stageHistory: change.history ? [...request.stageHistory, { ...change.history }] : request.stageHistory,
      updatedAt: this.iso()
    };
    delete next.nextAttemptAt;

    if ("terminal" in change.to) {
      next.currentStage = change.to.terminal;
      next.phase = null;
      if (change.attemptCount !== undefined) next.attemptCount = change.attemptCount;
    } else {
      const stageChanged = change.to.stage !== request.currentStage;
      next.currentStage = change.to.stage;
      next.phase = change.to.phase;
      next.attemptCount = change.attemptCount ?? (stageChanged ? 0 : request.attemptCount);
      if (change.nextAttemptAt !== undefined) next.nextAttemptAt = change.nextAttemptAt;
    }
    if (change.failure) next.failure = { ...change.failure };

    const releaseLease = change.lease === "release" || "terminal" in change.to;
    const lease = releaseLease ? null : record.lease;
    const applied = await this.store.compareAndSet(id, record.version, { request: next, lease });
    if (!applied) return { ok: false, reason: "stale_transition", current: (await this.find(id)) ?? request };
    return { ok: true, request: next };
  }

  /**
   * Mark a request ABORTED regardless of its stage. Already terminal
   * requests are returned unchanged.
   */
  async abort(id: string, reason = "aborted by request"): Promise<Request> {
    for (let i = 0; i < MAX_CAS_RETRIES; i++) {
      const record = await this.store.read(id);
      if (!record) {
        throw new PipelineError("REQUEST_NOT_FOUND", `Request ${id} not found`, { requestId: id });
      }
      if (isTerminal(record.request)) return record.request;

      const next: Request = {
        ...record.request,
        currentStage: "ABORTED",
        phase: null,
        abortReason: reason,
        updatedAt: this.iso()
      };
      delete next.nextAttemptAt;
      if (await this.store.compareAndSet(id, record.version, { request: next, lease: null })) {
        return next;
      }
    }
    throw new StaleTransitionError(id, "any", "contended");
  }

  /**
   * Claim the request for `holderId`. Returns null while another holder's
   * lease is unexpired or the request is terminal. Re-acquiring an owned
   * lease extends it.
   */
  async acquireLease(id: string, holderId: string, ttlMs: number): Promise<Lease | null> {
    const record = await this.store.read(id);
    if (!record || isTerminal(record.request)) return null;
    const now = this.now();
    const held = record.lease;
    if (held && held.holderId !== holderId && held.expiresAt > now) return null;

    const lease: Lease = { requestId: id, holderId, acquiredAt: now, expiresAt: now + ttlMs };
    const applied = await this.store.compareAndSet(id, record.version, { request: record.request, lease });
    return applied ? lease : null;
  }

  /**
   * Push the expiry of a lease this holder owns.
   */
  async renewLease(id: string, holderId: string, ttlMs: number): Promise<Lease | null> {
    const record = await this.store.read(id);
    if (!record?.lease || record.lease.holderId !== holderId || isTerminal(record.request)) return null;
    const lease: Lease = { ...record.lease, expiresAt: this.now() + ttlMs };
    const applied = await this.store.compareAndSet(id, record.version, { request: record.request, lease });
    return applied ? lease : null;
  }

  async releaseLease(id: string, holderId: string): Promise<boolean> {
    for (let i = 0; i < MAX_CAS_RETRIES; i++) {
      const record = await this.store.read(id);
      if (!record?.lease || record.lease.holderId !== holderId) return false;
      if (await this.store.compareAndSet(id, record.version, { request: record.request, lease: null })) {
        return true;
      }
    }
    return false;
  }

  async list(filter: LedgerFilter = {}): Promise<Request[]> {
    const records = await this.store.scan();
    return records
      .map((r) => r.request)
      .filter((request) => {
        if (filter.state !== undefined && stateLabel(request) !== filter.state) return false;
        if (filter.stage !== undefined && request.currentStage !== filter.stage) return false;
        if (filter.terminal !== undefined && isTerminal(request) !== filter.terminal) return false;
        return true;
      });
  }

  /**
   * Requests waiting for a dispatch: PENDING, SUCCEEDED (to be advanced), or
   * RETRY_WAIT whose backoff has elapsed. Oldest first.
   */
  async listReady(): Promise<LedgerRecord[]> {
    const now = this.now();
    const records = await this.store.scan();
    return records
      .filter(({ request }) => {
        if (request.phase === "PENDING" || request.phase === "SUCCEEDED") return true;
        if (request.phase === "RETRY_WAIT") return (request.nextAttemptAt ?? 0) <= now;
        return false;
      })
      .sort((a, b) => a.request.updatedAt.localeCompare(b.request.updatedAt));
  }

  /**
   * IN_PROGRESS requests whose lease is missing or expired.
   */
  async listExpiredInProgress(): Promise<LedgerRecord[]> {
    const now = this.now();
    const records = await this.store.scan();
    return records.filter(
      ({ request, lease }) => request.phase === "IN_PROGRESS" && (lease === null || lease.expiresAt <= now)
    );
  }

  async countLeasesHeldBy(holderId: string): Promise<number> {
    const now = this.now();
    const records = await this.store.scan();
    return records.filter(({ lease }) => lease !== null && lease.holderId === holderId && lease.expiresAt > now).length;
  }

  async stats(): Promise<LedgerStats> {
    const now = this.now();
    const records = await this.store.scan();
    const byState: Record<string, number> = {};
    let leased = 0;
    for (const { request, lease } of records) {
      const label = request.phase === null ? request.currentStage : request.phase;
      byState[label] = (byState[label] ?? 0) + 1;
      if (lease && lease.expiresAt > now) leased++;
    }
    return { total: records.length, byState, leased };
  }
}

/**
 * Unwrap a write result for callers that prefer exceptions.
 * @throws StaleTransitionError on a conflicting write
 * @throws PipelineError REQUEST_NOT_FOUND for an unknown request
 */
export function expectApplied(id: string, expectedState: string, result: LedgerWriteResult): Request {
  if (result.ok) return result.request;
  if (result.reason === "not_found") {
    throw new PipelineError("REQUEST_NOT_FOUND", `Request ${id} not found`, { requestId: id });
  }
  throw new StaleTransitionError(id, expectedState, result.current ? stateLabel(result.current) : undefined);
}
