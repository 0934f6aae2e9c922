import type { AttemptOutcome, Lease, Request, StageError } from "../types.js";

/**
 * One row of the ledger: the request, its lease, and the version used for
 * compare-and-set.
 */
export type LedgerRecord = {
  request: Request;
  lease: Lease | null;
  version: number;
};

/**
 * Durable persistence behind the ledger. Any store (key-value, relational,
 * document) that honours the conditional write can back the orchestrator.
 */
export interface LedgerStore {
  /** Insert a new record at version 1. Returns false when the id exists. */
  insert(request: Request): Promise<boolean>;
  read(id: string): Promise<LedgerRecord | undefined>;
  /**
   * Replace the record only if its version still equals `expectedVersion`.
   * On success the stored version becomes `expectedVersion + 1`.
   */
  compareAndSet(
    id: string,
    expectedVersion: number,
    next: { request: Request; lease: Lease | null }
  ): Promise<boolean>;
  scan(): Promise<LedgerRecord[]>;
}

export type AttemptKey = {
  requestId: string;
  stage: string;
  attempt: number;
};

export type JournalledOutcome = {
  type: AttemptOutcome;
  outputRef?: string;
  error?: StageError;
};

export type JournalEntry =
  | { key: AttemptKey; status: "in_flight"; startedAt: number }
  | { key: AttemptKey; status: "resolved"; startedAt: number; resolvedAt: number; outcome: JournalledOutcome };

/**
 * Deduplication record of stage invocations, keyed by (request, stage, attempt).
 */
export interface AttemptJournal {
  /** Record the attempt as in flight unless an entry already exists; returns the stored entry. */
  begin(key: AttemptKey, now: number): Promise<JournalEntry>;
  /** Store the terminal outcome. Returns false if the attempt was already resolved. */
  resolve(key: AttemptKey, outcome: JournalledOutcome, now: number): Promise<boolean>;
  lookup(key: AttemptKey): Promise<JournalEntry | undefined>;
}

export function attemptKeyString(key: AttemptKey): string {
  return `${key.requestId}/${key.stage}/${key.attempt}`;
}

export type LedgerWriteResult =
  | { ok: true; request: Request }
  | { ok: false; reason: "stale_transition" | "not_found"; current?: Request };
