import type { Lease, Request } from "../types.js";
import {
  attemptKeyString,
  type AttemptJournal,
  type AttemptKey,
  type JournalEntry,
  type JournalledOutcome,
  type LedgerRecord,
  type LedgerStore
} from "./types.js";

/**
 * In-process store with the same conditional-write contract as the sqlite
 * store. Records are copied on the way in and out so callers never hold
 * live references.
 */
export class MemoryPipelineStore implements LedgerStore, AttemptJournal {
  private readonly records = new Map<string, LedgerRecord>();
  private readonly attempts = new Map<string, JournalEntry>();

  async insert(request: Request): Promise<boolean> {
    if (this.records.has(request.id)) return false;
    this.records.set(request.id, { request: structuredClone(request), lease: null, version: 1 });
    return true;
  }

  async read(id: string): Promise<LedgerRecord | undefined> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : undefined;
  }

  async compareAndSet(
    id: string,
    expectedVersion: number,
    next: { request: Request; lease: Lease | null }
  ): Promise<boolean> {
    const current = this.records.get(id);
    if (!current || current.version !== expectedVersion) return false;
    this.records.set(id, {
      request: structuredClone(next.request),
      lease: next.lease ? { ...next.lease } : null,
      version: expectedVersion + 1
    });
    return true;
  }

  async scan(): Promise<LedgerRecord[]> {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }

  async begin(key: AttemptKey, now: number): Promise<JournalEntry> {
    const k = attemptKeyString(key);
    const existing = this.attempts.get(k);
    if (existing) return structuredClone(existing);
    const entry: JournalEntry = { key: { ...key }, status: "in_flight", startedAt: now };
    this.attempts.set(k, entry);
    return structuredClone(entry);
  }

  async resolve(key: AttemptKey, outcome: JournalledOutcome, now: number): Promise<boolean> {
    const k = attemptKeyString(key);
    const existing = this.attempts.get(k);
    if (existing?.status === "resolved") return false;
    this.attempts.set(k, {
      key: { ...key },
      status: "resolved",
      startedAt: existing?.startedAt ?? now,
      resolvedAt: now,
      outcome: structuredClone(outcome)
    });
    return true;
  }

  async lookup(key: AttemptKey): Promise<JournalEntry | undefined> {
    const entry = this.attempts.get(attemptKeyString(key));
    return entry ? structuredClone(entry) : undefined;
  }
}
