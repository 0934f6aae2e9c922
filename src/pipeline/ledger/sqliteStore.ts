import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createRequire } from "node:module";
import initSqlJs, { type Database, type SqlJsStatic } from "sql.js";
import { PipelineError } from "../errors.js";
import { stateLabel, type Lease, type Request } from "../types.js";
import { JournalledOutcomeSchema, LeaseSchema, RequestSchema } from "./schema.js";
import type {
  AttemptJournal,
  AttemptKey,
  JournalEntry,
  JournalledOutcome,
  LedgerRecord,
  LedgerStore
} from "./types.js";

type SqlJsBundle = {
  SQL: SqlJsStatic;
  db: Database;
};

/**
 * Attempts to locate sql-wasm.wasm in multiple candidate locations.
 * Order:
 *   1. Adjacent to the running JS (dist/)
 *   2. node_modules/sql.js/dist/ relative to cwd
 *   3. Via require.resolve from this file's directory
 */
function locateSqlWasm(filename: string): string {
  try {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const localCandidate = path.join(here, filename);
    if (fs.existsSync(localCandidate)) return localCandidate;
  } catch {
    // import.meta.url may not map to a file (bundled contexts)
  }

  const nodeModulesCandidate = path.resolve(process.cwd(), "node_modules", "sql.js", "dist", filename);
  if (fs.existsSync(nodeModulesCandidate)) return nodeModulesCandidate;

  try {
    const require = createRequire(import.meta.url);
    const resolved = require.resolve(`sql.js/dist/${filename}`);
    if (fs.existsSync(resolved)) return resolved;
  } catch {
    // sql.js not resolvable from here; fall through to the cwd path
  }

  return nodeModulesCandidate;
}

async function openDb(dbPath: string | undefined): Promise<SqlJsBundle> {
  const SQL = await initSqlJs({
    locateFile: (filename: string) => locateSqlWasm(filename)
  }).catch((err: unknown) => {
    throw new PipelineError("STORE_INIT_FAILED", "Failed to initialize sql.js (missing/invalid wasm?)", {
      err: err instanceof Error ? { name: err.name, message: err.message } : err
    });
  });
  if (dbPath !== undefined && fs.existsSync(dbPath)) {
    const bytes = fs.readFileSync(dbPath);
    return { SQL, db: new SQL.Database(bytes) };
  }
  return { SQL, db: new SQL.Database() };
}

function migrate(db: Database): void {
  db.run(`
    CREATE TABLE IF NOT EXISTS requests (
      id TEXT PRIMARY KEY,
      version INTEGER NOT NULL,
      state TEXT NOT NULL,
      lease_holder TEXT,
      lease_expires_at INTEGER,
      request_json TEXT NOT NULL,
      lease_json TEXT,
      updated_at TEXT NOT NULL
    );
  `);
  db.run(`CREATE INDEX IF NOT EXISTS idx_requests_state ON requests(state);`);
  db.run(`
    CREATE TABLE IF NOT EXISTS attempts (
      request_id TEXT NOT NULL,
      stage TEXT NOT NULL,
      attempt INTEGER NOT NULL,
      status TEXT NOT NULL,
      started_at INTEGER NOT NULL,
      resolved_at INTEGER,
      outcome_json TEXT,
      PRIMARY KEY (request_id, stage, attempt)
    );
  `);
}

function parseJsonColumn(value: unknown, column: string): unknown {
  if (typeof value !== "string") {
    throw new PipelineError("INTERNAL", `Ledger column ${column} is not text`);
  }
  return JSON.parse(value);
}

function toRecord(row: Record<string, unknown>): LedgerRecord {
  const request = RequestSchema.parse(parseJsonColumn(row.request_json, "request_json"));
  const lease = row.lease_json === null || row.lease_json === undefined
    ? null
    : LeaseSchema.parse(parseJsonColumn(row.lease_json, "lease_json"));
  return { request, lease, version: Number(row.version) };
}

function toJournalEntry(row: Record<string, unknown>): JournalEntry {
  const key: AttemptKey = {
    requestId: String(row.request_id),
    stage: String(row.stage),
    attempt: Number(row.attempt)
  };
  const startedAt = Number(row.started_at);
  if (row.status === "resolved") {
    return {
      key,
      status: "resolved",
      startedAt,
      resolvedAt: Number(row.resolved_at),
      outcome: JournalledOutcomeSchema.parse(parseJsonColumn(row.outcome_json, "outcome_json"))
    };
  }
  return { key, status: "in_flight", startedAt };
}

/**
 * sql.js-backed ledger and attempt journal. Every write is flushed to
 * `dbPath` so the ledger survives a restart; without a path the database
 * lives in memory.
 *
 * sql.js runs in-process, so the conditional UPDATE is atomic for every
 * orchestrator sharing this store instance.
 */
export class SqlitePipelineStore implements LedgerStore, AttemptJournal {
  private readonly dbPath: string | undefined;
  private bundle?: SqlJsBundle;

  constructor(dbPath?: string) {
    this.dbPath = dbPath;
  }

  get path(): string | undefined {
    return this.dbPath;
  }

  /**
   * Open (or create) the database and apply the schema.
   * Unlike an audit log, the ledger has no degraded mode: a store that
   * cannot open is fatal.
   */
  async init(): Promise<void> {
    if (this.bundle) return;
    if (this.dbPath !== undefined) {
      fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
    }
    this.bundle = await openDb(this.dbPath);
    migrate(this.bundle.db);
    await this.flush();
  }

  async flush(): Promise<void> {
    if (!this.bundle || this.dbPath === undefined) return;
    const data = this.bundle.db.export();
    fs.writeFileSync(this.dbPath, Buffer.from(data));
  }

  close(): void {
    this.bundle?.db.close();
    this.bundle = undefined;
  }

  private get db(): Database {
    if (!this.bundle) throw new PipelineError("STORE_NOT_INITIALIZED", "SqlitePipelineStore not initialized");
    return this.bundle.db;
  }

  private queryRows(sql: string, params: (string | number | null)[]): Record<string, unknown>[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Record<string, unknown>[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  async insert(request: Request): Promise<boolean> {
    const db = this.db;
    db.run(
      `INSERT OR IGNORE INTO requests (id, version, state, lease_holder, lease_expires_at, request_json, lease_json, updated_at)
       VALUES (?, 1, ?, NULL, NULL, ?, NULL, ?)`,
      [request.id, stateLabel(request), JSON.stringify(request), request.updatedAt]
    );
    const inserted = db.getRowsModified() === 1;
    if (inserted) await this.flush();
    return inserted;
  }

  async read(id: string): Promise<LedgerRecord | undefined> {
    const rows = this.queryRows(`SELECT version, request_json, lease_json FROM requests WHERE id = ?`, [id]);
    const row = rows[0];
    return row ? toRecord(row) : undefined;
  }

  async compareAndSet(
    id: string,
    expectedVersion: number,
    next: { request: Request; lease: Lease | null }
  ): Promise<boolean> {
    const db = this.db;
    db.run(
      `UPDATE requests
         SET version = version + 1, state = ?, lease_holder = ?, lease_expires_at = ?,
             request_json = ?, lease_json = ?, updated_at = ?
       WHERE id = ? AND version = ?`,
      [
        stateLabel(next.request),
        next.lease?.holderId ?? null,
        next.lease?.expiresAt ?? null,
        JSON.stringify(next.request),
        next.lease ? JSON.stringify(next.lease) : null,
        next.request.updatedAt,
        id,
        expectedVersion
      ]
    );
    const applied = db.getRowsModified() === 1;
    if (applied) await this.flush();
    return applied;
  }

  async scan(): Promise<LedgerRecord[]> {
    return this.queryRows(`SELECT version, request_json, lease_json FROM requests ORDER BY rowid`, []).map(toRecord);
  }

  async begin(key: AttemptKey, now: number): Promise<JournalEntry> {
    const db = this.db;
    db.run(
      `INSERT OR IGNORE INTO attempts (request_id, stage, attempt, status, started_at) VALUES (?, ?, ?, 'in_flight', ?)`,
      [key.requestId, key.stage, key.attempt, now]
    );
    if (db.getRowsModified() === 1) await this.flush();
    const entry = await this.lookup(key);
    if (!entry) throw new PipelineError("INTERNAL", "Attempt journal entry vanished after insert", { key });
    return entry;
  }

  async resolve(key: AttemptKey, outcome: JournalledOutcome, now: number): Promise<boolean> {
    const db = this.db;
    db.run(
      `INSERT OR IGNORE INTO attempts (request_id, stage, attempt, status, started_at) VALUES (?, ?, ?, 'in_flight', ?)`,
      [key.requestId, key.stage, key.attempt, now]
    );
    db.run(
      `UPDATE attempts SET status = 'resolved', resolved_at = ?, outcome_json = ?
       WHERE request_id = ? AND stage = ? AND attempt = ? AND status = 'in_flight'`,
      [now, JSON.stringify(outcome), key.requestId, key.stage, key.attempt]
    );
    const resolved = db.getRowsModified() === 1;
    await this.flush();
    return resolved;
  }

  async lookup(key: AttemptKey): Promise<JournalEntry | undefined> {
    const rows = this.queryRows(
      `SELECT request_id, stage, attempt, status, started_at, resolved_at, outcome_json
         FROM attempts WHERE request_id = ? AND stage = ? AND attempt = ?`,
      [key.requestId, key.stage, key.attempt]
    );
    const row = rows[0];
    return row ? toJournalEntry(row) : undefined;
  }
}
