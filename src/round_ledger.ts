// round_ledger.ts
//
// SQLite record of convergence runs and their per-round outcomes.
// - One row per driver run, state BUILDING -> DONE_SUCCESS | DONE_FAILURE
// - One row per round with the sandbox outcome and the files it turned up
// - Forward-compatible schema migrations (schema_version)
// - Bounded LRU of run records, invalidated on every write to the run
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import { LRUCache } from 'lru-cache';
import { stableStringify } from './recipe_io/stable_stringify';
import { ErrorFactory } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type RunState = 'BUILDING' | 'DONE_SUCCESS' | 'DONE_FAILURE';

export type RoundPhase = 'GEN' | 'USE';

export interface RoundRecord {
  round: number;
  success: boolean;
  must_restart: number;
  /** External PGO phase the round's recipe ran, null outside external PGO. */
  pgo_phase: RoundPhase | null;
  /** Unpackaged files the round's build reported. */
  new_files: string[];
}

export interface RunRecord {
  runId: string;
  packageName: string;
  kind: string;
  state: RunState;
  rounds: number;
  createdAt: Date;
  updatedAt: Date;
}

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;

const VALID_TRANSITIONS: Record<RunState, RunState[]> = {
  BUILDING: ['DONE_SUCCESS', 'DONE_FAILURE'],
  DONE_SUCCESS: [],
  DONE_FAILURE: [],
};

function isRunState(value: string): value is RunState {
  return Object.prototype.hasOwnProperty.call(VALID_TRANSITIONS, value);
}

function parsePhase(value: string | null): RoundPhase | null {
  return value === 'GEN' || value === 'USE' ? value : null;
}

function parseFileList(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((f): f is string => typeof f === 'string') : [];
}

interface RunRow {
  run_id: string;
  package: string;
  kind: string;
  state: string;
  rounds: number;
  created_at: string;
  updated_at: string;
}

interface RoundRow {
  round: number;
  success: number;
  must_restart: number;
  pgo_phase: string | null;
  new_files: string;
}

/* -------------------------------------------------------------------------- */
/* Round Ledger                                                               */
/* -------------------------------------------------------------------------- */

export class RoundLedger {
  private readonly db: Database.Database;
  private readonly runCache = new LRUCache<string, RunRecord>({ max: 64 });

  /** `dbPath` may be ':memory:'. */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.configureDatabase();
    this.runMigrations();
    this.integrityCheck();
  }

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
  }

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS runs (
            run_id TEXT PRIMARY KEY,
            package TEXT NOT NULL,
            kind TEXT NOT NULL,
            state TEXT NOT NULL,
            rounds INTEGER NOT NULL DEFAULT 0,
            created_at TEXT DEFAULT CURRENT_TIMESTAMP,
            updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
            CHECK(state IN ('BUILDING','DONE_SUCCESS','DONE_FAILURE')),
            CHECK(rounds >= 0)
          ) STRICT;

          CREATE TABLE IF NOT EXISTS rounds (
            run_id TEXT NOT NULL,
            round INTEGER NOT NULL,
            success INTEGER NOT NULL,
            must_restart INTEGER NOT NULL,
            pgo_phase TEXT,
            new_files TEXT NOT NULL,
            created_at TEXT DEFAULT CURRENT_TIMESTAMP,
            PRIMARY KEY (run_id, round),
            FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE,
            CHECK(success IN (0,1)),
            CHECK(must_restart >= 0)
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_runs_package ON runs(package);
          CREATE INDEX IF NOT EXISTS idx_rounds_run ON rounds(run_id);
        `);

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(SCHEMA_VERSION);
      }
    });

    tx();
  }

  private integrityCheck(): void {
    const result = this.db.prepare('PRAGMA quick_check').get() as { quick_check: string } | undefined;
    if (result?.quick_check !== 'ok') {
      throw ErrorFactory.ledger(`Ledger integrity check failed: ${result?.quick_check ?? 'no result'}`);
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Runs                                                                     */
  /* ------------------------------------------------------------------------ */

  createRun(runId: string, packageName: string, kind: string): void {
    this.db.prepare(
      `INSERT INTO runs (run_id, package, kind, state) VALUES (?, ?, ?, 'BUILDING')`
    ).run(runId, packageName, kind);
  }

  transition(runId: string, next: RunState): void {
    const run = this.getRun(runId);
    if (!run) throw ErrorFactory.ledger(`Run not found: ${runId}`);

    if (!VALID_TRANSITIONS[run.state].includes(next)) {
      throw ErrorFactory.ledger(`Invalid run transition ${run.state} -> ${next}`);
    }

    this.db.prepare(
      `UPDATE runs SET state = ?, updated_at = CURRENT_TIMESTAMP WHERE run_id = ?`
    ).run(next, runId);
    this.runCache.delete(runId);
  }

  getRun(runId: string): RunRecord | null {
    const cached = this.runCache.get(runId);
    if (cached) return { ...cached };

    const row = this.db.prepare(
      `SELECT run_id, package, kind, state, rounds, created_at, updated_at FROM runs WHERE run_id = ?`
    ).get(runId) as RunRow | undefined;
    if (!row) return null;
    const run = this.toRun(row);
    this.runCache.set(runId, run);
    return { ...run };
  }

  /** Most recent run, optionally for one package. */
  latestRun(packageName?: string): RunRecord | null {
    const row = (packageName === undefined
      ? this.db.prepare(
        `SELECT run_id, package, kind, state, rounds, created_at, updated_at FROM runs ORDER BY rowid DESC LIMIT 1`
      ).get()
      : this.db.prepare(
        `SELECT run_id, package, kind, state, rounds, created_at, updated_at FROM runs WHERE package = ? ORDER BY rowid DESC LIMIT 1`
      ).get(packageName)) as RunRow | undefined;
    return row ? this.toRun(row) : null;
  }

  private toRun(row: RunRow): RunRecord {
    if (!isRunState(row.state)) throw ErrorFactory.ledger(`Unknown run state ${row.state} for ${row.run_id}`);
    return {
      runId: row.run_id,
      packageName: row.package,
      kind: row.kind,
      state: row.state,
      rounds: row.rounds,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  /* ------------------------------------------------------------------------ */
  /* Rounds                                                                   */
  /* ------------------------------------------------------------------------ */

  recordRound(runId: string, record: RoundRecord): void {
    const tx = this.db.transaction(() => {
      const run = this.getRun(runId);
      if (!run) throw ErrorFactory.ledger(`Run not found: ${runId}`);
      if (run.state !== 'BUILDING') throw ErrorFactory.ledger(`Run ${runId} is ${run.state}; cannot record round ${record.round}`);

      this.db.prepare(
        `INSERT INTO rounds (run_id, round, success, must_restart, pgo_phase, new_files) VALUES (?, ?, ?, ?, ?, ?)`
      ).run(
        runId,
        record.round,
        record.success ? 1 : 0,
        record.must_restart,
        record.pgo_phase,
        stableStringify(record.new_files),
      );

      this.db.prepare(
        `UPDATE runs SET rounds = ?, updated_at = CURRENT_TIMESTAMP WHERE run_id = ?`
      ).run(record.round, runId);
    });

    tx();
    this.runCache.delete(runId);
  }

  listRounds(runId: string): RoundRecord[] {
    const rows = this.db.prepare(
      `SELECT round, success, must_restart, pgo_phase, new_files FROM rounds WHERE run_id = ? ORDER BY round`
    ).all(runId) as RoundRow[];

    return rows.map(row => ({
      round: row.round,
      success: row.success === 1,
      must_restart: row.must_restart,
      pgo_phase: parsePhase(row.pgo_phase),
      new_files: parseFileList(row.new_files),
    }));
  }

  close(): void {
    this.runCache.clear();
    this.db.close();
  }
}
