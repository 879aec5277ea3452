import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

type DbHandle = Database.Database;

export type RunOutcome = 'running' | 'pass' | 'ceiling' | 'aborted';

export type StoredRun = Readonly<{
  runId: string;
  startedAt: string;
  endedAt: string | null;
  outcome: RunOutcome;
  taskCount: number;
  maxIterations: number;
  lastIteration: number;
}>;

export type StoredIteration = Readonly<{
  runId: string;
  iteration: number;
  total: number;
  passed: number;
  failed: number;
  failedItems: readonly { name: string; message: string }[];
  recordedAt: string;
}>;

export type StoredJobResult = Readonly<{
  runId: string;
  iteration: number;
  phase: string;
  queueIndex: number;
  identity: string;
  label: string;
  status: string;
  exitCode: number;
  durationMs: number;
  startedAt: string;
  endedAt: string;
  logPath: string;
}>;

export type StoredProgressEvent = Readonly<{
  id: number;
  runId: string;
  source: string;
  phase: string | null;
  message: string;
  createdAt: string;
}>;

function nowIso(): string {
  return new Date().toISOString();
}

function withDb<T>(dbPath: string, fn: (db: DbHandle) => T): T {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    db.pragma('synchronous = NORMAL');
    ensureSchema(db);
    return fn(db);
  } finally {
    db.close();
  }
}

export function ensureSchema(db: DbHandle): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      run_id TEXT PRIMARY KEY,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      outcome TEXT NOT NULL DEFAULT 'running',
      task_count INTEGER NOT NULL CHECK (task_count >= 0),
      max_iterations INTEGER NOT NULL CHECK (max_iterations > 0),
      last_iteration INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS iterations (
      run_id TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
      iteration INTEGER NOT NULL CHECK (iteration > 0),
      total INTEGER NOT NULL,
      passed INTEGER NOT NULL,
      failed INTEGER NOT NULL,
      failed_items_json TEXT NOT NULL,
      recorded_at TEXT NOT NULL,
      PRIMARY KEY(run_id, iteration)
    );

    CREATE TABLE IF NOT EXISTS job_results (
      run_id TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
      iteration INTEGER NOT NULL,
      phase TEXT NOT NULL,
      queue_index INTEGER NOT NULL CHECK (queue_index >= 0),
      identity TEXT NOT NULL,
      label TEXT NOT NULL,
      status TEXT NOT NULL,
      exit_code INTEGER NOT NULL,
      duration_ms INTEGER NOT NULL,
      started_at TEXT NOT NULL,
      ended_at TEXT NOT NULL,
      log_path TEXT NOT NULL DEFAULT '',
      PRIMARY KEY(run_id, iteration, phase, queue_index)
    );

    CREATE INDEX IF NOT EXISTS idx_job_results_identity
      ON job_results(run_id, identity);

    CREATE TABLE IF NOT EXISTS progress_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL,
      source TEXT NOT NULL,
      phase TEXT,
      message TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_progress_events_run
      ON progress_events(run_id, id);
  `);
}

type RunRow = {
  run_id: string;
  started_at: string;
  ended_at: string | null;
  outcome: string;
  task_count: number;
  max_iterations: number;
  last_iteration: number;
};

function isRunOutcome(value: string): value is RunOutcome {
  return value === 'running' || value === 'pass' || value === 'ceiling' || value === 'aborted';
}

function toStoredRun(row: RunRow): StoredRun {
  return {
    runId: row.run_id,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    outcome: isRunOutcome(row.outcome) ? row.outcome : 'aborted',
    taskCount: row.task_count,
    maxIterations: row.max_iterations,
    lastIteration: row.last_iteration,
  };
}

function parseFailedItems(raw: string): { name: string; message: string }[] {
  try {
    const value: unknown = JSON.parse(raw);
    if (!Array.isArray(value)) return [];
    const items: { name: string; message: string }[] = [];
    for (const entry of value) {
      if (entry && typeof entry === 'object' && 'name' in entry && typeof entry.name === 'string') {
        const message = 'message' in entry && typeof entry.message === 'string' ? entry.message : '';
        items.push({ name: entry.name, message });
      }
    }
    return items;
  } catch {
    return [];
  }
}

/** Starts a run, or re-opens it when a resumed run reuses the id. */
export function recordRunStarted(
  dbPath: string,
  params: { runId: string; taskCount: number; maxIterations: number; startedAt?: string },
): void {
  withDb(dbPath, (db) => {
    db.prepare(
      `INSERT INTO runs (run_id, started_at, task_count, max_iterations)
       VALUES (@runId, @startedAt, @taskCount, @maxIterations)
       ON CONFLICT(run_id) DO UPDATE SET
         outcome = 'running',
         ended_at = NULL,
         task_count = excluded.task_count,
         max_iterations = excluded.max_iterations`,
    ).run({
      runId: params.runId,
      startedAt: params.startedAt ?? nowIso(),
      taskCount: params.taskCount,
      maxIterations: params.maxIterations,
    });
  });
}

export function recordRunFinished(
  dbPath: string,
  params: { runId: string; outcome: Exclude<RunOutcome, 'running'>; lastIteration: number; endedAt?: string },
): void {
  withDb(dbPath, (db) => {
    db.prepare(
      `UPDATE runs SET outcome = @outcome, ended_at = @endedAt, last_iteration = @lastIteration WHERE run_id = @runId`,
    ).run({
      runId: params.runId,
      outcome: params.outcome,
      endedAt: params.endedAt ?? nowIso(),
      lastIteration: params.lastIteration,
    });
  });
}

export function recordIteration(dbPath: string, iteration: Omit<StoredIteration, 'recordedAt'>): void {
  withDb(dbPath, (db) => {
    const tx = db.transaction(() => {
      db.prepare(
        `INSERT OR REPLACE INTO iterations (run_id, iteration, total, passed, failed, failed_items_json, recorded_at)
         VALUES (@runId, @iteration, @total, @passed, @failed, @failedItemsJson, @recordedAt)`,
      ).run({
        runId: iteration.runId,
        iteration: iteration.iteration,
        total: iteration.total,
        passed: iteration.passed,
        failed: iteration.failed,
        failedItemsJson: JSON.stringify(iteration.failedItems),
        recordedAt: nowIso(),
      });
      db.prepare(`UPDATE runs SET last_iteration = MAX(last_iteration, @iteration) WHERE run_id = @runId`).run({
        runId: iteration.runId,
        iteration: iteration.iteration,
      });
    });
    tx();
  });
}

/** Upserts job results in one transaction; a re-run phase replaces its previous rows. */
export function recordJobResults(dbPath: string, results: readonly StoredJobResult[]): void {
  if (results.length === 0) return;
  withDb(dbPath, (db) => {
    const insert = db.prepare(
      `INSERT OR REPLACE INTO job_results
         (run_id, iteration, phase, queue_index, identity, label, status, exit_code, duration_ms, started_at, ended_at, log_path)
       VALUES
         (@runId, @iteration, @phase, @queueIndex, @identity, @label, @status, @exitCode, @durationMs, @startedAt, @endedAt, @logPath)`,
    );
    const tx = db.transaction((rows: readonly StoredJobResult[]) => {
      for (const row of rows) insert.run({ ...row, durationMs: Math.round(row.durationMs) });
    });
    tx(results);
  });
}

export function appendProgressEvent(
  dbPath: string,
  params: { runId: string; source: string; phase?: string | null; message: string },
): void {
  withDb(dbPath, (db) => {
    db.prepare(
      `INSERT INTO progress_events (run_id, source, phase, message, created_at)
       VALUES (@runId, @source, @phase, @message, @createdAt)`,
    ).run({
      runId: params.runId,
      source: params.source,
      phase: params.phase ?? null,
      message: params.message,
      createdAt: nowIso(),
    });
  });
}

export function listRuns(dbPath: string): StoredRun[] {
  if (!fs.existsSync(dbPath)) return [];
  return withDb(dbPath, (db) => {
    const rows = db.prepare(`SELECT * FROM runs ORDER BY started_at DESC, run_id DESC`).all() as RunRow[];
    return rows.map(toStoredRun);
  });
}

export function readRun(dbPath: string, runId: string): StoredRun | null {
  if (!fs.existsSync(dbPath)) return null;
  return withDb(dbPath, (db) => {
    const row = db.prepare(`SELECT * FROM runs WHERE run_id = ?`).get(runId) as RunRow | undefined;
    return row ? toStoredRun(row) : null;
  });
}

export function listIterations(dbPath: string, runId: string): StoredIteration[] {
  if (!fs.existsSync(dbPath)) return [];
  return withDb(dbPath, (db) => {
    const rows = db
      .prepare(`SELECT * FROM iterations WHERE run_id = ? ORDER BY iteration ASC`)
      .all(runId) as {
      run_id: string;
      iteration: number;
      total: number;
      passed: number;
      failed: number;
      failed_items_json: string;
      recorded_at: string;
    }[];
    return rows.map((row) => ({
      runId: row.run_id,
      iteration: row.iteration,
      total: row.total,
      passed: row.passed,
      failed: row.failed,
      failedItems: parseFailedItems(row.failed_items_json),
      recordedAt: row.recorded_at,
    }));
  });
}

export function listJobResults(
  dbPath: string,
  params: { runId: string; iteration?: number; phase?: string },
): StoredJobResult[] {
  if (!fs.existsSync(dbPath)) return [];
  return withDb(dbPath, (db) => {
    const rows = db
      .prepare(
        `SELECT * FROM job_results
         WHERE run_id = @runId
           AND (@iteration IS NULL OR iteration = @iteration)
           AND (@phase IS NULL OR phase = @phase)
         ORDER BY iteration ASC, phase ASC, queue_index ASC`,
      )
      .all({ runId: params.runId, iteration: params.iteration ?? null, phase: params.phase ?? null }) as {
      run_id: string;
      iteration: number;
      phase: string;
      queue_index: number;
      identity: string;
      label: string;
      status: string;
      exit_code: number;
      duration_ms: number;
      started_at: string;
      ended_at: string;
      log_path: string;
    }[];
    return rows.map((row) => ({
      runId: row.run_id,
      iteration: row.iteration,
      phase: row.phase,
      queueIndex: row.queue_index,
      identity: row.identity,
      label: row.label,
      status: row.status,
      exitCode: row.exit_code,
      durationMs: row.duration_ms,
      startedAt: row.started_at,
      endedAt: row.ended_at,
      logPath: row.log_path,
    }));
  });
}

export function listProgressEvents(dbPath: string, runId: string): StoredProgressEvent[] {
  if (!fs.existsSync(dbPath)) return [];
  return withDb(dbPath, (db) => {
    const rows = db
      .prepare(`SELECT * FROM progress_events WHERE run_id = ? ORDER BY id ASC`)
      .all(runId) as { id: number; run_id: string; source: string; phase: string | null; message: string; created_at: string }[];
    return rows.map((row) => ({
      id: row.id,
      runId: row.run_id,
      source: row.source,
      phase: row.phase,
      message: row.message,
      createdAt: row.created_at,
    }));
  });
}
