/**
 * Database - SQLite run history for flow-autotuner
 */

import Database from "better-sqlite3";
import { join } from "path";
import { z } from "zod";
import { FLOW_ROOT } from "../files/path-resolver.js";
import { isFlowStage, type ParameterChange } from "../types/flow.js";
import type {
  FlowRunRecord,
  FlowRunStatus,
  ParameterChangeRecord,
  StageAttemptRecord,
} from "../types/history.js";
import type {
  FlowRunRecorder,
  FlowRunSummary,
  StageAttempt,
} from "../flow/iteration-controller.js";

const StringListSchema = z.array(z.string());
const JsonObjectSchema = z.record(z.string(), z.unknown());

interface FlowRunRow {
  id: string;
  design_dir: string;
  status: string;
  max_iterations: number;
  iterations: number | null;
  stage_count: number | null;
  final_config: string | null;
  error: string | null;
  started_at: string;
  completed_at: string | null;
}

interface StageAttemptRow {
  id: number;
  flow_run_id: string;
  iteration: number;
  stage: string;
  success: number;
  duration_sec: number;
  errors: string;
  warnings: string;
  metrics: string | null;
  run_dir: string | null;
}

interface ParameterChangeRow {
  id: number;
  flow_run_id: string;
  iteration: number;
  param_key: string;
  old_value: string | null;
  new_value: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS flow_runs (
    id TEXT PRIMARY KEY,
    design_dir TEXT NOT NULL,
    status TEXT NOT NULL,
    max_iterations INTEGER NOT NULL,
    iterations INTEGER,
    stage_count INTEGER,
    final_config TEXT,
    error TEXT,
    started_at DATETIME NOT NULL,
    completed_at DATETIME
  );

  CREATE TABLE IF NOT EXISTS stage_attempts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    flow_run_id TEXT NOT NULL,
    iteration INTEGER NOT NULL,
    stage TEXT NOT NULL,
    success INTEGER NOT NULL,
    duration_sec REAL NOT NULL,
    errors TEXT NOT NULL,
    warnings TEXT NOT NULL,
    metrics TEXT,
    run_dir TEXT,
    FOREIGN KEY (flow_run_id) REFERENCES flow_runs(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS parameter_changes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    flow_run_id TEXT NOT NULL,
    iteration INTEGER NOT NULL,
    param_key TEXT NOT NULL,
    old_value TEXT,
    new_value TEXT NOT NULL,
    FOREIGN KEY (flow_run_id) REFERENCES flow_runs(id) ON DELETE CASCADE
  );
`;

/**
 * Database manager; also records controller progress
 */
export class DatabaseManager implements FlowRunRecorder {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath || process.env.FLOW_DB_PATH || join(FLOW_ROOT, "flow-autotuner.db");
  }

  /**
   * Get database instance, creating if needed
   */
  getDb(): Database.Database {
    if (!this.db) {
      const db = new Database(this.dbPath);
      db.pragma("journal_mode = WAL");
      db.pragma("foreign_keys = ON");
      db.exec(SCHEMA);
      this.db = db;
    }
    return this.db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  // ==================== Recorder ====================

  startRun(info: { designDir: string; maxIterations: number }): string {
    const id = this.generateId("flow");
    this.getDb()
      .prepare(
        `INSERT INTO flow_runs (id, design_dir, status, max_iterations, started_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(id, info.designDir, "running", info.maxIterations, new Date().toISOString());
    return id;
  }

  recordStage(runId: string, attempt: StageAttempt): void {
    const { result } = attempt;
    const metrics =
      result.timing || result.area || result.routing
        ? JSON.stringify({ timing: result.timing, area: result.area, routing: result.routing })
        : null;

    this.getDb()
      .prepare(
        `INSERT INTO stage_attempts
           (flow_run_id, iteration, stage, success, duration_sec, errors, warnings, metrics, run_dir)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        runId,
        attempt.iteration,
        result.stage,
        result.success ? 1 : 0,
        result.durationSec,
        JSON.stringify(result.errors),
        JSON.stringify(result.warnings),
        metrics,
        result.runDir ?? null
      );
  }

  recordChanges(runId: string, iteration: number, changes: ParameterChange[]): void {
    const db = this.getDb();
    const stmt = db.prepare(
      `INSERT INTO parameter_changes (flow_run_id, iteration, param_key, old_value, new_value)
       VALUES (?, ?, ?, ?, ?)`
    );

    const insertAll = db.transaction((items: ParameterChange[]) => {
      for (const change of items) {
        stmt.run(
          runId,
          iteration,
          change.key,
          change.from === undefined ? null : String(change.from),
          String(change.to)
        );
      }
    });
    insertAll(changes);
  }

  finishRun(runId: string, summary: FlowRunSummary): void {
    this.getDb()
      .prepare(
        `UPDATE flow_runs
         SET status = ?, iterations = ?, stage_count = ?, final_config = ?, completed_at = ?
         WHERE id = ?`
      )
      .run(
        summary.outcome,
        summary.iterations,
        summary.stageCount,
        JSON.stringify(summary.finalConfig),
        new Date().toISOString(),
        runId
      );
  }

  abortRun(runId: string, reason: string): void {
    this.getDb()
      .prepare("UPDATE flow_runs SET status = ?, error = ?, completed_at = ? WHERE id = ?")
      .run("aborted", reason, new Date().toISOString(), runId);
  }

  // ==================== Queries ====================

  getFlowRun(id: string): FlowRunRecord | null {
    const row = this.getDb()
      .prepare<[string], FlowRunRow>("SELECT * FROM flow_runs WHERE id = ?")
      .get(id);
    return row ? this.rowToFlowRun(row) : null;
  }

  getRecentFlowRuns(limit = 10): FlowRunRecord[] {
    const rows = this.getDb()
      .prepare<[number], FlowRunRow>("SELECT * FROM flow_runs ORDER BY started_at DESC, rowid DESC LIMIT ?")
      .all(limit);
    return rows.map((row) => this.rowToFlowRun(row));
  }

  getStageAttempts(flowRunId: string): StageAttemptRecord[] {
    const rows = this.getDb()
      .prepare<[string], StageAttemptRow>(
        "SELECT * FROM stage_attempts WHERE flow_run_id = ? ORDER BY id ASC"
      )
      .all(flowRunId);
    return rows.map((row) => this.rowToStageAttempt(row));
  }

  getParameterChanges(flowRunId: string): ParameterChangeRecord[] {
    const rows = this.getDb()
      .prepare<[string], ParameterChangeRow>(
        "SELECT * FROM parameter_changes WHERE flow_run_id = ? ORDER BY id ASC"
      )
      .all(flowRunId);

    return rows.map((row) => ({
      id: row.id,
      flowRunId: row.flow_run_id,
      iteration: row.iteration,
      key: row.param_key,
      from: row.old_value ?? undefined,
      to: row.new_value,
    }));
  }

  // ==================== Helper Methods ====================

  private generateId(prefix: string): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `${prefix}_${timestamp}_${random}`;
  }

  private rowToFlowRun(row: FlowRunRow): FlowRunRecord {
    return {
      id: row.id,
      designDir: row.design_dir,
      status: toRunStatus(row.status),
      maxIterations: row.max_iterations,
      iterations: row.iterations ?? undefined,
      stageCount: row.stage_count ?? undefined,
      finalConfig: row.final_config
        ? JsonObjectSchema.parse(JSON.parse(row.final_config))
        : undefined,
      error: row.error ?? undefined,
      startedAt: new Date(row.started_at),
      completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
    };
  }

  private rowToStageAttempt(row: StageAttemptRow): StageAttemptRecord {
    if (!isFlowStage(row.stage)) {
      throw new Error(`Unknown stage '${row.stage}' in stage attempt ${row.id}`);
    }
    return {
      id: row.id,
      flowRunId: row.flow_run_id,
      iteration: row.iteration,
      stage: row.stage,
      success: row.success === 1,
      durationSec: row.duration_sec,
      errors: StringListSchema.parse(JSON.parse(row.errors)),
      warnings: StringListSchema.parse(JSON.parse(row.warnings)),
      metrics: row.metrics ? JsonObjectSchema.parse(JSON.parse(row.metrics)) : undefined,
      runDir: row.run_dir ?? undefined,
    };
  }
}

function toRunStatus(status: string): FlowRunStatus {
  if (status === "running" || status === "success" || status === "exhausted" || status === "aborted") {
    return status;
  }
  throw new Error(`Unknown flow run status '${status}'`);
}

// Export singleton instance
export const database = new DatabaseManager();
