/**
 * Run History Types
 */

import type { FlowStage } from "./flow.js";

export type FlowRunStatus = "running" | "success" | "exhausted" | "aborted";

/**
 * One invocation of the feedback loop on a design
 */
export interface FlowRunRecord {
  id: string;
  designDir: string;
  status: FlowRunStatus;
  maxIterations: number;
  iterations?: number;
  stageCount?: number;
  finalConfig?: Record<string, unknown>;
  error?: string;          // Set when the run aborted
  startedAt: Date;
  completedAt?: Date;
}

/**
 * One persisted stage attempt
 */
export interface StageAttemptRecord {
  id: number;
  flowRunId: string;
  iteration: number;
  stage: FlowStage;
  success: boolean;
  durationSec: number;
  errors: string[];
  warnings: string[];
  metrics?: Record<string, unknown>;
  runDir?: string;
}

/**
 * One persisted configuration mutation
 */
export interface ParameterChangeRecord {
  id: number;
  flowRunId: string;
  iteration: number;
  key: string;
  from?: string;
  to: string;
}
