/**
 * Iteration Controller
 *
 * Drives the flow stage by stage, analyzes each completed stage, and after a
 * failure applies the failed stage's tuning action (if it has one) before the
 * next attempt. Stops on the first clean pass or when the iteration budget is
 * spent.
 *
 *   running_stage(0..n) -> analyzing -> running_stage(i+1) ...
 *   running_stage(i) fails -> tuning -> running_stage(0) of next iteration
 *   all stages pass -> done_success
 *   budget spent -> done_exhausted
 */

import { FLOW_STAGES, type FlowStage, type ParameterChange, type StageResult } from "../types/flow.js";
import {
  STAGE_ANALYZERS,
  analyzeStage,
  formatSuggestion,
  type StageAnalyzer,
  type Suggestion,
} from "../tuner/bottleneck-analyzer.js";
import {
  STAGE_TUNING_ACTIONS,
  type FlowConfig,
  type ParameterTuner,
  type TuningAction,
} from "../tuner/parameter-tuner.js";

function defaultMaxIterations(): number {
  return parseInt(process.env.FLOW_MAX_ITERATIONS || "3", 10);
}

export type ControllerState =
  | { kind: "running_stage"; iteration: number; index: number }
  | { kind: "analyzing"; iteration: number; stage: FlowStage }
  | { kind: "tuning"; iteration: number; stage: FlowStage }
  | { kind: "done_success" }
  | { kind: "done_exhausted" };

export type FlowOutcome = "success" | "exhausted";

/**
 * The part of FlowExecutor the controller depends on
 */
export interface StageExecutor {
  readonly designDir: string;
  runStage(stage: FlowStage, tag?: string): Promise<StageResult>;
}

export interface StageAttempt {
  iteration: number;
  result: StageResult;
}

export interface IterationReport {
  iteration: number;
  failedStage?: FlowStage;
  suggestions: Suggestion[];
  changes: ParameterChange[];
}

export interface FlowRunSummary {
  outcome: FlowOutcome;
  iterations: number;
  stageCount: number;
  history: StageAttempt[];
  iterationReports: IterationReport[];
  finalConfig: FlowConfig;
}

/**
 * Receives progress of a run as it happens (e.g. to persist it)
 */
export interface FlowRunRecorder {
  startRun(info: { designDir: string; maxIterations: number }): string;
  recordStage(runId: string, attempt: StageAttempt): void;
  recordChanges(runId: string, iteration: number, changes: ParameterChange[]): void;
  finishRun(runId: string, summary: FlowRunSummary): void;
  abortRun(runId: string, reason: string): void;
}

export interface IterationControllerOptions {
  executor: StageExecutor;
  tuner: ParameterTuner;
  maxIterations?: number;
  analyzers?: Partial<Record<FlowStage, StageAnalyzer>>;
  tuningActions?: Partial<Record<FlowStage, TuningAction>>;
  recorder?: FlowRunRecorder;
  onTransition?: (state: ControllerState) => void;
}

export class IterationController {
  private executor: StageExecutor;
  private tuner: ParameterTuner;
  readonly maxIterations: number;
  private analyzers: Partial<Record<FlowStage, StageAnalyzer>>;
  private tuningActions: Partial<Record<FlowStage, TuningAction>>;
  private recorder?: FlowRunRecorder;
  private onTransition?: (state: ControllerState) => void;
  private _state: ControllerState = { kind: "running_stage", iteration: 1, index: 0 };

  constructor(options: IterationControllerOptions) {
    const maxIterations = options.maxIterations ?? defaultMaxIterations();
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    this.executor = options.executor;
    this.tuner = options.tuner;
    this.maxIterations = maxIterations;
    this.analyzers = options.analyzers ?? STAGE_ANALYZERS;
    this.tuningActions = options.tuningActions ?? STAGE_TUNING_ACTIONS;
    this.recorder = options.recorder;
    this.onTransition = options.onTransition;
  }

  get state(): ControllerState {
    return this._state;
  }

  /**
   * Run the loop to a terminal state. If a stage or tuning action throws, the
   * recorder sees the run aborted and the error propagates.
   */
  async run(): Promise<FlowRunSummary> {
    const runId = this.recorder?.startRun({
      designDir: this.executor.designDir,
      maxIterations: this.maxIterations,
    });

    try {
      return await this.iterate(runId);
    } catch (error) {
      if (runId !== undefined) {
        this.recorder?.abortRun(runId, error instanceof Error ? error.message : String(error));
      }
      throw error;
    }
  }

  private async iterate(runId: string | undefined): Promise<FlowRunSummary> {
    const history: StageAttempt[] = [];
    const iterationReports: IterationReport[] = [];
    let iteration = 0;
    let outcome: FlowOutcome = "exhausted";

    while (iteration < this.maxIterations) {
      iteration++;
      console.error(`[flow] === Iteration ${iteration}/${this.maxIterations} ===`);

      const report: IterationReport = { iteration, suggestions: [], changes: [] };
      iterationReports.push(report);

      for (const [index, stage] of FLOW_STAGES.entries()) {
        this.transition({ kind: "running_stage", iteration, index });
        const result = await this.executor.runStage(stage, `iter_${iteration}`);

        const attempt: StageAttempt = { iteration, result };
        history.push(attempt);
        if (runId !== undefined) {
          this.recorder?.recordStage(runId, attempt);
        }

        if (!result.success) {
          report.failedStage = stage;
          console.error(`[flow] ${stage} failed`);
          break;
        }

        this.transition({ kind: "analyzing", iteration, stage });
        const suggestions = analyzeStage(result, this.analyzers);
        if (suggestions.length > 0) {
          console.error(`[flow] ${stage} completed with issues:`);
          for (const suggestion of suggestions) {
            console.error(`  ${formatSuggestion(suggestion)}`);
          }
          report.suggestions.push(...suggestions);
        }
      }

      if (report.failedStage === undefined) {
        outcome = "success";
        console.error("[flow] Flow completed successfully");
        break;
      }

      const failedStage = report.failedStage;
      this.transition({ kind: "tuning", iteration, stage: failedStage });
      const action = this.tuningActions[failedStage];
      if (action) {
        const failedResult = history[history.length - 1].result;
        report.changes = action(this.tuner, failedResult);
        if (runId !== undefined) {
          this.recorder?.recordChanges(runId, iteration, report.changes);
        }
      } else {
        console.error(`[flow] No automatic adjustment for ${failedStage} failures`);
      }
    }

    this.transition(outcome === "success" ? { kind: "done_success" } : { kind: "done_exhausted" });

    const summary: FlowRunSummary = {
      outcome,
      iterations: iteration,
      stageCount: history.length,
      history,
      iterationReports,
      finalConfig: { ...this.tuner.getConfig() },
    };

    if (runId !== undefined) {
      this.recorder?.finishRun(runId, summary);
    }
    return summary;
  }

  private transition(next: ControllerState): void {
    this._state = next;
    this.onTransition?.(next);
  }
}

/**
 * Plain-text run summary, one line per stage attempt
 */
export function formatFlowSummary(summary: FlowRunSummary): string {
  const lines: string[] = [];

  lines.push("=== Flow Summary ===");
  lines.push(`Outcome: ${summary.outcome}`);
  lines.push(`Total iterations: ${summary.iterations}`);
  lines.push(`Stages executed: ${summary.stageCount}`);

  for (const { iteration, result } of summary.history) {
    const status = result.success ? "PASS" : "FAIL";
    lines.push(
      `  [${iteration}] ${result.stage.padEnd(10)} ${status.padEnd(5)} (${result.durationSec.toFixed(1)}s)`
    );
  }

  const changes = summary.iterationReports.flatMap((r) =>
    r.changes.map((c) => `  [${r.iteration}] ${c.key}: ${String(c.from ?? "(unset)")} -> ${c.to}`)
  );
  if (changes.length > 0) {
    lines.push("Parameter changes:");
    lines.push(...changes);
  }

  return lines.join("\n");
}
