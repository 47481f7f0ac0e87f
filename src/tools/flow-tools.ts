/**
 * MCP Tools for the Flow Feedback Loop
 *
 * Provides tools for:
 * - Running the iterate/analyze/tune loop on a design
 * - Parsing and analyzing the reports of an existing run
 * - Applying a named parameter adjustment by hand
 * - Reading back persisted run history
 */

import { z } from "zod";
import { database } from "../db/database.js";
import { dockerManager, type ContainerStatus } from "../docker/docker-manager.js";
import { pathResolver } from "../files/path-resolver.js";
import {
  FlowExecutor,
  IterationController,
  formatFlowSummary,
  DockerStageRunner,
  findLatestRunDir,
  type FlowRunRecorder,
  type FlowRunSummary,
  type StageRunner,
} from "../flow/index.js";
import { parseAllReports, parseStageReports, type RunReports } from "../parsers/index.js";
import {
  ParameterTuner,
  analyzeStage,
  type Suggestion,
} from "../tuner/index.js";
import { FLOW_STAGES, createStageResult, type ParameterChange } from "../types/flow.js";
import type {
  FlowRunRecord,
  ParameterChangeRecord,
  StageAttemptRecord,
} from "../types/history.js";

/**
 * Tool result type
 */
export interface ToolResult<T> {
  success: boolean;
  result?: T;
  error?: string;
}

// ==================== Argument Schemas ====================

const designArg = z.string().min(1).describe("Design name under the designs directory, or an absolute path");

export const RunFlowLoopArgs = z.object({
  design: designArg,
  max_iterations: z.number().int().min(1).max(20).optional(),
  record_history: z.boolean().default(true),
});

export const ParseRunReportsArgs = z.object({
  design: designArg,
  run_dir: z.string().optional(),
});

export const AnalyzeStageArgs = z.object({
  design: designArg,
  stage: z.enum(FLOW_STAGES),
  run_dir: z.string().optional(),
  errors: z.array(z.string()).default([]),
});

export const TuneParametersArgs = z.object({
  design: designArg,
  adjustment: z.enum(["timing_violation", "routing_congestion"]),
});

export const LatestRunArgs = z.object({
  design: designArg,
});

export const FlowHistoryArgs = z.object({
  flow_run_id: z.string().optional(),
  limit: z.number().int().min(1).max(100).default(10),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function resolveRunDir(designDir: string, runDir?: string): Promise<string | null> {
  return runDir ? runDir : findLatestRunDir(designDir);
}

// ==================== Handlers ====================

/**
 * Run the full feedback loop on a design
 */
export async function runFlowLoopTool(
  args: z.infer<typeof RunFlowLoopArgs>,
  deps: { runner?: StageRunner; recorder?: FlowRunRecorder } = {}
): Promise<ToolResult<{ summary: FlowRunSummary; text: string }>> {
  try {
    const designDir = pathResolver.resolveDesignDir(args.design);
    const tuner = new ParameterTuner(pathResolver.getConfigPath(designDir));
    const executor = new FlowExecutor(designDir, deps.runner ?? new DockerStageRunner());

    const controller = new IterationController({
      executor,
      tuner,
      maxIterations: args.max_iterations,
      recorder: args.record_history ? deps.recorder ?? database : undefined,
    });

    const summary = await controller.run();
    return { success: true, result: { summary, text: formatFlowSummary(summary) } };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

/**
 * Parse every known report in a run directory (latest run by default)
 */
export async function parseRunReportsTool(
  args: z.infer<typeof ParseRunReportsArgs>
): Promise<ToolResult<{ runDir: string; reports: RunReports }>> {
  try {
    const designDir = pathResolver.resolveDesignDir(args.design);
    const runDir = await resolveRunDir(designDir, args.run_dir);
    if (!runDir) {
      return { success: false, error: `No run directory found under ${designDir}` };
    }

    return { success: true, result: { runDir, reports: await parseAllReports(runDir) } };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

/**
 * Run a stage's bottleneck rules against an existing run's reports
 */
export async function analyzeStageTool(
  args: z.infer<typeof AnalyzeStageArgs>
): Promise<ToolResult<{ runDir: string; suggestions: Suggestion[]; parseErrors: string[] }>> {
  try {
    const designDir = pathResolver.resolveDesignDir(args.design);
    const runDir = await resolveRunDir(designDir, args.run_dir);
    if (!runDir) {
      return { success: false, error: `No run directory found under ${designDir}` };
    }

    const reports = await parseStageReports(args.stage, runDir);
    const result = createStageResult({
      stage: args.stage,
      success: true,
      durationSec: 0,
      timing: reports.timing,
      area: reports.area,
      routing: reports.routing,
      errors: [...args.errors, ...reports.errors],
      runDir,
    });

    return {
      success: true,
      result: { runDir, suggestions: analyzeStage(result), parseErrors: reports.errors },
    };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

/**
 * Apply one named adjustment to a design's config.json
 */
export async function tuneParametersTool(
  args: z.infer<typeof TuneParametersArgs>
): Promise<ToolResult<{ configPath: string; changes: ParameterChange[] }>> {
  try {
    const designDir = pathResolver.resolveDesignDir(args.design);
    const tuner = new ParameterTuner(pathResolver.getConfigPath(designDir));

    const changes =
      args.adjustment === "timing_violation"
        ? tuner.adjustForTimingViolation()
        : tuner.adjustForRoutingCongestion();

    return { success: true, result: { configPath: tuner.configPath, changes } };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

export async function getLatestRunDirTool(
  args: z.infer<typeof LatestRunArgs>
): Promise<ToolResult<{ runDir: string | null }>> {
  try {
    const designDir = pathResolver.resolveDesignDir(args.design);
    return { success: true, result: { runDir: await resolveRunDir(designDir) } };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

/**
 * Persisted history: one run in detail, or the most recent runs
 */
export async function getFlowHistoryTool(
  args: z.infer<typeof FlowHistoryArgs>
): Promise<
  ToolResult<
    | { run: FlowRunRecord; stages: StageAttemptRecord[]; changes: ParameterChangeRecord[] }
    | { runs: FlowRunRecord[] }
  >
> {
  try {
    if (args.flow_run_id) {
      const run = database.getFlowRun(args.flow_run_id);
      if (!run) {
        return { success: false, error: `Flow run ${args.flow_run_id} not found` };
      }
      return {
        success: true,
        result: {
          run,
          stages: database.getStageAttempts(run.id),
          changes: database.getParameterChanges(run.id),
        },
      };
    }

    return { success: true, result: { runs: database.getRecentFlowRuns(args.limit) } };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

export async function getContainerStatusTool(): Promise<
  ToolResult<ContainerStatus & { dockerAvailable: boolean; containerName: string }>
> {
  const dockerAvailable = await dockerManager.isDockerAvailable();
  const status = dockerAvailable ? await dockerManager.getContainerStatus() : { running: false };
  return {
    success: true,
    result: { ...status, dockerAvailable, containerName: dockerManager.getContainerName() },
  };
}

// ==================== Formatting ====================

export function formatToolResult<T>(result: ToolResult<T>): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Loop results read better as the text summary followed by the raw data
 */
export function formatFlowLoopResult(
  result: Awaited<ReturnType<typeof runFlowLoopTool>>
): string {
  if (!result.success || !result.result) {
    return JSON.stringify({ success: false, error: result.error }, null, 2);
  }
  const { summary, text } = result.result;
  return `${text}\n\n${JSON.stringify(
    {
      outcome: summary.outcome,
      iterations: summary.iterations,
      stage_count: summary.stageCount,
      iteration_reports: summary.iterationReports,
      final_config: summary.finalConfig,
    },
    null,
    2
  )}`;
}
