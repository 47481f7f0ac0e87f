/**
 * Stage Executor
 *
 * Runs a single pipeline stage through a StageRunner, then reads back the
 * reports that stage left in the newest run directory.
 */

import type { Dirent } from "fs";
import { readdir, stat } from "fs/promises";
import { join } from "path";
import { parseStageReports } from "../parsers/index.js";
import { pathResolver } from "../files/path-resolver.js";
import {
  createStageResult,
  type FlowStage,
  type StageResult,
} from "../types/flow.js";
import type { StageRunner } from "./stage-runner.js";

export const DEFAULT_RUN_TAG = "flow_autotuner";

export class FlowExecutor {
  readonly designDir: string;
  private runner: StageRunner;

  constructor(designDir: string, runner: StageRunner) {
    this.designDir = designDir;
    this.runner = runner;
  }

  /**
   * Run one stage and build its result. Blocks until the runner returns.
   */
  async runStage(stage: FlowStage, tag: string = DEFAULT_RUN_TAG): Promise<StageResult> {
    console.error(`[flow] Running ${stage}...`);

    const startTime = Date.now();
    const outcome = await this.runner.run({ stage, designDir: this.designDir, tag });
    const durationSec = (Date.now() - startTime) / 1000;

    const errors = [...(outcome.errors ?? [])];
    const warnings = [...(outcome.warnings ?? [])];

    const runDir = await this.getLatestRunDir();
    if (!runDir) {
      return createStageResult({ stage, success: outcome.success, durationSec, errors, warnings });
    }

    const reports = await parseStageReports(stage, runDir);
    errors.push(...reports.errors);

    return createStageResult({
      stage,
      success: outcome.success,
      durationSec,
      timing: reports.timing,
      area: reports.area,
      routing: reports.routing,
      errors,
      warnings,
      runDir,
    });
  }

  /**
   * Most recent run directory of this design
   */
  async getLatestRunDir(): Promise<string | null> {
    return findLatestRunDir(this.designDir);
  }
}

/**
 * Newest subdirectory of `<designDir>/runs` by modification time; on equal
 * times the lexicographically greater name wins. Null when there is none.
 */
export async function findLatestRunDir(designDir: string): Promise<string | null> {
  const runsDir = pathResolver.getRunsDir(designDir);

  let entries: Dirent[];
  try {
    entries = await readdir(runsDir, { withFileTypes: true });
  } catch {
    return null;
  }

  const runDirs = await Promise.all(
    entries
      .filter((e) => e.isDirectory())
      .map(async (e) => {
        const path = join(runsDir, e.name);
        const { mtimeMs } = await stat(path);
        return { name: e.name, path, mtimeMs };
      })
  );

  runDirs.sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));

  return runDirs.length > 0 ? runDirs[0].path : null;
}
