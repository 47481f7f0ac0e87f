/**
 * Report Parsers Index
 *
 * Fixed report locations inside an OpenLane run directory and helpers that
 * parse them per stage or for a whole run.
 */

import { access } from "fs/promises";
import { join } from "path";
import type {
  AreaMetrics,
  FlowStage,
  RoutingMetrics,
  TimingMetrics,
} from "../types/flow.js";
import { parseSynthesisReport } from "./synthesis-report.js";
import { parseTimingReport } from "./timing-report.js";
import { parseDrcReport } from "./drc-report.js";

export { parseSynthesisReport, parseSynthesisStats } from "./synthesis-report.js";
export {
  parseTimingReport,
  parseTimingSlacks,
  extractSlacks,
  PLACEHOLDER_CLOCK_PERIOD_NS,
} from "./timing-report.js";
export { parseDrcReport, parseDrcContent } from "./drc-report.js";

/**
 * Report paths relative to a run directory
 */
export const REPORT_PATHS = {
  synthesisStat: join("reports", "synthesis", "1-synthesis.AREA_0.stat.rpt"),
  synthesisSta: join("reports", "synthesis", "sta.rpt"),
  routingDrc: join("reports", "routing", "drc_violations.rpt"),
} as const;

/**
 * Metrics parsed for one stage attempt
 */
export interface StageReports {
  timing?: TimingMetrics;
  area?: AreaMetrics;
  routing?: RoutingMetrics;
  errors: string[];
}

/**
 * Parse the reports a stage is expected to produce.
 * Stages without reports of their own return no metrics.
 */
export async function parseStageReports(
  stage: FlowStage,
  runDir: string
): Promise<StageReports> {
  switch (stage) {
    case "synthesis": {
      const area = await parseSynthesisReport(join(runDir, REPORT_PATHS.synthesisStat));
      const timing = await parseTimingReport(join(runDir, REPORT_PATHS.synthesisSta));
      return {
        area: area.metrics,
        timing: timing.metrics,
        errors: [...area.errors, ...timing.errors],
      };
    }
    case "routing": {
      const drc = await parseDrcReport(join(runDir, REPORT_PATHS.routingDrc));
      return { routing: drc.metrics, errors: drc.errors };
    }
    default:
      return { errors: [] };
  }
}

/**
 * Reports found in a run directory, keyed by family
 */
export interface RunReports {
  synthesis?: { area: AreaMetrics; errors: string[] };
  timing?: { metrics: TimingMetrics; errors: string[] };
  routing?: { metrics: RoutingMetrics; errors: string[] };
}

/**
 * Parse every known report that exists in a run directory
 */
export async function parseAllReports(runDir: string): Promise<RunReports> {
  const results: RunReports = {};

  const synthPath = join(runDir, REPORT_PATHS.synthesisStat);
  if (await exists(synthPath)) {
    const { metrics, errors } = await parseSynthesisReport(synthPath);
    results.synthesis = { area: metrics, errors };
  }

  const staPath = join(runDir, REPORT_PATHS.synthesisSta);
  if (await exists(staPath)) {
    results.timing = await parseTimingReport(staPath);
  }

  const drcPath = join(runDir, REPORT_PATHS.routingDrc);
  if (await exists(drcPath)) {
    results.routing = await parseDrcReport(drcPath);
  }

  return results;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
