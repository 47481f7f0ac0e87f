/**
 * Static Timing Report Parser
 *
 * Reads OpenSTA path reports. Every `slack (MET)` / `slack (VIOLATED)` line
 * contributes one slack value; WNS is the smallest and TNS the sum of the
 * negative ones.
 *
 * The report does not state the clock period or separate hold paths, so
 * clock period, critical path delay and hold slack stay unmeasured.
 */

import { readFile } from "fs/promises";
import {
  createTimingMetrics,
  type ParseResult,
  type TimingField,
  type TimingMetrics,
} from "../types/flow.js";

/** Placeholder used while the clock period is unknown */
export const PLACEHOLDER_CLOCK_PERIOD_NS = 10.0;

export async function parseTimingReport(
  reportPath: string
): Promise<ParseResult<TimingMetrics>> {
  let content: string;
  try {
    content = await readFile(reportPath, "utf-8");
  } catch {
    return {
      metrics: createTimingMetrics({
        clockPeriod: PLACEHOLDER_CLOCK_PERIOD_NS,
      }),
      errors: [`Timing report not found: ${reportPath}`],
    };
  }

  return { metrics: parseTimingSlacks(content), errors: [] };
}

/**
 * Collect slack values in report order
 */
export function extractSlacks(content: string): number[] {
  const slacks: number[] = [];
  for (const match of content.matchAll(/slack \((?:MET|VIOLATED)\)\s+([-\d.]+)/g)) {
    const value = parseFloat(match[1]);
    if (!isNaN(value)) {
      slacks.push(value);
    }
  }
  return slacks;
}

export function parseTimingSlacks(content: string): TimingMetrics {
  const slacks = extractSlacks(content);
  const measured: TimingField[] = [];
  let wns = 0;
  let tns = 0;

  if (slacks.length > 0) {
    wns = slacks.reduce((min, s) => Math.min(min, s));
    tns = slacks.filter((s) => s < 0).reduce((sum, s) => sum + s, 0);
    measured.push("wns", "tns");
  }

  const clockPeriod = PLACEHOLDER_CLOCK_PERIOD_NS;

  return createTimingMetrics(
    {
      wns,
      tns,
      whs: 0,
      ths: 0,
      criticalPathDelay: wns > 0 ? clockPeriod - wns : clockPeriod,
      clockPeriod,
    },
    measured
  );
}
