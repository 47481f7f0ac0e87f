/**
 * Bottleneck Analyzer
 *
 * Stage-specific rules that turn a StageResult into advisory suggestions.
 * Rules run in table order and any number of them may fire.
 */

import { hasViolations, isMeasured, type FlowStage, type StageResult } from "../types/flow.js";

export type SuggestionSeverity = "warning" | "error";

export interface Suggestion {
  stage: FlowStage;
  severity: SuggestionSeverity;
  message: string;
}

export type StageAnalyzer = (result: StageResult) => Suggestion[];

const LARGE_DESIGN_CELLS = 10_000;

export function analyzeSynthesis(result: StageResult): Suggestion[] {
  const suggestions: Suggestion[] = [];

  if (result.timing && hasViolations(result.timing)) {
    const { wns, clockPeriod } = result.timing;
    const relaxStep = isMeasured(result.timing, "clockPeriod")
      ? `Increase CLOCK_PERIOD from ${clockPeriod} to ${(clockPeriod * 1.2).toFixed(1)}`
      : "Increase CLOCK_PERIOD by 20% (x1.2)";
    suggestions.push({
      stage: "synthesis",
      severity: "warning",
      message:
        `Timing violations detected (WNS=${wns.toFixed(3)}ns). Suggestions:\n` +
        `  1. ${relaxStep}\n` +
        "  2. Change SYNTH_STRATEGY to 'DELAY 0' for timing optimization",
    });
  }

  if (result.area && result.area.totalCells > LARGE_DESIGN_CELLS) {
    suggestions.push({
      stage: "synthesis",
      severity: "warning",
      message:
        `Large design (${result.area.totalCells} cells). ` +
        "Consider reducing FP_CORE_UTIL to 40-45% to ease routing.",
    });
  }

  return suggestions;
}

export function analyzePlacement(result: StageResult): Suggestion[] {
  const suggestions: Suggestion[] = [];
  const lowered = result.errors.map((e) => e.toLowerCase());

  if (lowered.some((e) => e.includes("overflow"))) {
    suggestions.push({
      stage: "placement",
      severity: "warning",
      message:
        "Placement overflow detected. Suggestions:\n" +
        "  1. Reduce PL_TARGET_DENSITY by 0.05-0.10\n" +
        "  2. Reduce FP_CORE_UTIL by 5-10%",
    });
  }

  if (lowered.some((e) => e.includes("congestion"))) {
    suggestions.push({
      stage: "placement",
      severity: "warning",
      message:
        "Routing congestion predicted. Suggestions:\n" +
        "  1. Reduce PL_TARGET_DENSITY to 0.45-0.50\n" +
        "  2. Increase GLB_RT_ADJUSTMENT to 0.15-0.20",
    });
  }

  return suggestions;
}

export function analyzeRouting(result: StageResult): Suggestion[] {
  const suggestions: Suggestion[] = [];
  if (!result.routing) {
    return suggestions;
  }

  const { drcViolations, antennaViolations } = result.routing;

  if (drcViolations > 0) {
    suggestions.push({
      stage: "routing",
      severity: "error",
      message:
        `${drcViolations} DRC violations found. Suggestions:\n` +
        "  1. Reduce PL_TARGET_DENSITY to 0.40-0.45\n" +
        "  2. Reduce FP_CORE_UTIL to 35-40%\n" +
        "  3. Increase GLB_RT_ADJUSTMENT to 0.20",
    });
  }

  if (antennaViolations > 0) {
    suggestions.push({
      stage: "routing",
      severity: "warning",
      message: `${antennaViolations} antenna violations. Ensure DIODE_INSERTION_STRATEGY=3 in config.`,
    });
  }

  return suggestions;
}

/**
 * Rule sets by stage. Stages without an entry have no rules.
 */
export const STAGE_ANALYZERS: Partial<Record<FlowStage, StageAnalyzer>> = {
  synthesis: analyzeSynthesis,
  placement: analyzePlacement,
  routing: analyzeRouting,
};

export function analyzeStage(
  result: StageResult,
  analyzers: Partial<Record<FlowStage, StageAnalyzer>> = STAGE_ANALYZERS
): Suggestion[] {
  return analyzers[result.stage]?.(result) ?? [];
}

export function formatSuggestion(suggestion: Suggestion): string {
  return `[${suggestion.severity.toUpperCase()}] ${suggestion.message}`;
}
