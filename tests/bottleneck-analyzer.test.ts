import { describe, expect, it } from "vitest";
import {
  analyzePlacement,
  analyzeRouting,
  analyzeStage,
  analyzeSynthesis,
  formatSuggestion,
} from "../src/tuner/bottleneck-analyzer.js";
import {
  createAreaMetrics,
  createRoutingMetrics,
  createStageResult,
  createTimingMetrics,
} from "../src/types/flow.js";

describe("synthesis rules", () => {
  it("suggests relaxing the clock on negative slack", () => {
    const result = createStageResult({
      stage: "synthesis",
      success: true,
      durationSec: 1,
      timing: createTimingMetrics({ wns: -0.5, tns: -0.75, clockPeriod: 10 }, ["wns", "tns"]),
    });

    expect(analyzeSynthesis(result)).toEqual([
      {
        stage: "synthesis",
        severity: "warning",
        message:
          "Timing violations detected (WNS=-0.500ns). Suggestions:\n" +
          "  1. Increase CLOCK_PERIOD by 20% (x1.2)\n" +
          "  2. Change SYNTH_STRATEGY to 'DELAY 0' for timing optimization",
      },
    ]);
  });

  it("names the new period when the clock period was measured", () => {
    const result = createStageResult({
      stage: "synthesis",
      success: true,
      durationSec: 1,
      timing: createTimingMetrics({ wns: -0.2, clockPeriod: 5 }, ["wns", "clockPeriod"]),
    });

    const [suggestion] = analyzeSynthesis(result);
    expect(suggestion.message).toContain("  1. Increase CLOCK_PERIOD from 5 to 6.0\n");
  });

  it("flags designs above 10000 cells", () => {
    const result = createStageResult({
      stage: "synthesis",
      success: true,
      durationSec: 1,
      area: createAreaMetrics({ totalCells: 12000 }, ["totalCells"]),
      timing: createTimingMetrics({ wns: 0.3, clockPeriod: 10 }, ["wns", "tns"]),
    });

    expect(analyzeSynthesis(result)).toEqual([
      {
        stage: "synthesis",
        severity: "warning",
        message:
          "Large design (12000 cells). Consider reducing FP_CORE_UTIL to 40-45% to ease routing.",
      },
    ]);
  });

  it("stays quiet at exactly 10000 cells with met timing", () => {
    const result = createStageResult({
      stage: "synthesis",
      success: true,
      durationSec: 1,
      area: createAreaMetrics({ totalCells: 10000 }, ["totalCells"]),
      timing: createTimingMetrics({ wns: 0 }, ["wns"]),
    });

    expect(analyzeSynthesis(result)).toEqual([]);
  });
});

describe("placement rules", () => {
  const placement = (errors: string[]) =>
    createStageResult({ stage: "placement", success: true, durationSec: 1, errors });

  it("matches overflow case-insensitively", () => {
    const suggestions = analyzePlacement(placement(["[ERROR] GPL-0302 Global placement OVERFLOW"]));

    expect(suggestions).toEqual([
      {
        stage: "placement",
        severity: "warning",
        message:
          "Placement overflow detected. Suggestions:\n" +
          "  1. Reduce PL_TARGET_DENSITY by 0.05-0.10\n" +
          "  2. Reduce FP_CORE_UTIL by 5-10%",
      },
    ]);
  });

  it("emits one suggestion per condition regardless of repeats", () => {
    const suggestions = analyzePlacement(
      placement(["overflow 1", "overflow 2", "congestion high", "Congestion again"])
    );

    expect(suggestions.map((s) => s.message.split(".")[0])).toEqual([
      "Placement overflow detected",
      "Routing congestion predicted",
    ]);
  });

  it("ignores unrelated errors", () => {
    expect(analyzePlacement(placement(["[ERROR] something else"]))).toEqual([]);
  });
});

describe("routing rules", () => {
  it("reports DRC violations as errors and antenna violations as warnings", () => {
    const result = createStageResult({
      stage: "routing",
      success: true,
      durationSec: 1,
      routing: createRoutingMetrics({ drcViolations: 3, antennaViolations: 2 }, [
        "drcViolations",
        "antennaViolations",
      ]),
    });

    expect(analyzeRouting(result)).toEqual([
      {
        stage: "routing",
        severity: "error",
        message:
          "3 DRC violations found. Suggestions:\n" +
          "  1. Reduce PL_TARGET_DENSITY to 0.40-0.45\n" +
          "  2. Reduce FP_CORE_UTIL to 35-40%\n" +
          "  3. Increase GLB_RT_ADJUSTMENT to 0.20",
      },
      {
        stage: "routing",
        severity: "warning",
        message: "2 antenna violations. Ensure DIODE_INSERTION_STRATEGY=3 in config.",
      },
    ]);
  });

  it("has nothing to say without routing metrics", () => {
    expect(
      analyzeRouting(createStageResult({ stage: "routing", success: true, durationSec: 1 }))
    ).toEqual([]);
  });
});

describe("analyzeStage", () => {
  it("returns no suggestions for stages without rules", () => {
    const result = createStageResult({
      stage: "cts",
      success: true,
      durationSec: 1,
      errors: ["overflow"],
    });

    expect(analyzeStage(result)).toEqual([]);
  });

  it("uses a custom rule table when given one", () => {
    const result = createStageResult({ stage: "signoff", success: true, durationSec: 1 });
    const suggestions = analyzeStage(result, {
      signoff: (r) => [{ stage: r.stage, severity: "warning", message: "check LVS" }],
    });

    expect(suggestions).toEqual([{ stage: "signoff", severity: "warning", message: "check LVS" }]);
  });

  it("formats severity in upper case", () => {
    expect(formatSuggestion({ stage: "routing", severity: "error", message: "bad" })).toBe(
      "[ERROR] bad"
    );
  });
});
