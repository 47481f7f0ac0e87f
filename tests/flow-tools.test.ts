import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ScriptedStageRunner, type FlowRunRecorder } from "../src/flow/index.js";
import { REPORT_PATHS } from "../src/parsers/index.js";
import {
  AnalyzeStageArgs,
  RunFlowLoopArgs,
  analyzeStageTool,
  formatFlowLoopResult,
  getLatestRunDirTool,
  parseRunReportsTool,
  runFlowLoopTool,
  tuneParametersTool,
} from "../src/tools/flow-tools.js";

describe("flow tools", () => {
  let designDir: string;
  let runDir: string;

  beforeEach(() => {
    designDir = mkdtempSync(join(tmpdir(), "flow-tools-"));
    runDir = join(designDir, "runs", "iter_1");
    writeFileSync(
      join(designDir, "config.json"),
      JSON.stringify({ DESIGN_NAME: "counter", PL_TARGET_DENSITY: 0.55, FP_CORE_UTIL: 50 })
    );
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(designDir, { recursive: true, force: true });
  });

  const writeDrcReport = (content: string) => {
    mkdirSync(join(runDir, "reports", "routing"), { recursive: true });
    writeFileSync(join(runDir, REPORT_PATHS.routingDrc), content);
  };

  it("applies argument defaults", () => {
    expect(RunFlowLoopArgs.parse({ design: "counter" })).toEqual({
      design: "counter",
      record_history: true,
    });
    expect(AnalyzeStageArgs.parse({ design: "counter", stage: "routing" }).errors).toEqual([]);
    expect(AnalyzeStageArgs.safeParse({ design: "counter", stage: "lvs" }).success).toBe(false);
  });

  it("runs the loop with an injected runner and recorder", async () => {
    const finishRun = vi.fn();
    const recorder: FlowRunRecorder = {
      startRun: () => "run-1",
      recordStage: () => {},
      recordChanges: () => {},
      finishRun,
      abortRun: () => {},
    };
    const runner = new ScriptedStageRunner({ routing: [{ success: false }] });

    const result = await runFlowLoopTool(
      { design: designDir, max_iterations: 2, record_history: true },
      { runner, recorder }
    );

    expect(result.success).toBe(true);
    expect(result.result?.summary.outcome).toBe("success");
    expect(result.result?.summary.iterations).toBe(2);
    expect(result.result?.text.split("\n")[1]).toBe("Outcome: success");
    expect(finishRun).toHaveBeenCalledTimes(1);
    expect(JSON.parse(readFileSync(join(designDir, "config.json"), "utf-8")).FP_CORE_UTIL).toBe(40);
  });

  it("reports a missing config as a failed result", async () => {
    rmSync(join(designDir, "config.json"));

    const result = await runFlowLoopTool(
      { design: designDir, record_history: false },
      { runner: new ScriptedStageRunner() }
    );

    expect(result).toEqual({
      success: false,
      error: expect.stringContaining(`Cannot load config ${join(designDir, "config.json")}:`),
    });
    expect(formatFlowLoopResult(result)).toBe(
      JSON.stringify({ success: false, error: result.error }, null, 2)
    );
  });

  it("parses the latest run's reports", async () => {
    writeDrcReport("[INFO] Total DRC violations: 2\n");

    const result = await parseRunReportsTool({ design: designDir });

    expect(result.success).toBe(true);
    expect(result.result?.runDir).toBe(runDir);
    expect(result.result?.reports.routing?.metrics.drcViolations).toBe(2);
    expect(result.result?.reports.synthesis).toBeUndefined();
  });

  it("fails to parse when the design has no runs", async () => {
    expect(await parseRunReportsTool({ design: designDir })).toEqual({
      success: false,
      error: `No run directory found under ${designDir}`,
    });
  });

  it("analyzes a stage of an explicit run directory", async () => {
    writeDrcReport("[ERROR] a\n[ERROR] b\n");

    const result = await analyzeStageTool({
      design: designDir,
      stage: "routing",
      run_dir: runDir,
      errors: [],
    });

    expect(result.result?.parseErrors).toEqual(["Found 2 DRC violations"]);
    expect(result.result?.suggestions.map((s) => s.severity)).toEqual(["error"]);
    expect(result.result?.suggestions[0].message.split("\n")[0]).toBe(
      "2 DRC violations found. Suggestions:"
    );
  });

  it("passes log errors to the placement rules", async () => {
    mkdirSync(runDir, { recursive: true });

    const result = await analyzeStageTool({
      design: designDir,
      stage: "placement",
      errors: ["[ERROR] GPL-0302 overflow"],
    });

    expect(result.result?.suggestions.map((s) => s.message.split(".")[0])).toEqual([
      "Placement overflow detected",
    ]);
  });

  it("applies a named adjustment", async () => {
    const result = await tuneParametersTool({ design: designDir, adjustment: "timing_violation" });

    expect(result.result?.changes).toEqual([
      { key: "CLOCK_PERIOD", from: undefined, to: 12 },
      { key: "SYNTH_STRATEGY", from: undefined, to: "DELAY 0" },
    ]);
  });

  it("returns null when there is no run directory", async () => {
    expect(await getLatestRunDirTool({ design: designDir })).toEqual({
      success: true,
      result: { runDir: null },
    });
  });
});
