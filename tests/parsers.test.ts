import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  REPORT_PATHS,
  extractSlacks,
  parseAllReports,
  parseDrcContent,
  parseDrcReport,
  parseStageReports,
  parseSynthesisReport,
  parseSynthesisStats,
  parseTimingReport,
  parseTimingSlacks,
} from "../src/parsers/index.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("synthesis report", () => {
  it("reads cell count and chip area", async () => {
    const { metrics, errors } = await parseSynthesisReport(fixture("synthesis.stat.rpt"));

    expect(errors).toEqual([]);
    expect(metrics.totalCells).toBe(10);
    expect(metrics.totalArea).toBeCloseTo(50.123, 6);
    expect(metrics.measured).toEqual(["totalCells", "totalArea"]);
    expect(metrics.utilization).toBe(0);
  });

  it("leaves unmatched fields unmeasured", () => {
    const metrics = parseSynthesisStats("   Number of cells:              12000\n");

    expect(metrics.totalCells).toBe(12000);
    expect(metrics.totalArea).toBe(0);
    expect(metrics.measured).toEqual(["totalCells"]);
  });

  it("reports a missing file without throwing", async () => {
    const path = join(tmpdir(), "no-such-dir", "stat.rpt");
    const { metrics, errors } = await parseSynthesisReport(path);

    expect(errors).toEqual([`Synthesis report not found: ${path}`]);
    expect(metrics.totalCells).toBe(0);
    expect(metrics.measured).toEqual([]);
  });
});

describe("timing report", () => {
  it("computes WNS and TNS from violated paths", async () => {
    const { metrics, errors } = await parseTimingReport(fixture("sta-violated.rpt"));

    expect(errors).toEqual([]);
    expect(metrics.wns).toBe(-0.5);
    expect(metrics.tns).toBe(-0.75);
    expect(metrics.criticalPathDelay).toBe(10);
    expect(metrics.clockPeriod).toBe(10);
    expect(metrics.measured).toEqual(["wns", "tns"]);
  });

  it("has zero TNS when every path meets timing", async () => {
    const { metrics } = await parseTimingReport(fixture("sta-met.rpt"));

    expect(metrics.wns).toBe(2.5);
    expect(metrics.tns).toBe(0);
    expect(metrics.criticalPathDelay).toBe(7.5);
  });

  it("keeps slacks in report order", () => {
    expect(extractSlacks("slack (MET) 0.40\nslack (VIOLATED) -1.10\nslack (MET) 0.05\n")).toEqual([
      0.4, -1.1, 0.05,
    ]);
  });

  it("handles reports with hundreds of thousands of paths", () => {
    const lines = Array.from({ length: 200_000 }, (_, i) => `slack (MET) ${(i % 1000) / 100}`);
    lines.push("slack (VIOLATED) -0.75");

    const metrics = parseTimingSlacks(lines.join("\n"));

    expect(metrics.wns).toBe(-0.75);
    expect(metrics.tns).toBe(-0.75);
  });

  it("measures nothing when no slack lines are present", () => {
    const metrics = parseTimingSlacks("No paths found.\n");

    expect(metrics.wns).toBe(0);
    expect(metrics.tns).toBe(0);
    expect(metrics.measured).toEqual([]);
  });

  it("returns the placeholder clock period for a missing file", async () => {
    const path = join(tmpdir(), "no-such-dir", "sta.rpt");
    const { metrics, errors } = await parseTimingReport(path);

    expect(errors).toEqual([`Timing report not found: ${path}`]);
    expect(metrics.clockPeriod).toBe(10);
    expect(metrics.wns).toBe(0);
  });
});

describe("DRC report", () => {
  it("counts [ERROR] markers when no total is given", async () => {
    const { metrics, errors } = await parseDrcReport(fixture("drc-markers.rpt"));

    expect(metrics.drcViolations).toBe(3);
    expect(errors).toEqual(["Found 3 DRC violations"]);
  });

  it("prefers the explicit total", async () => {
    const { metrics, errors } = await parseDrcReport(fixture("drc-total.rpt"));

    expect(metrics.drcViolations).toBe(5);
    expect(errors).toEqual(["Found 5 DRC violations"]);
  });

  it("reports a clean run as zero measured violations", () => {
    const { metrics, errors } = parseDrcContent("[INFO] Total DRC violations: 0\n");

    expect(metrics.drcViolations).toBe(0);
    expect(metrics.measured).toEqual(["drcViolations"]);
    expect(errors).toEqual([]);
  });

  it("reports a missing file", async () => {
    const path = join(tmpdir(), "no-such-dir", "drc.rpt");
    const { metrics, errors } = await parseDrcReport(path);

    expect(metrics.drcViolations).toBe(0);
    expect(errors).toEqual([`DRC report not found: ${path}`]);
  });
});

describe("run directory parsing", () => {
  let runDir: string;

  beforeEach(() => {
    runDir = mkdtempSync(join(tmpdir(), "flow-reports-"));
    mkdirSync(join(runDir, "reports", "synthesis"), { recursive: true });
    mkdirSync(join(runDir, "reports", "routing"), { recursive: true });
  });

  afterEach(() => {
    rmSync(runDir, { recursive: true, force: true });
  });

  it("parses synthesis area and timing together", async () => {
    writeFileSync(join(runDir, REPORT_PATHS.synthesisStat), "Number of cells: 42\n");
    writeFileSync(join(runDir, REPORT_PATHS.synthesisSta), "slack (VIOLATED) -0.30\n");

    const reports = await parseStageReports("synthesis", runDir);

    expect(reports.area?.totalCells).toBe(42);
    expect(reports.timing?.wns).toBe(-0.3);
    expect(reports.routing).toBeUndefined();
    expect(reports.errors).toEqual([]);
  });

  it("collects missing-report errors for synthesis", async () => {
    const reports = await parseStageReports("synthesis", runDir);

    expect(reports.errors).toEqual([
      `Synthesis report not found: ${join(runDir, REPORT_PATHS.synthesisStat)}`,
      `Timing report not found: ${join(runDir, REPORT_PATHS.synthesisSta)}`,
    ]);
  });

  it("parses nothing for stages without reports", async () => {
    expect(await parseStageReports("cts", runDir)).toEqual({ errors: [] });
  });

  it("includes only the reports that exist", async () => {
    writeFileSync(join(runDir, REPORT_PATHS.routingDrc), "[ERROR] short\n");

    const reports = await parseAllReports(runDir);

    expect(reports.synthesis).toBeUndefined();
    expect(reports.timing).toBeUndefined();
    expect(reports.routing?.metrics.drcViolations).toBe(1);
    expect(reports.routing?.errors).toEqual(["Found 1 DRC violations"]);
  });
});
