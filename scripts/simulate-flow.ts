/**
 * Simulated flow loop
 *
 * Drives the iteration controller with scripted stage outcomes instead of
 * Docker: routing fails once with DRC errors, then the flow passes with the
 * adjusted configuration. Useful for checking the loop without a toolchain.
 *
 * Usage: npm run simulate
 */

import { mkdtemp, mkdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  FlowExecutor,
  IterationController,
  ScriptedStageRunner,
  formatFlowSummary,
  type StageRunRequest,
} from "../src/flow/index.js";
import { REPORT_PATHS } from "../src/parsers/index.js";
import { ParameterTuner } from "../src/tuner/index.js";

const SYNTH_STAT = `=== counter ===
   Number of wires:                 15
   Number of cells:                 10
     sky130_fd_sc_hd__dff_1          8
     sky130_fd_sc_hd__xor2_1         2

Chip area for module '\\counter': 50.123000
`;

const SYNTH_STA = `Startpoint: count[0] (rising edge-triggered flip-flop clocked by clk)
Endpoint: count[7] (rising edge-triggered flip-flop clocked by clk)
data arrival time                                   8.45
data required time                                  9.50
slack (MET)                                         1.05
`;

async function writeReports(request: StageRunRequest): Promise<void> {
  const runDir = join(request.designDir, "runs", request.tag);
  await mkdir(join(runDir, "reports", "synthesis"), { recursive: true });
  await mkdir(join(runDir, "reports", "routing"), { recursive: true });

  if (request.stage === "synthesis") {
    await writeFile(join(runDir, REPORT_PATHS.synthesisStat), SYNTH_STAT);
    await writeFile(join(runDir, REPORT_PATHS.synthesisSta), SYNTH_STA);
  }
  if (request.stage === "routing") {
    const drc = request.tag === "iter_1" ? "[INFO] Total DRC violations: 4\n" : "[INFO] Total DRC violations: 0\n";
    await writeFile(join(runDir, REPORT_PATHS.routingDrc), drc);
  }
}

async function simulateFlow() {
  console.log("=== Simulated Flow Loop ===\n");

  const designDir = await mkdtemp(join(tmpdir(), "flow-sim-"));
  const configPath = join(designDir, "config.json");
  await writeFile(
    configPath,
    JSON.stringify({ DESIGN_NAME: "counter", CLOCK_PERIOD: 10.0, PL_TARGET_DENSITY: 0.55, FP_CORE_UTIL: 50 }, null, 4)
  );

  const runner = new ScriptedStageRunner(
    {
      routing: [{ success: false, errors: ["[ERROR] GRT-0116 Global routing finished with congestion"] }],
    },
    writeReports
  );

  const controller = new IterationController({
    executor: new FlowExecutor(designDir, runner),
    tuner: new ParameterTuner(configPath),
    maxIterations: 3,
    onTransition: (state) => console.log(`  state -> ${state.kind}`),
  });

  const summary = await controller.run();
  console.log("");
  console.log(formatFlowSummary(summary));
  console.log("\nconfig.json after the run:");
  console.log(await readFile(configPath, "utf-8"));

  await rm(designDir, { recursive: true, force: true });
}

simulateFlow().catch((err) => {
  console.error("Simulation failed:", err);
  process.exit(1);
});
