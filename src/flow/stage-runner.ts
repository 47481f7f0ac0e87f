/**
 * Stage Runners
 *
 * A stage runner executes one pipeline stage out of process and reports
 * whether it completed. On return the stage's report files exist under the
 * newest directory in `<design>/runs` (or do not, if the stage died early).
 */

import {
  dockerManager,
  type ContainerExecutor,
} from "../docker/docker-manager.js";
import { pathResolver, type PathResolver } from "../files/path-resolver.js";
import { FLOW_STAGES, type FlowStage } from "../types/flow.js";

/**
 * Default OpenLane invocation for one stage. `{overwrite}` expands to
 * `-overwrite` for the first stage of a run only: flow.tcl deletes an existing
 * run directory under that flag, and later stages resume from the outputs the
 * earlier ones left there.
 */
export const DEFAULT_STAGE_COMMAND =
  "./flow.tcl -design {design} -tag {tag} -from {stage} -to {stage} {overwrite}";

export interface StageRunRequest {
  stage: FlowStage;
  designDir: string;  // Host path
  tag: string;        // Run tag, names the run directory
}

export interface StageRunOutcome {
  success: boolean;
  errors?: string[];
  warnings?: string[];
}

export interface StageRunner {
  run(request: StageRunRequest): Promise<StageRunOutcome>;
}

/**
 * Split tool output into error and warning lines
 */
export function collectMessages(output: string): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (line.includes("[ERROR]")) {
      errors.push(line);
    } else if (line.includes("[WARNING]")) {
      warnings.push(line);
    }
  }

  return { errors, warnings };
}

/**
 * Fill a command template's {design}, {stage}, {tag} and {overwrite}
 * placeholders. Only the pipeline's first stage starts a fresh run.
 */
export function renderStageCommand(
  template: string,
  values: { design: string; stage: FlowStage; tag: string }
): string {
  const overwrite = values.stage === FLOW_STAGES[0] ? "-overwrite" : "";
  return template
    .replace(/\{design\}/g, values.design)
    .replace(/\{stage\}/g, values.stage)
    .replace(/\{tag\}/g, values.tag)
    .replace(/\{overwrite\}/g, overwrite)
    .trim();
}

export interface DockerStageRunnerOptions {
  executor?: ContainerExecutor;
  resolver?: PathResolver;
  commandTemplate?: string;
  timeoutMs?: number;
  workdir?: string;
}

/**
 * Runs OpenLane stages inside the flow container
 */
export class DockerStageRunner implements StageRunner {
  private executor: ContainerExecutor;
  private resolver: PathResolver;
  private commandTemplate: string;
  private timeoutMs: number;
  private workdir: string;

  constructor(options: DockerStageRunnerOptions = {}) {
    this.executor = options.executor ?? dockerManager;
    this.resolver = options.resolver ?? pathResolver;
    this.commandTemplate =
      options.commandTemplate ?? (process.env.FLOW_STAGE_COMMAND || DEFAULT_STAGE_COMMAND);
    this.timeoutMs = options.timeoutMs ?? parseInt(process.env.FLOW_STAGE_TIMEOUT_MS || "3600000", 10);
    this.workdir = options.workdir ?? (process.env.OPENLANE_ROOT || "/openlane");
  }

  async run(request: StageRunRequest): Promise<StageRunOutcome> {
    const { stage, designDir, tag } = request;

    if (!(await this.executor.ensureRunning())) {
      return {
        success: false,
        errors: ["Docker container is not running. Please start the container first."],
      };
    }

    try {
      const command = renderStageCommand(this.commandTemplate, {
        design: this.resolver.hostToContainer(designDir),
        stage,
        tag,
      });
      console.error(`[docker] ${command}`);

      const result = await this.executor.execLong(command, {
        workdir: this.workdir,
        timeout: this.timeoutMs,
      });

      const { errors, warnings } = collectMessages(`${result.stdout}\n${result.stderr}`);
      if (!result.success && errors.length === 0) {
        errors.push(`Stage ${stage} exited with code ${result.exitCode}`);
      }

      return { success: result.success, errors, warnings };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        errors: [`Stage ${stage} did not complete: ${message}`],
      };
    }
  }
}

/**
 * Scripted outcomes per stage, consumed in call order
 */
export type StageScript = Partial<Record<FlowStage, StageRunOutcome[]>>;

/**
 * Simulated runner for demos and tests. Each call for a stage takes the next
 * queued outcome for that stage; an empty queue means success.
 */
export class ScriptedStageRunner implements StageRunner {
  readonly calls: StageRunRequest[] = [];
  private queues: Map<FlowStage, StageRunOutcome[]>;
  private onRun?: (request: StageRunRequest) => void | Promise<void>;

  constructor(
    script: StageScript = {},
    onRun?: (request: StageRunRequest) => void | Promise<void>
  ) {
    this.queues = new Map();
    for (const stage of FLOW_STAGES) {
      const outcomes = script[stage];
      if (outcomes) {
        this.queues.set(stage, [...outcomes]);
      }
    }
    this.onRun = onRun;
  }

  async run(request: StageRunRequest): Promise<StageRunOutcome> {
    this.calls.push(request);
    await this.onRun?.(request);
    return this.queues.get(request.stage)?.shift() ?? { success: true };
  }
}
