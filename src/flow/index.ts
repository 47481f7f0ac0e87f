/**
 * Flow Module Index
 */

export {
  type StageRunRequest,
  type StageRunOutcome,
  type StageRunner,
  type StageScript,
  type DockerStageRunnerOptions,
  DockerStageRunner,
  ScriptedStageRunner,
  collectMessages,
  renderStageCommand,
} from "./stage-runner.js";

export { DEFAULT_RUN_TAG, FlowExecutor, findLatestRunDir } from "./stage-executor.js";

export {
  type ControllerState,
  type FlowOutcome,
  type StageExecutor,
  type StageAttempt,
  type IterationReport,
  type FlowRunSummary,
  type FlowRunRecorder,
  type IterationControllerOptions,
  IterationController,
  formatFlowSummary,
} from "./iteration-controller.js";
