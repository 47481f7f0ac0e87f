/**
 * Tools Index - Exports all flow tools for MCP
 */

export {
  type ToolResult,
  RunFlowLoopArgs,
  ParseRunReportsArgs,
  AnalyzeStageArgs,
  TuneParametersArgs,
  LatestRunArgs,
  FlowHistoryArgs,
  runFlowLoopTool,
  parseRunReportsTool,
  analyzeStageTool,
  tuneParametersTool,
  getLatestRunDirTool,
  getFlowHistoryTool,
  getContainerStatusTool,
  formatToolResult,
  formatFlowLoopResult,
} from "./flow-tools.js";

export { pathResolver } from "../files/path-resolver.js";
export { dockerManager } from "../docker/docker-manager.js";
