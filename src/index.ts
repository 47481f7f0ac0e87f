#!/usr/bin/env node

/**
 * flow-autotuner - Model Context Protocol server for OpenLane flow tuning
 *
 * Drives the OpenLane flow stage by stage inside Docker, parses the stage
 * reports, and rewrites config.json between attempts until the flow passes
 * or the iteration budget runs out.
 */

// Load environment variables from .env before any module reads them
import "dotenv/config";

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";

import {
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
} from "./tools/index.js";
import { describeParameters } from "./tuner/index.js";
import { FLOW_STAGES } from "./types/flow.js";

/**
 * Validate tool arguments, reporting zod issues as invalid params
 */
function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown, toolName: string): z.infer<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool '${toolName}': ${issues}`);
  }
  return result.data;
}

function textContent(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

// Initialize the MCP server
const server = new Server(
  { name: "flow-autotuner", version: "1.0.0" },
  { capabilities: { tools: {} } }
);

const designProperty = {
  type: "string",
  description: "Design name under the designs directory, or an absolute host path to the design",
};

// Tool definitions
const tools = [
  {
    name: "run_flow_loop",
    description:
      "Run the OpenLane flow stage by stage (synthesis, floorplan, placement, cts, routing, signoff), analyze each stage's reports, and automatically adjust config.json after a routing failure. Repeats until the flow passes or max_iterations is reached.",
    inputSchema: {
      type: "object",
      properties: {
        design: designProperty,
        max_iterations: {
          type: "number",
          description: "Maximum flow attempts (default 3)",
        },
        record_history: {
          type: "boolean",
          description: "Persist stage attempts and parameter changes (default true)",
          default: true,
        },
      },
      required: ["design"],
    },
  },
  {
    name: "parse_run_reports",
    description:
      "Parse the synthesis statistics, synthesis STA and routing DRC reports of a run into structured metrics.",
    inputSchema: {
      type: "object",
      properties: {
        design: designProperty,
        run_dir: {
          type: "string",
          description: "Optional: run directory (defaults to the most recent run)",
        },
      },
      required: ["design"],
    },
  },
  {
    name: "analyze_stage",
    description:
      "Apply the bottleneck rules for one stage to an existing run and return advisory parameter suggestions.",
    inputSchema: {
      type: "object",
      properties: {
        design: designProperty,
        stage: {
          type: "string",
          enum: [...FLOW_STAGES],
          description: "Flow stage to analyze",
        },
        run_dir: {
          type: "string",
          description: "Optional: run directory (defaults to the most recent run)",
        },
        errors: {
          type: "array",
          items: { type: "string" },
          description: "Optional: error lines from the stage log (used by the placement rules)",
        },
      },
      required: ["design", "stage"],
    },
  },
  {
    name: "tune_parameters",
    description:
      "Apply a named adjustment to the design's config.json: 'timing_violation' relaxes CLOCK_PERIOD by 20% and selects SYNTH_STRATEGY 'DELAY 0'; 'routing_congestion' lowers PL_TARGET_DENSITY and FP_CORE_UTIL (bounded) and sets GLB_RT_ADJUSTMENT to 0.20.\n\nRecognized parameters:\n" +
      describeParameters(),
    inputSchema: {
      type: "object",
      properties: {
        design: designProperty,
        adjustment: {
          type: "string",
          enum: ["timing_violation", "routing_congestion"],
        },
      },
      required: ["design", "adjustment"],
    },
  },
  {
    name: "get_latest_run_dir",
    description: "Return the most recently modified run directory of a design.",
    inputSchema: {
      type: "object",
      properties: { design: designProperty },
      required: ["design"],
    },
  },
  {
    name: "get_flow_history",
    description:
      "List recent flow loop runs, or show one run's stage attempts and parameter changes.",
    inputSchema: {
      type: "object",
      properties: {
        flow_run_id: {
          type: "string",
          description: "Optional: a flow run id to show in detail",
        },
        limit: {
          type: "number",
          description: "Number of recent runs to list (default 10)",
        },
      },
    },
  },
  {
    name: "get_container_status",
    description: "Check whether Docker is available and the flow container is running.",
    inputSchema: { type: "object", properties: {} },
  },
];

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case "run_flow_loop": {
        const result = await runFlowLoopTool(parseArgs(RunFlowLoopArgs, args, name));
        return textContent(formatFlowLoopResult(result));
      }

      case "parse_run_reports": {
        const result = await parseRunReportsTool(parseArgs(ParseRunReportsArgs, args, name));
        return textContent(formatToolResult(result));
      }

      case "analyze_stage": {
        const result = await analyzeStageTool(parseArgs(AnalyzeStageArgs, args, name));
        return textContent(formatToolResult(result));
      }

      case "tune_parameters": {
        const result = await tuneParametersTool(parseArgs(TuneParametersArgs, args, name));
        return textContent(formatToolResult(result));
      }

      case "get_latest_run_dir": {
        const result = await getLatestRunDirTool(parseArgs(LatestRunArgs, args, name));
        return textContent(formatToolResult(result));
      }

      case "get_flow_history": {
        const result = await getFlowHistoryTool(parseArgs(FlowHistoryArgs, args, name));
        return textContent(formatToolResult(result));
      }

      case "get_container_status": {
        return textContent(formatToolResult(await getContainerStatusTool()));
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }
  } catch (error) {
    if (error instanceof McpError) throw error;
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
  }
});

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log startup info to stderr (stdout carries the MCP protocol)
  console.error("=== flow-autotuner Server v1.0.0 ===");
  console.error("Features:");
  console.error("  - Stage-by-stage OpenLane flow in Docker");
  console.error("  - Synthesis / STA / DRC report parsing");
  console.error("  - Bottleneck analysis and config.json tuning");
  console.error("  - SQLite run history");
  console.error("====================================");
}

main().catch((error) => {
  console.error("Server failed to start:", error);
  process.exit(1);
});
