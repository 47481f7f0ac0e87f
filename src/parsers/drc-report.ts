/**
 * Routing DRC Report Parser
 *
 *   [INFO] Total DRC violations: 5
 *   [ERROR] Metal spacing violation at (100, 200)
 *   [ERROR] Via enclosure violation at (150, 250)
 *
 * An explicit total wins; otherwise each `[ERROR]` marker counts as one
 * violation.
 */

import { readFile } from "fs/promises";
import {
  createRoutingMetrics,
  type ParseResult,
  type RoutingMetrics,
} from "../types/flow.js";

export async function parseDrcReport(
  reportPath: string
): Promise<ParseResult<RoutingMetrics>> {
  let content: string;
  try {
    content = await readFile(reportPath, "utf-8");
  } catch {
    return {
      metrics: createRoutingMetrics(),
      errors: [`DRC report not found: ${reportPath}`],
    };
  }

  return parseDrcContent(content);
}

export function parseDrcContent(content: string): ParseResult<RoutingMetrics> {
  const errors: string[] = [];
  let drcCount: number;

  const totalMatch = content.match(/Total DRC violations:\s+(\d+)/);
  if (totalMatch) {
    drcCount = parseInt(totalMatch[1], 10);
  } else {
    drcCount = (content.match(/\[ERROR\]/g) ?? []).length;
  }

  if (drcCount > 0) {
    errors.push(`Found ${drcCount} DRC violations`);
  }

  return {
    metrics: createRoutingMetrics({ drcViolations: drcCount }, ["drcViolations"]),
    errors,
  };
}
