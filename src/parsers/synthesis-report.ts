/**
 * Synthesis Statistics Report Parser
 *
 * Reads the Yosys `stat` report written during synthesis:
 *
 *   === counter ===
 *      Number of wires:                 15
 *      Number of cells:                 10
 *        sky130_fd_sc_hd__dff_1          8
 *
 *   Chip area for module '\counter': 50.123000
 *
 * Core area, die area and utilization are not known at this point in the
 * flow and are never measured here.
 */

import { readFile } from "fs/promises";
import {
  createAreaMetrics,
  type AreaField,
  type AreaMetrics,
  type ParseResult,
} from "../types/flow.js";

export async function parseSynthesisReport(
  reportPath: string
): Promise<ParseResult<AreaMetrics>> {
  let content: string;
  try {
    content = await readFile(reportPath, "utf-8");
  } catch {
    return {
      metrics: createAreaMetrics(),
      errors: [`Synthesis report not found: ${reportPath}`],
    };
  }

  return { metrics: parseSynthesisStats(content), errors: [] };
}

/**
 * Extract area metrics from report text
 */
export function parseSynthesisStats(content: string): AreaMetrics {
  const measured: AreaField[] = [];
  let totalCells = 0;
  let totalArea = 0;

  const cellMatch = content.match(/Number of cells:\s+(\d+)/);
  if (cellMatch) {
    totalCells = parseInt(cellMatch[1], 10);
    measured.push("totalCells");
  }

  const areaMatch = content.match(/Chip area for module.*?:\s+([\d.]+)/);
  if (areaMatch) {
    const area = parseFloat(areaMatch[1]);
    if (!isNaN(area)) {
      totalArea = area;
      measured.push("totalArea");
    }
  }

  return createAreaMetrics({ totalCells, totalArea }, measured);
}
