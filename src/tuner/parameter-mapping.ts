/**
 * Flow Configuration Parameters
 *
 * The config.json keys the feedback loop reads or writes, with the defaults
 * assumed when a design's configuration omits them.
 */

import type { FlowStage } from "../types/flow.js";

export type FlowParameterKey =
  | "CLOCK_PERIOD"
  | "SYNTH_STRATEGY"
  | "PL_TARGET_DENSITY"
  | "FP_CORE_UTIL"
  | "GLB_RT_ADJUSTMENT"
  | "DIODE_INSERTION_STRATEGY";

export interface FlowParameter {
  key: FlowParameterKey;
  type: "int" | "float" | "string";
  defaultValue?: number | string;
  description: string;
  category: FlowStage | "timing";
  autoTuned: boolean;         // Written by an automatic adjustment
}

export const FLOW_PARAMETERS: Record<FlowParameterKey, FlowParameter> = {
  CLOCK_PERIOD: {
    key: "CLOCK_PERIOD",
    type: "float",
    defaultValue: 10.0,
    description: "Clock period in nanoseconds",
    category: "timing",
    autoTuned: true,
  },
  SYNTH_STRATEGY: {
    key: "SYNTH_STRATEGY",
    type: "string",
    description: "Yosys/ABC synthesis strategy, e.g. 'AREA 0' or 'DELAY 0'",
    category: "synthesis",
    autoTuned: true,
  },
  PL_TARGET_DENSITY: {
    key: "PL_TARGET_DENSITY",
    type: "float",
    defaultValue: 0.55,
    description: "Global placement target density (0.0-1.0)",
    category: "placement",
    autoTuned: true,
  },
  FP_CORE_UTIL: {
    key: "FP_CORE_UTIL",
    type: "int",
    defaultValue: 50,
    description: "Core utilization percentage (0-100)",
    category: "floorplan",
    autoTuned: true,
  },
  GLB_RT_ADJUSTMENT: {
    key: "GLB_RT_ADJUSTMENT",
    type: "float",
    description: "Global routing capacity reduction applied to every layer",
    category: "routing",
    autoTuned: true,
  },
  // Only ever suggested, never written
  DIODE_INSERTION_STRATEGY: {
    key: "DIODE_INSERTION_STRATEGY",
    type: "int",
    description: "Antenna diode insertion strategy selector",
    category: "routing",
    autoTuned: false,
  },
};

/**
 * Numeric default for a parameter; throws if it has none
 */
export function numericDefault(key: FlowParameterKey): number {
  const value = FLOW_PARAMETERS[key].defaultValue;
  if (typeof value !== "number") {
    throw new Error(`Parameter ${key} has no numeric default`);
  }
  return value;
}

/**
 * Round to a fixed number of decimals so repeated adjustments don't drift
 */
export function roundTo(value: number, decimals = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * One line per parameter for tool descriptions; parameters the tuner never
 * writes are marked advisory.
 */
export function describeParameters(): string {
  return Object.values(FLOW_PARAMETERS)
    .map((param) => {
      const defaultText = param.defaultValue === undefined ? "" : `, default ${param.defaultValue}`;
      const advisory = param.autoTuned ? "" : " [advisory only]";
      return `${param.key} (${param.type}, ${param.category}${defaultText}): ${param.description}${advisory}`;
    })
    .join("\n");
}
