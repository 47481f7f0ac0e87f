/**
 * Config Parameter Tuner
 *
 * Owns the design's config.json for the duration of a run. The file is read
 * once at construction; after that the in-memory map is the source of truth
 * and every adjustment rewrites the whole file.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { z } from "zod";
import type { FlowStage, ParameterChange, StageResult } from "../types/flow.js";
import { numericDefault, roundTo, type FlowParameterKey } from "./parameter-mapping.js";

export type FlowConfig = Record<string, unknown>;

const ConfigFileSchema = z.record(z.string(), z.unknown());

export const DELAY_SYNTH_STRATEGY = "DELAY 0";
const CLOCK_RELAXATION = 1.2;
const MIN_PLACEMENT_DENSITY = 0.4;
const MIN_CORE_UTIL = 35;
const CONGESTION_RT_ADJUSTMENT = 0.2;

/**
 * Raised when config.json cannot be read or is not a JSON object
 */
export class ConfigLoadError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(`Cannot load config ${configPath}: ${message}`);
    this.name = "ConfigLoadError";
    this.configPath = configPath;
  }
}

export function loadConfig(configPath: string): FlowConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(configPath, error instanceof Error ? error.message : String(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigLoadError(configPath, error instanceof Error ? error.message : "invalid JSON");
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigLoadError(configPath, "expected a JSON object of parameters");
  }
  return result.data;
}

export class ParameterTuner {
  readonly configPath: string;
  private config: FlowConfig;

  constructor(configPath: string) {
    this.configPath = configPath;
    this.config = loadConfig(configPath);
  }

  /**
   * The live configuration (not a copy)
   */
  getConfig(): Readonly<FlowConfig> {
    return this.config;
  }

  /**
   * Numeric value of a key, falling back to the parameter's default
   */
  getNumber(key: FlowParameterKey): number {
    const value = this.config[key];
    if (typeof value === "number") {
      return value;
    }
    if (typeof value === "string" && value.trim() !== "" && !isNaN(Number(value))) {
      return Number(value);
    }
    return numericDefault(key);
  }

  /**
   * Relax the clock by 20% and switch synthesis to a delay-oriented strategy
   */
  adjustForTimingViolation(): ParameterChange[] {
    const currentPeriod = this.getNumber("CLOCK_PERIOD");

    return this.apply({
      CLOCK_PERIOD: roundTo(currentPeriod * CLOCK_RELAXATION),
      SYNTH_STRATEGY: DELAY_SYNTH_STRATEGY,
    });
  }

  /**
   * Loosen placement and floorplan density and reserve routing capacity.
   * Density and utilization never drop below 0.40 and 35.
   */
  adjustForRoutingCongestion(): ParameterChange[] {
    const currentDensity = this.getNumber("PL_TARGET_DENSITY");
    const currentUtil = this.getNumber("FP_CORE_UTIL");

    return this.apply({
      PL_TARGET_DENSITY: Math.max(MIN_PLACEMENT_DENSITY, roundTo(currentDensity - 0.1)),
      FP_CORE_UTIL: Math.max(MIN_CORE_UTIL, roundTo(currentUtil - 10)),
      GLB_RT_ADJUSTMENT: CONGESTION_RT_ADJUSTMENT,
    });
  }

  /**
   * Persist the updated map, then apply the updates in memory. A failed write
   * leaves both the file and the in-memory config as they were.
   */
  private apply(updates: Partial<Record<FlowParameterKey, string | number>>): ParameterChange[] {
    const entries = Object.entries(updates).filter(
      (entry): entry is [string, string | number] => entry[1] !== undefined
    );

    this.save({ ...this.config, ...Object.fromEntries(entries) });

    const changes: ParameterChange[] = [];
    for (const [key, value] of entries) {
      const previous = this.config[key];
      this.config[key] = value;
      changes.push({ key, from: previous, to: value });
      console.error(`[tuner] Adjusted ${key}: ${previous ?? "(unset)"} → ${value}`);
    }
    return changes;
  }

  /**
   * Write the full map next to the target and rename it into place
   */
  private save(config: FlowConfig): void {
    const tmpPath = `${this.configPath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(config, null, 4) + "\n", "utf-8");
      renameSync(tmpPath, this.configPath);
    } catch (error) {
      rmSync(tmpPath, { force: true });
      throw error;
    }
  }
}

/**
 * Automatic correction applied after a stage fails
 */
export type TuningAction = (tuner: ParameterTuner, failed: StageResult) => ParameterChange[];

/**
 * Only routing failures are corrected automatically; the synthesis and
 * placement rules stay advisory.
 */
export const STAGE_TUNING_ACTIONS: Partial<Record<FlowStage, TuningAction>> = {
  routing: (tuner) => tuner.adjustForRoutingCongestion(),
};
