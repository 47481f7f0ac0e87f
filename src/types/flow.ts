/**
 * Flow and Metrics Types for flow-autotuner
 */

/**
 * Pipeline stages in execution order
 */
export const FLOW_STAGES = [
  "synthesis",
  "floorplan",
  "placement",
  "cts",
  "routing",
  "signoff",
] as const;

export type FlowStage = (typeof FLOW_STAGES)[number];

export function isFlowStage(value: string): value is FlowStage {
  return FLOW_STAGES.some((stage) => stage === value);
}

/**
 * Timing analysis results.
 *
 * Fields not listed in `measured` hold placeholders and were not read from
 * the report.
 */
export interface TimingMetrics {
  readonly wns: number;               // Worst Negative Slack (ns)
  readonly tns: number;               // Total Negative Slack (ns), <= 0
  readonly whs: number;               // Worst Hold Slack (ns)
  readonly ths: number;               // Total Hold Slack (ns)
  readonly criticalPathDelay: number;
  readonly clockPeriod: number;
  readonly measured: readonly TimingField[];
}

export type TimingField = "wns" | "tns" | "whs" | "ths" | "criticalPathDelay" | "clockPeriod";

/**
 * Area utilization results
 */
export interface AreaMetrics {
  readonly totalCells: number;
  readonly totalArea: number;         // um²
  readonly coreArea: number;          // um²
  readonly dieArea: number;           // um²
  readonly utilization: number;       // Percentage (0-100)
  readonly measured: readonly AreaField[];
}

export type AreaField = "totalCells" | "totalArea" | "coreArea" | "dieArea" | "utilization";

/**
 * Routing quality metrics
 */
export interface RoutingMetrics {
  readonly drcViolations: number;
  readonly antennaViolations: number;
  readonly wireLength: number;
  readonly viaCount: number;
  readonly congestionScore: number;
  readonly measured: readonly RoutingField[];
}

export type RoutingField =
  | "drcViolations"
  | "antennaViolations"
  | "wireLength"
  | "viaCount"
  | "congestionScore";

/**
 * Result of one stage attempt. Frozen once built.
 */
export interface StageResult {
  readonly stage: FlowStage;
  readonly success: boolean;
  readonly durationSec: number;
  readonly timing?: TimingMetrics;
  readonly area?: AreaMetrics;
  readonly routing?: RoutingMetrics;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly runDir?: string;
}

/**
 * Output of a single report parser
 */
export interface ParseResult<T> {
  metrics: T;
  errors: string[];
}

export function hasViolations(timing: TimingMetrics): boolean {
  return timing.wns < 0 || timing.whs < 0;
}

export function isMeasured<F extends string>(
  metrics: { readonly measured: readonly F[] },
  field: F
): boolean {
  return metrics.measured.includes(field);
}

export function createTimingMetrics(
  values: Partial<Omit<TimingMetrics, "measured">> = {},
  measured: TimingField[] = []
): TimingMetrics {
  return Object.freeze({
    wns: values.wns ?? 0,
    tns: values.tns ?? 0,
    whs: values.whs ?? 0,
    ths: values.ths ?? 0,
    criticalPathDelay: values.criticalPathDelay ?? 0,
    clockPeriod: values.clockPeriod ?? 0,
    measured: Object.freeze([...measured]),
  });
}

export function createAreaMetrics(
  values: Partial<Omit<AreaMetrics, "measured">> = {},
  measured: AreaField[] = []
): AreaMetrics {
  return Object.freeze({
    totalCells: values.totalCells ?? 0,
    totalArea: values.totalArea ?? 0,
    coreArea: values.coreArea ?? 0,
    dieArea: values.dieArea ?? 0,
    utilization: values.utilization ?? 0,
    measured: Object.freeze([...measured]),
  });
}

export function createRoutingMetrics(
  values: Partial<Omit<RoutingMetrics, "measured">> = {},
  measured: RoutingField[] = []
): RoutingMetrics {
  return Object.freeze({
    drcViolations: values.drcViolations ?? 0,
    antennaViolations: values.antennaViolations ?? 0,
    wireLength: values.wireLength ?? 0,
    viaCount: values.viaCount ?? 0,
    congestionScore: values.congestionScore ?? 0,
    measured: Object.freeze([...measured]),
  });
}

/**
 * Input for building a StageResult
 */
export interface StageResultInput {
  stage: FlowStage;
  success: boolean;
  durationSec: number;
  timing?: TimingMetrics;
  area?: AreaMetrics;
  routing?: RoutingMetrics;
  errors?: string[];
  warnings?: string[];
  runDir?: string;
}

export function createStageResult(input: StageResultInput): StageResult {
  return Object.freeze({
    ...input,
    errors: Object.freeze([...(input.errors ?? [])]),
    warnings: Object.freeze([...(input.warnings ?? [])]),
  });
}

/**
 * One applied configuration mutation
 */
export interface ParameterChange {
  key: string;
  from: unknown;
  to: string | number;
}
