/**
 * Tuner Module Index
 *
 * Exports bottleneck analysis and configuration tuning
 */

// Bottleneck analyzer
export {
  type Suggestion,
  type SuggestionSeverity,
  type StageAnalyzer,
  STAGE_ANALYZERS,
  analyzeSynthesis,
  analyzePlacement,
  analyzeRouting,
  analyzeStage,
  formatSuggestion,
} from "./bottleneck-analyzer.js";

// Parameter tuner
export {
  type FlowConfig,
  type TuningAction,
  ConfigLoadError,
  ParameterTuner,
  STAGE_TUNING_ACTIONS,
  DELAY_SYNTH_STRATEGY,
  loadConfig,
} from "./parameter-tuner.js";

// Recognized config.json parameters
export {
  type FlowParameter,
  type FlowParameterKey,
  FLOW_PARAMETERS,
  describeParameters,
  numericDefault,
  roundTo,
} from "./parameter-mapping.js";
