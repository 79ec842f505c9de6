export { loadConfig, parseConfig, resolveConfigPath, CONFIG_PATH_ENV } from "./config/config.js";
export type { MetricsConfig, OutcomeVocabularyConfig } from "./config/types.metrics.js";
export { computeMetrics, METRICS_PROFILES, type ComputeOptions } from "./decisions/compute.js";
export {
  computeInteractionMetrics,
  computeInteractionMetricsByAgent,
  DEFAULT_RT_MAX_S,
  type InteractionOptions,
} from "./decisions/evaluation/interaction.js";
export {
  buildOutcomeVocabulary,
  computeOutcomeMetrics,
  DEFAULT_OUTCOME_VOCABULARY,
  type OutcomeVocabulary,
} from "./decisions/evaluation/outcome.js";
export {
  computeOutcomeCatalogue,
  listAvailableOutcomeMetrics,
  type OutcomeMetricCategory,
  type OutcomeMetricEntry,
} from "./decisions/evaluation/outcome-catalogue.js";
export {
  computeHumanRtMetrics,
  computeLatencyMetrics,
  groupAiLatencyPercentiles,
  groupHumanResponsePercentiles,
  type GroupedPercentiles,
  type SessionLogsRoot,
} from "./decisions/evaluation/response-time.js";
export { computePercentile, summarizePercentiles } from "./decisions/evaluation/stats.js";
export { normalizeDecisions, sortByTime } from "./decisions/normalize.js";
export { parseJsonl, readNdjsonFile } from "./decisions/ndjson.js";
export {
  extractDecisions,
  loadDecisionsArtifact,
  loadEventRecords,
  loadJson,
  loadJsonl,
} from "./decisions/store.js";
export type * from "./decisions/types.js";
export { validateDecisionsMinimal } from "./decisions/validators.js";
export { filterDecisionsEventsByEpoch } from "./decisions/window/filter.js";
export { resolveWindowBounds } from "./decisions/window/resolve.js";
export { parseTimeValue, tryParseTimeValue } from "./decisions/window/time.js";
export * from "./errors.js";
export { renderMarkdownReport } from "./report/markdown.js";
export { VERSION } from "./version.js";
