import type { DecisionRecord, NormalizedDecision, OutcomeCatalogueMetrics, OutcomeMetrics } from "../types.js";
import { canonString, coerceNumber, computeMean, pickAlias, sum } from "../utils.js";
import { OUTCOME_ALIASES, isTruthyFlag, ratio } from "./outcome.js";

export const CATALOGUE_ALIASES = {
  responseTimeS: ["response_time", "time_to_response", "resolution_time", "duration_s", "handle_time_s"],
  latencyMs: ["latency_ms", "inference_ms"],
  timeWithAi: ["time_with_ai"],
  timeWithoutAi: ["time_without_ai"],
  correctionTime: ["correction_time", "time_spent_correcting"],
  timeSpent: ["time_spent", "learning_time", "total_time"],
  performanceImprovement: ["performance_improvement", "learning_gain"],
  resourcesUsed: ["resources_used", "cpu_used", "gpu_used", "mem_used"],
  totalResources: ["total_resources", "cpu_total", "gpu_total", "mem_total"],
  reachedTarget: ["reached_target", "meets_target", "target_reached"],
  correctionEffectiveness: ["correction_effectiveness"],
  errorsBefore: ["errors_before"],
  errorsAfter: ["errors_after"],
  preRetention: ["pre_retention_performance"],
  postRetention: ["post_retention_performance"],
  preFeedback: ["pre_feedback_performance"],
  postFeedback: ["post_feedback_performance"],
  preAdaptation: ["pre_adaptation_performance"],
  postAdaptation: ["post_adaptation_performance"],
  preCorrection: ["pre_correction_performance"],
  postCorrection: ["post_correction_performance"],
  timeInterval: ["time_interval"],
  aiAssisted: ["ai_assisted", "assisted", "ai_help"],
  decisionOutcome: ["decision_outcome"],
  objectiveStatus: ["objective_status"],
  safetyIncidents: ["safety_incidents"],
  uptime: ["uptime"],
  totalTime: ["total_time"],
  performanceAdversarial: ["performance_adversarial"],
  performanceNormal: ["performance_normal"],
  performanceAcrossDomains: ["performance_across_domains"],
  baselinePerformance: ["baseline_performance"],
} as const satisfies Record<string, readonly string[]>;

type CatalogueField = keyof typeof CATALOGUE_ALIASES;

const FULFILLED_TOKENS = new Set(["achieved", "done", "met"]);
const SUCCESS_TOKENS = new Set(["successful", "success", "ok"]);

export type OutcomeMetricCategory =
  | "Performance"
  | "Efficiency"
  | "Adaptability and Learning"
  | "Collaboration and Interaction"
  | "Trust and Safety"
  | "Robustness and Generalization";

export type OutcomeMetricEntry = {
  key: keyof OutcomeMetrics | keyof OutcomeCatalogueMetrics;
  label: string;
};

const OUTCOME_METRIC_INDEX: Record<OutcomeMetricCategory, readonly OutcomeMetricEntry[]> = {
  Performance: [
    { key: "outcome_prediction_accuracy", label: "Prediction Accuracy" },
    { key: "outcome_precision", label: "Precision" },
    { key: "outcome_recall", label: "Recall" },
    { key: "outcome_overall_accuracy_pct", label: "Overall System Accuracy" },
    { key: "outcome_model_improvement_rate", label: "Model Improvement Rate" },
  ],
  Efficiency: [
    { key: "outcome_response_time_s", label: "Response Time" },
    { key: "outcome_teaching_efficiency", label: "Teaching Efficiency" },
    { key: "outcome_query_efficiency", label: "Query Efficiency" },
    { key: "outcome_resource_utilization_pct", label: "Resource Utilization" },
    { key: "outcome_task_completion_time_delta_s", label: "Task Completion Time" },
    { key: "outcome_correction_efficiency", label: "Correction Efficiency" },
    { key: "outcome_error_reduction_rate_pct", label: "Error Reduction Rate" },
    { key: "outcome_knowledge_retention_pct", label: "Knowledge Retention" },
  ],
  "Adaptability and Learning": [
    { key: "outcome_feedback_impact", label: "Feedback Impact" },
    { key: "outcome_adaptability_score", label: "Adaptability Score" },
    { key: "outcome_impact_of_corrections", label: "Impact of Corrections" },
    { key: "outcome_learning_efficiency", label: "Learning Efficiency" },
    { key: "outcome_objective_fulfillment_rate", label: "Objective Fulfillment Rate" },
  ],
  "Collaboration and Interaction": [
    { key: "outcome_human_ai_agreement_rate", label: "Human-AI Agreement Rate" },
    { key: "outcome_ai_assistance_rate", label: "AI Assistance Rate" },
    { key: "outcome_decision_effectiveness_pct", label: "Decision Effectiveness" },
    { key: "outcome_time_to_resolution_s", label: "Time to Resolution" },
    { key: "outcome_human_effort_saved_s", label: "Human Effort Saved" },
  ],
  "Trust and Safety": [
    { key: "outcome_confidence_pct", label: "Confidence" },
    { key: "outcome_trust_score", label: "Trust Score" },
    { key: "outcome_safety_incidents", label: "Safety Incidents" },
    { key: "outcome_system_reliability_pct", label: "System Reliability" },
  ],
  "Robustness and Generalization": [
    { key: "outcome_adversarial_robustness", label: "Adversarial Robustness" },
    { key: "outcome_domain_generalization", label: "Domain Generalization" },
  ],
};

/** Metrics reported under the `full` profile, grouped by category. */
export function listAvailableOutcomeMetrics(): Record<OutcomeMetricCategory, OutcomeMetricEntry[]> {
  return {
    Performance: OUTCOME_METRIC_INDEX.Performance.map((entry) => ({ ...entry })),
    Efficiency: OUTCOME_METRIC_INDEX.Efficiency.map((entry) => ({ ...entry })),
    "Adaptability and Learning": OUTCOME_METRIC_INDEX["Adaptability and Learning"].map((entry) => ({
      ...entry,
    })),
    "Collaboration and Interaction": OUTCOME_METRIC_INDEX["Collaboration and Interaction"].map(
      (entry) => ({ ...entry }),
    ),
    "Trust and Safety": OUTCOME_METRIC_INDEX["Trust and Safety"].map((entry) => ({ ...entry })),
    "Robustness and Generalization": OUTCOME_METRIC_INDEX["Robustness and Generalization"].map(
      (entry) => ({ ...entry }),
    ),
  };
}

/** Booleans count as 1/0; anything unparseable as 0. */
function toNumber(value: unknown): number {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return coerceNumber(value) ?? 0;
}

function total(rows: readonly DecisionRecord[], field: CatalogueField): number {
  return sum(rows.map((raw) => toNumber(pickAlias(raw, CATALOGUE_ALIASES[field]))));
}

function difference(rows: readonly DecisionRecord[], post: CatalogueField, pre: CatalogueField): number {
  return total(rows, post) - total(rows, pre);
}

/** Seconds fields first, then millisecond latency. */
export function responseSeconds(raw: DecisionRecord): number {
  const seconds = pickAlias(raw, CATALOGUE_ALIASES.responseTimeS);
  if (seconds !== undefined) {
    return toNumber(seconds);
  }
  const ms = pickAlias(raw, CATALOGUE_ALIASES.latencyMs);
  if (ms !== undefined) {
    return toNumber(ms) / 1000;
  }
  return 0;
}

function countWhere(rows: readonly DecisionRecord[], predicate: (raw: DecisionRecord) => boolean) {
  return rows.filter(predicate).length;
}

function hasToken(raw: DecisionRecord, aliases: readonly string[], tokens: ReadonlySet<string>) {
  return tokens.has(canonString(pickAlias(raw, aliases)) ?? "");
}

function computeModelImprovementRate(rows: readonly DecisionRecord[]): number {
  const interval = total(rows, "timeInterval");
  const denominator = interval > 0 ? interval : Math.max(rows.length, 1);
  return difference(rows, "postAdaptation", "preAdaptation") / denominator;
}

/**
 * Extended outcome catalogue over optional study fields. Each metric sums
 * its fields across records; ratios are 0 on a zero denominator.
 */
export function computeOutcomeCatalogue(records: readonly NormalizedDecision[]): OutcomeCatalogueMetrics {
  const rows = records.map((record) => record.raw);
  const meanResponseS = computeMean(rows.map(responseSeconds));
  const learningEfficiency = ratio(total(rows, "performanceImprovement"), total(rows, "timeSpent"));
  const timeSavedS = difference(rows, "timeWithoutAi", "timeWithAi");
  const hits = countWhere(rows, (raw) => isTruthyFlag(pickAlias(raw, CATALOGUE_ALIASES.reachedTarget)));
  const fulfilled = countWhere(
    rows,
    (raw) =>
      hasToken(raw, OUTCOME_ALIASES.groundTruth, FULFILLED_TOKENS) ||
      canonString(pickAlias(raw, CATALOGUE_ALIASES.objectiveStatus)) === "achieved",
  );
  const assisted = countWhere(rows, (raw) =>
    CATALOGUE_ALIASES.aiAssisted.some((key) => Object.hasOwn(raw, key) && isTruthyFlag(raw[key])),
  );
  const successful = countWhere(rows, (raw) =>
    hasToken(raw, CATALOGUE_ALIASES.decisionOutcome, SUCCESS_TOKENS),
  );
  const errorsBefore = total(rows, "errorsBefore");

  return {
    outcome_model_improvement_rate: computeModelImprovementRate(rows),
    outcome_response_time_s: meanResponseS,
    outcome_teaching_efficiency: learningEfficiency,
    outcome_query_efficiency: ratio(rows.length, hits),
    outcome_resource_utilization_pct:
      ratio(total(rows, "resourcesUsed"), total(rows, "totalResources")) * 100,
    outcome_task_completion_time_delta_s: timeSavedS,
    outcome_correction_efficiency: ratio(
      total(rows, "correctionEffectiveness"),
      total(rows, "correctionTime"),
    ),
    outcome_error_reduction_rate_pct:
      ratio(errorsBefore - total(rows, "errorsAfter"), errorsBefore) * 100,
    outcome_knowledge_retention_pct:
      ratio(total(rows, "postRetention"), total(rows, "preRetention")) * 100,
    outcome_feedback_impact: difference(rows, "postFeedback", "preFeedback"),
    outcome_adaptability_score: difference(rows, "postAdaptation", "preAdaptation"),
    outcome_impact_of_corrections: difference(rows, "postCorrection", "preCorrection"),
    outcome_learning_efficiency: learningEfficiency,
    outcome_objective_fulfillment_rate: ratio(fulfilled, rows.length),
    outcome_ai_assistance_rate: ratio(assisted, rows.length),
    outcome_decision_effectiveness_pct: ratio(successful, rows.length) * 100,
    outcome_time_to_resolution_s: meanResponseS,
    outcome_human_effort_saved_s: timeSavedS,
    outcome_safety_incidents: total(rows, "safetyIncidents"),
    outcome_system_reliability_pct: ratio(total(rows, "uptime"), total(rows, "totalTime")) * 100,
    outcome_adversarial_robustness: ratio(
      total(rows, "performanceAdversarial"),
      total(rows, "performanceNormal"),
    ),
    outcome_domain_generalization: ratio(
      total(rows, "performanceAcrossDomains"),
      total(rows, "baselinePerformance"),
    ),
  };
}
