export type DecisionRecord = Record<string, unknown>;

/** Event rows share the decision shape; they feed window diagnostics only. */
export type EventRecord = DecisionRecord;

export type DecisionsArtifact = {
  meta?: {
    timestamps?: {
      start_time?: number | string | null;
      end_time?: number | string | null;
    };
    [key: string]: unknown;
  };
  decisions: unknown[];
  events?: unknown[];
  [key: string]: unknown;
};

export type CanonicalAgent = "HUMAN" | "AI" | "SYS";

export type TimeSource = "explicit" | "timestamp" | "sequence";

export type NormalizedDecision = {
  t: number;
  tSource: TimeSource;
  /** Epoch seconds parsed from the record's timestamp alias, if any. */
  instant: number | null;
  /** A `CanonicalAgent` when the label maps; unknown labels stay canonical lower-case. */
  agent: string | null;
  /** Canonical lower-case actor label before mapping. */
  actor: string | null;
  action: string | null;
  eventType: string | null;
  durationS: number | null;
  latencyMs: number | null;
  correct: boolean | null;
  raw: DecisionRecord;
};

export type NormalizeResult = {
  records: NormalizedDecision[];
  notes: string[];
};

export type WindowBasis = "relative" | "absolute";

export type WindowSpec = {
  basis: WindowBasis;
  start?: number | string;
  end?: number | string;
  last?: number;
};

export type WindowEffective = {
  t_start_epoch: number | null;
  t_end_epoch: number | null;
  t_start_rel_s?: number;
  t_end_rel_s?: number;
  session_start_epoch?: number;
};

export type WindowCounts = {
  decisions_total: number;
  decisions_used: number;
  events_total: number;
  events_used: number;
};

export type WindowSummary = {
  basis: WindowBasis;
  requested: WindowSpec | { mode: "full" };
  effective: WindowEffective;
  counts: WindowCounts;
  duration_s: number;
  notes: string[];
};

export type InteractionMetrics = {
  F: number;
  D: number;
  HCL: number;
  Tr: number;
  A: number;
  S: number;
  EL: number;
  EfficiencyScore: number;
};

export type HumanRtMetrics = {
  human_rt_n: number;
  human_rt_mean_s: number;
  human_rt_p50_s: number;
  human_rt_p90_s: number;
  human_rt_p95_s: number;
};

export type AiLatencyMetrics = {
  ai_latency_n: number;
  ai_latency_mean_ms: number;
  ai_latency_p50_ms: number;
  ai_latency_p90_ms: number;
  ai_latency_p95_ms: number;
};

export type OutcomeMetrics = {
  outcome_tp: number;
  outcome_fp: number;
  outcome_tn: number;
  outcome_fn: number;
  outcome_prediction_accuracy: number;
  outcome_precision: number;
  outcome_recall: number;
  outcome_overall_accuracy_pct: number;
  outcome_human_ai_agreement_rate: number;
  outcome_trust_score: number;
  outcome_confidence_pct: number;
};

/** Sum and ratio metrics over optional per-record study fields. */
export type OutcomeCatalogueMetrics = {
  outcome_model_improvement_rate: number;
  outcome_response_time_s: number;
  outcome_teaching_efficiency: number;
  outcome_query_efficiency: number;
  outcome_resource_utilization_pct: number;
  outcome_task_completion_time_delta_s: number;
  outcome_correction_efficiency: number;
  outcome_error_reduction_rate_pct: number;
  outcome_knowledge_retention_pct: number;
  outcome_feedback_impact: number;
  outcome_adaptability_score: number;
  outcome_impact_of_corrections: number;
  outcome_learning_efficiency: number;
  outcome_objective_fulfillment_rate: number;
  outcome_ai_assistance_rate: number;
  outcome_decision_effectiveness_pct: number;
  outcome_time_to_resolution_s: number;
  outcome_human_effort_saved_s: number;
  outcome_safety_incidents: number;
  outcome_system_reliability_pct: number;
  outcome_adversarial_robustness: number;
  outcome_domain_generalization: number;
};

export type MetricVector = InteractionMetrics &
  HumanRtMetrics &
  AiLatencyMetrics &
  Partial<OutcomeMetrics> &
  Partial<OutcomeCatalogueMetrics>;

export type MetricsProfile = "core" | "full";

export type ComputeResult = {
  ok: true;
  metrics: MetricVector;
  window_summary: WindowSummary;
  warnings?: string[];
};
