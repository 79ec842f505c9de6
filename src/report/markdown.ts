import { DEFAULT_RT_MAX_S } from "../decisions/evaluation/interaction.js";
import { normalizeDecisions } from "../decisions/normalize.js";
import type { ComputeResult, DecisionsArtifact, MetricVector } from "../decisions/types.js";
import { isRecord } from "../decisions/utils.js";
import { VERSION } from "../version.js";

type MetricRow = {
  category: string;
  label: string;
  key: keyof MetricVector;
  note: string;
};

export type DataCoverage = {
  hasTimestamps: boolean;
  hasDurations: boolean;
  humanDecisions: number;
  aiDecisions: number;
};

function metricRows(rtMaxS: number): MetricRow[] {
  return [
    { category: "Interaction", label: "F (frequency)", key: "F", note: "agent actions per minute" },
    { category: "Interaction", label: "D (duration)", key: "D", note: "mean action duration (s)" },
    {
      category: "Human-centeredness",
      label: "HCL",
      key: "HCL",
      note: `normalized (rt_max=${formatValue(rtMaxS)}s)`,
    },
    { category: "Trust", label: "Tr", key: "Tr", note: "share of labeled rows without error" },
    { category: "Adaptability", label: "A", key: "A", note: "late vs early accuracy trend" },
    { category: "Similarity", label: "S", key: "S", note: "human vs surrogate policy" },
    { category: "Efficiency", label: "EL", key: "EL", note: "overrun vs baseline" },
    {
      category: "Efficiency",
      label: "EfficiencyScore",
      key: "EfficiencyScore",
      note: "EL, off-role and progress composite",
    },
  ];
}

const OUTCOME_ROWS: Array<{ label: string; key: keyof MetricVector }> = [
  { label: "true positives", key: "outcome_tp" },
  { label: "false positives", key: "outcome_fp" },
  { label: "true negatives", key: "outcome_tn" },
  { label: "false negatives", key: "outcome_fn" },
  { label: "prediction accuracy", key: "outcome_prediction_accuracy" },
  { label: "precision", key: "outcome_precision" },
  { label: "recall", key: "outcome_recall" },
  { label: "overall accuracy (%)", key: "outcome_overall_accuracy_pct" },
  { label: "human-AI agreement rate", key: "outcome_human_ai_agreement_rate" },
  { label: "trust score (%)", key: "outcome_trust_score" },
  { label: "high-confidence accuracy (%)", key: "outcome_confidence_pct" },
];

/** Integers as-is, other numbers to four decimals. */
export function formatValue(value: number | undefined): string {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return "n/a";
  }
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}

function readPath(source: unknown, path: string[]): string {
  let current = source;
  for (const key of path) {
    if (!isRecord(current)) {
      return "n/a";
    }
    current = current[key];
  }
  if (typeof current === "string" && current.trim()) {
    return current;
  }
  if (typeof current === "number" && Number.isFinite(current)) {
    return String(current);
  }
  return "n/a";
}

export function summarizeCoverage(artifact: DecisionsArtifact | null | undefined): DataCoverage {
  const { records } = normalizeDecisions(artifact?.decisions ?? []);
  return {
    hasTimestamps: records.some((record) => record.tSource !== "sequence"),
    hasDurations: records.some((record) => record.durationS !== null || record.latencyMs !== null),
    humanDecisions: records.filter((record) => record.agent === "HUMAN").length,
    aiDecisions: records.filter((record) => record.agent === "AI").length,
  };
}

function renderBullets(items: readonly string[]): string[] {
  return items.length > 0 ? items.map((item) => `- ${item}`) : ["- None"];
}

export function renderMarkdownReport(params: {
  result: ComputeResult;
  artifact?: DecisionsArtifact | null;
  artifactPath: string;
  rtMaxS?: number;
  generatedAt?: Date;
}): string {
  const { result } = params;
  const { metrics } = result;
  const window = result.window_summary;
  const meta = params.artifact?.meta;
  const coverage = summarizeCoverage(params.artifact);
  const generatedAt = (params.generatedAt ?? new Date()).toISOString();

  const lines: string[] = [
    "# HAIC Evaluation Report",
    "",
    "## Run metadata",
    `- **run_id:** ${readPath(meta, ["run_id"])}`,
    `- **session_id:** ${readPath(meta, ["session_id"])}`,
    `- **pilot_tag:** ${readPath(meta, ["pilot_tag"])}`,
    `- **application mode:** ${readPath(meta, ["application", "mode"])}`,
    `- **model:** ${readPath(meta, ["ai_system", "name"])} (${readPath(meta, ["ai_system", "version"])})`,
    "",
    "## Evaluation window",
    `- **basis:** ${window.basis}  (relative = seconds since session start; absolute = epoch/ISO)`,
    `- **requested:** ${JSON.stringify(window.requested)}`,
    `- **effective:** ${JSON.stringify(window.effective)}`,
    `- **duration:** ${formatValue(window.duration_s)} s`,
    `- **events used:** ${window.counts.events_used} / ${window.counts.events_total}`,
    `- **decisions used:** ${window.counts.decisions_used} / ${window.counts.decisions_total}`,
  ];
  if (window.notes.length > 0) {
    lines.push("", "**window notes**", ...renderBullets(window.notes));
  }

  lines.push(
    "",
    "## Metrics summary",
    "| Category | Metric | Value | Notes |",
    "|---|---:|---:|---|",
    ...metricRows(params.rtMaxS ?? DEFAULT_RT_MAX_S).map(
      (row) => `| ${row.category} | ${row.label} | ${formatValue(metrics[row.key])} | ${row.note} |`,
    ),
    "",
    "## Response times",
    "| Series | n | mean | p50 | p90 | p95 |",
    "|---|---:|---:|---:|---:|---:|",
    `| Human RT (s) | ${metrics.human_rt_n} | ${formatValue(metrics.human_rt_mean_s)} | ${formatValue(metrics.human_rt_p50_s)} | ${formatValue(metrics.human_rt_p90_s)} | ${formatValue(metrics.human_rt_p95_s)} |`,
    `| AI latency (ms) | ${metrics.ai_latency_n} | ${formatValue(metrics.ai_latency_mean_ms)} | ${formatValue(metrics.ai_latency_p50_ms)} | ${formatValue(metrics.ai_latency_p90_ms)} | ${formatValue(metrics.ai_latency_p95_ms)} |`,
  );

  if (metrics.outcome_tp !== undefined) {
    lines.push(
      "",
      "## Outcomes",
      "| Metric | Value |",
      "|---|---:|",
      ...OUTCOME_ROWS.map((row) => `| ${row.label} | ${formatValue(metrics[row.key])} |`),
    );
  }

  lines.push(
    "",
    "## Diagnostics",
    "### Data coverage",
    `- **has timestamps:** ${coverage.hasTimestamps}`,
    `- **has durations:** ${coverage.hasDurations}`,
    `- **human decisions:** ${coverage.humanDecisions}`,
    `- **ai decisions:** ${coverage.aiDecisions}`,
    "",
    "### Warnings",
    ...renderBullets(result.warnings ?? []),
    "",
    "## Reproducibility",
    `- **artifact:** ${params.artifactPath}`,
    `- **library version:** haic-metrics ${VERSION}`,
    `- **generated at:** ${generatedAt}`,
    "",
  );
  return lines.join("\n");
}
