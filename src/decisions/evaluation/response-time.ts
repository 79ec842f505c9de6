import { normalizeDecisions } from "../normalize.js";
import type { AiLatencyMetrics, HumanRtMetrics, NormalizedDecision } from "../types.js";
import { canonString, coerceNumber, isNumber, isRecord } from "../utils.js";
import { DEFAULT_QUANTILES, computePercentile, summarizePercentiles } from "./stats.js";

const HUMAN_ACTORS = new Set(["human", "operator", "radiologist"]);
const AI_ACTORS = new Set(["ai", "model"]);
export const AI_ACTIONS = new Set([
  "ai_evaluated",
  "classify",
  "forecast",
  "ai_inference",
  "ai_decision",
]);

/** Bare `latency` values at or above this are already milliseconds. */
const BARE_LATENCY_MS_THRESHOLD = 500;

const DEFAULT_HUMAN_SLA_S = 30;
const DEFAULT_AI_SLA_MS = 5000;

/** Unlabeled rows count as human. */
export function isHumanRow(record: NormalizedDecision): boolean {
  return record.actor === null || HUMAN_ACTORS.has(record.actor);
}

export function isAiRow(record: NormalizedDecision): boolean {
  if (record.actor !== null && AI_ACTORS.has(record.actor)) {
    return true;
  }
  const action = canonString(record.action);
  return action !== undefined && AI_ACTIONS.has(action);
}

export function responseSeconds(record: NormalizedDecision): number | null {
  if (record.durationS !== null) {
    return record.durationS;
  }
  if (record.latencyMs !== null) {
    return record.latencyMs / 1000;
  }
  return null;
}

export function latencyMilliseconds(record: NormalizedDecision): number | null {
  if (record.latencyMs !== null) {
    return record.latencyMs;
  }
  if (record.durationS !== null) {
    return record.durationS * 1000;
  }
  const bare = coerceNumber(record.raw.latency);
  if (bare === undefined) {
    return null;
  }
  return bare >= BARE_LATENCY_MS_THRESHOLD ? bare : bare * 1000;
}

function collect(
  records: readonly NormalizedDecision[],
  include: (record: NormalizedDecision) => boolean,
  measure: (record: NormalizedDecision) => number | null,
): number[] {
  const values: number[] = [];
  for (const record of records) {
    if (!include(record)) {
      continue;
    }
    const value = measure(record);
    if (value !== null) {
      values.push(value);
    }
  }
  return values;
}

export function computeHumanRtMetrics(records: readonly NormalizedDecision[]): HumanRtMetrics {
  const summary = summarizePercentiles(collect(records, isHumanRow, responseSeconds));
  return {
    human_rt_n: summary.n,
    human_rt_mean_s: summary.mean,
    human_rt_p50_s: summary.p50,
    human_rt_p90_s: summary.p90,
    human_rt_p95_s: summary.p95,
  };
}

export function computeLatencyMetrics(records: readonly NormalizedDecision[]): AiLatencyMetrics {
  const summary = summarizePercentiles(collect(records, isAiRow, latencyMilliseconds));
  return {
    ai_latency_n: summary.n,
    ai_latency_mean_ms: summary.mean,
    ai_latency_p50_ms: summary.p50,
    ai_latency_p90_ms: summary.p90,
    ai_latency_p95_ms: summary.p95,
  };
}

export type SessionLogsRoot = {
  logs?: unknown[];
  extras?: {
    rt_limits?: {
      rt_max_human_s?: number;
      rt_max_ai_ms?: number;
    };
  };
};

export type GroupedPercentiles = {
  labels: string[];
  series: string[];
  /** Series-major: `data[seriesIndex][labelIndex]`, `null` for empty groups. */
  data: Array<Array<number | null>>;
  counts: Record<string, number>;
  sla: number;
  group_key: string;
};

function groupValues(params: {
  root: SessionLogsRoot;
  groupKey: string;
  include: (record: NormalizedDecision) => boolean;
  measure: (record: NormalizedDecision) => number | null;
}): Map<string, number[]> {
  const byGroup = new Map<string, number[]>();
  for (const session of params.root.logs ?? []) {
    if (!isRecord(session)) {
      continue;
    }
    const groupValue = session[params.groupKey];
    const group = groupValue === undefined || groupValue === null ? "unknown" : String(groupValue);
    const decisions = Array.isArray(session.decisions) ? session.decisions : [];
    const values = collect(normalizeDecisions(decisions).records, params.include, params.measure);
    if (values.length === 0) {
      continue;
    }
    byGroup.set(group, [...(byGroup.get(group) ?? []), ...values]);
  }
  return byGroup;
}

function buildGroupedPayload(
  byGroup: Map<string, number[]>,
  groupKey: string,
  sla: number,
): GroupedPercentiles {
  const labels = [...byGroup.keys()].sort();
  const data = DEFAULT_QUANTILES.map((quantile) =>
    labels.map((label) => {
      const values = byGroup.get(label) ?? [];
      return values.length > 0 ? computePercentile(values, quantile) : null;
    }),
  );
  const counts: Record<string, number> = {};
  for (const label of labels) {
    counts[label] = byGroup.get(label)?.length ?? 0;
  }
  return {
    labels,
    series: DEFAULT_QUANTILES.map((quantile) => `p${Math.round(quantile * 100)}`),
    data,
    counts,
    sla,
    group_key: groupKey,
  };
}

/** Human response-time percentiles (seconds) across sessions, grouped by a session field. */
export function groupHumanResponsePercentiles(
  root: SessionLogsRoot,
  groupKey = "pilot_tag",
): GroupedPercentiles {
  const byGroup = groupValues({
    root,
    groupKey,
    include: (record) => record.actor === "human",
    measure: responseSeconds,
  });
  const sla = root.extras?.rt_limits?.rt_max_human_s;
  return buildGroupedPayload(byGroup, groupKey, isNumber(sla) ? sla : DEFAULT_HUMAN_SLA_S);
}

/** AI latency percentiles (milliseconds) across sessions, grouped by a session field. */
export function groupAiLatencyPercentiles(
  root: SessionLogsRoot,
  groupKey = "ai_model_version",
): GroupedPercentiles {
  const byGroup = groupValues({ root, groupKey, include: isAiRow, measure: latencyMilliseconds });
  const sla = root.extras?.rt_limits?.rt_max_ai_ms;
  return buildGroupedPayload(byGroup, groupKey, isNumber(sla) ? sla : DEFAULT_AI_SLA_MS);
}
