import { sortByTime } from "../normalize.js";
import type { InteractionMetrics, NormalizedDecision } from "../types.js";
import { canonString, clamp01, computeMean, isNumber, isRecord } from "../utils.js";

export const DEFAULT_RT_MAX_S = 5.0;

const OFFROLE_PENALTY_WEIGHT = 0.35;
const PROGRESS_BONUS_WEIGHT = 0.1;
const ADAPTABILITY_BUCKET_SHARE = 0.2;
const KL_EPSILON = 1e-12;
const PROGRESS_KINDS = new Set(["checklist_progress", "progress"]);

export type InteractionOptions = {
  /** Session length in seconds; overrides the span derived from record times. */
  totalTimeS?: number | null;
  baselineS?: number | null;
  rtMaxS?: number;
};

type ProbabilityMap = Record<string, number>;

export function isAgentRow(record: NormalizedDecision): boolean {
  return record.agent !== null;
}

/** Event type, else action, canonicalized. Drives the `error` and progress checks. */
export function resolveKind(record: NormalizedDecision): string | null {
  return record.eventType ?? canonString(record.action) ?? null;
}

/** `duration_s`, else `latency_ms` in seconds; negative values clamp to 0. */
export function resolveDurationSeconds(record: NormalizedDecision): number | null {
  if (record.durationS !== null) {
    return Math.max(0, record.durationS);
  }
  if (record.latencyMs !== null) {
    return Math.max(0, record.latencyMs / 1000);
  }
  return null;
}

function isFlagSet(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (isNumber(value)) {
    return value !== 0;
  }
  const canon = canonString(value);
  return canon === "true" || canon === "yes" || canon === "1";
}

function spanOf(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return Math.max(0, max - min);
}

export function resolveTotalTime(
  agentRows: readonly NormalizedDecision[],
  explicit: number | null | undefined,
): number {
  if (isNumber(explicit)) {
    return Math.max(0, explicit);
  }
  const tSpan = spanOf(agentRows.map((row) => row.t));
  if (tSpan > 0) {
    return tSpan;
  }
  const instants = agentRows
    .map((row) => row.instant)
    .filter((value): value is number => value !== null);
  return spanOf(instants);
}

function toProbabilityDistribution(values: Record<string, unknown>): ProbabilityMap {
  const cleaned: ProbabilityMap = {};
  let total = 0;
  for (const [key, value] of Object.entries(values)) {
    const p = isNumber(value) ? Math.max(0, value) : 0;
    cleaned[key] = p;
    total += p;
  }
  for (const key of Object.keys(cleaned)) {
    cleaned[key] = total > 0 ? cleaned[key] / total : 0;
  }
  return cleaned;
}

/** Mean of the `key` distributions across rows that carry one, renormalized. */
export function aggregateProbabilities(
  rows: readonly NormalizedDecision[],
  key: string,
): ProbabilityMap {
  const accum: ProbabilityMap = {};
  let count = 0;
  for (const row of rows) {
    const value = row.raw[key];
    if (!isRecord(value) || Object.keys(value).length === 0) {
      continue;
    }
    for (const [action, p] of Object.entries(toProbabilityDistribution(value))) {
      accum[action] = (Object.hasOwn(accum, action) ? accum[action] : 0) + p;
    }
    count += 1;
  }
  if (count === 0) {
    return {};
  }
  const averaged: ProbabilityMap = {};
  for (const [action, p] of Object.entries(accum)) {
    averaged[action] = p / count;
  }
  return toProbabilityDistribution(averaged);
}

/** KL(P || Q) over the union of keys, with both operands floored at `epsilon`. */
export function klDivergence(p: ProbabilityMap, q: ProbabilityMap, epsilon = KL_EPSILON): number {
  const keys = new Set([...Object.keys(p), ...Object.keys(q)]);
  let kl = 0;
  for (const key of keys) {
    const pk = Math.max(epsilon, Object.hasOwn(p, key) ? p[key] : 0);
    const qk = Math.max(epsilon, Object.hasOwn(q, key) ? q[key] : 0);
    kl += pk * Math.log(pk / qk);
  }
  return kl;
}

function bucketAccuracy(rows: readonly NormalizedDecision[]): number {
  const labeled = rows.filter((row) => row.correct !== null);
  if (labeled.length === 0) {
    return 1;
  }
  return labeled.filter((row) => row.correct === true).length / labeled.length;
}

function computeAdaptability(agentRows: readonly NormalizedDecision[]): number {
  if (agentRows.length === 0) {
    return 0;
  }
  const k = Math.max(1, Math.ceil(ADAPTABILITY_BUCKET_SHARE * agentRows.length));
  const early = bucketAccuracy(agentRows.slice(0, k));
  const late = bucketAccuracy(agentRows.slice(-k));
  return Math.tanh((late - early) / Math.max(1e-9, early));
}

function computeSimilarity(agentRows: readonly NormalizedDecision[]): number {
  const human = aggregateProbabilities(agentRows, "probs");
  const surrogate = aggregateProbabilities(agentRows, "surrogate_probs");
  if (Object.keys(human).length > 0 && Object.keys(surrogate).length > 0) {
    return clamp01(Math.exp(-klDivergence(human, surrogate)));
  }
  let compared = 0;
  let matches = 0;
  for (const row of agentRows) {
    const surrogateAction = row.raw.surrogate_action;
    if (surrogateAction === undefined || surrogateAction === null || row.action === null) {
      continue;
    }
    compared += 1;
    if (row.action === String(surrogateAction)) {
      matches += 1;
    }
  }
  return compared > 0 ? clamp01(matches / compared) : 0;
}

function computeTrust(
  agentRows: readonly NormalizedDecision[],
  allRows: readonly NormalizedDecision[],
): number {
  let labeled = 0;
  let errors = 0;
  for (const row of agentRows) {
    if (row.correct === null) {
      continue;
    }
    labeled += 1;
    if (row.correct === false) {
      errors += 1;
    }
  }
  for (const row of allRows) {
    if (resolveKind(row) === "error") {
      labeled += 1;
      errors += 1;
    }
  }
  if (labeled === 0) {
    return 1;
  }
  return clamp01(1 - errors / labeled);
}

function computeHumanCenteredLatency(
  agentRows: readonly NormalizedDecision[],
  durations: number[],
  rtMax: number,
): number {
  const humanRts = agentRows
    .filter((row) => row.agent === "HUMAN")
    .map((row) => resolveDurationSeconds(row))
    .filter((value): value is number => value !== null);
  const latencies = agentRows
    .filter((row) => row.latencyMs !== null)
    .map((row) => Math.max(0, (row.latencyMs ?? 0) / 1000));
  let meanRt = rtMax;
  if (humanRts.length > 0) {
    meanRt = computeMean(humanRts);
  } else if (durations.length > 0) {
    meanRt = computeMean(durations);
  } else if (latencies.length > 0) {
    meanRt = computeMean(latencies);
  }
  if (rtMax <= 0) {
    return 0;
  }
  return clamp01(1 - meanRt / rtMax);
}

/**
 * Interaction KPIs over normalized records.
 *
 * - F: agent rows per minute of session time
 * - D: mean action duration in seconds
 * - HCL: 1 - mean response time / `rtMaxS`, clipped to [0, 1]
 * - Tr: 1 - error share among labeled rows (1 when nothing is labeled)
 * - A: tanh of the relative accuracy change between the first and last 20% of rows
 * - S: exp(-KL) between human and surrogate action distributions, else
 *   action match rate against `surrogate_action`
 * - EL: session overrun relative to `baselineS`
 * - EfficiencyScore: 1 / (1 + EL), penalized by off-role actions and nudged up by
 *   progress events, clipped to [0, 1]
 *
 * Empty input yields zeros, with Tr = 1 and EfficiencyScore = 1.
 */
export function computeInteractionMetrics(
  records: readonly NormalizedDecision[],
  options: InteractionOptions = {},
): InteractionMetrics {
  const rtMax = options.rtMaxS ?? DEFAULT_RT_MAX_S;
  const sorted = sortByTime(records);
  const agentRows = sorted.filter((row) => isAgentRow(row));
  const n = agentRows.length;
  const totalTime = resolveTotalTime(agentRows, options.totalTimeS);

  const F = totalTime > 0 ? n / (totalTime / 60) : 0;

  const durations = agentRows
    .map((row) => resolveDurationSeconds(row))
    .filter((value): value is number => value !== null);
  const D = computeMean(durations);

  const HCL = computeHumanCenteredLatency(agentRows, durations, rtMax);
  const Tr = computeTrust(agentRows, sorted);
  const A = computeAdaptability(agentRows);
  const S = computeSimilarity(agentRows);

  const baseline = options.baselineS;
  const EL =
    isNumber(baseline) && baseline > 0 && totalTime > 0
      ? Math.max(0, (totalTime - baseline) / baseline)
      : 0;

  const offRoleCount = agentRows.filter((row) => isFlagSet(row.raw.off_role_action)).length;
  const offRoleRate = n > 0 ? offRoleCount / n : 0;
  const progressCount = sorted.filter((row) => PROGRESS_KINDS.has(resolveKind(row) ?? "")).length;
  const progressRate = totalTime > 0 ? progressCount / totalTime : 0;

  let efficiency = 1 / (1 + EL);
  efficiency *= 1 - OFFROLE_PENALTY_WEIGHT * clamp01(offRoleRate);
  efficiency *= 1 + PROGRESS_BONUS_WEIGHT * clamp01(progressRate);

  return {
    F,
    D,
    HCL,
    Tr,
    A,
    S,
    EL,
    EfficiencyScore: clamp01(efficiency),
  };
}

/** The KPI vector per mapped agent label; rows without an agent are left out. */
export function computeInteractionMetricsByAgent(
  records: readonly NormalizedDecision[],
  options: InteractionOptions = {},
): Record<string, InteractionMetrics> {
  const byAgent = new Map<string, NormalizedDecision[]>();
  for (const record of records) {
    if (record.agent === null) {
      continue;
    }
    const entries = byAgent.get(record.agent) ?? [];
    entries.push(record);
    byAgent.set(record.agent, entries);
  }
  const out: Record<string, InteractionMetrics> = {};
  for (const [agent, rows] of byAgent.entries()) {
    out[agent] = computeInteractionMetrics(rows, options);
  }
  return out;
}
