import type { OutcomeVocabularyConfig } from "../../config/types.metrics.js";
import type { DecisionRecord, NormalizedDecision, OutcomeMetrics } from "../types.js";
import { canonString, coerceNumber, isRecord, pickAlias, sum } from "../utils.js";

export const OUTCOME_ALIASES = {
  resultLabel: ["ai_detection_results", "result", "outcome_label"],
  prediction: ["prediction", "predicted", "pred_label", "ai_label", "ai_decision", "ai_suggestion"],
  groundTruth: ["ground_truth", "true_label", "label", "human_label", "human_decision", "op_decision"],
  outcomeBool: ["correct", "is_correct", "agreement"],
  resultCorrect: ["result", "outcome"],
  confidence: ["confidence_level", "confidence"],
  trustRating: ["trust_rating"],
  trustScaleMaximum: ["trust_scale_maximum"],
} as const satisfies Record<string, readonly string[]>;

export type OutcomeVocabulary = {
  positive: ReadonlySet<string>;
  negative: ReadonlySet<string>;
  correctTokens: ReadonlySet<string>;
};

/** Radiology and manufacturing review labels; override per domain. */
export const DEFAULT_OUTCOME_VOCABULARY: OutcomeVocabulary = {
  positive: new Set([
    "positive",
    "pos",
    "yes",
    "1",
    "true",
    "flagged",
    "rejected",
    "anomaly",
    "error",
    "issue",
    "defect",
    "unsafe",
    "invalid",
  ]),
  negative: new Set([
    "negative",
    "neg",
    "no",
    "0",
    "false",
    "accepted",
    "ok",
    "valid",
    "secure",
    "correct",
    "safe",
  ]),
  correctTokens: new Set(["correct", "true", "1"]),
};

const TRUTHY_FALLBACK = new Set(["1", "true", "t", "yes"]);
const FALSY_FALLBACK = new Set(["0", "false", "f", "no"]);
const FALSY_FLAGS = new Set([...FALSY_FALLBACK, "incorrect"]);
const HIGH_CONFIDENCE = 0.9;

export type Confusion = { tp: number; fp: number; tn: number; fn: number };

const EMPTY_CONFUSION: Confusion = { tp: 0, fp: 0, tn: 0, fn: 0 };

const RESULT_LABELS: Record<string, Confusion> = {
  true_positive: { tp: 1, fp: 0, tn: 0, fn: 0 },
  tp: { tp: 1, fp: 0, tn: 0, fn: 0 },
  false_positive: { tp: 0, fp: 1, tn: 0, fn: 0 },
  fp: { tp: 0, fp: 1, tn: 0, fn: 0 },
  true_negative: { tp: 0, fp: 0, tn: 1, fn: 0 },
  tn: { tp: 0, fp: 0, tn: 1, fn: 0 },
  false_negative: { tp: 0, fp: 0, tn: 0, fn: 1 },
  fn: { tp: 0, fp: 0, tn: 0, fn: 1 },
};

function toTokenSet(values: string[] | undefined, fallback: ReadonlySet<string>): ReadonlySet<string> {
  if (!values) {
    return fallback;
  }
  return new Set(values.map((value) => value.trim().toLowerCase()));
}

export function buildOutcomeVocabulary(config?: OutcomeVocabularyConfig): OutcomeVocabulary {
  return {
    positive: toTokenSet(config?.positive, DEFAULT_OUTCOME_VOCABULARY.positive),
    negative: toTokenSet(config?.negative, DEFAULT_OUTCOME_VOCABULARY.negative),
    correctTokens: toTokenSet(config?.correctTokens, DEFAULT_OUTCOME_VOCABULARY.correctTokens),
  };
}

/** `true` positive, `false` negative, `null` when the label is not recognised. */
export function classifyLabel(label: unknown, vocabulary: OutcomeVocabulary): boolean | null {
  if (label === undefined || label === null) {
    return null;
  }
  const token = String(label).trim().toLowerCase();
  if (vocabulary.positive.has(token)) {
    return true;
  }
  if (vocabulary.negative.has(token)) {
    return false;
  }
  if (TRUTHY_FALLBACK.has(token)) {
    return true;
  }
  if (FALSY_FALLBACK.has(token)) {
    return false;
  }
  return null;
}

/**
 * One-hot confusion contribution of a record: an explicit result label first,
 * then the (prediction, ground truth) pair, else all zeros.
 */
export function deriveConfusion(raw: DecisionRecord, vocabulary: OutcomeVocabulary): Confusion {
  const resultLabel = canonString(pickAlias(raw, OUTCOME_ALIASES.resultLabel));
  if (resultLabel && Object.hasOwn(RESULT_LABELS, resultLabel)) {
    return { ...RESULT_LABELS[resultLabel] };
  }
  const predicted = classifyLabel(pickAlias(raw, OUTCOME_ALIASES.prediction), vocabulary);
  const actual = classifyLabel(pickAlias(raw, OUTCOME_ALIASES.groundTruth), vocabulary);
  if (predicted === null || actual === null) {
    return { ...EMPTY_CONFUSION };
  }
  if (predicted) {
    return { ...(actual ? RESULT_LABELS.tp : RESULT_LABELS.fp) };
  }
  return { ...(actual ? RESULT_LABELS.fn : RESULT_LABELS.tn) };
}

/**
 * Reads a loosely typed flag. Any present value counts as set except `false`,
 * zero, empty containers and the tokens `0`, `false`, `f`, `no`, `incorrect`.
 */
export function isTruthyFlag(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  if (typeof value === "string") {
    const token = canonString(value) ?? "";
    return token !== "" && !FALSY_FLAGS.has(token);
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

export function resolveCorrectness(raw: DecisionRecord, vocabulary: OutcomeVocabulary): boolean {
  const explicit = pickAlias(raw, OUTCOME_ALIASES.outcomeBool);
  if (explicit !== undefined) {
    return isTruthyFlag(explicit);
  }
  const resultText = pickAlias(raw, OUTCOME_ALIASES.resultCorrect);
  if (resultText !== undefined) {
    return vocabulary.correctTokens.has(canonString(resultText) ?? "");
  }
  const confusion = deriveConfusion(raw, vocabulary);
  return confusion.tp + confusion.tn > 0;
}

export function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function computeAgreementRate(rows: readonly DecisionRecord[]): number {
  let total = 0;
  let agree = 0;
  for (const raw of rows) {
    const human = pickAlias(raw, OUTCOME_ALIASES.groundTruth);
    const ai = pickAlias(raw, OUTCOME_ALIASES.prediction);
    if (human === undefined && ai === undefined) {
      continue;
    }
    total += 1;
    if ((canonString(human) ?? "") === (canonString(ai) ?? "")) {
      agree += 1;
    }
  }
  return ratio(agree, total);
}

function sumField(rows: readonly DecisionRecord[], aliases: readonly string[]): number {
  return sum(rows.map((raw) => coerceNumber(pickAlias(raw, aliases)) ?? 0));
}

function computeConfidencePct(rows: readonly DecisionRecord[], vocabulary: OutcomeVocabulary): number {
  const high = rows.filter(
    (raw) => (coerceNumber(pickAlias(raw, OUTCOME_ALIASES.confidence)) ?? 0) >= HIGH_CONFIDENCE,
  );
  const good = high.filter((raw) => resolveCorrectness(raw, vocabulary));
  return ratio(good.length, high.length) * 100;
}

export function countConfusion(rows: readonly DecisionRecord[], vocabulary: OutcomeVocabulary): Confusion {
  const totals = { ...EMPTY_CONFUSION };
  for (const raw of rows) {
    const confusion = deriveConfusion(raw, vocabulary);
    totals.tp += confusion.tp;
    totals.fp += confusion.fp;
    totals.tn += confusion.tn;
    totals.fn += confusion.fn;
  }
  return totals;
}

/**
 * Outcome catalogue. Prediction accuracy divides by every record, so rows
 * without a derivable outcome lower it rather than being skipped.
 */
export function computeOutcomeMetrics(
  records: readonly NormalizedDecision[],
  vocabulary: OutcomeVocabulary = DEFAULT_OUTCOME_VOCABULARY,
): OutcomeMetrics {
  const rows = records.map((record) => record.raw);
  const { tp, fp, tn, fn } = countConfusion(rows, vocabulary);
  const correct = rows.filter((raw) => resolveCorrectness(raw, vocabulary)).length;
  return {
    outcome_tp: tp,
    outcome_fp: fp,
    outcome_tn: tn,
    outcome_fn: fn,
    outcome_prediction_accuracy: ratio(tp + tn, rows.length),
    outcome_precision: ratio(tp, tp + fp),
    outcome_recall: ratio(tp, tp + fn),
    outcome_overall_accuracy_pct: ratio(correct, rows.length) * 100,
    outcome_human_ai_agreement_rate: computeAgreementRate(rows),
    outcome_trust_score:
      ratio(
        sumField(rows, OUTCOME_ALIASES.trustRating),
        sumField(rows, OUTCOME_ALIASES.trustScaleMaximum),
      ) * 100,
    outcome_confidence_pct: computeConfidencePct(rows, vocabulary),
  };
}
