import type { CanonicalAgent, DecisionRecord, NormalizeResult, NormalizedDecision } from "./types.js";
import { NAIVE_DATETIME_NOTE, tryParseTimeValue } from "./window/time.js";
import { canonString, coerceNumber, isNumber, isRecord, pickAlias } from "./utils.js";

export const DECISION_ALIASES = {
  agent: ["agent", "actor_type", "actor", "role"],
  timestamp: ["timestamp", "time", "created_at", "event_time", "date"],
  action: ["action", "event_type", "type", "name"],
  eventType: ["event_type", "type"],
  durationS: ["duration_s", "human_duration_s", "duration"],
  latencyMs: ["latency_ms", "inference_ms"],
  correct: ["correct", "agreement", "is_correct"],
} as const satisfies Record<string, readonly string[]>;

const AGENT_MAP: Record<string, CanonicalAgent> = {
  human: "HUMAN",
  ai: "AI",
  system: "SYS",
};

/** Numeric timestamps above this are epoch milliseconds. */
const EPOCH_MS_THRESHOLD = 1e12;

export function canonicalizeAgent(value: unknown): { agent: string; actor: string } | null {
  const actor = canonString(value);
  if (!actor) {
    return null;
  }
  return { agent: Object.hasOwn(AGENT_MAP, actor) ? AGENT_MAP[actor] : actor, actor };
}

function coerceCorrect(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  const canon = canonString(value);
  if (canon === "true") {
    return true;
  }
  if (canon === "false") {
    return false;
  }
  return null;
}

function parseRecordInstant(value: unknown, timeNotes: string[]): number | null {
  if (value === undefined) {
    return null;
  }
  if (isNumber(value) && value > EPOCH_MS_THRESHOLD) {
    return value / 1000;
  }
  return tryParseTimeValue(value, timeNotes);
}

function minOf(values: number[]): number {
  return values.reduce((acc, value) => Math.min(acc, value), Number.POSITIVE_INFINITY);
}

type FirstPass = Omit<NormalizedDecision, "t" | "tSource"> & { t: number | null };

function readRecord(params: {
  raw: DecisionRecord;
  label: string;
  index: number;
  notes: string[];
  timeNotes: string[];
}): FirstPass {
  const { raw, label, index, notes } = params;
  const agent = canonicalizeAgent(pickAlias(raw, DECISION_ALIASES.agent));
  const timestamp = pickAlias(raw, DECISION_ALIASES.timestamp);
  const instant = parseRecordInstant(timestamp, params.timeNotes);
  if (timestamp !== undefined && instant === null) {
    notes.push(`${label}[${index}] has an unparseable timestamp; ignored.`);
  }
  const action = pickAlias(raw, DECISION_ALIASES.action);
  const eventType = pickAlias(raw, DECISION_ALIASES.eventType);
  return {
    t: isNumber(raw.t) ? raw.t : null,
    instant,
    agent: agent?.agent ?? null,
    actor: agent?.actor ?? null,
    action: action === undefined ? null : String(action),
    eventType: canonString(eventType) ?? null,
    durationS: coerceNumber(pickAlias(raw, DECISION_ALIASES.durationS)) ?? null,
    latencyMs: coerceNumber(pickAlias(raw, DECISION_ALIASES.latencyMs)) ?? null,
    correct: coerceCorrect(pickAlias(raw, DECISION_ALIASES.correct)),
    raw,
  };
}

/**
 * Maps heterogeneous decision rows onto the canonical shape.
 *
 * Runs in two passes: the first reads every row and collects parsed timestamp
 * instants, the second fills missing `t` values as offsets from the earliest
 * instant. Rows with neither `t` nor a timestamp get a sequence counter
 * (0, 1, 2, ...) scoped to this call. Sequence times only preserve order; the
 * real spacing between such rows is unknown.
 */
export function normalizeDecisions(
  records: readonly unknown[],
  options: { label?: string } = {},
): NormalizeResult {
  const label = options.label ?? "decision";
  const notes: string[] = [];
  const timeNotes: string[] = [];
  const firstPass: FirstPass[] = [];
  records.forEach((entry, index) => {
    if (!isRecord(entry)) {
      notes.push(`${label}[${index}] is not an object; skipped.`);
      return;
    }
    firstPass.push(readRecord({ raw: entry, label, index, notes, timeNotes }));
  });
  // One naive-datetime note per call, not one per row.
  if (timeNotes.includes(NAIVE_DATETIME_NOTE)) {
    notes.push(NAIVE_DATETIME_NOTE);
  }

  const instants = firstPass
    .map((row) => row.instant)
    .filter((value): value is number => value !== null);
  const sessionReference = instants.length > 0 ? minOf(instants) : null;

  let sequence = 0;
  const normalized = firstPass.map((row): NormalizedDecision => {
    if (row.t !== null) {
      return { ...row, t: row.t, tSource: "explicit" };
    }
    if (row.instant !== null && sessionReference !== null) {
      return { ...row, t: Math.max(0, row.instant - sessionReference), tSource: "timestamp" };
    }
    const t = sequence;
    sequence += 1;
    return { ...row, t, tSource: "sequence" };
  });

  if (sequence > 0) {
    notes.push(
      `${sequence} ${label}s had no time signal; assigned sequence order as synthetic t (spacing unknown).`,
    );
  }
  return { records: normalized, notes };
}

/** Ascending by `t`; ties keep input order. */
export function sortByTime(records: readonly NormalizedDecision[]): NormalizedDecision[] {
  return [...records].sort((a, b) => a.t - b.t);
}
