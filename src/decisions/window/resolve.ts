import { WindowSpecSchema } from "../../config/zod-schema.metrics.js";
import { InvalidWindowError } from "../../errors.js";
import type {
  DecisionsArtifact,
  NormalizedDecision,
  WindowBasis,
  WindowEffective,
  WindowSpec,
} from "../types.js";
import { isNumber, isRecord } from "../utils.js";
import { parseTimeValue, tryParseTimeValue } from "./time.js";

export type ResolvedWindow = {
  tStart: number | null;
  tEnd: number | null;
  basis: WindowBasis;
  requested: WindowSpec;
  effective: WindowEffective;
  notes: string[];
};

function unresolvedEffective(): WindowEffective {
  return { t_start_epoch: null, t_end_epoch: null };
}

/**
 * The time a record is windowed by: its explicit `t`, else its parsed timestamp.
 * Sequence-only records have no usable time.
 */
export function resolveWindowTime(record: NormalizedDecision): number | null {
  if (record.tSource === "explicit") {
    return record.t;
  }
  return record.instant;
}

export function windowTimeRange(
  records: readonly NormalizedDecision[],
): { min: number; max: number } | null {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const record of records) {
    const time = resolveWindowTime(record);
    if (time === null) {
      continue;
    }
    min = Math.min(min, time);
    max = Math.max(max, time);
  }
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    return null;
  }
  return { min, max };
}

export function parseWindowSpec(value: unknown): WindowSpec {
  const parsed = WindowSpecSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "window"}: ${issue.message}`)
      .join("; ");
    throw new InvalidWindowError(`Invalid window: ${issues}`);
  }
  return parsed.data;
}

function readMetaTime(
  artifact: DecisionsArtifact | null | undefined,
  key: "start_time" | "end_time",
  notes: string[],
): number | null {
  const meta = artifact?.meta;
  if (!isRecord(meta)) {
    return null;
  }
  const timestamps = meta.timestamps;
  if (!isRecord(timestamps)) {
    return null;
  }
  const raw = timestamps[key];
  if (raw === undefined || raw === null) {
    return null;
  }
  const parsed = tryParseTimeValue(raw, notes);
  if (parsed === null) {
    notes.push(`meta.timestamps.${key} is not a usable time; ignored.`);
  }
  return parsed;
}

export function resolveSessionStart(params: {
  artifact?: DecisionsArtifact | null;
  records: readonly NormalizedDecision[];
  notes: string[];
}): number | null {
  const metaStart = readMetaTime(params.artifact, "start_time", params.notes);
  if (metaStart !== null) {
    return metaStart;
  }
  const range = windowTimeRange(params.records);
  if (range) {
    params.notes.push(
      "Fallback: meta.timestamps.start_time missing; using min(decision.t) as session start.",
    );
    return range.min;
  }
  params.notes.push("No usable timestamps found to establish session start.");
  return null;
}

function assertOrdered(tStart: number, tEnd: number, basis: WindowBasis): void {
  if (tEnd < tStart) {
    const label = basis === "relative" ? "Relative" : "Absolute";
    throw new InvalidWindowError(`${label} window 'end' must be >= 'start'.`);
  }
}

function resolveRelative(params: {
  artifact?: DecisionsArtifact | null;
  records: readonly NormalizedDecision[];
  window: WindowSpec;
  notes: string[];
}): ResolvedWindow {
  const { window, notes } = params;
  const hasStart = window.start !== undefined;
  const hasEnd = window.end !== undefined;
  const hasLast = window.last !== undefined;
  if (hasLast && (hasStart || hasEnd)) {
    throw new InvalidWindowError(
      "For relative windows, use either {last: N} or {start, end}, not both.",
    );
  }
  if (!hasLast && !(hasStart && hasEnd)) {
    throw new InvalidWindowError(
      "Relative window requires both 'start' and 'end' (seconds) unless using 'last'.",
    );
  }
  if (!hasLast && !(isNumber(window.start) && isNumber(window.end))) {
    throw new InvalidWindowError("Relative window 'start'/'end' must be numbers (seconds).");
  }

  const unresolved: ResolvedWindow = {
    tStart: null,
    tEnd: null,
    basis: "relative",
    requested: window,
    effective: unresolvedEffective(),
    notes,
  };
  const t0 = resolveSessionStart({ artifact: params.artifact, records: params.records, notes });
  if (t0 === null) {
    return unresolved;
  }

  let tStart: number;
  let tEnd: number;
  if (isNumber(window.last)) {
    const sessionEnd =
      readMetaTime(params.artifact, "end_time", notes) ?? windowTimeRange(params.records)?.max;
    if (sessionEnd === undefined) {
      notes.push("Cannot resolve relative 'last' window end; missing session end time.");
      return unresolved;
    }
    tEnd = sessionEnd;
    tStart = Math.max(t0, tEnd - window.last);
  } else if (isNumber(window.start) && isNumber(window.end)) {
    assertOrdered(window.start, window.end, "relative");
    tStart = t0 + window.start;
    tEnd = t0 + window.end;
  } else {
    return unresolved;
  }
  assertOrdered(tStart, tEnd, "relative");

  return {
    tStart,
    tEnd,
    basis: "relative",
    requested: window,
    effective: {
      t_start_epoch: tStart,
      t_end_epoch: tEnd,
      t_start_rel_s: tStart - t0,
      t_end_rel_s: tEnd - t0,
      session_start_epoch: t0,
    },
    notes,
  };
}

function resolveAbsolute(window: WindowSpec, notes: string[]): ResolvedWindow {
  if (window.last !== undefined) {
    throw new InvalidWindowError("'last' is only supported for relative windows.");
  }
  if (window.start === undefined || window.end === undefined) {
    throw new InvalidWindowError(
      "Absolute window requires both 'start' and 'end' (epoch seconds or ISO strings).",
    );
  }
  const tStart = parseTimeValue(window.start, notes);
  const tEnd = parseTimeValue(window.end, notes);
  assertOrdered(tStart, tEnd, "absolute");
  return {
    tStart,
    tEnd,
    basis: "absolute",
    requested: window,
    effective: { t_start_epoch: tStart, t_end_epoch: tEnd },
    notes,
  };
}

/**
 * Turns a window specification into absolute epoch bounds.
 *
 * Relative windows are anchored at the session start (artifact metadata, else
 * the earliest record time). When no anchor exists the bounds come back as
 * `null` with a note instead of an error.
 */
export function resolveWindowBounds(params: {
  artifact?: DecisionsArtifact | null;
  records: readonly NormalizedDecision[];
  window: WindowSpec;
}): ResolvedWindow {
  const notes: string[] = [];
  const window = parseWindowSpec(params.window);
  if (window.basis === "relative") {
    return resolveRelative({ artifact: params.artifact, records: params.records, window, notes });
  }
  return resolveAbsolute(window, notes);
}
