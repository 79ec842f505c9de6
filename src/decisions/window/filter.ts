import type { DecisionsArtifact, NormalizedDecision, WindowSpec, WindowSummary } from "../types.js";
import { resolveWindowBounds, resolveWindowTime, windowTimeRange } from "./resolve.js";

export type WindowFilterResult = {
  decisions: NormalizedDecision[];
  events: NormalizedDecision[];
  summary: WindowSummary;
};

function selectWithin(
  records: readonly NormalizedDecision[],
  tStart: number,
  tEnd: number,
): { kept: NormalizedDecision[]; missingTime: number } {
  const kept: NormalizedDecision[] = [];
  let missingTime = 0;
  for (const record of records) {
    const time = resolveWindowTime(record);
    if (time === null) {
      missingTime += 1;
      continue;
    }
    if (tStart <= time && time <= tEnd) {
      kept.push(record);
    }
  }
  return { kept, missingTime };
}

/**
 * Applies a window to decisions and, when present, the artifact's events.
 * Bounds are inclusive at both ends. Inputs are never mutated.
 */
export function filterDecisionsEventsByEpoch(params: {
  artifact?: DecisionsArtifact | null;
  decisions: readonly NormalizedDecision[];
  events?: readonly NormalizedDecision[];
  window?: WindowSpec | null;
}): WindowFilterResult {
  const events = params.events ?? [];
  const decisionsTotal = params.decisions.length;
  const eventsTotal = events.length;

  if (!params.window) {
    const range = windowTimeRange(params.decisions);
    return {
      decisions: [...params.decisions],
      events: [...events],
      summary: {
        basis: "absolute",
        requested: { mode: "full" },
        effective: {
          t_start_epoch: range?.min ?? null,
          t_end_epoch: range?.max ?? null,
        },
        counts: {
          decisions_total: decisionsTotal,
          decisions_used: decisionsTotal,
          events_total: eventsTotal,
          events_used: eventsTotal,
        },
        duration_s: range ? Math.max(0, range.max - range.min) : 0,
        notes: [],
      },
    };
  }

  const resolved = resolveWindowBounds({
    artifact: params.artifact,
    records: params.decisions,
    window: params.window,
  });
  const notes = [...resolved.notes];

  if (resolved.tStart === null || resolved.tEnd === null) {
    notes.push("Window bounds could not be resolved; no items selected.");
    return {
      decisions: [],
      events: [],
      summary: {
        basis: resolved.basis,
        requested: resolved.requested,
        effective: resolved.effective,
        counts: {
          decisions_total: decisionsTotal,
          decisions_used: 0,
          events_total: eventsTotal,
          events_used: 0,
        },
        duration_s: 0,
        notes,
      },
    };
  }

  const decisions = selectWithin(params.decisions, resolved.tStart, resolved.tEnd);
  const filteredEvents = selectWithin(events, resolved.tStart, resolved.tEnd);
  if (decisions.missingTime > 0) {
    notes.push(
      `${decisions.missingTime} decisions missing a time reference were excluded from windowing.`,
    );
  }
  if (filteredEvents.missingTime > 0) {
    notes.push(
      `${filteredEvents.missingTime} events missing a time reference were excluded from windowing.`,
    );
  }

  return {
    decisions: decisions.kept,
    events: filteredEvents.kept,
    summary: {
      basis: resolved.basis,
      requested: resolved.requested,
      effective: resolved.effective,
      counts: {
        decisions_total: decisionsTotal,
        decisions_used: decisions.kept.length,
        events_total: eventsTotal,
        events_used: filteredEvents.kept.length,
      },
      duration_s: Math.max(0, resolved.tEnd - resolved.tStart),
      notes,
    },
  };
}
