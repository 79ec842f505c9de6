import { describe, expect, it } from "vitest";
import { normalizeDecisions } from "../normalize.js";
import type { DecisionsArtifact } from "../types.js";
import { filterDecisionsEventsByEpoch } from "./filter.js";

const SESSION_ARTIFACT: DecisionsArtifact = {
  meta: { timestamps: { start_time: 0 } },
  decisions: [{ t: 1 }, { t: 10 }, { t: 30 }],
  events: [{ t: 1 }, { t: 50 }],
};

function normalized(rows: unknown[], label?: string) {
  return normalizeDecisions(rows, { label }).records;
}

describe("filterDecisionsEventsByEpoch", () => {
  it("passes everything through without a window", () => {
    const result = filterDecisionsEventsByEpoch({ decisions: normalized([{ t: 2 }, { t: 8 }]) });
    expect(result.decisions).toHaveLength(2);
    expect(result.summary).toEqual({
      basis: "absolute",
      requested: { mode: "full" },
      effective: { t_start_epoch: 2, t_end_epoch: 8 },
      counts: { decisions_total: 2, decisions_used: 2, events_total: 0, events_used: 0 },
      duration_s: 6,
      notes: [],
    });
  });

  it("selects decisions and events inside a relative window", () => {
    const decisions = normalized(SESSION_ARTIFACT.decisions);
    const events = normalized(SESSION_ARTIFACT.events ?? [], "event");

    const narrow = filterDecisionsEventsByEpoch({
      artifact: SESSION_ARTIFACT,
      decisions,
      events,
      window: { basis: "relative", start: 0, end: 15 },
    });
    expect(narrow.summary.counts).toEqual({
      decisions_total: 3,
      decisions_used: 2,
      events_total: 2,
      events_used: 1,
    });
    expect(narrow.summary.duration_s).toBe(15);

    const wide = filterDecisionsEventsByEpoch({
      artifact: SESSION_ARTIFACT,
      decisions,
      events,
      window: { basis: "relative", start: 0, end: 40 },
    });
    expect(wide.summary.counts.decisions_used).toBe(3);
  });

  it("includes both bounds of an absolute window", () => {
    const start = 1704067200;
    const result = filterDecisionsEventsByEpoch({
      decisions: normalized([{ t: start + 1 }, { t: start + 600 }, { t: start + 1200 }]),
      window: { basis: "absolute", start: "2024-01-01T00:00:00Z", end: "2024-01-01T00:10:00Z" },
    });
    expect(result.decisions.map((record) => record.t)).toEqual([start + 1, start + 600]);
    expect(result.summary.duration_s).toBe(600);
  });

  it("excludes rows without a time reference and says so", () => {
    const result = filterDecisionsEventsByEpoch({
      decisions: normalized([{ t: 1 }, { action: "untimed" }]),
      window: { basis: "absolute", start: 0, end: 10 },
    });
    expect(result.summary.counts.decisions_used).toBe(1);
    expect(result.summary.notes).toEqual([
      "1 decisions missing a time reference were excluded from windowing.",
    ]);
  });

  it("selects nothing when the bounds cannot be resolved", () => {
    const result = filterDecisionsEventsByEpoch({
      decisions: normalized([{ action: "untimed" }]),
      window: { basis: "relative", last: 60 },
    });
    expect(result.decisions).toEqual([]);
    expect(result.summary.counts).toEqual({
      decisions_total: 1,
      decisions_used: 0,
      events_total: 0,
      events_used: 0,
    });
    expect(result.summary.duration_s).toBe(0);
    expect(result.summary.notes).toEqual([
      "No usable timestamps found to establish session start.",
      "Window bounds could not be resolved; no items selected.",
    ]);
  });

  it("never selects fewer decisions as a relative end grows", () => {
    const decisions = normalized([{ t: 0 }, { t: 4 }, { t: 9 }, { t: 17 }, { t: 26 }, { t: 40 }]);
    let previous = 0;
    for (let end = 0; end <= 45; end += 5) {
      const { summary } = filterDecisionsEventsByEpoch({
        artifact: SESSION_ARTIFACT,
        decisions,
        window: { basis: "relative", start: 0, end },
      });
      expect(summary.counts.decisions_used).toBeGreaterThanOrEqual(previous);
      expect(summary.counts.decisions_used).toBeLessThanOrEqual(summary.counts.decisions_total);
      previous = summary.counts.decisions_used;
    }
    expect(previous).toBe(6);
  });

  it("does not mutate its inputs", () => {
    const decisions = normalized([{ t: 1 }, { t: 50 }]);
    filterDecisionsEventsByEpoch({ decisions, window: { basis: "absolute", start: 0, end: 10 } });
    expect(decisions.map((record) => record.t)).toEqual([1, 50]);
  });
});
