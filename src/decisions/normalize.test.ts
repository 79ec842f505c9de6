import { describe, expect, it } from "vitest";
import { normalizeDecisions, sortByTime } from "./normalize.js";
import { NAIVE_DATETIME_NOTE } from "./window/time.js";

describe("normalizeDecisions", () => {
  it("resolves fields through their aliases", () => {
    const { records, notes } = normalizeDecisions([
      {
        actor_type: "Human",
        created_at: "2024-01-01T00:00:10Z",
        type: "Click",
        human_duration_s: "1.5",
      },
      { role: "AI", timestamp: "2024-01-01T00:00:00Z", name: "classify", inference_ms: 120 },
    ]);
    expect(notes).toEqual([]);
    expect(records[0]).toMatchObject({
      agent: "HUMAN",
      actor: "human",
      action: "Click",
      eventType: "click",
      durationS: 1.5,
      latencyMs: null,
      t: 10,
      tSource: "timestamp",
      instant: 1704067210,
    });
    expect(records[1]).toMatchObject({
      agent: "AI",
      action: "classify",
      eventType: null,
      latencyMs: 120,
      t: 0,
    });
  });

  it("keeps unknown agent labels in canonical form", () => {
    const { records } = normalizeDecisions([{ agent: "  Quality  &  Control ", t: 1 }]);
    expect(records[0].agent).toBe("quality and control");
    expect(records[0].actor).toBe("quality and control");
  });

  it("leaves rows without an agent alias unassigned", () => {
    const { records } = normalizeDecisions([{ t: 1, action: "note" }]);
    expect(records[0].agent).toBeNull();
    expect(records[0].actor).toBeNull();
  });

  it("assigns sequence times to rows with no time signal", () => {
    const { records, notes } = normalizeDecisions([{ action: "a" }, { t: 5 }, { action: "b" }]);
    expect(records.map((record) => record.t)).toEqual([0, 5, 1]);
    expect(records.map((record) => record.tSource)).toEqual(["sequence", "explicit", "sequence"]);
    expect(notes).toEqual([
      "2 decisions had no time signal; assigned sequence order as synthetic t (spacing unknown).",
    ]);
  });

  it("restarts the sequence counter on every call", () => {
    normalizeDecisions([{ action: "a" }, { action: "b" }]);
    const { records } = normalizeDecisions([{ action: "c" }]);
    expect(records[0].t).toBe(0);
  });

  it("skips non-object entries with a note", () => {
    const { records, notes } = normalizeDecisions([1, { t: 1 }], { label: "event" });
    expect(records).toHaveLength(1);
    expect(notes).toEqual(["event[0] is not an object; skipped."]);
  });

  it("ignores unparseable timestamps with a note", () => {
    const { records, notes } = normalizeDecisions([{ timestamp: "yesterday", t: 2 }]);
    expect(records[0].instant).toBeNull();
    expect(records[0].t).toBe(2);
    expect(notes).toEqual(["decision[0] has an unparseable timestamp; ignored."]);
  });

  it("reads large numeric timestamps as epoch milliseconds", () => {
    const { records } = normalizeDecisions([
      { timestamp: 1700000000000 },
      { timestamp: 1700000005000 },
    ]);
    expect(records[0].instant).toBe(1700000000);
    expect(records.map((record) => record.t)).toEqual([0, 5]);
  });

  it("adds the naive datetime note once per call", () => {
    const { records, notes } = normalizeDecisions([
      { timestamp: "2024-01-01T00:00:00" },
      { timestamp: "2024-01-01T00:00:30" },
    ]);
    expect(records.map((record) => record.t)).toEqual([0, 30]);
    expect(notes).toEqual([NAIVE_DATETIME_NOTE]);
  });

  it("coerces correctness flags and drops non-numeric durations", () => {
    const { records } = normalizeDecisions([
      { t: 0, correct: "TRUE", duration_s: "slow" },
      { t: 1, agreement: "maybe" },
      { t: 2, is_correct: false, latency_ms: "250" },
    ]);
    expect(records.map((record) => record.correct)).toEqual([true, null, false]);
    expect(records[0].durationS).toBeNull();
    expect(records[2].latencyMs).toBe(250);
  });

  it("keeps the source row untouched on raw", () => {
    const row = { t: 3, agent: "human", custom: { nested: true } };
    const { records } = normalizeDecisions([row]);
    expect(records[0].raw).toBe(row);
    expect(row).toEqual({ t: 3, agent: "human", custom: { nested: true } });
  });
});

describe("sortByTime", () => {
  it("orders by t and keeps ties in input order", () => {
    const { records } = normalizeDecisions([
      { t: 5, action: "late" },
      { t: 1, action: "first" },
      { t: 1, action: "second" },
    ]);
    expect(sortByTime(records).map((record) => record.action)).toEqual(["first", "second", "late"]);
  });
});
