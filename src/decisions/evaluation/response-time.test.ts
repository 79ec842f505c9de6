import { describe, expect, it } from "vitest";
import { normalizeDecisions } from "../normalize.js";
import {
  computeHumanRtMetrics,
  computeLatencyMetrics,
  groupAiLatencyPercentiles,
  groupHumanResponsePercentiles,
  type SessionLogsRoot,
} from "./response-time.js";

function records(rows: unknown[]) {
  return normalizeDecisions(rows).records;
}

describe("computeHumanRtMetrics", () => {
  it("summarizes human, operator and unlabeled rows", () => {
    const metrics = computeHumanRtMetrics(
      records([
        { agent: "human", duration_s: 1 },
        { agent: "operator", duration_s: 3 },
        { latency_ms: 2000 },
        { agent: "ai", duration_s: 9 },
      ]),
    );
    expect(metrics.human_rt_n).toBe(3);
    expect(metrics.human_rt_mean_s).toBe(2);
    expect(metrics.human_rt_p50_s).toBe(2);
    expect(metrics.human_rt_p90_s).toBeCloseTo(2.8);
    expect(metrics.human_rt_p95_s).toBeCloseTo(2.9);
  });

  it("reports zeros when no human timing exists", () => {
    expect(computeHumanRtMetrics(records([{ agent: "ai", duration_s: 1 }]))).toEqual({
      human_rt_n: 0,
      human_rt_mean_s: 0,
      human_rt_p50_s: 0,
      human_rt_p90_s: 0,
      human_rt_p95_s: 0,
    });
  });

  it("treats duration_s and latency_ms as the same signal", () => {
    const fromDuration = computeHumanRtMetrics(records([{ agent: "human", duration_s: 2 }]));
    const fromLatency = computeHumanRtMetrics(records([{ agent: "human", latency_ms: 2000 }]));
    expect(fromLatency).toEqual(fromDuration);
  });
});

describe("computeLatencyMetrics", () => {
  it("collects AI rows by actor or action", () => {
    const metrics = computeLatencyMetrics(
      records([
        { agent: "ai", latency_ms: 100 },
        { agent: "model", duration_s: 0.3 },
        { action: "classify", latency: 0.2 },
        { action: "forecast", latency: 800 },
        { agent: "human", latency_ms: 999 },
      ]),
    );
    expect(metrics.ai_latency_n).toBe(4);
    expect(metrics.ai_latency_mean_ms).toBeCloseTo(350);
    expect(metrics.ai_latency_p50_ms).toBeCloseTo(250);
    expect(metrics.ai_latency_p90_ms).toBeCloseTo(650);
    expect(metrics.ai_latency_p95_ms).toBeCloseTo(725);
  });

  it("skips AI rows without any timing", () => {
    expect(computeLatencyMetrics(records([{ agent: "ai" }])).ai_latency_n).toBe(0);
  });
});

describe("grouped percentiles", () => {
  const root: SessionLogsRoot = {
    logs: [
      {
        pilot_tag: "b",
        decisions: [
          { actor: "human", duration_s: 4 },
          { actor: "ai", latency_ms: 50 },
        ],
      },
      {
        pilot_tag: "a",
        decisions: [
          { actor: "human", duration_s: 1 },
          { actor: "human", duration_s: 3 },
        ],
      },
      { decisions: [{ actor: "human", duration_s: 2 }] },
      "not a session",
    ],
    extras: { rt_limits: { rt_max_human_s: 10 } },
  };

  it("groups human response times by pilot tag", () => {
    const payload = groupHumanResponsePercentiles(root);
    expect(payload.labels).toEqual(["a", "b", "unknown"]);
    expect(payload.series).toEqual(["p50", "p90", "p95"]);
    expect(payload.data[0]).toEqual([2, 4, 2]);
    expect(payload.data[1][0]).toBeCloseTo(2.8);
    expect(payload.counts).toEqual({ a: 2, b: 1, unknown: 1 });
    expect(payload.sla).toBe(10);
    expect(payload.group_key).toBe("pilot_tag");
  });

  it("groups AI latency with the default SLA", () => {
    const payload = groupAiLatencyPercentiles(root);
    expect(payload.labels).toEqual(["unknown"]);
    expect(payload.data).toEqual([[50], [50], [50]]);
    expect(payload.sla).toBe(5000);
    expect(payload.group_key).toBe("ai_model_version");
  });
});
