import { describe, expect, it } from "vitest";
import { computeMetrics } from "../decisions/compute.js";
import type { DecisionsArtifact } from "../decisions/types.js";
import { VERSION } from "../version.js";
import { formatValue, renderMarkdownReport } from "./markdown.js";

const GENERATED_AT = new Date("2024-05-01T12:00:00Z");

const ARTIFACT: DecisionsArtifact = {
  meta: { run_id: "run-1", ai_system: { name: "detector", version: "1.2" } },
  decisions: [
    {
      t: 0,
      agent: "human",
      action: "review",
      duration_s: 2,
      correct: true,
      prediction: "positive",
      ground_truth: "positive",
    },
    { t: 30, agent: "ai", action: "classify", latency_ms: 250 },
  ],
};

function renderLines(profile: "core" | "full" = "core"): string[] {
  const result = computeMetrics(ARTIFACT, { profile });
  return renderMarkdownReport({
    result,
    artifact: ARTIFACT,
    artifactPath: "runs/session.json",
    generatedAt: GENERATED_AT,
  }).split("\n");
}

describe("renderMarkdownReport", () => {
  it("renders run metadata with placeholders for missing fields", () => {
    const lines = renderLines();
    expect(lines[0]).toBe("# HAIC Evaluation Report");
    expect(lines).toContain("- **run_id:** run-1");
    expect(lines).toContain("- **session_id:** n/a");
    expect(lines).toContain("- **application mode:** n/a");
    expect(lines).toContain("- **model:** detector (1.2)");
  });

  it("describes the evaluation window", () => {
    const lines = renderLines();
    expect(lines).toContain(
      "- **basis:** absolute  (relative = seconds since session start; absolute = epoch/ISO)",
    );
    expect(lines).toContain('- **requested:** {"mode":"full"}');
    expect(lines).toContain('- **effective:** {"t_start_epoch":0,"t_end_epoch":30}');
    expect(lines).toContain("- **duration:** 30 s");
    expect(lines).toContain("- **decisions used:** 2 / 2");
    expect(lines).toContain("- **events used:** 0 / 0");
    expect(lines).not.toContain("**window notes**");
  });

  it("tabulates the metric vector and response times", () => {
    const lines = renderLines();
    expect(lines).toContain("| Interaction | F (frequency) | 4 | agent actions per minute |");
    expect(lines).toContain("| Interaction | D (duration) | 1.1250 | mean action duration (s) |");
    expect(lines).toContain("| Human-centeredness | HCL | 0.6000 | normalized (rt_max=5s) |");
    expect(lines).toContain("| Human RT (s) | 1 | 2 | 2 | 2 | 2 |");
    expect(lines).toContain("| AI latency (ms) | 1 | 250 | 250 | 250 | 250 |");
    expect(lines).not.toContain("## Outcomes");
  });

  it("adds the outcome table under the full profile", () => {
    const lines = renderLines("full");
    expect(lines).toContain("## Outcomes");
    expect(lines).toContain("| true positives | 1 |");
    expect(lines).toContain("| precision | 1 |");
    expect(lines).toContain("| prediction accuracy | 0.5000 |");
  });

  it("reports coverage, warnings and reproducibility details", () => {
    const lines = renderLines();
    expect(lines).toContain("- **has timestamps:** true");
    expect(lines).toContain("- **has durations:** true");
    expect(lines).toContain("- **human decisions:** 1");
    expect(lines).toContain("- **ai decisions:** 1");
    expect(lines[lines.indexOf("### Warnings") + 1]).toBe("- None");
    expect(lines).toContain("- **artifact:** runs/session.json");
    expect(lines).toContain(`- **library version:** haic-metrics ${VERSION}`);
    expect(lines).toContain("- **generated at:** 2024-05-01T12:00:00.000Z");
  });

  it("lists window notes and warnings when present", () => {
    const artifact: DecisionsArtifact = { decisions: [{ t: 5 }, { t: 20 }] };
    const result = computeMetrics(artifact, { window: { basis: "relative", last: 10 } });
    const lines = renderMarkdownReport({
      result,
      artifact,
      artifactPath: "inline",
      rtMaxS: 8,
      generatedAt: GENERATED_AT,
    }).split("\n");
    const fallback =
      "- Fallback: meta.timestamps.start_time missing; using min(decision.t) as session start.";
    expect(lines[lines.indexOf("**window notes**") + 1]).toBe(fallback);
    expect(lines).toContain("- decision[0] has no type key (event_type/action/type).");
    expect(lines).toContain("| Human-centeredness | HCL | 0 | normalized (rt_max=8s) |");
  });
});

describe("formatValue", () => {
  it("keeps integers and rounds fractions", () => {
    expect(formatValue(3)).toBe("3");
    expect(formatValue(1 / 3)).toBe("0.3333");
    expect(formatValue(undefined)).toBe("n/a");
    expect(formatValue(Number.NaN)).toBe("n/a");
  });
});
