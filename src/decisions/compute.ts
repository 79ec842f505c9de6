import { ComputeOptionsSchema } from "../config/zod-schema.metrics.js";
import type { OutcomeVocabularyConfig } from "../config/types.metrics.js";
import { ConfigError, UnknownProfileError } from "../errors.js";
import { computeInteractionMetrics } from "./evaluation/interaction.js";
import { buildOutcomeVocabulary, computeOutcomeMetrics } from "./evaluation/outcome.js";
import { computeOutcomeCatalogue } from "./evaluation/outcome-catalogue.js";
import { computeHumanRtMetrics, computeLatencyMetrics } from "./evaluation/response-time.js";
import { normalizeDecisions } from "./normalize.js";
import { extractDecisions, isDecisionsArtifact } from "./store.js";
import type { ComputeResult, MetricVector, MetricsProfile, WindowSpec } from "./types.js";
import { validateDecisionsMinimal } from "./validators.js";
import { parseWindowSpec } from "./window/resolve.js";
import { filterDecisionsEventsByEpoch } from "./window/filter.js";

export const METRICS_PROFILES: readonly MetricsProfile[] = ["core", "full"];

export type ComputeOptions = {
  profile?: string;
  rtMaxS?: number;
  baselineS?: number | null;
  includeWarnings?: boolean;
  window?: WindowSpec | null;
  outcomeVocabulary?: OutcomeVocabularyConfig;
};

function isMetricsProfile(value: string): value is MetricsProfile {
  return METRICS_PROFILES.some((profile) => profile === value);
}

function parseOptions(options: ComputeOptions) {
  const parsed = ComputeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid compute options: ${issues}`);
  }
  const profile = parsed.data.profile ?? "core";
  if (!isMetricsProfile(profile)) {
    throw new UnknownProfileError(profile);
  }
  const window =
    parsed.data.window === undefined || parsed.data.window === null
      ? null
      : parseWindowSpec(parsed.data.window);
  return { ...parsed.data, profile, window };
}

/**
 * Computes the metric vector for a decision list or a decisions artifact.
 *
 * Validation warnings, normalization notes and window notes are merged into
 * `warnings` in that order. Nothing is logged and the input is not mutated.
 */
export function computeMetrics(input: unknown, options: ComputeOptions = {}): ComputeResult {
  const rawDecisions = extractDecisions(input);
  const artifact = isDecisionsArtifact(input) ? input : null;
  const opts = parseOptions(options);

  const validation = validateDecisionsMinimal(rawDecisions);
  // Note indexes refer to positions in the caller's list.
  const decisions = normalizeDecisions(rawDecisions);
  const rawEvents = artifact && Array.isArray(artifact.events) ? artifact.events : [];
  const events = normalizeDecisions(rawEvents, { label: "event" });

  const windowed = filterDecisionsEventsByEpoch({
    artifact,
    decisions: decisions.records,
    events: events.records,
    window: opts.window,
  });

  let metrics: MetricVector = {
    ...computeInteractionMetrics(windowed.decisions, {
      rtMaxS: opts.rtMaxS,
      baselineS: opts.baselineS,
    }),
    ...computeHumanRtMetrics(windowed.decisions),
    ...computeLatencyMetrics(windowed.decisions),
  };
  if (opts.profile === "full") {
    const vocabulary = buildOutcomeVocabulary(opts.outcomeVocabulary);
    metrics = {
      ...metrics,
      ...computeOutcomeMetrics(windowed.decisions, vocabulary),
      ...computeOutcomeCatalogue(windowed.decisions),
    };
  }

  const result: ComputeResult = {
    ok: true,
    metrics,
    window_summary: windowed.summary,
  };
  if (opts.includeWarnings ?? true) {
    result.warnings = [
      ...validation.warnings,
      ...decisions.notes.filter((note) => !validation.warnings.includes(note)),
      ...events.notes,
      ...windowed.summary.notes,
    ];
  }
  return result;
}
