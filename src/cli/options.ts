import { InvalidArgumentError } from "commander";
import type { MetricsConfig } from "../config/types.metrics.js";
import type { ComputeOptions } from "../decisions/compute.js";
import type { WindowBasis, WindowSpec } from "../decisions/types.js";

export type ComputeCliOptions = {
  file: string;
  events?: string;
  profile?: string;
  rtMax?: number;
  baseline?: number;
  basis?: string;
  start?: string;
  end?: string;
  last?: number;
  format: string;
  config?: string;
  warnings: boolean;
};

export function parseNumberOption(value: string): number {
  const parsed = Number(value.trim());
  if (!value.trim() || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`expected a number, got "${value}"`);
  }
  return parsed;
}

function parseBasis(value: string | undefined, hasLast: boolean): WindowBasis {
  if (value === undefined) {
    return hasLast ? "relative" : "absolute";
  }
  if (value === "relative" || value === "absolute") {
    return value;
  }
  throw new InvalidArgumentError(`--basis must be relative or absolute, got "${value}"`);
}

/** Numeric strings become numbers; anything else is kept for the time parser. */
function parseBound(value: string | undefined): number | string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  return trimmed && Number.isFinite(parsed) ? parsed : trimmed;
}

/** A window from `--basis/--start/--end/--last`, or `null` when none were given. */
export function buildWindowFromFlags(opts: ComputeCliOptions): WindowSpec | null {
  if (
    opts.basis === undefined &&
    opts.start === undefined &&
    opts.end === undefined &&
    opts.last === undefined
  ) {
    return null;
  }
  const window: WindowSpec = { basis: parseBasis(opts.basis, opts.last !== undefined) };
  const start = parseBound(opts.start);
  const end = parseBound(opts.end);
  if (start !== undefined) {
    window.start = start;
  }
  if (end !== undefined) {
    window.end = end;
  }
  if (opts.last !== undefined) {
    window.last = opts.last;
  }
  return window;
}

/** Flags win over config file values. */
export function mergeComputeOptions(cfg: MetricsConfig, opts: ComputeCliOptions): ComputeOptions {
  return {
    profile: opts.profile ?? cfg.profile,
    rtMaxS: opts.rtMax ?? cfg.rtMaxS,
    baselineS: opts.baseline ?? cfg.baselineS,
    includeWarnings: opts.warnings === false ? false : cfg.includeWarnings,
    window: buildWindowFromFlags(opts) ?? cfg.window ?? null,
    outcomeVocabulary: cfg.outcomeVocabulary,
  };
}
