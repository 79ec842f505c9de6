import { isRecord } from "./utils.js";

const TIME_KEYS = ["timestamp", "ts", "t", "time"] as const;
const TYPE_KEYS = ["event_type", "action", "type"] as const;
const SAMPLE_SIZE = 10;

export type DecisionsValidation = {
  /** Object rows, in input order; anything else is dropped with a warning. */
  decisions: Record<string, unknown>[];
  warnings: string[];
};

/**
 * Advisory checks. Only the first rows are inspected for missing time and
 * type keys; nothing here throws.
 */
export function validateDecisionsMinimal(decisions: readonly unknown[]): DecisionsValidation {
  const warnings: string[] = [];
  if (decisions.length === 0) {
    warnings.push("decisions list is empty");
    return { decisions: [], warnings };
  }
  const kept: Record<string, unknown>[] = [];
  decisions.forEach((entry, index) => {
    if (!isRecord(entry)) {
      warnings.push(`decision[${index}] is not an object; skipped.`);
      return;
    }
    kept.push(entry);
    if (index >= SAMPLE_SIZE) {
      return;
    }
    if (!TIME_KEYS.some((key) => key in entry)) {
      warnings.push(`decision[${index}] has no timestamp key (${TIME_KEYS.join("/")}).`);
    }
    if (!TYPE_KEYS.some((key) => key in entry)) {
      warnings.push(`decision[${index}] has no type key (${TYPE_KEYS.join("/")}).`);
    }
  });
  return { decisions: kept, warnings };
}
