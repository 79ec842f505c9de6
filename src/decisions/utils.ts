import type { DecisionRecord } from "./types.js";

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export function isRecord(value: unknown): value is DecisionRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** Finite numbers only; booleans and numeric strings do not count. */
export function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function coerceNumber(value: unknown): number | undefined {
  if (isNumber(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === "") {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/** First present, non-empty value among `aliases`, in order. */
export function pickAlias(record: DecisionRecord, aliases: readonly string[]): unknown {
  for (const key of aliases) {
    if (key in record && !isEmptyValue(record[key])) {
      return record[key];
    }
  }
  return undefined;
}

export function canonString(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return String(value).trim().toLowerCase().replace(/&/g, "and").replace(/\s+/g, " ");
}

export function computeMean(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const total = values.reduce((acc, value) => acc + value, 0);
  return total / values.length;
}

export function sum(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}
