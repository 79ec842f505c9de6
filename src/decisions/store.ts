import fs from "node:fs";
import path from "node:path";
import { InputShapeError } from "../errors.js";
import { parseJsonl, readNdjsonFile } from "./ndjson.js";
import type { DecisionsArtifact, EventRecord } from "./types.js";
import { isRecord } from "./utils.js";

const LINE_DELIMITED_EXTENSIONS = new Set([".jsonl", ".ndjson"]);

export function isDecisionsArtifact(value: unknown): value is DecisionsArtifact {
  return isRecord(value) && Array.isArray(value.decisions);
}

/** A bare decision list, or the `decisions` list of an artifact. */
export function extractDecisions(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (isDecisionsArtifact(value)) {
    return value.decisions;
  }
  throw new InputShapeError(
    "Expected a decisions list or an artifact object with a 'decisions' list.",
  );
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    const reason = isRecord(err) && err.code === "ENOENT" ? "file not found" : String(err);
    throw new InputShapeError(`Cannot read ${filePath}: ${reason}`, { cause: err });
  }
}

export async function loadJson(filePath: string): Promise<unknown> {
  const raw = await readText(filePath);
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new InputShapeError(`${filePath} is not valid JSON`, { cause: err });
  }
}

export async function loadJsonl(filePath: string): Promise<unknown[]> {
  const raw = await readText(filePath);
  return parseJsonl(raw, filePath);
}

/**
 * Loads a decisions artifact. `.jsonl`/`.ndjson` files are read as one
 * decision per line and wrapped as `{ decisions }`.
 */
export async function loadDecisionsArtifact(filePath: string): Promise<DecisionsArtifact> {
  const extension = path.extname(filePath).toLowerCase();
  if (LINE_DELIMITED_EXTENSIONS.has(extension)) {
    return { decisions: await loadJsonl(filePath) };
  }
  const parsed = await loadJson(filePath);
  if (Array.isArray(parsed)) {
    return { decisions: parsed };
  }
  if (!isDecisionsArtifact(parsed)) {
    throw new InputShapeError(`${filePath} is not a decisions artifact (missing 'decisions' list).`);
  }
  return parsed;
}

/** Event rows from an NDJSON side file; unreadable lines are skipped. */
export async function loadEventRecords(filePath: string): Promise<EventRecord[]> {
  return await readNdjsonFile(filePath, (value) => (isRecord(value) ? value : null));
}
