import fs from "node:fs";
import readline from "node:readline";
import { InputShapeError } from "../errors.js";

/** Lenient reader: blank lines, malformed lines and rows the mapper rejects are skipped. */
export async function readNdjsonFile<T>(
  filePath: string,
  mapper: (value: unknown) => T | null,
): Promise<T[]> {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  const stream = fs.createReadStream(filePath, "utf8");
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const entries: T[] = [];
  for await (const line of rl) {
    if (!line.trim()) {
      continue;
    }
    try {
      const parsed = JSON.parse(line) as unknown;
      const mapped = mapper(parsed);
      if (mapped) {
        entries.push(mapped);
      }
    } catch {
      continue;
    }
  }
  return entries;
}

/** Strict reader: the first malformed line fails the whole file. */
export function parseJsonl(raw: string, source = "input"): unknown[] {
  const rows: unknown[] = [];
  raw.split("\n").forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed) {
      return;
    }
    try {
      rows.push(JSON.parse(trimmed) as unknown);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InputShapeError(`Invalid JSON on line ${index + 1} of ${source}: ${reason}`, {
        cause: err,
      });
    }
  });
  return rows;
}
