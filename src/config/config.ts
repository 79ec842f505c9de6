import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../errors.js";
import type { MetricsConfig } from "./types.metrics.js";
import { MetricsConfigSchema } from "./zod-schema.metrics.js";

export const CONFIG_PATH_ENV = "HAIC_METRICS_CONFIG";

export function resolveConfigPath(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  const explicit = filePath?.trim() || env[CONFIG_PATH_ENV]?.trim();
  if (!explicit) {
    return null;
  }
  return path.resolve(explicit);
}

export function parseConfig(value: unknown, source = "config"): MetricsConfig {
  const parsed = MetricsConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`${source} is invalid: ${issues}`);
  }
  return parsed.data;
}

/**
 * Reads the JSON config named by `filePath` or `HAIC_METRICS_CONFIG`.
 * No configured path, or a path that does not exist, yields `{}`.
 */
export function loadConfig(params: { filePath?: string; env?: NodeJS.ProcessEnv } = {}): MetricsConfig {
  const configPath = resolveConfigPath(params.filePath, params.env);
  if (!configPath || !fs.existsSync(configPath)) {
    return {};
  }
  const raw = fs.readFileSync(configPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON`, { cause: err });
  }
  return parseConfig(parsed, configPath);
}
