#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "../config/config.js";
import { computeMetrics } from "../decisions/compute.js";
import { loadDecisionsArtifact, loadEventRecords } from "../decisions/store.js";
import { renderMarkdownReport } from "../report/markdown.js";
import { VERSION } from "../version.js";
import { mergeComputeOptions, parseNumberOption, type ComputeCliOptions } from "./options.js";

async function main() {
  const program = new Command();
  program
    .name("haic-metrics")
    .version(VERSION)
    .requiredOption("--file <path>", "Path to a decisions artifact (JSON, JSONL or NDJSON)")
    .option("--events <path>", "NDJSON file of session events, overriding the artifact's events")
    .option("--profile <profile>", "Metric profile: core or full")
    .option("--rt-max <seconds>", "SLA threshold for HCL, in seconds", parseNumberOption)
    .option("--baseline <seconds>", "Expected session duration for EL, in seconds", parseNumberOption)
    .option("--basis <basis>", "Window basis: relative or absolute")
    .option("--start <value>", "Window start (seconds offset, epoch seconds or ISO-8601)")
    .option("--end <value>", "Window end (seconds offset, epoch seconds or ISO-8601)")
    .option("--last <seconds>", "Relative window covering the final N seconds", parseNumberOption)
    .option("--format <format>", "Output format: json or md", "json")
    .option("--config <path>", "JSON config file (defaults to $HAIC_METRICS_CONFIG)")
    .option("--no-warnings", "Omit warnings from the result");

  program.parse(process.argv);
  const opts = program.opts<ComputeCliOptions>();
  if (opts.format !== "json" && opts.format !== "md") {
    throw new Error(`unsupported --format: ${opts.format}`);
  }

  const cfg = loadConfig({ filePath: opts.config });
  const artifact = await loadDecisionsArtifact(opts.file);
  if (opts.events) {
    artifact.events = await loadEventRecords(opts.events);
  }
  const options = mergeComputeOptions(cfg, opts);
  const result = computeMetrics(artifact, options);

  if (opts.format === "md") {
    console.log(
      renderMarkdownReport({
        result,
        artifact,
        artifactPath: opts.file,
        rtMaxS: options.rtMaxS,
      }),
    );
    return;
  }
  console.log(JSON.stringify(result, null, 2));
}

main().catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
