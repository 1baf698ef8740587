#!/usr/bin/env -S node --import tsx

import { readFileSync, realpathSync, writeFileSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { loadConfig } from "../config.ts";
import type { ClusteringAlgorithm, ConfigOverrides } from "../config.ts";
import { errorMessage, PipelineError, ValidationError } from "../errors.ts";
import { isLogLevel, setLogLevel } from "../log/logger.ts";
import { Pipeline } from "../pipeline/core.ts";
import type { PipelineDeps } from "../pipeline/core.ts";

export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  VALIDATION: 2,
  PARTIAL: 3,
} as const;

export type TextSink = {
  write(text: string): unknown;
};

export type CliDeps = PipelineDeps & {
  env?: NodeJS.ProcessEnv;
  stdout?: TextSink;
  stderr?: TextSink;
};

function parseArg(argv: string[], name: string): string | null {
  const idx = argv.indexOf(name);
  if (idx === -1 || idx + 1 >= argv.length) {
    return null;
  }
  return argv[idx + 1] ?? null;
}

function parseBoolFlag(argv: string[], name: string): boolean {
  return argv.includes(name);
}

function parseNumberArg(argv: string[], name: string): number | undefined {
  const raw = parseArg(argv, name);
  if (raw == null) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} expects a number, got "${raw}"`);
  }
  return value;
}

export function parseClusterIds(raw: string | null): number[] | undefined {
  if (!raw) {
    return undefined;
  }
  const ids = raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const value = Number(part);
      if (!Number.isInteger(value)) {
        throw new ValidationError(`Invalid cluster id "${part}"`);
      }
      return value;
    });
  return ids.length > 0 ? ids : undefined;
}

function parseAlgorithm(raw: string | null): ClusteringAlgorithm | undefined {
  if (raw == null) {
    return undefined;
  }
  if (raw === "auto" || raw === "density" || raw === "kmeans") {
    return raw;
  }
  throw new ValidationError(`Unsupported clustering algorithm: ${raw}`);
}

export function buildOverrides(argv: string[]): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const dataDir = parseArg(argv, "--data-dir");
  const model = parseArg(argv, "--model");
  const embeddingModel = parseArg(argv, "--embedding-model");
  const calibrationPath = parseArg(argv, "--calibration");
  if (dataDir) overrides.dataDir = dataDir;
  if (model) overrides.model = model;
  if (embeddingModel) overrides.embeddingModel = embeddingModel;
  if (calibrationPath) overrides.calibrationPath = calibrationPath;

  const numeric: Array<[string, keyof ConfigOverrides]> = [
    ["--coverage-threshold", "coverageThreshold"],
    ["--merge-threshold", "mergeThreshold"],
    ["--batch-size", "maxBatchSize"],
    ["--concurrency", "concurrency"],
    ["--max-retries", "maxRetries"],
    ["--timeout-ms", "requestTimeoutMs"],
    ["--backoff-ms", "backoffBaseMs"],
  ];
  for (const [flag, key] of numeric) {
    const value = parseNumberArg(argv, flag);
    if (value !== undefined) {
      Object.assign(overrides, { [key]: value });
    }
  }

  const clustering: NonNullable<ConfigOverrides["clustering"]> = {};
  const algorithm = parseAlgorithm(parseArg(argv, "--algorithm"));
  const k = parseNumberArg(argv, "--k");
  const eps = parseNumberArg(argv, "--eps");
  const minClusterSize = parseNumberArg(argv, "--min-cluster-size");
  const minSamples = parseNumberArg(argv, "--min-samples");
  const seed = parseNumberArg(argv, "--seed");
  if (algorithm) clustering.algorithm = algorithm;
  if (k !== undefined) clustering.k = k;
  if (eps !== undefined) clustering.eps = eps;
  if (minClusterSize !== undefined) clustering.minClusterSize = minClusterSize;
  if (minSamples !== undefined) clustering.minSamples = minSamples;
  if (seed !== undefined) clustering.seed = seed;
  if (Object.keys(clustering).length > 0) {
    overrides.clustering = clustering;
  }
  return overrides;
}

function readJsonl(path: string): unknown[] {
  const lines = readFileSync(path, "utf8")
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.map((line, index) => {
    try {
      return JSON.parse(line) as unknown;
    } catch (err) {
      throw new ValidationError(`${path}:${index + 1} is not valid JSON`, [errorMessage(err)]);
    }
  });
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8")) as unknown;
  } catch (err) {
    throw new ValidationError(`${path} is not valid JSON`, [errorMessage(err)]);
  }
}

/** Accepts JSONL, a JSON array, or `{ "records": [...] }`. */
export function readRecordsFile(path: string): unknown[] {
  if (path.endsWith(".jsonl")) {
    return readJsonl(path);
  }
  const data = readJson(path);
  if (Array.isArray(data)) {
    return data;
  }
  if (data && typeof data === "object" && "records" in data && Array.isArray(data.records)) {
    return data.records;
  }
  throw new ValidationError(`${path} must hold a JSON array of records or an object with a "records" array`);
}

function writeJson(out: TextSink, value: unknown): void {
  out.write(`${JSON.stringify(value, null, 2)}\n`);
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof PipelineError && err.code === "validation") {
    return ExitCode.VALIDATION;
  }
  return ExitCode.FAILURE;
}

function usageText(): string {
  return [
    "Usage: voiceprint <command> [options]",
    "",
    "Commands:",
    "  import               Import records (--input records.jsonl|records.json)",
    "  run-clustering       Embed missing records and cluster the corpus",
    "  show-cluster-status  Show clusters, coverage and health diagnostics",
    "  prepare-batch        Render the analysis prompt for a cluster (--cluster N [--output file])",
    "  estimate-analysis    Estimate tokens for analyzing clusters ([--clusters 0,1])",
    "  run-analysis         Analyze clusters in parallel and write a draft ([--clusters 0,1])",
    "  review-draft         Summarize the pending draft",
    "  approve-draft        Commit the pending draft ([--force] [--dry-run])",
    "  reject-draft         Discard the pending draft",
    "  ingest               Ingest a batch file (--input batch.json [--force] [--dry-run])",
    "  status               Show registry status",
    "",
    "Common options:",
    "  --data-dir <dir>            Data directory (env VOICEPRINT_DATA, default ~/.voiceprint)",
    "  --model <name>              Analysis model (env VOICEPRINT_MODEL)",
    "  --embedding-model <name>    Embedding model (env VOICEPRINT_EMBEDDING_MODEL)",
    "  --coverage-threshold <x>    Minimum per-cluster coverage before commit (default 0.8)",
    "  --merge-threshold <x>       Persona similarity merge threshold (default 0.85)",
    "  --concurrency <n>           Parallel analysis requests (default 5)",
    "  --log-level <level>         debug|info|warn|error|silent",
    "",
    "Clustering options:",
    "  --algorithm auto|density|kmeans  --k <n>  --eps <x>  --min-cluster-size <n>  --min-samples <n>  --seed <n>",
    "",
    "Exit codes: 0 success, 1 failure, 2 validation refusal, 3 partial failure",
  ].join("\n");
}

async function run(argv: string[], deps: CliDeps, stdout: TextSink, stderr: TextSink): Promise<number> {
  const command = argv[0];
  const config = loadConfig(buildOverrides(argv), deps.env ?? process.env);
  const pipeline = new Pipeline(config, deps);

  if (command === "import") {
    const input = parseArg(argv, "--input");
    if (!input) {
      throw new ValidationError("--input is required");
    }
    writeJson(stdout, pipeline.importRecords(readRecordsFile(input)));
    return ExitCode.OK;
  }

  if (command === "run-clustering") {
    const snapshot = await pipeline.runClustering();
    writeJson(stdout, {
      algorithm: snapshot.algorithm,
      parameters: snapshot.parameters,
      totalRecords: snapshot.totalRecords,
      clusterCount: snapshot.clusterCount,
      noiseCount: snapshot.noiseCount,
      noiseRatio: snapshot.noiseRatio,
      silhouette: snapshot.silhouette,
      clusters: snapshot.clusters.map((cluster) => ({ id: cluster.id, size: cluster.size, isNoise: cluster.isNoise })),
      healthIssues: snapshot.healthIssues,
    });
    return ExitCode.OK;
  }

  if (command === "show-cluster-status") {
    writeJson(stdout, pipeline.clusterStatus());
    return ExitCode.OK;
  }

  if (command === "prepare-batch") {
    const clusterId = parseNumberArg(argv, "--cluster");
    if (clusterId === undefined) {
      throw new ValidationError("--cluster is required");
    }
    const plan = pipeline.prepareBatch(clusterId);
    if (plan.batches.length === 0) {
      stdout.write(`Cluster ${clusterId} is fully analyzed (${plan.cluster.size} records)\n`);
      return ExitCode.OK;
    }
    const rendered = plan.batches
      .map((batch) => `<!-- batch ${batch.batchId}: ${batch.recordIds.length} records -->\n${batch.prompt}`)
      .join("\n\n");
    const output = parseArg(argv, "--output");
    if (output) {
      writeFileSync(output, `${rendered}\n`, "utf8");
      writeJson(stdout, { clusterId, batches: plan.batches.map((batch) => batch.batchId), output });
    } else {
      stdout.write(`${rendered}\n`);
    }
    return ExitCode.OK;
  }

  if (command === "estimate-analysis") {
    writeJson(stdout, pipeline.estimateAnalysis(parseClusterIds(parseArg(argv, "--clusters"))));
    return ExitCode.OK;
  }

  if (command === "run-analysis") {
    const report = await pipeline.runAnalysis(parseClusterIds(parseArg(argv, "--clusters")));
    writeJson(stdout, report);
    if (report.status === "failed") {
      return ExitCode.FAILURE;
    }
    return report.status === "partial" ? ExitCode.PARTIAL : ExitCode.OK;
  }

  if (command === "review-draft") {
    stdout.write(`${pipeline.reviewDraft()}\n`);
    return ExitCode.OK;
  }

  if (command === "approve-draft") {
    const report = pipeline.approveDraft({
      force: parseBoolFlag(argv, "--force"),
      dryRun: parseBoolFlag(argv, "--dry-run"),
    });
    writeJson(stdout, report);
    return ExitCode.OK;
  }

  if (command === "reject-draft") {
    const draft = pipeline.rejectDraft();
    writeJson(stdout, { rejected: draft.runId });
    return ExitCode.OK;
  }

  if (command === "ingest") {
    const input = parseArg(argv, "--input") ?? argv.find((arg, index) => index > 0 && arg.endsWith(".json"));
    if (!input) {
      throw new ValidationError("--input is required");
    }
    const report = pipeline.ingestBatch(readJson(input), {
      force: parseBoolFlag(argv, "--force"),
      dryRun: parseBoolFlag(argv, "--dry-run"),
    });
    writeJson(stdout, report);
    return ExitCode.OK;
  }

  if (command === "status") {
    writeJson(stdout, pipeline.status());
    return ExitCode.OK;
  }

  stderr.write(`Unknown command: ${command ?? ""}\n${usageText()}\n`);
  return ExitCode.FAILURE;
}

export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    stdout.write(`${usageText()}\n`);
    return ExitCode.OK;
  }

  if (argv.includes("--version") || argv.includes("-v")) {
    stdout.write("0.1.0\n");
    return ExitCode.OK;
  }

  const logLevel = parseArg(argv, "--log-level");
  if (logLevel != null) {
    if (!isLogLevel(logLevel)) {
      stderr.write(`error: unsupported log level ${logLevel}\n`);
      return ExitCode.VALIDATION;
    }
    setLogLevel(logLevel);
  }

  try {
    return await run(argv, deps, stdout, stderr);
  } catch (err) {
    if (err instanceof PipelineError) {
      stderr.write(`error: ${err.message}\n`);
      return exitCodeFor(err);
    }
    throw err;
  }
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err) => {
      console.error(err);
      process.exitCode = ExitCode.FAILURE;
    },
  );
}
