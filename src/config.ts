import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";

import { ValidationError } from "./errors.ts";

export const DEFAULT_DATA_DIR = join(homedir(), ".voiceprint");
export const DATA_DIR_ENV = "VOICEPRINT_DATA";

const ClusteringConfigSchema = z.object({
  algorithm: z.enum(["auto", "density", "kmeans"]),
  k: z.number().int().min(2).optional(),
  eps: z.number().positive().optional(),
  minClusterSize: z.number().int().min(2),
  minSamples: z.number().int().min(1),
  seed: z.number().int(),
  densityMinRecords: z.number().int().min(1),
});

const PipelineConfigSchema = z.object({
  dataDir: z.string().min(1),
  model: z.string().min(1),
  embeddingModel: z.string().min(1),
  calibrationPath: z.string().min(1).optional(),
  coverageThreshold: z.number().gt(0).max(1),
  mergeThreshold: z.number().gt(0).max(1),
  maxBatchSize: z.number().int().positive(),
  concurrency: z.number().int().positive(),
  maxRetries: z.number().int().min(0),
  requestTimeoutMs: z.number().int().positive(),
  backoffBaseMs: z.number().min(0),
  clustering: ClusteringConfigSchema,
});

export type ClusteringAlgorithm = z.infer<typeof ClusteringConfigSchema>["algorithm"];
export type ClusteringConfig = Readonly<z.infer<typeof ClusteringConfigSchema>>;
export type PipelineConfig = Readonly<Omit<z.infer<typeof PipelineConfigSchema>, "clustering">> & {
  readonly clustering: ClusteringConfig;
};

export type ConfigOverrides = Partial<Omit<z.infer<typeof PipelineConfigSchema>, "clustering">> & {
  clustering?: Partial<z.infer<typeof ClusteringConfigSchema>>;
};

export const DEFAULT_CONFIG: PipelineConfig = Object.freeze({
  dataDir: DEFAULT_DATA_DIR,
  model: "gpt-5-mini",
  embeddingModel: "text-embedding-3-small",
  coverageThreshold: 0.8,
  mergeThreshold: 0.85,
  maxBatchSize: 150,
  concurrency: 5,
  maxRetries: 2,
  requestTimeoutMs: 120_000,
  backoffBaseMs: 1000,
  clustering: Object.freeze({
    algorithm: "auto" as const,
    minClusterSize: 5,
    minSamples: 2,
    seed: 42,
    densityMinRecords: 20,
  }),
});

function expandHome(path: string): string {
  if (path === "~" || path.startsWith("~/")) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const out: ConfigOverrides = {};
  if (env[DATA_DIR_ENV]) {
    out.dataDir = env[DATA_DIR_ENV];
  }
  if (env.VOICEPRINT_MODEL) {
    out.model = env.VOICEPRINT_MODEL;
  }
  if (env.VOICEPRINT_EMBEDDING_MODEL) {
    out.embeddingModel = env.VOICEPRINT_EMBEDDING_MODEL;
  }
  return out;
}

/**
 * Builds the run context configuration: defaults, then environment, then
 * explicit overrides. The returned object is frozen.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const envOverrides = fromEnv(env);
  const candidate = {
    ...DEFAULT_CONFIG,
    ...envOverrides,
    ...overrides,
    clustering: {
      ...DEFAULT_CONFIG.clustering,
      ...overrides.clustering,
    },
  };

  const parsed = PipelineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    dataDir: resolve(expandHome(config.dataDir)),
    calibrationPath: config.calibrationPath ? resolve(expandHome(config.calibrationPath)) : undefined,
    clustering: Object.freeze({ ...config.clustering }),
  });
}
