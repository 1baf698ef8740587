import { z } from "zod";

import { AnalysisDispatcher, newRunId } from "../analysis/dispatcher.ts";
import { toAnalysisResult } from "../analysis/types.ts";
import type { AnalysisRequest, DispatchProgress } from "../analysis/types.ts";
import { estimateTokens, findCluster, prepareClusterBatches } from "../batch/preparer.ts";
import type { ClusterBatchPlan } from "../batch/preparer.ts";
import { DEFAULT_CALIBRATION_PATH, loadCalibration } from "../batch/prompt.ts";
import { clusterAssignments, ClusterEngine } from "../clustering/engine.ts";
import { suggestedClusterRange } from "../clustering/health.ts";
import type { PipelineConfig } from "../config.ts";
import { clusterCoverage, incompleteClusters, nextClusterToAnalyze } from "../coverage/tracker.ts";
import type { ClusterCoverage } from "../coverage/tracker.ts";
import { DraftLifecycle } from "../drafts/lifecycle.ts";
import type { ApproveOptions, DraftState } from "../drafts/lifecycle.ts";
import { renderDraftReview } from "../drafts/review.ts";
import { OpenAIEmbedder, normalizeVectors } from "../embeddings/embedder.ts";
import type { Embedder } from "../embeddings/embedder.ts";
import { ConflictError, NotFoundError, ValidationError } from "../errors.ts";
import { formatZodIssue, JsonObjectSchema, parseAnalysisPayload } from "../json/schema.ts";
import { LiteLLMClient } from "../llm/client.ts";
import type { LLMClient } from "../llm/client.ts";
import { RetryPolicy } from "../llm/retry.ts";
import { getLogger } from "../log/logger.ts";
import { consolidatePersonas } from "../personas/consolidator.ts";
import { checkPersonaHealth } from "../registry/health.ts";
import type { PersonaHealthReport } from "../registry/health.ts";
import { RegistryIngestor } from "../registry/ingestor.ts";
import type { IngestOptions, IngestReport } from "../registry/ingestor.ts";
import type { ClusterSnapshot, DispatchFailure, Draft } from "../store/schemas.ts";
import { Workspace } from "../store/workspace.ts";

const log = getLogger({ module: "pipeline" });

export const ImportRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
  text: z.string().min(1),
  metadata: JsonObjectSchema.optional(),
});

export type ImportRecord = z.input<typeof ImportRecordSchema>;

export type PipelineDeps = {
  llmClient?: LLMClient;
  embedder?: Embedder;
  now?: () => Date;
  onProgress?: (progress: DispatchProgress) => void;
};

export type ImportReport = {
  added: number;
  updated: number;
  unchanged: number;
  total: number;
};

export type ClusterStatus = {
  createdAt: string;
  algorithm: ClusterSnapshot["algorithm"];
  totalRecords: number;
  clusterCount: number;
  noiseCount: number;
  noiseRatio: number;
  silhouette: number | null;
  healthIssues: ClusterSnapshot["healthIssues"];
  suggestedRange: { min: number; max: number };
  clusters: Array<ClusterCoverage & { isNoise: boolean; exemplarIds: string[] }>;
  incomplete: number[];
  nextCluster: number | null;
};

export type BatchEstimate = {
  batchId: string;
  clusterId: number;
  records: number;
  inputTokens: number;
  outputTokens: number;
};

export type AnalysisEstimate = {
  model: string;
  batches: BatchEstimate[];
  totalInputTokens: number;
  totalOutputTokens: number;
};

export type AnalysisRunStatus = "complete" | "partial" | "failed" | "nothing_to_do";

export type AnalysisRunReport = {
  runId: string;
  status: AnalysisRunStatus;
  batches: number;
  succeeded: string[];
  failed: DispatchFailure[];
  personas: number;
  merges: number;
  draftWritten: boolean;
};

export type RegistryStatus = {
  records: number;
  clusters: number | null;
  draft: DraftState;
  personas: Array<{ name: string; sampleCount: number; confidence: number; sourceClusters: number[] }>;
  samples: number;
  unassigned: number;
  merges: number;
  health: PersonaHealthReport;
  updatedAt: string | null;
};

/**
 * One run context over a data directory: every stage reads its inputs from
 * the workspace and writes its outputs back.
 */
export class Pipeline {
  readonly config: PipelineConfig;
  readonly workspace: Workspace;
  readonly drafts: DraftLifecycle;
  private ingestor: RegistryIngestor;
  private engine: ClusterEngine;
  private llmClient: LLMClient;
  private embedder: Embedder;
  private now: () => Date;
  private onProgress?: (progress: DispatchProgress) => void;

  constructor(config: PipelineConfig, deps: PipelineDeps = {}) {
    this.config = config;
    this.workspace = new Workspace(config.dataDir);
    this.ingestor = new RegistryIngestor(this.workspace, { coverageThreshold: config.coverageThreshold });
    this.drafts = new DraftLifecycle(this.workspace, this.ingestor);
    this.engine = new ClusterEngine(config.clustering);
    // Retries for analysis calls belong to the dispatcher.
    this.llmClient =
      deps.llmClient ?? new LiteLLMClient({ timeoutMs: config.requestTimeoutMs, retryPolicy: RetryPolicy.none() });
    this.embedder =
      deps.embedder ??
      new OpenAIEmbedder({
        model: config.embeddingModel,
        timeoutMs: config.requestTimeoutMs,
        retryPolicy: new RetryPolicy({ maxAttempts: config.maxRetries + 1, baseDelayMs: config.backoffBaseMs }),
      });
    this.now = deps.now ?? (() => new Date());
    this.onProgress = deps.onProgress;
  }

  importRecords(input: unknown[]): ImportReport {
    const parsed: Array<z.output<typeof ImportRecordSchema>> = [];
    const issues: string[] = [];
    input.forEach((row, index) => {
      const result = ImportRecordSchema.safeParse(row);
      if (result.success) {
        parsed.push(result.data);
      } else {
        const first = result.error.issues[0];
        issues.push(`record ${index}: ${first ? formatZodIssue(first) : "invalid"}`);
      }
    });
    const seen = new Set<string>();
    for (const record of parsed) {
      if (seen.has(record.id)) {
        issues.push(`record id ${record.id} appears more than once`);
      }
      seen.add(record.id);
    }
    if (issues.length > 0) {
      throw new ValidationError("Import rejected", issues);
    }

    const document = this.workspace.loadRecords();
    const byId = new Map(document.records.map((record) => [record.id, record]));
    const report: ImportReport = { added: 0, updated: 0, unchanged: 0, total: 0 };

    for (const incoming of parsed) {
      const existing = byId.get(incoming.id);
      if (!existing) {
        const record = { id: incoming.id, text: incoming.text, ...(incoming.metadata ? { metadata: incoming.metadata } : {}) };
        document.records.push(record);
        byId.set(record.id, record);
        report.added += 1;
        continue;
      }
      if (existing.text === incoming.text) {
        report.unchanged += 1;
        continue;
      }
      existing.text = incoming.text;
      delete existing.embedding;
      if (incoming.metadata) {
        existing.metadata = incoming.metadata;
      }
      report.updated += 1;
    }

    report.total = document.records.length;
    this.workspace.saveRecords(document);
    log.info(report, "records imported");
    return report;
  }

  async runClustering(): Promise<ClusterSnapshot> {
    const document = this.workspace.loadRecords();
    if (document.records.length === 0) {
      throw new NotFoundError("No records imported. Run the import command first.");
    }
    if (this.drafts.state() === "DRAFT_PENDING") {
      throw new ConflictError(
        "A draft is pending against the current clusters. Approve or reject it before re-clustering.",
      );
    }

    const modelChanged = document.embeddingModel !== null && document.embeddingModel !== this.embedder.model;
    const missing = document.records.filter((record) => modelChanged || !record.embedding);
    if (missing.length > 0) {
      log.info({ records: missing.length, model: this.embedder.model }, "embedding records");
      const embedded = await this.embedder.embed(missing.map((record) => record.text));
      if (embedded.vectors.length !== missing.length) {
        throw new ValidationError(`Embedder returned ${embedded.vectors.length} vectors for ${missing.length} texts`);
      }
      missing.forEach((record, index) => {
        record.embedding = embedded.vectors[index];
      });
      document.embeddingModel = this.embedder.model;
    }

    const vectors = normalizeVectors(document.records.map((record) => record.embedding ?? []));
    const snapshot = this.engine.run(
      { ids: document.records.map((record) => record.id), vectors, embeddingModel: document.embeddingModel },
      this.now(),
    );

    const assignments = clusterAssignments(snapshot);
    for (const record of document.records) {
      record.clusterId = assignments.get(record.id) ?? null;
    }

    this.workspace.saveSnapshot(snapshot);
    this.workspace.saveRecords(document);
    return snapshot;
  }

  requireSnapshot(): ClusterSnapshot {
    const snapshot = this.workspace.loadSnapshot();
    if (!snapshot) {
      throw new NotFoundError("No cluster snapshot. Run run-clustering first.");
    }
    return snapshot;
  }

  clusterStatus(): ClusterStatus {
    const snapshot = this.requireSnapshot();
    const analyzed = this.workspace.analyzedIds();
    const threshold = this.config.coverageThreshold;
    return {
      createdAt: snapshot.createdAt,
      algorithm: snapshot.algorithm,
      totalRecords: snapshot.totalRecords,
      clusterCount: snapshot.clusterCount,
      noiseCount: snapshot.noiseCount,
      noiseRatio: snapshot.noiseRatio,
      silhouette: snapshot.silhouette,
      healthIssues: snapshot.healthIssues,
      suggestedRange: suggestedClusterRange(snapshot.totalRecords),
      clusters: snapshot.clusters.map((cluster) => ({
        ...clusterCoverage(cluster, analyzed, threshold),
        isNoise: cluster.isNoise,
        exemplarIds: cluster.exemplarIds,
      })),
      incomplete: incompleteClusters(snapshot.clusters, analyzed, threshold).map((coverage) => coverage.clusterId),
      nextCluster: nextClusterToAnalyze(snapshot.clusters, analyzed),
    };
  }

  private calibration(): string {
    return loadCalibration(this.config.calibrationPath ?? DEFAULT_CALIBRATION_PATH);
  }

  private texts(): Map<string, string> {
    return new Map(this.workspace.loadRecords().records.map((record) => [record.id, record.text]));
  }

  private plan(clusterIds: number[] | undefined, snapshot: ClusterSnapshot): ClusterBatchPlan[] {
    const analyzedIds = this.workspace.analyzedIds();
    const texts = this.texts();
    const calibration = this.calibration();
    const targets =
      clusterIds && clusterIds.length > 0
        ? clusterIds.map((id) => findCluster(snapshot, id).id)
        : snapshot.clusters.filter((cluster) => !cluster.isNoise).map((cluster) => cluster.id);

    return targets.map((clusterId) =>
      prepareClusterBatches({
        snapshot,
        clusterId,
        texts,
        analyzedIds,
        maxBatchSize: this.config.maxBatchSize,
        coverageThreshold: this.config.coverageThreshold,
        calibration,
      }),
    );
  }

  prepareBatch(clusterId: number): ClusterBatchPlan {
    const [plan] = this.plan([clusterId], this.requireSnapshot());
    if (!plan) {
      throw new NotFoundError(`Cluster ${clusterId} not found in the current cluster snapshot`);
    }
    return plan;
  }

  estimateAnalysis(clusterIds?: number[]): AnalysisEstimate {
    const batches = this.plan(clusterIds, this.requireSnapshot()).flatMap((plan) =>
      plan.batches.map((batch) => {
        const tokens = estimateTokens(batch.prompt, batch.records.length);
        return {
          batchId: batch.batchId,
          clusterId: batch.clusterId,
          records: batch.records.length,
          inputTokens: tokens.inputTokens,
          outputTokens: tokens.outputTokens,
        };
      }),
    );
    return {
      model: this.config.model,
      batches,
      totalInputTokens: batches.reduce((sum, batch) => sum + batch.inputTokens, 0),
      totalOutputTokens: batches.reduce((sum, batch) => sum + batch.outputTokens, 0),
    };
  }

  /**
   * Dispatches every pending batch of the selected clusters (all real clusters
   * by default), consolidates the personas and writes the draft. The draft
   * slot is checked before any request goes out.
   */
  async runAnalysis(clusterIds?: number[]): Promise<AnalysisRunReport> {
    this.drafts.assertNone();
    const snapshot = this.requireSnapshot();
    const requests: AnalysisRequest[] = this.plan(clusterIds, snapshot).flatMap((plan) =>
      plan.batches.map((batch) => ({
        batchId: batch.batchId,
        clusterId: batch.clusterId,
        recordIds: batch.recordIds,
        prompt: batch.prompt,
      })),
    );

    const runId = newRunId(this.now());
    if (requests.length === 0) {
      log.info({ runId }, "nothing left to analyze");
      return {
        runId,
        status: "nothing_to_do",
        batches: 0,
        succeeded: [],
        failed: [],
        personas: 0,
        merges: 0,
        draftWritten: false,
      };
    }

    const dispatcher = new AnalysisDispatcher({
      llmClient: this.llmClient,
      model: this.config.model,
      concurrency: this.config.concurrency,
      timeoutMs: this.config.requestTimeoutMs,
      maxRetries: this.config.maxRetries,
      backoffBaseMs: this.config.backoffBaseMs,
      onProgress: this.onProgress,
    });
    const outcome = await dispatcher.dispatch(requests, runId);
    const succeeded = Object.keys(outcome.results);
    const failed = Object.values(outcome.errors);

    if (succeeded.length === 0) {
      log.error({ runId, failed: failed.length }, "every batch failed; no draft written");
      return {
        runId,
        status: "failed",
        batches: requests.length,
        succeeded,
        failed,
        personas: 0,
        merges: 0,
        draftWritten: false,
      };
    }

    const consolidated = await consolidatePersonas(outcome.results, this.embedder, this.config.mergeThreshold);
    const draft: Draft = {
      runId,
      createdAt: this.now().toISOString(),
      results: consolidated.results,
      errors: outcome.errors,
      personas: consolidated.personas,
      mergeEvents: consolidated.events,
      metadata: {
        model: this.config.model,
        embeddingModel: this.embedder.model,
        mergeThreshold: this.config.mergeThreshold,
        clusterIds: [...new Set(requests.map((request) => request.clusterId).filter((id): id is number => id !== null))],
        batchCount: requests.length,
        successCount: succeeded.length,
        errorCount: failed.length,
      },
    };
    this.drafts.create(draft);

    return {
      runId,
      status: failed.length > 0 ? "partial" : "complete",
      batches: requests.length,
      succeeded,
      failed,
      personas: consolidated.personas.length,
      merges: consolidated.events.length,
      draftWritten: true,
    };
  }

  reviewDraft(): string {
    return renderDraftReview(this.drafts.current());
  }

  approveDraft(options: ApproveOptions = {}): IngestReport {
    return this.drafts.approve({ ...options, now: options.now ?? this.now() });
  }

  rejectDraft(): Draft {
    return this.drafts.reject();
  }

  /** Ingests a hand-supplied batch document in the analysis wire format. */
  ingestBatch(data: unknown, options: IngestOptions = {}): IngestReport {
    const checked = parseAnalysisPayload(data);
    if (!checked.ok) {
      throw new ValidationError("Invalid batch file", [checked.reason]);
    }
    const result = toAnalysisResult(checked.payload, {});
    return this.ingestor.ingest({ results: [result] }, { ...options, now: options.now ?? this.now() });
  }

  status(): RegistryStatus {
    const registry = this.workspace.loadRegistry();
    const snapshot = this.workspace.loadSnapshot();
    return {
      records: this.workspace.loadRecords().records.length,
      clusters: snapshot ? snapshot.clusterCount : null,
      draft: this.drafts.state(),
      personas: [...registry.personas]
        .sort((a, b) => b.sampleCount - a.sampleCount || a.name.localeCompare(b.name))
        .map((persona) => ({
          name: persona.name,
          sampleCount: persona.sampleCount,
          confidence: persona.confidence,
          sourceClusters: persona.sourceClusters,
        })),
      samples: registry.samples.length,
      unassigned: registry.unassignedIds.length,
      merges: registry.mergeHistory.length,
      health: checkPersonaHealth(registry.personas),
      updatedAt: registry.updatedAt,
    };
  }
}
