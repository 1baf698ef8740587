import { randomUUID } from "node:crypto";

import { ANALYSIS_SYSTEM_PROMPT, buildRetryPrompt } from "../batch/prompt.ts";
import { errorMessage, MalformedResponseError, PipelineError, TransientServiceError, ValidationError } from "../errors.ts";
import { safeParseJson } from "../json/repair.ts";
import { parseAnalysisPayload } from "../json/schema.ts";
import type { LLMClient } from "../llm/client.ts";
import { isRetryableAnalysisError, RetryPolicy } from "../llm/retry.ts";
import { getLogger } from "../log/logger.ts";
import type { AnalysisResult, DispatchFailure } from "../store/schemas.ts";
import { toAnalysisResult } from "./types.ts";
import type { AnalysisRequest, DispatchOutcome, DispatchProgress } from "./types.ts";

const log = getLogger({ module: "dispatcher" });

export type DispatcherOptions = {
  llmClient: LLMClient;
  model: string;
  concurrency?: number;
  timeoutMs?: number;
  /** Overrides the policy built from maxRetries/backoffBaseMs. */
  retryPolicy?: RetryPolicy;
  maxRetries?: number;
  backoffBaseMs?: number;
  systemPrompt?: string;
  maxTokens?: number;
  onProgress?: (progress: DispatchProgress) => void;
};

export function newRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `run-${stamp}-${randomUUID().slice(0, 8)}`;
}

/**
 * Runs `fn` with an abort signal and rejects with a TransientServiceError once
 * `timeoutMs` elapses. The underlying call is aborted and abandoned.
 */
export async function withTimeout<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number, label: string): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientServiceError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function failureKind(err: unknown): DispatchFailure["kind"] {
  return err instanceof PipelineError ? err.code : "unknown";
}

/**
 * Fans batches out to the analysis service through a bounded worker pool.
 * Every submitted batch id ends up in exactly one of `results` or `errors`;
 * one batch failing never stops its siblings.
 */
export class AnalysisDispatcher {
  private llmClient: LLMClient;
  private model: string;
  private concurrency: number;
  private timeoutMs: number;
  private retryPolicy: RetryPolicy;
  private systemPrompt: string;
  private maxTokens?: number;
  private onProgress?: (progress: DispatchProgress) => void;

  constructor(options: DispatcherOptions) {
    this.llmClient = options.llmClient;
    this.model = options.model;
    this.concurrency = Math.max(1, options.concurrency ?? 5);
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.retryPolicy =
      options.retryPolicy ??
      new RetryPolicy({
        maxAttempts: (options.maxRetries ?? 2) + 1,
        baseDelayMs: options.backoffBaseMs ?? 1000,
        isRetryable: isRetryableAnalysisError,
      });
    this.systemPrompt = options.systemPrompt ?? ANALYSIS_SYSTEM_PROMPT;
    this.maxTokens = options.maxTokens;
    this.onProgress = options.onProgress;
  }

  async dispatch(requests: AnalysisRequest[], runId: string = newRunId()): Promise<DispatchOutcome> {
    const seen = new Set<string>();
    for (const request of requests) {
      if (seen.has(request.batchId)) {
        throw new ValidationError(`Duplicate batch id ${request.batchId} in dispatch`);
      }
      seen.add(request.batchId);
    }

    const runLog = log.child({ runId });
    runLog.info({ batches: requests.length, concurrency: this.concurrency, model: this.model }, "dispatch started");

    const results: Record<string, AnalysisResult> = {};
    const errors: Record<string, DispatchFailure> = {};
    let cursor = 0;
    let completed = 0;

    const workers = new Array(Math.min(this.concurrency, requests.length)).fill(null).map(async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        const request = requests[index];
        if (!request) {
          break;
        }

        let attempts = 0;
        try {
          results[request.batchId] = await this.retryPolicy.execute(
            async ({ attempt, lastError }) => {
              attempts = attempt;
              return this.analyzeOnce(request, attempt, lastError);
            },
            (err, attempt, delayMs) => {
              runLog.warn(
                { batchId: request.batchId, attempt, delayMs, error: errorMessage(err) },
                "analysis attempt failed, retrying",
              );
            },
          );
        } catch (err) {
          runLog.warn({ batchId: request.batchId, attempts, error: errorMessage(err) }, "analysis failed");
          errors[request.batchId] = {
            clusterId: request.clusterId,
            batchId: request.batchId,
            kind: failureKind(err),
            error: errorMessage(err),
            attempts,
          };
        }

        completed += 1;
        this.onProgress?.({
          batchId: request.batchId,
          ok: request.batchId in results,
          completed,
          total: requests.length,
        });
      }
    });

    await Promise.all(workers);
    runLog.info(
      { succeeded: Object.keys(results).length, failed: Object.keys(errors).length },
      "dispatch finished",
    );
    return { runId, results, errors };
  }

  private async analyzeOnce(request: AnalysisRequest, attempt: number, lastError: unknown): Promise<AnalysisResult> {
    const prompt =
      lastError instanceof MalformedResponseError ? buildRetryPrompt(request.prompt, lastError.message) : request.prompt;

    const completion = await withTimeout(
      (signal) =>
        this.llmClient.complete(this.model, this.systemPrompt, prompt, {
          temperature: 0,
          maxTokens: this.maxTokens,
          signal,
        }),
      this.timeoutMs,
      `Analysis of batch ${request.batchId}`,
    );

    const parsed = safeParseJson(completion.content);
    if (!parsed.success) {
      throw new MalformedResponseError(parsed.error, completion.content);
    }
    if (parsed.repairApplied) {
      log.info({ batchId: request.batchId }, "repaired malformed JSON response");
    }

    const checked = parseAnalysisPayload(parsed.data);
    if (!checked.ok) {
      throw new MalformedResponseError(`Schema validation failed: ${checked.reason}`, completion.content);
    }

    if (
      checked.payload.cluster_id != null &&
      request.clusterId !== null &&
      checked.payload.cluster_id !== request.clusterId
    ) {
      log.warn(
        { batchId: request.batchId, expected: request.clusterId, got: checked.payload.cluster_id },
        "response named a different cluster; keeping the requested one",
      );
    }

    return toAnalysisResult(
      checked.payload,
      { batchId: request.batchId, clusterId: request.clusterId },
      { repairApplied: parsed.repairApplied, attempts: attempt },
    );
  }
}
