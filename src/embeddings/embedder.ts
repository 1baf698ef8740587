import { postJson, resolveApiKey, resolveBaseUrl } from "../llm/client.ts";
import { RetryPolicy } from "../llm/retry.ts";
import { getLogger } from "../log/logger.ts";
import { l2Normalize } from "../utils.ts";
import type { Vector } from "../utils.ts";

const log = getLogger({ module: "embeddings" });

export type EmbeddingBatch = {
  vectors: Vector[];
  model: string;
  dimensions: number;
};

/** Ordered texts in, index-aligned vectors out. */
export interface Embedder {
  readonly model: string;
  embed(texts: string[]): Promise<EmbeddingBatch>;
}

export type OpenAIEmbedderOptions = {
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  chunkSize?: number;
  retryPolicy?: RetryPolicy;
};

type EmbeddingsPayload = {
  model?: string;
  data?: Array<{ index?: number; embedding?: number[] }>;
};

function isEmbeddingsPayload(value: unknown): value is EmbeddingsPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private baseUrl: string;
  private apiKey: string | null;
  private timeoutMs: number;
  private chunkSize: number;
  private retryPolicy: RetryPolicy;

  constructor(options: OpenAIEmbedderOptions = {}) {
    this.model = options.model ?? "text-embedding-3-small";
    this.baseUrl = resolveBaseUrl(options.baseUrl);
    this.apiKey = resolveApiKey(options.apiKey);
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.chunkSize = Math.max(1, options.chunkSize ?? 96);
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    if (texts.length === 0) {
      return { vectors: [], model: this.model, dimensions: 0 };
    }
    const apiKey = this.apiKey;
    if (!apiKey) {
      throw new Error("No API key configured. Set LITELLM_API_KEY or OPENAI_API_KEY, or inject a custom embedder.");
    }

    const vectors: Vector[] = [];
    let model = this.model;
    for (let start = 0; start < texts.length; start += this.chunkSize) {
      const chunk = texts.slice(start, start + this.chunkSize);
      const payload = await this.retryPolicy.execute(() =>
        postJson(`${this.baseUrl}/embeddings`, apiKey, { model: this.model, input: chunk }, this.timeoutMs),
      );
      if (!isEmbeddingsPayload(payload) || !Array.isArray(payload.data) || payload.data.length !== chunk.length) {
        throw new Error(`Embedding response for ${chunk.length} inputs did not contain ${chunk.length} vectors`);
      }
      const ordered = [...payload.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
      for (const item of ordered) {
        if (!Array.isArray(item.embedding)) {
          throw new Error("Embedding response item is missing its vector");
        }
        vectors.push(item.embedding.map(Number));
      }
      model = payload.model ?? model;
      log.debug({ done: vectors.length, total: texts.length }, "embedded chunk");
    }

    const dimensions = vectors[0]?.length ?? 0;
    if (vectors.some((vector) => vector.length !== dimensions)) {
      throw new Error("Embedding response mixed vector dimensions");
    }
    return { vectors, model, dimensions };
  }
}

export function normalizeVectors(vectors: Vector[]): Vector[] {
  return vectors.map((vector) => l2Normalize(vector));
}
