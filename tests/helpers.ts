import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { loadConfig } from "../src/config.ts";
import type { ConfigOverrides, PipelineConfig } from "../src/config.ts";
import type { Embedder, EmbeddingBatch } from "../src/embeddings/embedder.ts";
import type { Completion, CompletionOptions, LLMClient } from "../src/llm/client.ts";
import { setLogLevel } from "../src/log/logger.ts";
import { NOISE_CLUSTER_ID } from "../src/store/schemas.ts";
import type { Cluster, ClusterSnapshot } from "../src/store/schemas.ts";

setLogLevel("silent");

export type LLMCall = {
  model: string;
  systemPrompt: string;
  prompt: string;
  options: CompletionOptions;
};

/** A scripted reply: fixed text, a thrown error, or computed from the call. */
export type LLMReply = string | Error | ((call: LLMCall) => string | Promise<string>);

/**
 * Replies are matched by model name or by a substring of the prompt. An array
 * of replies is consumed in order per key; the last one repeats.
 */
export class FakeLLMClient implements LLMClient {
  public calls: LLMCall[] = [];
  private replies: Record<string, LLMReply | LLMReply[]>;
  private fallback: LLMReply;
  private served = new Map<string, number>();

  constructor(replies: Record<string, LLMReply | LLMReply[]> = {}, fallback: LLMReply = "{}") {
    this.replies = replies;
    this.fallback = fallback;
  }

  callsMatching(key: string): LLMCall[] {
    return this.calls.filter((call) => call.model === key || call.prompt.includes(key));
  }

  async complete(model: string, systemPrompt: string, prompt: string, options: CompletionOptions = {}): Promise<Completion> {
    const call = { model, systemPrompt, prompt, options };
    this.calls.push(call);

    let reply = this.fallback;
    for (const [key, scripted] of Object.entries(this.replies)) {
      if (model === key || prompt.includes(key)) {
        if (Array.isArray(scripted)) {
          const index = this.served.get(key) ?? 0;
          this.served.set(key, index + 1);
          reply = scripted[Math.min(index, scripted.length - 1)] ?? this.fallback;
        } else {
          reply = scripted;
        }
        break;
      }
    }

    if (reply instanceof Error) {
      throw reply;
    }
    const content = typeof reply === "function" ? await reply(call) : reply;
    return { content, tokens: 10, costUsd: 0.001 };
  }
}

/**
 * Deterministic embedder. Texts found in `vectors` (exact match, else first
 * key contained in the text) get that vector; others get a hashed one.
 */
export class FakeEmbedder implements Embedder {
  readonly model: string;
  public calls: string[][] = [];
  private vectors: Record<string, number[]>;

  constructor(vectors: Record<string, number[]> = {}, model = "fake-embedding") {
    this.vectors = vectors;
    this.model = model;
  }

  async embed(texts: string[]): Promise<EmbeddingBatch> {
    this.calls.push(texts);
    const vectors = texts.map((text) => this.vectorFor(text));
    return { vectors, model: this.model, dimensions: vectors[0]?.length ?? 0 };
  }

  private vectorFor(text: string): number[] {
    const exact = this.vectors[text];
    if (exact) {
      return exact;
    }
    for (const [key, vector] of Object.entries(this.vectors)) {
      if (text.includes(key)) {
        return vector;
      }
    }
    return hashedVector(text);
  }
}

export function hashedVector(text: string, dimensions = 8): number[] {
  const out = new Array<number>(dimensions).fill(0);
  for (let i = 0; i < text.length; i += 1) {
    const slot = (text.charCodeAt(i) * 31 + i) % dimensions;
    out[slot] = (out[slot] ?? 0) + 1;
  }
  return out;
}

export function tempDir(prefix = "voiceprint-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Config isolated from the environment, with no retry backoff. */
export function testConfig(dataDir: string, overrides: ConfigOverrides = {}): PipelineConfig {
  return loadConfig({ backoffBaseMs: 0, ...overrides, dataDir }, {});
}

export function makeCluster(id: number, memberIds: string[]): Cluster {
  const isNoise = id === NOISE_CLUSTER_ID;
  return {
    id,
    memberIds,
    size: memberIds.length,
    isNoise,
    exemplarIds: isNoise ? [] : memberIds.slice(0, 3),
    meanDistance: isNoise ? null : 0.1,
  };
}

/** Hand-built snapshot over the given clusters. */
export function makeSnapshot(clusters: Cluster[]): ClusterSnapshot {
  const totalRecords = clusters.reduce((sum, cluster) => sum + cluster.size, 0);
  const noiseCount = clusters.filter((cluster) => cluster.isNoise).reduce((sum, cluster) => sum + cluster.size, 0);
  return {
    createdAt: "2026-01-01T00:00:00.000Z",
    algorithm: "kmeans",
    parameters: { k: clusters.length, seed: 42 },
    totalRecords,
    clusterCount: clusters.filter((cluster) => !cluster.isNoise).length,
    noiseCount,
    noiseRatio: totalRecords > 0 ? noiseCount / totalRecords : 0,
    silhouette: null,
    embeddingModel: "fake-embedding",
    clusters,
    healthIssues: [],
  };
}

/** `count` ids of the form `${prefix}1`, `${prefix}2`, ... */
export function ids(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}

export type PersonaSpec = {
  name: string;
  description?: string;
  characteristics?: Record<string, number | string | boolean | string[]>;
};

/** Analysis response in the wire format the dispatcher expects. */
export function analysisReply(
  clusterId: number | null,
  samples: Array<[string, string | null]>,
  personas: PersonaSpec[] = [],
): string {
  return JSON.stringify({
    cluster_id: clusterId,
    calibration_referenced: true,
    new_personas: personas.map((persona) => ({
      name: persona.name,
      description: persona.description ?? "",
      characteristics: persona.characteristics ?? {},
    })),
    samples: samples.map(([id, persona]) => ({ id, persona, confidence: 0.8 })),
  });
}

/** Collects everything written to it, for the CLI's stdout and stderr. */
export class MemorySink {
  text = "";

  write(text: string): boolean {
    this.text += text;
    return true;
  }
}

/**
 * Scripted analyst: assigns every record in the prompt to the persona whose
 * marker appears in the prompt text.
 */
export function markerAnalyst(personaByMarker: Record<string, string>): (call: LLMCall) => string {
  return (call) => {
    const cluster = /# Cluster (-?\d+) Analysis/.exec(call.prompt)?.[1];
    const recordIds = [...call.prompt.matchAll(/^## Record \d+: (\S+)$/gm)].map((match) => match[1] ?? "");
    const persona = Object.entries(personaByMarker).find(([marker]) => call.prompt.includes(marker))?.[1] ?? null;
    return analysisReply(
      cluster === undefined ? null : Number(cluster),
      recordIds.map((id): [string, string | null] => [id, persona]),
      persona ? [{ name: persona }] : [],
    );
  };
}
