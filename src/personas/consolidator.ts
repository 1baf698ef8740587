import type { Embedder } from "../embeddings/embedder.ts";
import { normalizeVectors } from "../embeddings/embedder.ts";
import type { JsonObject, JsonValue } from "../json/schema.ts";
import { getLogger } from "../log/logger.ts";
import type { AnalysisResult, MergeEvent, ProposedPersona } from "../store/schemas.ts";
import { cosineSimilarity, round } from "../utils.ts";
import { personaIdFor } from "./base.ts";

const log = getLogger({ module: "consolidator" });

export type ConsolidationResult = {
  personas: ProposedPersona[];
  events: MergeEvent[];
  /** Absorbed persona name -> kept persona name. */
  renames: Map<string, string>;
  results: Record<string, AnalysisResult>;
};

export class DisjointSet {
  private parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let root = x;
    while ((this.parent[root] ?? root) !== root) {
      root = this.parent[root] ?? root;
    }
    let node = x;
    while (node !== root) {
      const next = this.parent[node] ?? root;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  /** Joins two sets; the smaller index stays the root so groups keep first-seen order. */
  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return;
    }
    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
  }
}

/**
 * Transitively closed grouping: any chain of pairs at or above `threshold`
 * lands in one group, even when the chain's ends are dissimilar. Groups are
 * ordered by their first member.
 */
export function groupBySimilarity(
  matrix: number[][],
  threshold: number,
  forcedPairs: Array<[number, number]> = [],
): number[][] {
  const n = matrix.length;
  const sets = new DisjointSet(n);
  for (let i = 0; i < n; i += 1) {
    for (let j = i + 1; j < n; j += 1) {
      if ((matrix[i]?.[j] ?? 0) >= threshold) {
        sets.union(i, j);
      }
    }
  }
  for (const [a, b] of forcedPairs) {
    sets.union(a, b);
  }

  const groups = new Map<number, number[]>();
  for (let i = 0; i < n; i += 1) {
    const root = sets.find(i);
    const members = groups.get(root) ?? [];
    members.push(i);
    groups.set(root, members);
  }
  return [...groups.values()].sort((a, b) => (a[0] ?? 0) - (b[0] ?? 0));
}

export function similarityMatrix(vectors: number[][]): number[][] {
  return vectors.map((a, i) => vectors.map((b, j) => (i === j ? 1 : cosineSimilarity(a, b))));
}

function isPlainObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Combines one characteristic across personas, in first-seen order: numbers
 * average (2 decimals), arrays union, objects merge key by key, anything else
 * keeps the first value.
 */
export function mergeValues(values: JsonValue[]): JsonValue {
  const first = values[0];
  if (first === undefined) {
    return null;
  }
  if (values.every((value) => typeof value === "number")) {
    const numbers = values.filter((value): value is number => typeof value === "number");
    return round(numbers.reduce((sum, value) => sum + value, 0) / numbers.length, 2);
  }
  if (values.every((value) => Array.isArray(value))) {
    const seen = new Set<string>();
    const out: JsonValue[] = [];
    for (const value of values) {
      if (!Array.isArray(value)) {
        continue;
      }
      for (const item of value) {
        const key = JSON.stringify(item);
        if (!seen.has(key)) {
          seen.add(key);
          out.push(item);
        }
      }
    }
    return out;
  }
  if (values.every((value) => isPlainObject(value))) {
    return mergeCharacteristics(values.filter(isPlainObject));
  }
  return first;
}

export function mergeCharacteristics(objects: JsonObject[]): JsonObject {
  const keys: string[] = [];
  for (const object of objects) {
    for (const key of Object.keys(object)) {
      if (!keys.includes(key)) {
        keys.push(key);
      }
    }
  }
  const out: JsonObject = {};
  for (const key of keys) {
    const present: JsonValue[] = [];
    for (const object of objects) {
      const value = object[key];
      if (value !== undefined) {
        present.push(value);
      }
    }
    out[key] = mergeValues(present);
  }
  return out;
}

export function mergePersonaGroup(group: ProposedPersona[]): ProposedPersona {
  const [first] = group;
  if (!first) {
    throw new Error("Cannot merge an empty persona group");
  }
  return {
    name: first.name,
    description: first.description,
    characteristics: mergeCharacteristics(group.map((persona) => persona.characteristics)),
  };
}

/** Results in a completion-order-independent sequence: cluster id, then batch id. */
export function orderedResults(results: Record<string, AnalysisResult>): AnalysisResult[] {
  return Object.values(results).sort(
    (a, b) =>
      (a.clusterId ?? Number.MAX_SAFE_INTEGER) - (b.clusterId ?? Number.MAX_SAFE_INTEGER) ||
      a.batchId.localeCompare(b.batchId, undefined, { numeric: true }),
  );
}

export function applyRenames(result: AnalysisResult, renames: ReadonlyMap<string, string>): AnalysisResult {
  const seen = new Set<string>();
  const personas: ProposedPersona[] = [];
  for (const persona of result.personas) {
    const name = renames.get(persona.name) ?? persona.name;
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    personas.push({ ...persona, name });
  }
  return {
    ...result,
    personas,
    assignments: result.assignments.map((assignment) =>
      assignment.persona !== null && renames.has(assignment.persona)
        ? { ...assignment, persona: renames.get(assignment.persona) ?? assignment.persona }
        : assignment,
    ),
  };
}

/**
 * De-duplicates the personas proposed across a run's results. Operates on the
 * draft only; the registry is never touched here.
 */
export async function consolidatePersonas(
  results: Record<string, AnalysisResult>,
  embedder: Embedder,
  threshold: number,
): Promise<ConsolidationResult> {
  const ordered = orderedResults(results);
  const proposals = ordered.flatMap((result) => result.personas);

  let matrix: number[][] = proposals.map((_, i) => proposals.map((__, j) => (i === j ? 1 : 0)));
  if (proposals.length > 1) {
    const embedded = await embedder.embed(proposals.map((persona) => `${persona.name} ${persona.description}`.trim()));
    matrix = similarityMatrix(normalizeVectors(embedded.vectors));
  }

  const sameName: Array<[number, number]> = [];
  proposals.forEach((a, i) => {
    proposals.forEach((b, j) => {
      if (i < j && personaIdFor(a.name) === personaIdFor(b.name)) {
        sameName.push([i, j]);
      }
    });
  });

  const groups = groupBySimilarity(matrix, threshold, sameName);
  const personas: ProposedPersona[] = [];
  const events: MergeEvent[] = [];
  const renames = new Map<string, string>();

  for (const group of groups) {
    const members = group.map((index) => proposals[index]).filter((persona): persona is ProposedPersona => !!persona);
    const merged = mergePersonaGroup(members);
    personas.push(merged);

    const absorbed = [...new Set(members.map((persona) => persona.name))].filter((name) => name !== merged.name);
    for (const name of absorbed) {
      renames.set(name, merged.name);
    }
    if (absorbed.length > 0) {
      let lowest = 1;
      for (const i of group) {
        for (const j of group) {
          const similarity = matrix[i]?.[j] ?? 0;
          if (i < j && similarity >= threshold) {
            lowest = Math.min(lowest, similarity);
          }
        }
      }
      events.push({ kept: merged.name, absorbed, similarity: round(lowest, 4) });
    }
  }

  const rewritten: Record<string, AnalysisResult> = {};
  for (const result of ordered) {
    rewritten[result.batchId] = applyRenames(result, renames);
  }

  log.info({ proposed: proposals.length, kept: personas.length, merges: events.length }, "personas consolidated");
  return { personas, events, renames, results: rewritten };
}
