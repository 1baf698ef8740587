import test from "node:test";
import assert from "node:assert/strict";

import { normalizeVectors, OpenAIEmbedder } from "../../src/embeddings/embedder.ts";
import { RetryPolicy } from "../../src/llm/retry.ts";

type EmbeddingRequest = { model: string; input: string[] };

async function withFetch<T>(handler: (request: EmbeddingRequest) => Response, fn: () => Promise<T>): Promise<T> {
  const originalFetch = globalThis.fetch;
  globalThis.fetch = (async (_input: unknown, init?: RequestInit) =>
    handler(JSON.parse(String(init?.body ?? "{}")) as EmbeddingRequest)) as typeof fetch;
  try {
    return await fn();
  } finally {
    globalThis.fetch = originalFetch;
  }
}

test("texts are embedded in chunks and reassembled in input order", async () => {
  const requests: string[][] = [];
  const batch = await withFetch(
    (request) => {
      requests.push(request.input);
      // Returned out of order; the index field decides placement.
      const data = request.input.map((text, index) => ({ index, embedding: [text.length, 1] })).reverse();
      return new Response(JSON.stringify({ model: "embed-test", data }), { status: 200 });
    },
    () =>
      new OpenAIEmbedder({ apiKey: "test-key", model: "embed-test", chunkSize: 2, retryPolicy: RetryPolicy.none() }).embed([
        "a",
        "bb",
        "ccc",
      ]),
  );

  assert.deepEqual(requests, [["a", "bb"], ["ccc"]]);
  assert.deepEqual(batch.vectors, [
    [1, 1],
    [2, 1],
    [3, 1],
  ]);
  assert.equal(batch.model, "embed-test");
  assert.equal(batch.dimensions, 2);
});

test("a response with the wrong number of vectors is rejected", async () => {
  await withFetch(
    () => new Response(JSON.stringify({ data: [{ index: 0, embedding: [1] }] }), { status: 200 }),
    () =>
      assert.rejects(
        new OpenAIEmbedder({ apiKey: "test-key", retryPolicy: RetryPolicy.none() }).embed(["a", "b"]),
        /Embedding response for 2 inputs did not contain 2 vectors/,
      ),
  );
});

test("mixed vector dimensions are rejected", async () => {
  await withFetch(
    () =>
      new Response(
        JSON.stringify({
          data: [
            { index: 0, embedding: [1, 2] },
            { index: 1, embedding: [1] },
          ],
        }),
        { status: 200 },
      ),
    () =>
      assert.rejects(
        new OpenAIEmbedder({ apiKey: "test-key", retryPolicy: RetryPolicy.none() }).embed(["a", "b"]),
        /mixed vector dimensions/,
      ),
  );
});

test("empty input makes no request", async () => {
  let calls = 0;
  const batch = await withFetch(
    () => {
      calls += 1;
      return new Response("{}", { status: 200 });
    },
    () => new OpenAIEmbedder({ apiKey: "test-key" }).embed([]),
  );
  assert.equal(calls, 0);
  assert.deepEqual(batch.vectors, []);
});

test("vectors are scaled to unit length and zero vectors are left alone", () => {
  assert.deepEqual(normalizeVectors([[3, 4], [0, 0]]), [
    [0.6, 0.8],
    [0, 0],
  ]);
});
