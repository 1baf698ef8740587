import test from "node:test";
import assert from "node:assert/strict";
import { join } from "node:path";

import {
  batchIdFor,
  estimateTokens,
  prepareClusterBatches,
  splitIntoBatches,
} from "../../src/batch/preparer.ts";
import { buildRetryPrompt, DEFAULT_CALIBRATION_PATH, loadCalibration } from "../../src/batch/prompt.ts";
import { NotFoundError, ValidationError } from "../../src/errors.ts";
import { ids, makeCluster, makeSnapshot, tempDir } from "../helpers.ts";

const snapshot = makeSnapshot([makeCluster(0, ids("a", 5)), makeCluster(1, ["b1"]), makeCluster(-1, ["n1"])]);
const texts = new Map([...ids("a", 5), "b1", "n1"].map((id) => [id, `text of ${id}`]));

function prepare(clusterId: number, analyzedIds: string[] = [], maxBatchSize = 150) {
  return prepareClusterBatches({
    snapshot,
    clusterId,
    texts,
    analyzedIds: new Set(analyzedIds),
    maxBatchSize,
    coverageThreshold: 0.8,
    calibration: "CALIBRATION BLOCK",
  });
}

test("ids are split into sequential batches no larger than the cap", () => {
  assert.deepEqual(splitIntoBatches(["a", "b", "c"], 2), [["a", "b"], ["c"]]);
  assert.deepEqual(splitIntoBatches([], 2), []);
  assert.throws(() => splitIntoBatches(["a"], 0), ValidationError);
});

test("batch ids carry a suffix only when a cluster is split", () => {
  assert.equal(batchIdFor(3, 0, 1), "3");
  assert.equal(batchIdFor(3, 1, 2), "3_2");
});

test("only unanalyzed members are batched", () => {
  const plan = prepare(0, ["a1", "a2"], 2);
  assert.equal(plan.coverage.analyzed, 2);
  assert.deepEqual(
    plan.batches.map((batch) => [batch.batchId, batch.recordIds]),
    [
      ["0_1", ["a3", "a4"]],
      ["0_2", ["a5"]],
    ],
  );
  const prompt = plan.batches[0]?.prompt ?? "";
  assert.ok(prompt.startsWith("CALIBRATION BLOCK\n"));
  assert.ok(prompt.includes("# Cluster 0 Analysis"));
  assert.ok(prompt.includes("**Cluster size:** 5 records"));
  assert.ok(prompt.includes("**Records to analyze:** 2"));
  assert.ok(prompt.includes("**Centroid examples:** a1, a2, a3"));
  assert.ok(prompt.includes("## Record 1: a3\n\n```\ntext of a3\n```"));
  assert.ok(prompt.includes('"batch_id": "0_1"'));
});

test("an unsplit cluster uses the cluster id as its batch id", () => {
  assert.deepEqual(
    prepare(0).batches.map((batch) => batch.batchId),
    ["0"],
  );
  assert.deepEqual(prepare(0, ids("a", 5)).batches, []);
});

test("noise, unknown clusters and missing texts are refused", () => {
  assert.throws(() => prepare(-1), ValidationError);
  assert.throws(() => prepare(9), (err: unknown) => err instanceof NotFoundError && /Cluster 9 not found/.test(err.message));
  assert.throws(
    () =>
      prepareClusterBatches({
        snapshot,
        clusterId: 1,
        texts: new Map(),
        analyzedIds: new Set(),
        maxBatchSize: 10,
        coverageThreshold: 0.8,
        calibration: "",
      }),
    NotFoundError,
  );
});

test("token estimates use four characters per token and a floor on output", () => {
  assert.deepEqual(estimateTokens("x".repeat(401), 20), { inputTokens: 100, outputTokens: 1500, totalTokens: 1600 });
  assert.equal(estimateTokens("", 30).outputTokens, 3000);
});

test("retry prompts append the failure reason", () => {
  const retry = buildRetryPrompt("ORIGINAL", "Missing 'samples' array");
  assert.ok(retry.startsWith("ORIGINAL\n"));
  assert.ok(retry.includes("CRITICAL: Your response MUST be valid JSON only."));
  assert.ok(retry.includes("Previous attempt failed with: Missing 'samples' array"));
});

test("calibration text falls back when the reference file is missing", () => {
  assert.ok(loadCalibration(DEFAULT_CALIBRATION_PATH).startsWith("# Calibration Reference\n\nScore every sample"));
  const fallback = loadCalibration(join(tempDir(), "missing.md"));
  assert.ok(fallback.startsWith("# Calibration Reference\n\nUse consistent scoring scales:"));
});
