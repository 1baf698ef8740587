import test from "node:test";
import assert from "node:assert/strict";
import { readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { ConflictError, ValidationError } from "../../src/errors.ts";
import type { Draft } from "../../src/store/schemas.ts";
import { Workspace } from "../../src/store/workspace.ts";
import { makeCluster, makeSnapshot, tempDir } from "../helpers.ts";

function draft(runId: string): Draft {
  return {
    runId,
    createdAt: "2026-01-01T00:00:00.000Z",
    results: {},
    errors: {},
    personas: [],
    mergeEvents: [],
    metadata: {
      model: "test-model",
      embeddingModel: null,
      mergeThreshold: 0.85,
      clusterIds: [0],
      batchCount: 0,
      successCount: 0,
      errorCount: 0,
    },
  };
}

test("an empty data directory reads as empty documents", () => {
  const workspace = new Workspace(join(tempDir(), "data"));
  assert.deepEqual(workspace.loadRecords(), { embeddingModel: null, records: [] });
  assert.equal(workspace.hasRecords(), false);
  assert.equal(workspace.loadSnapshot(), null);
  assert.deepEqual(workspace.loadRegistry(), {
    personas: [],
    samples: [],
    unassignedIds: [],
    mergeHistory: [],
    updatedAt: null,
  });
  assert.equal(workspace.hasDraft(), false);
  assert.equal(workspace.loadDraft(), null);
  assert.equal(workspace.analyzedIds().size, 0);
});

test("documents round-trip and leave no temp files behind", () => {
  const dir = join(tempDir(), "data");
  const workspace = new Workspace(dir);
  const snapshot = makeSnapshot([makeCluster(0, ["a", "b"]), makeCluster(-1, ["c"])]);
  workspace.saveSnapshot(snapshot);
  workspace.saveRecords({ embeddingModel: "fake-embedding", records: [{ id: "a", text: "hello", clusterId: 0 }] });

  assert.deepEqual(workspace.loadSnapshot(), snapshot);
  assert.deepEqual(workspace.loadRecords().records, [{ id: "a", text: "hello", clusterId: 0 }]);
  assert.deepEqual(readdirSync(dir).sort(), ["clusters.json", "records.json"]);
});

test("analyzed ids come from registry samples", () => {
  const workspace = new Workspace(tempDir());
  workspace.saveRegistry({
    personas: [],
    samples: [
      { id: "a", personaId: null, clusterId: 0, batchId: "0", ingestedAt: "2026-01-01T00:00:00.000Z" },
      { id: "b", personaId: "warm-coach", clusterId: 0, batchId: "0", ingestedAt: "2026-01-01T00:00:00.000Z" },
    ],
    unassignedIds: ["a"],
    mergeHistory: [],
    updatedAt: "2026-01-01T00:00:00.000Z",
  });
  assert.deepEqual([...workspace.analyzedIds()].sort(), ["a", "b"]);
});

test("missing optional fields take their defaults on load", () => {
  const dir = tempDir();
  writeFileSync(join(dir, "records.json"), JSON.stringify({ records: [{ id: "x", text: "t" }] }));
  assert.deepEqual(new Workspace(dir).loadRecords(), { embeddingModel: null, records: [{ id: "x", text: "t" }] });
});

test("corrupt and invalid documents raise validation errors", () => {
  const dir = tempDir();
  writeFileSync(join(dir, "clusters.json"), "{not json");
  writeFileSync(join(dir, "registry.json"), JSON.stringify({ personas: "x" }));
  const workspace = new Workspace(dir);

  assert.throws(
    () => workspace.loadSnapshot(),
    (err: unknown) => err instanceof ValidationError && err.message.startsWith(`Could not read ${join(dir, "clusters.json")}`),
  );
  assert.throws(
    () => workspace.loadRegistry(),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.message.startsWith("Invalid registry.json") &&
      err.issues[0] === "personas: Expected array, received string",
  );
});

test("the draft slot holds one draft at a time", () => {
  const workspace = new Workspace(join(tempDir(), "data"));
  workspace.createDraft(draft("run-1"));
  assert.equal(workspace.hasDraft(), true);
  assert.throws(() => workspace.createDraft(draft("run-2")), ConflictError);
  assert.equal(workspace.loadDraft()?.runId, "run-1");

  assert.equal(workspace.deleteDraft(), true);
  assert.equal(workspace.deleteDraft(), false);
  workspace.createDraft(draft("run-3"));
  assert.equal(workspace.loadDraft()?.runId, "run-3");
});
