import test from "node:test";
import assert from "node:assert/strict";
import { existsSync } from "node:fs";

import { NotFoundError, ValidationError } from "../../src/errors.ts";
import { RegistryIngestor } from "../../src/registry/ingestor.ts";
import type { AnalysisResult } from "../../src/store/schemas.ts";
import { Workspace } from "../../src/store/workspace.ts";
import { ids, makeCluster, makeSnapshot, tempDir } from "../helpers.ts";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function setup() {
  const workspace = new Workspace(tempDir());
  const clusterA = ids("a", 10);
  const clusterB = ids("b", 4);
  workspace.saveSnapshot(makeSnapshot([makeCluster(0, clusterA), makeCluster(1, clusterB), makeCluster(-1, ["n1"])]));
  workspace.saveRecords({
    embeddingModel: "fake-embedding",
    records: [...clusterA, ...clusterB, "n1"].map((id) => ({ id, text: `text of ${id}` })),
  });
  return { workspace, ingestor: new RegistryIngestor(workspace, { coverageThreshold: 0.8 }) };
}

function result(
  clusterId: number | null,
  batchId: string,
  assignments: Array<[string, string | null]>,
  personaNames: string[] = [],
): AnalysisResult {
  return {
    clusterId,
    batchId,
    personas: personaNames.map((name) => ({ name, description: `${name} voice`, characteristics: {} })),
    assignments: assignments.map(([id, persona]) => ({ id, persona, confidence: 0.9 })),
    calibrationReferenced: true,
    repairApplied: false,
    attempts: 1,
  };
}

const eightOfTen = result(
  0,
  "0",
  [
    ["a1", "Warm Coach"],
    ["a2", "Warm Coach"],
    ["a3", "Warm Coach"],
    ["a4", "Warm Coach"],
    ["a5", "Warm Coach"],
    ["a6", "Warm Coach"],
    ["a7", "Dry Analyst"],
    ["a8", null],
  ],
  ["Warm Coach", "Dry Analyst"],
);

const sevenOfTen = result(
  0,
  "0",
  ids("a", 7).map((id): [string, string] => [id, "Warm Coach"]),
  ["Warm Coach"],
);

test("a batch that leaves its cluster below the threshold is refused untouched", () => {
  const { workspace, ingestor } = setup();
  assert.throws(
    () => ingestor.ingest({ results: [sevenOfTen] }, { now: NOW }),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.issues.length === 1 &&
      err.issues[0] === "cluster 0: projected 7/10 (70%) is below 80%; need 1 more of 8 required",
  );
  assert.equal(existsSync(workspace.path("registry.json")), false);
});

test("dry runs enforce coverage too", () => {
  const { ingestor } = setup();
  assert.throws(() => ingestor.ingest({ results: [sevenOfTen] }, { dryRun: true }), ValidationError);
});

test("force commits below the threshold with a warning", () => {
  const { workspace, ingestor } = setup();
  const report = ingestor.ingest({ results: [sevenOfTen] }, { force: true, now: NOW });
  assert.equal(report.forced, true);
  assert.deepEqual(report.warnings, [
    "forced past coverage gate: cluster 0: projected 7/10 (70%) is below 80%; need 1 more of 8 required",
  ]);
  const persona = workspace.loadRegistry().personas[0];
  assert.equal(persona?.sampleCount, 7);
  assert.equal(persona?.confidence, 0.85);
});

test("an accepted batch creates personas, samples and record attributions", () => {
  const { workspace, ingestor } = setup();
  const report = ingestor.ingest({ results: [eightOfTen] }, { now: NOW });

  assert.deepEqual(report.newPersonas, ["Warm Coach", "Dry Analyst"]);
  assert.deepEqual(report.updatedPersonas, []);
  assert.deepEqual(report.newSamples, ids("a", 8));
  assert.deepEqual(report.unassignedIds, ["a8"]);
  assert.deepEqual(report.attributed, { "Warm Coach": 6, "Dry Analyst": 1 });
  assert.deepEqual(report.warnings, ["sample a8 has no persona; recorded as unassigned"]);
  assert.deepEqual(
    report.coverage.map((check) => [check.clusterId, check.projectedAnalyzed, check.shortfall, check.batchIds]),
    [[0, 8, 0, ["0"]]],
  );

  const registry = workspace.loadRegistry();
  assert.deepEqual(
    registry.personas.map((persona) => [persona.id, persona.sampleCount, persona.confidence, persona.sourceClusters]),
    [
      ["warm-coach", 6, 0.8, [0]],
      ["dry-analyst", 1, 0.55, [0]],
    ],
  );
  assert.equal(registry.personas[0]?.description, "Warm Coach voice");
  assert.deepEqual(registry.unassignedIds, ["a8"]);
  assert.equal(registry.updatedAt, "2026-03-01T12:00:00.000Z");
  assert.deepEqual(registry.samples[0], {
    id: "a1",
    personaId: "warm-coach",
    clusterId: 0,
    batchId: "0",
    confidence: 0.9,
    ingestedAt: "2026-03-01T12:00:00.000Z",
  });

  const records = new Map(workspace.loadRecords().records.map((record) => [record.id, record]));
  assert.equal(records.get("a1")?.personaId, "warm-coach");
  assert.equal(records.get("a8")?.personaId, null);
  assert.equal(records.get("a9")?.personaId, undefined);
});

test("a dry run reports without writing", () => {
  const { workspace, ingestor } = setup();
  const report = ingestor.ingest({ results: [eightOfTen] }, { dryRun: true, now: NOW });
  assert.equal(report.dryRun, true);
  assert.equal(report.newSamples.length, 8);
  assert.equal(existsSync(workspace.path("registry.json")), false);
  assert.equal(workspace.loadRecords().records[0]?.personaId, undefined);
});

test("ingesting the same batch twice changes nothing", () => {
  const { workspace, ingestor } = setup();
  ingestor.ingest({ results: [eightOfTen] }, { now: NOW });
  const before = workspace.loadRegistry();

  const again = ingestor.ingest({ results: [eightOfTen] }, { now: NOW });
  assert.deepEqual(again.newSamples, []);
  assert.deepEqual(again.updatedSamples, ids("a", 8));
  assert.deepEqual(again.newPersonas, []);
  assert.deepEqual(again.updatedPersonas, []);
  assert.deepEqual(again.attributed, {});
  assert.deepEqual(workspace.loadRegistry(), before);
});

test("reassigning a sample moves it between personas", () => {
  const { workspace, ingestor } = setup();
  ingestor.ingest({ results: [eightOfTen] }, { now: NOW });
  const report = ingestor.ingest({ results: [result(0, "0b", [["a7", "Warm Coach"]])] }, { now: NOW });

  assert.deepEqual(report.updatedSamples, ["a7"]);
  assert.deepEqual(report.attributed, { "Warm Coach": 1 });
  assert.deepEqual(report.updatedPersonas, ["Warm Coach", "Dry Analyst"]);
  const counts = workspace.loadRegistry().personas.map((persona) => [persona.id, persona.sampleCount, persona.confidence]);
  assert.deepEqual(counts, [
    ["warm-coach", 7, 0.85],
    ["dry-analyst", 0, 0.5],
  ]);
});

test("samples outside the corpus are rejected", () => {
  const { ingestor } = setup();
  assert.throws(
    () => ingestor.ingest({ results: [result(0, "0", [["zz", "Warm Coach"]], ["Warm Coach"])] }, { force: true }),
    (err: unknown) => err instanceof NotFoundError && err.message === "Unknown sample id(s) not in the corpus: zz",
  );
});

test("a sample assigned twice in one batch is rejected", () => {
  const { ingestor } = setup();
  const twice = result(
    1,
    "1",
    [
      ["b1", "Warm Coach"],
      ["b1", "Dry Analyst"],
    ],
    ["Warm Coach", "Dry Analyst"],
  );
  assert.throws(
    () => ingestor.ingest({ results: [twice] }, { force: true }),
    (err: unknown) => err instanceof ValidationError && err.issues[0] === "sample b1 is duplicated",
  );
});

test("unknown persona names leave the sample unassigned", () => {
  const { workspace, ingestor } = setup();
  const report = ingestor.ingest({ results: [result(1, "1", ids("b", 4).map((id): [string, string] => [id, "Ghost"]))] }, { now: NOW });
  assert.deepEqual(report.unassignedIds, ids("b", 4));
  assert.equal(report.warnings[0], 'sample b1 names unknown persona "Ghost"; recorded as unassigned');
  assert.deepEqual(workspace.loadRegistry().personas, []);
});

test("noise results skip the coverage gate with a warning", () => {
  const { ingestor } = setup();
  const report = ingestor.ingest({ results: [result(-1, "-1", [["n1", "Warm Coach"]], ["Warm Coach"])] }, { now: NOW });
  assert.deepEqual(report.coverage, []);
  assert.deepEqual(report.warnings, ["cluster -1 is not a real cluster in the current snapshot; coverage gate skipped"]);
  assert.deepEqual(report.newSamples, ["n1"]);
});

test("merge events are recorded once per run", () => {
  const { workspace, ingestor } = setup();
  const batch = {
    results: [eightOfTen],
    mergeEvents: [{ kept: "Warm Coach", absorbed: ["Friendly Mentor"], similarity: 0.91 }],
    runId: "run-1",
  };
  ingestor.ingest(batch, { now: NOW });
  ingestor.ingest(batch, { now: NOW });
  assert.deepEqual(workspace.loadRegistry().mergeHistory, [
    {
      kept: "Warm Coach",
      absorbed: ["Friendly Mentor"],
      similarity: 0.91,
      runId: "run-1",
      mergedAt: "2026-03-01T12:00:00.000Z",
    },
  ]);
});

test("personas named in non-Latin scripts get separate registry entries", () => {
  const { workspace, ingestor } = setup();
  const batch = result(
    1,
    "1",
    [
      ["b1", "热情教练"],
      ["b2", "热情教练"],
      ["b3", "冷静分析师"],
      ["b4", "冷静分析师"],
    ],
    ["热情教练", "冷静分析师"],
  );
  const report = ingestor.ingest({ results: [batch] }, { now: NOW });
  assert.deepEqual(report.newPersonas, ["热情教练", "冷静分析师"]);
  assert.deepEqual(
    workspace.loadRegistry().personas.map((persona) => [persona.id, persona.sampleCount]),
    [
      ["热情教练", 2],
      ["冷静分析师", 2],
    ],
  );
});

test("fresh analysis of a known persona replaces its description and characteristics", () => {
  const { workspace, ingestor } = setup();
  const coach = (characteristics: Record<string, number>, description: string): AnalysisResult => ({
    ...result(1, "1", ids("b", 4).map((id): [string, string] => [id, "Warm Coach"])),
    personas: [{ name: "Warm Coach", description, characteristics }],
  });
  ingestor.ingest({ results: [coach({ formality: 3 }, "First pass")] }, { now: NOW });

  const later = new Date("2026-03-05T08:00:00.000Z");
  const report = ingestor.ingest({ results: [coach({ formality: 7 }, "")] }, { now: later });
  assert.deepEqual(report.newPersonas, []);
  assert.deepEqual(report.updatedPersonas, ["Warm Coach"]);

  const persona = workspace.loadRegistry().personas[0];
  assert.deepEqual(persona?.characteristics, { formality: 7 });
  assert.equal(persona?.description, "First pass");
  assert.equal(persona?.createdAt, "2026-03-01T12:00:00.000Z");
  assert.equal(persona?.updatedAt, "2026-03-05T08:00:00.000Z");
  assert.equal(persona?.sampleCount, 4);
});

test("records are written before the registry", () => {
  const { workspace, ingestor } = setup();
  const order: string[] = [];
  const saveRecords = workspace.saveRecords.bind(workspace);
  const saveRegistry = workspace.saveRegistry.bind(workspace);
  workspace.saveRecords = (document) => {
    order.push("records");
    saveRecords(document);
  };
  workspace.saveRegistry = (registry) => {
    order.push("registry");
    saveRegistry(registry);
  };
  ingestor.ingest({ results: [eightOfTen] }, { now: NOW });
  assert.deepEqual(order, ["records", "registry"]);
});
