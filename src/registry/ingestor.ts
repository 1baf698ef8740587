import { isDeepStrictEqual } from "node:util";

import { describeShortfall, projectCoverage } from "../coverage/tracker.ts";
import type { CoverageProjection } from "../coverage/tracker.ts";
import { NotFoundError, ValidationError } from "../errors.ts";
import { getLogger } from "../log/logger.ts";
import { confidenceFor, newPersonaDescriptor, personaIdFor } from "../personas/base.ts";
import type {
  AnalysisResult,
  ClusterSnapshot,
  MergeEvent,
  PersonaDescriptor,
  ProposedPersona,
  Registry,
  RegistrySample,
} from "../store/schemas.ts";
import type { Workspace } from "../store/workspace.ts";

const log = getLogger({ module: "ingestor" });

export type IngestBatch = {
  results: AnalysisResult[];
  /** Persona definitions beyond those carried on the results, e.g. a draft's merged set. */
  personas?: ProposedPersona[];
  mergeEvents?: MergeEvent[];
  runId?: string;
};

export type IngestOptions = {
  dryRun?: boolean;
  force?: boolean;
  now?: Date;
};

export type CoverageCheck = CoverageProjection & {
  batchIds: string[];
};

export type IngestReport = {
  dryRun: boolean;
  forced: boolean;
  newPersonas: string[];
  updatedPersonas: string[];
  newSamples: string[];
  updatedSamples: string[];
  unassignedIds: string[];
  /** Persona name -> samples newly attributed by this ingest. */
  attributed: Record<string, number>;
  coverage: CoverageCheck[];
  warnings: string[];
};

type PlannedSample = {
  id: string;
  clusterId: number | null;
  batchId: string;
  persona: string | null;
  confidence?: number;
  analysis?: RegistrySample["analysis"];
};

/**
 * Commits analysis results into the registry. All checks run before the first
 * write; a refused ingest leaves every document untouched.
 */
export class RegistryIngestor {
  private workspace: Workspace;
  private coverageThreshold: number;

  constructor(workspace: Workspace, options: { coverageThreshold: number }) {
    this.workspace = workspace;
    this.coverageThreshold = options.coverageThreshold;
  }

  ingest(batch: IngestBatch, options: IngestOptions = {}): IngestReport {
    const dryRun = options.dryRun ?? false;
    const force = options.force ?? false;
    const now = (options.now ?? new Date()).toISOString();

    const registry = this.workspace.loadRegistry();
    const snapshot = this.workspace.loadSnapshot();
    const recordsDocument = this.workspace.loadRecords();
    const corpusIds = new Set(recordsDocument.records.map((record) => record.id));
    const analyzedIds = new Set(registry.samples.map((sample) => sample.id));

    const planned = this.planSamples(batch.results);
    this.checkCorpus(planned, corpusIds);

    const warnings: string[] = [];
    const coverage = this.checkCoverage(planned, snapshot, analyzedIds, force, warnings);

    const next = structuredClone(registry);
    const report: IngestReport = {
      dryRun,
      forced: force,
      newPersonas: [],
      updatedPersonas: [],
      newSamples: [],
      updatedSamples: [],
      unassignedIds: [],
      attributed: {},
      coverage,
      warnings,
    };

    const personas = new Map<string, PersonaDescriptor>(next.personas.map((persona) => [persona.id, persona]));
    const proposed = [...(batch.personas ?? []), ...batch.results.flatMap((result) => result.personas)];
    const refreshed = new Set<string>();
    for (const persona of proposed) {
      const id = personaIdFor(persona.name);
      const known = personas.get(id);
      if (known) {
        if (this.refreshPersona(known, persona)) {
          refreshed.add(id);
        }
        continue;
      }
      const descriptor = newPersonaDescriptor(persona, now);
      personas.set(id, descriptor);
      next.personas.push(descriptor);
      report.newPersonas.push(descriptor.name);
    }

    const samples = new Map<string, RegistrySample>(next.samples.map((sample) => [sample.id, sample]));
    const unassigned = new Set(next.unassignedIds);
    const touched = new Set<string>();

    for (const sample of planned) {
      const personaId = this.resolvePersona(sample, personas, warnings);
      const existing = samples.get(sample.id);
      const previousPersonaId = existing?.personaId ?? null;

      if (previousPersonaId !== personaId) {
        const previous = previousPersonaId ? personas.get(previousPersonaId) : undefined;
        if (previous) {
          previous.sampleIds = previous.sampleIds.filter((id) => id !== sample.id);
          touched.add(previous.id);
        }
        const target = personaId ? personas.get(personaId) : undefined;
        if (target && !target.sampleIds.includes(sample.id)) {
          target.sampleIds.push(sample.id);
          touched.add(target.id);
          report.attributed[target.name] = (report.attributed[target.name] ?? 0) + 1;
        }
      }

      const target = personaId ? personas.get(personaId) : undefined;
      if (target && sample.clusterId !== null && !target.sourceClusters.includes(sample.clusterId)) {
        target.sourceClusters.push(sample.clusterId);
        touched.add(target.id);
      }

      const entry: RegistrySample = {
        id: sample.id,
        personaId,
        clusterId: sample.clusterId,
        batchId: sample.batchId,
        ...(sample.confidence !== undefined ? { confidence: sample.confidence } : {}),
        ...(sample.analysis !== undefined ? { analysis: sample.analysis } : {}),
        ingestedAt: existing?.ingestedAt ?? now,
      };
      if (existing) {
        Object.assign(existing, entry);
        report.updatedSamples.push(sample.id);
      } else {
        samples.set(sample.id, entry);
        next.samples.push(entry);
        report.newSamples.push(sample.id);
      }

      if (personaId === null) {
        unassigned.add(sample.id);
        report.unassignedIds.push(sample.id);
      } else {
        unassigned.delete(sample.id);
      }
    }

    for (const persona of next.personas) {
      const count = persona.sampleIds.length;
      if (touched.has(persona.id) || refreshed.has(persona.id) || persona.sampleCount !== count) {
        persona.sampleCount = count;
        persona.confidence = confidenceFor(count);
        persona.updatedAt = now;
        if (!report.newPersonas.includes(persona.name) && !report.updatedPersonas.includes(persona.name)) {
          report.updatedPersonas.push(persona.name);
        }
      }
    }

    next.unassignedIds = [...unassigned];
    this.appendMergeHistory(next, batch, now);
    next.updatedAt = now;

    log.info(
      {
        dryRun,
        force,
        newSamples: report.newSamples.length,
        updatedSamples: report.updatedSamples.length,
        newPersonas: report.newPersonas.length,
        unassigned: report.unassignedIds.length,
      },
      dryRun ? "ingest validated (dry run)" : "ingest committed",
    );

    // Records before the registry: registry samples are what mark a record analyzed.
    if (!dryRun) {
      if (recordsDocument.records.length > 0) {
        const byId = new Map(planned.map((sample) => [sample.id, sample]));
        for (const record of recordsDocument.records) {
          const sample = byId.get(record.id);
          if (!sample) {
            continue;
          }
          record.personaId = samples.get(record.id)?.personaId ?? null;
          if (sample.analysis !== undefined) {
            record.analysis = sample.analysis;
          }
        }
        this.workspace.saveRecords(recordsDocument);
      }
      this.workspace.saveRegistry(next);
    }
    return report;
  }

  /**
   * Applies fresh analysis to a known persona: a non-empty description or
   * characteristics object replaces the stored one. Returns whether anything changed.
   */
  private refreshPersona(known: PersonaDescriptor, proposed: ProposedPersona): boolean {
    let changed = false;
    if (proposed.description && proposed.description !== known.description) {
      known.description = proposed.description;
      changed = true;
    }
    const characteristics = proposed.characteristics;
    if (Object.keys(characteristics).length > 0 && !isDeepStrictEqual(characteristics, known.characteristics)) {
      known.characteristics = characteristics;
      changed = true;
    }
    return changed;
  }

  private planSamples(results: AnalysisResult[]): PlannedSample[] {
    const planned: PlannedSample[] = [];
    const seen = new Set<string>();
    const duplicates: string[] = [];
    for (const result of results) {
      for (const assignment of result.assignments) {
        if (seen.has(assignment.id)) {
          duplicates.push(assignment.id);
          continue;
        }
        seen.add(assignment.id);
        planned.push({
          id: assignment.id,
          clusterId: result.clusterId,
          batchId: result.batchId,
          persona: assignment.persona,
          confidence: assignment.confidence,
          analysis: assignment.analysis,
        });
      }
    }
    if (duplicates.length > 0) {
      throw new ValidationError(
        "Batch assigns some samples more than once",
        duplicates.map((id) => `sample ${id} is duplicated`),
      );
    }
    return planned;
  }

  private checkCorpus(planned: PlannedSample[], corpusIds: ReadonlySet<string>): void {
    if (corpusIds.size === 0) {
      return;
    }
    const unknown = planned.filter((sample) => !corpusIds.has(sample.id)).map((sample) => sample.id);
    if (unknown.length > 0) {
      throw new NotFoundError(`Unknown sample id(s) not in the corpus: ${unknown.join(", ")}`);
    }
  }

  private checkCoverage(
    planned: PlannedSample[],
    snapshot: ClusterSnapshot | null,
    analyzedIds: ReadonlySet<string>,
    force: boolean,
    warnings: string[],
  ): CoverageCheck[] {
    const byCluster = new Map<number, { ids: string[]; batchIds: Set<string> }>();
    for (const sample of planned) {
      if (sample.clusterId === null) {
        continue;
      }
      const entry = byCluster.get(sample.clusterId) ?? { ids: [], batchIds: new Set<string>() };
      entry.ids.push(sample.id);
      entry.batchIds.add(sample.batchId);
      byCluster.set(sample.clusterId, entry);
    }

    const checks: CoverageCheck[] = [];
    const shortfalls: string[] = [];
    for (const [clusterId, entry] of [...byCluster.entries()].sort((a, b) => a[0] - b[0])) {
      const cluster = snapshot?.clusters.find((candidate) => candidate.id === clusterId);
      if (!cluster || cluster.isNoise) {
        warnings.push(`cluster ${clusterId} is not a real cluster in the current snapshot; coverage gate skipped`);
        continue;
      }
      const projection = projectCoverage(cluster, analyzedIds, entry.ids, this.coverageThreshold);
      checks.push({ ...projection, batchIds: [...entry.batchIds].sort() });
      if (!projection.meetsThreshold) {
        shortfalls.push(describeShortfall(projection, this.coverageThreshold));
      }
    }

    if (shortfalls.length > 0) {
      if (!force) {
        throw new ValidationError("Coverage below threshold; ingest refused (use force to override)", shortfalls);
      }
      for (const shortfall of shortfalls) {
        warnings.push(`forced past coverage gate: ${shortfall}`);
      }
    }
    return checks;
  }

  private resolvePersona(
    sample: PlannedSample,
    personas: ReadonlyMap<string, PersonaDescriptor>,
    warnings: string[],
  ): string | null {
    if (sample.persona === null) {
      warnings.push(`sample ${sample.id} has no persona; recorded as unassigned`);
      return null;
    }
    const id = personaIdFor(sample.persona);
    if (!personas.has(id)) {
      warnings.push(`sample ${sample.id} names unknown persona "${sample.persona}"; recorded as unassigned`);
      return null;
    }
    return id;
  }

  private appendMergeHistory(registry: Registry, batch: IngestBatch, now: string): void {
    const events = batch.mergeEvents ?? [];
    if (events.length === 0) {
      return;
    }
    if (batch.runId && registry.mergeHistory.some((event) => event.runId === batch.runId)) {
      return;
    }
    for (const event of events) {
      registry.mergeHistory.push({ ...event, runId: batch.runId, mergedAt: now });
    }
  }
}
