import { orderedResults } from "../personas/consolidator.ts";
import { personaHealthIssues } from "../registry/health.ts";
import type { Draft } from "../store/schemas.ts";

export function renderDraftReview(draft: Draft): string {
  const results = orderedResults(draft.results);
  const failures = Object.values(draft.errors).sort((a, b) =>
    a.batchId.localeCompare(b.batchId, undefined, { numeric: true }),
  );
  const sampleCount = results.reduce((sum, result) => sum + result.assignments.length, 0);
  const clusters = new Set(results.map((result) => result.clusterId).filter((id): id is number => id !== null));

  const lines = [
    `Draft ${draft.runId} (created ${draft.createdAt})`,
    `Model: ${draft.metadata.model}`,
    `Clusters analyzed: ${clusters.size}`,
    `Batches: ${results.length} succeeded, ${failures.length} failed`,
    `Samples: ${sampleCount}`,
    `Personas: ${draft.personas.length}`,
  ];

  for (const persona of draft.personas) {
    const assigned = results.reduce(
      (sum, result) => sum + result.assignments.filter((assignment) => assignment.persona === persona.name).length,
      0,
    );
    lines.push(`  - ${persona.name} (${assigned} samples)${persona.description ? `: ${persona.description}` : ""}`);
  }

  const health = draft.personas.flatMap(personaHealthIssues);
  if (health.length > 0) {
    lines.push("Persona health:");
    for (const issue of health) {
      lines.push(`  - ${issue.severity}: ${issue.message}`);
    }
  }

  if (draft.mergeEvents.length > 0) {
    lines.push(`Merged personas (threshold ${draft.metadata.mergeThreshold}):`);
    for (const event of draft.mergeEvents) {
      lines.push(`  - ${event.absorbed.join(", ")} -> ${event.kept} (similarity ${event.similarity})`);
    }
  }

  lines.push("Batches:");
  for (const result of results) {
    const unassigned = result.assignments.filter((assignment) => assignment.persona === null).length;
    const notes = [
      result.repairApplied ? "repaired" : "",
      result.attempts > 1 ? `${result.attempts} attempts` : "",
      unassigned > 0 ? `${unassigned} unassigned` : "",
    ].filter(Boolean);
    lines.push(
      `  - batch ${result.batchId} (cluster ${result.clusterId ?? "-"}): ${result.assignments.length} samples, ` +
        `${result.personas.length} personas${notes.length > 0 ? ` [${notes.join(", ")}]` : ""}`,
    );
  }

  if (failures.length > 0) {
    lines.push("Failures:");
    for (const failure of failures) {
      lines.push(`  - batch ${failure.batchId} (cluster ${failure.clusterId ?? "-"}): ${failure.kind}: ${failure.error}`);
    }
  }

  return lines.join("\n");
}
