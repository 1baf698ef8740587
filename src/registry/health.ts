import type { JsonObject, JsonValue } from "../json/schema.ts";

export const REQUIRED_TONE_VECTORS = ["formality", "warmth", "directness"] as const;
export const RECOMMENDED_TONE_VECTORS = ["authority"] as const;

export type PersonaHealthIssue = {
  persona: string | null;
  severity: "error" | "warning";
  message: string;
};

export type PersonaHealthReport = {
  healthy: boolean;
  issues: PersonaHealthIssue[];
};

type PersonaLike = { name: string; characteristics: JsonObject };

function kindOf(value: JsonValue): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

/** Tone-vector checks for one persona's characteristics (1-10 scores). */
export function personaHealthIssues(persona: PersonaLike): PersonaHealthIssue[] {
  const { name, characteristics } = persona;
  const issues: PersonaHealthIssue[] = [];

  for (const field of REQUIRED_TONE_VECTORS) {
    const value = characteristics[field];
    if (value === undefined) {
      issues.push({ persona: name, severity: "error", message: `[${name}] missing required tone vector "${field}"` });
    } else if (typeof value !== "number") {
      issues.push({
        persona: name,
        severity: "error",
        message: `[${name}] tone vector "${field}" must be numeric (1-10), got ${kindOf(value)}`,
      });
    }
  }
  for (const field of RECOMMENDED_TONE_VECTORS) {
    if (characteristics[field] === undefined) {
      issues.push({ persona: name, severity: "warning", message: `[${name}] missing recommended tone vector "${field}"` });
    }
  }

  const scores = [...REQUIRED_TONE_VECTORS, ...RECOMMENDED_TONE_VECTORS]
    .map((field) => characteristics[field])
    .filter((value): value is number => typeof value === "number");
  if (scores.length >= 3 && new Set(scores).size === 1) {
    issues.push({
      persona: name,
      severity: "warning",
      message: `[${name}] all tone vectors share the value ${scores[0]}; they look inferred rather than scored`,
    });
  }
  return issues;
}

/** Advisory: errors mark the set unhealthy, warnings do not. */
export function checkPersonaHealth(personas: readonly PersonaLike[]): PersonaHealthReport {
  const issues: PersonaHealthIssue[] =
    personas.length === 0
      ? [{ persona: null, severity: "warning", message: "registry contains no personas" }]
      : personas.flatMap(personaHealthIssues);
  return { healthy: issues.every((issue) => issue.severity !== "error"), issues };
}
