import { createHash } from "node:crypto";

import type { PersonaDescriptor, ProposedPersona } from "../store/schemas.ts";

export type { PersonaDescriptor, ProposedPersona };

export const BASE_CONFIDENCE = 0.5;
export const CONFIDENCE_PER_SAMPLE = 0.05;
export const MAX_CONFIDENCE = 0.95;

/** Saturating confidence: 0.5 with no samples, capped at 0.95. */
export function confidenceFor(sampleCount: number): number {
  const raw = BASE_CONFIDENCE + CONFIDENCE_PER_SAMPLE * Math.max(0, sampleCount);
  return Number(Math.min(raw, MAX_CONFIDENCE).toFixed(2));
}

/**
 * Stable registry key for a persona name ("Warm Coach" -> "warm-coach").
 * Letters and digits of any script are kept; a name with none falls back to
 * a hash of the name so distinct names never share a key.
 */
export function personaIdFor(name: string): string {
  const trimmed = name.trim();
  const slug = trimmed
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
  if (slug) {
    return slug;
  }
  return `persona-${createHash("sha256").update(trimmed).digest("hex").slice(0, 8)}`;
}

export function newPersonaDescriptor(proposed: ProposedPersona, now: string): PersonaDescriptor {
  return {
    id: personaIdFor(proposed.name),
    name: proposed.name.trim(),
    description: proposed.description,
    characteristics: proposed.characteristics,
    sampleIds: [],
    sampleCount: 0,
    confidence: confidenceFor(0),
    sourceClusters: [],
    createdAt: now,
    updatedAt: now,
  };
}
