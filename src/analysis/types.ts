import type { AnalysisPayload } from "../json/schema.ts";
import type { AnalysisResult, DispatchFailure } from "../store/schemas.ts";

export type AnalysisRequest = {
  batchId: string;
  clusterId: number | null;
  recordIds: string[];
  prompt: string;
};

export type DispatchOutcome = {
  runId: string;
  results: Record<string, AnalysisResult>;
  errors: Record<string, DispatchFailure>;
};

export type DispatchProgress = {
  batchId: string;
  ok: boolean;
  completed: number;
  total: number;
};

/**
 * Converts a validated wire payload into a result. The caller's batch and
 * cluster ids win over whatever the payload claims.
 */
export function toAnalysisResult(
  payload: AnalysisPayload,
  origin: { batchId?: string; clusterId?: number | null },
  meta: { repairApplied?: boolean; attempts?: number } = {},
): AnalysisResult {
  const clusterId = origin.clusterId !== undefined ? origin.clusterId : (payload.cluster_id ?? null);
  const batchId = origin.batchId ?? payload.batch_id ?? (clusterId === null ? "manual" : String(clusterId));
  return {
    clusterId,
    batchId,
    personas: payload.new_personas.map((persona) => ({
      name: persona.name,
      description: persona.description,
      characteristics: persona.characteristics,
    })),
    assignments: payload.samples.map((sample) => ({
      id: sample.id,
      persona: sample.persona === null || sample.persona.trim() === "" ? null : sample.persona.trim(),
      ...(sample.confidence !== undefined ? { confidence: sample.confidence } : {}),
      ...(sample.analysis !== undefined ? { analysis: sample.analysis } : {}),
    })),
    calibrationReferenced: payload.calibration_referenced ?? false,
    repairApplied: meta.repairApplied ?? false,
    attempts: meta.attempts ?? 1,
  };
}
