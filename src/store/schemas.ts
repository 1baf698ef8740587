import { z } from "zod";

import { JsonObjectSchema } from "../json/schema.ts";

export const NOISE_CLUSTER_ID = -1;

export const CorpusRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  embedding: z.array(z.number()).optional(),
  clusterId: z.number().int().nullable().optional(),
  personaId: z.string().nullable().optional(),
  analysis: JsonObjectSchema.optional(),
  metadata: JsonObjectSchema.optional(),
});

export const RecordsDocumentSchema = z.object({
  embeddingModel: z.string().nullable().default(null),
  records: z.array(CorpusRecordSchema),
});

const HealthIssueSchema = z.object({
  type: z.enum(["few_clusters", "many_clusters", "high_noise", "moderate_noise", "low_silhouette"]),
  severity: z.enum(["warning", "info"]),
  message: z.string(),
  suggestion: z.string(),
});

export const ClusterSchema = z.object({
  id: z.number().int(),
  memberIds: z.array(z.string()),
  size: z.number().int().min(0),
  isNoise: z.boolean(),
  exemplarIds: z.array(z.string()),
  meanDistance: z.number().nullable(),
});

export const ClusterSnapshotSchema = z.object({
  createdAt: z.string(),
  algorithm: z.enum(["density", "kmeans"]),
  parameters: z.object({
    k: z.number().int().optional(),
    eps: z.number().optional(),
    minSamples: z.number().int().optional(),
    minClusterSize: z.number().int().optional(),
    seed: z.number().int(),
  }),
  totalRecords: z.number().int().min(0),
  clusterCount: z.number().int().min(0),
  noiseCount: z.number().int().min(0),
  noiseRatio: z.number().min(0).max(1),
  silhouette: z.number().nullable(),
  embeddingModel: z.string().nullable(),
  clusters: z.array(ClusterSchema),
  healthIssues: z.array(HealthIssueSchema),
});

export const ProposedPersonaSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  characteristics: JsonObjectSchema,
});

export const SampleAssignmentSchema = z.object({
  id: z.string().min(1),
  persona: z.string().nullable(),
  confidence: z.number().optional(),
  analysis: JsonObjectSchema.optional(),
});

export const AnalysisResultSchema = z.object({
  clusterId: z.number().int().nullable(),
  batchId: z.string().min(1),
  personas: z.array(ProposedPersonaSchema),
  assignments: z.array(SampleAssignmentSchema),
  calibrationReferenced: z.boolean().default(false),
  repairApplied: z.boolean().default(false),
  attempts: z.number().int().min(0).default(1),
});

export const DispatchFailureSchema = z.object({
  clusterId: z.number().int().nullable(),
  batchId: z.string().min(1),
  kind: z.enum(["transient_service", "malformed_response", "validation", "conflict", "not_found", "unknown"]),
  error: z.string(),
  attempts: z.number().int().min(0),
});

export const MergeEventSchema = z.object({
  kept: z.string(),
  absorbed: z.array(z.string()),
  similarity: z.number(),
  runId: z.string().optional(),
  mergedAt: z.string().optional(),
});

export const DraftSchema = z.object({
  runId: z.string().min(1),
  createdAt: z.string(),
  results: z.record(AnalysisResultSchema),
  errors: z.record(DispatchFailureSchema),
  personas: z.array(ProposedPersonaSchema),
  mergeEvents: z.array(MergeEventSchema),
  metadata: z.object({
    model: z.string(),
    embeddingModel: z.string().nullable(),
    mergeThreshold: z.number(),
    clusterIds: z.array(z.number().int()),
    batchCount: z.number().int().min(0),
    successCount: z.number().int().min(0),
    errorCount: z.number().int().min(0),
  }),
});

export const PersonaDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  characteristics: JsonObjectSchema,
  sampleIds: z.array(z.string()),
  sampleCount: z.number().int().min(0),
  confidence: z.number().min(0).max(1),
  sourceClusters: z.array(z.number().int()),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const RegistrySampleSchema = z.object({
  id: z.string().min(1),
  personaId: z.string().nullable(),
  clusterId: z.number().int().nullable(),
  batchId: z.string().nullable(),
  confidence: z.number().optional(),
  analysis: JsonObjectSchema.optional(),
  ingestedAt: z.string(),
});

export const RegistrySchema = z.object({
  personas: z.array(PersonaDescriptorSchema),
  samples: z.array(RegistrySampleSchema),
  unassignedIds: z.array(z.string()),
  mergeHistory: z.array(MergeEventSchema),
  updatedAt: z.string().nullable(),
});

export type CorpusRecord = z.infer<typeof CorpusRecordSchema>;
export type RecordsDocument = z.infer<typeof RecordsDocumentSchema>;
export type Cluster = z.infer<typeof ClusterSchema>;
export type ClusterSnapshot = z.infer<typeof ClusterSnapshotSchema>;
export type ProposedPersona = z.infer<typeof ProposedPersonaSchema>;
export type SampleAssignment = z.infer<typeof SampleAssignmentSchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type DispatchFailure = z.infer<typeof DispatchFailureSchema>;
export type MergeEvent = z.infer<typeof MergeEventSchema>;
export type Draft = z.infer<typeof DraftSchema>;
export type PersonaDescriptor = z.infer<typeof PersonaDescriptorSchema>;
export type RegistrySample = z.infer<typeof RegistrySampleSchema>;
export type Registry = z.infer<typeof RegistrySchema>;

export function emptyRegistry(): Registry {
  return { personas: [], samples: [], unassignedIds: [], mergeHistory: [], updatedAt: null };
}
