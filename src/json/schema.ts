import { z } from "zod";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

const ProposedPersonaSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(""),
  characteristics: JsonObjectSchema.default({}),
});

const SampleAssignmentSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
  persona: z.string().nullable(),
  confidence: z.number().min(0).max(1).optional(),
  analysis: JsonObjectSchema.optional(),
});

/** Wire shape requested from the analysis service (and accepted from batch files). */
export const AnalysisPayloadSchema = z.object({
  cluster_id: z.number().int().nullable().optional(),
  batch_id: z.string().optional(),
  calibration_referenced: z.boolean().optional(),
  new_personas: z.array(ProposedPersonaSchema).default([]),
  samples: z.array(SampleAssignmentSchema).min(1, "'samples' array is empty"),
});

export type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;
export type ProposedPersonaPayload = z.infer<typeof ProposedPersonaSchema>;
export type SampleAssignmentPayload = z.infer<typeof SampleAssignmentSchema>;

export function formatIssuePath(path: Array<string | number>): string {
  let out = "";
  for (const segment of path) {
    out += typeof segment === "number" ? `[${segment}]` : out ? `.${segment}` : segment;
  }
  return out || "root";
}

export function formatZodIssue(issue: z.ZodIssue): string {
  return `${formatIssuePath(issue.path)}: ${issue.message}`;
}

export type AnalysisParseResult = { ok: true; payload: AnalysisPayload } | { ok: false; reason: string };

export function parseAnalysisPayload(data: unknown): AnalysisParseResult {
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    return { ok: false, reason: "Root must be an object" };
  }
  if (!("samples" in data)) {
    return { ok: false, reason: "Missing 'samples' array" };
  }
  if (!Array.isArray(data.samples)) {
    return { ok: false, reason: "'samples' must be an array" };
  }

  const parsed = AnalysisPayloadSchema.safeParse(data);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return { ok: false, reason: first ? formatZodIssue(first) : "Invalid analysis payload" };
  }
  return { ok: true, payload: parsed.data };
}

export function validateAnalysisSchema(data: unknown): { valid: boolean; reason: string } {
  const result = parseAnalysisPayload(data);
  return result.ok ? { valid: true, reason: "" } : { valid: false, reason: result.reason };
}
