import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

export const DEFAULT_CALIBRATION_PATH = fileURLToPath(new URL("../../references/calibration.md", import.meta.url));

const FALLBACK_CALIBRATION = [
  "# Calibration Reference",
  "",
  "Use consistent scoring scales:",
  "- Formality: 1 (very casual) to 10 (highly formal)",
  "- Warmth: 1 (cold) to 10 (effusive)",
  "- Authority: 1 (deferential) to 10 (directive)",
  "- Directness: 1 (very indirect) to 10 (blunt)",
].join("\n");

export const ANALYSIS_SYSTEM_PROMPT =
  "You are a writing-style analyst. You group writing samples into named style personas and score them on fixed " +
  "scales. You answer with a single JSON object and nothing else.";

export function loadCalibration(path: string = DEFAULT_CALIBRATION_PATH): string {
  if (!existsSync(path)) {
    return FALLBACK_CALIBRATION;
  }
  return readFileSync(path, "utf8").trim();
}

export type PromptRecord = {
  id: string;
  text: string;
};

export type PromptContext = {
  clusterId: number;
  batchId: string;
  clusterSize: number;
  exemplarIds: string[];
  records: PromptRecord[];
  calibration: string;
};

const RULE = "=".repeat(60);

function outputInstructions(clusterId: number, batchId: string): string {
  const example = {
    batch_id: batchId,
    cluster_id: clusterId,
    calibration_referenced: true,
    new_personas: [
      {
        name: "Persona Name",
        description: "When this persona is used",
        characteristics: {
          tone: ["word1", "word2"],
          formality: 5,
          warmth: 6,
          authority: 7,
          directness: 8,
          typical_greeting: "Hi there",
          uses_contractions: true,
        },
      },
    ],
    samples: [
      {
        id: "<record id>",
        persona: "Persona Name",
        confidence: 0.85,
        analysis: {
          tone_vectors: { formality: 5, warmth: 6, authority: 7, directness: 8 },
          sentence_style: "short, punchy",
          notable_phrases: ["phrase1"],
        },
      },
    ],
  };

  return [
    "# Output Instructions",
    "",
    "Analyze every record above and output ONE JSON object with this structure:",
    "",
    "```json",
    JSON.stringify(example, null, 2),
    "```",
    "",
    "Rules:",
    "- `samples` has exactly one object per record, using the record id shown in its heading.",
    "- `persona` names a persona from `new_personas` or one you have used before.",
    "- Scores use the calibration scales above.",
  ].join("\n");
}

/** Renders the full analysis request for one batch. */
export function buildAnalysisPrompt(context: PromptContext): string {
  const parts: string[] = [context.calibration, "", RULE, ""];

  parts.push(`# Cluster ${context.clusterId} Analysis`, "");
  parts.push(`**Cluster size:** ${context.clusterSize} records`);
  parts.push(`**Records to analyze:** ${context.records.length}`);
  if (context.exemplarIds.length > 0) {
    parts.push(`**Centroid examples:** ${context.exemplarIds.join(", ")}`);
  }

  parts.push("", RULE, "", "# Records to Analyze", "");
  context.records.forEach((record, index) => {
    parts.push(`## Record ${index + 1}: ${record.id}`, "", "```", record.text, "```", "", "-".repeat(40), "");
  });

  parts.push(RULE, "", outputInstructions(context.clusterId, context.batchId));
  return parts.join("\n");
}

/** Stricter follow-up used after a response could not be parsed or validated. */
export function buildRetryPrompt(originalPrompt: string, reason: string): string {
  return [
    originalPrompt,
    "",
    "---",
    "CRITICAL: Your response MUST be valid JSON only.",
    `Previous attempt failed with: ${reason}`,
    "",
    "Output ONLY a JSON object starting with { and ending with }.",
    "No markdown code fences. No explanation text.",
  ].join("\n");
}
