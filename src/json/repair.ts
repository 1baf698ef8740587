export type JsonParseResult =
  | { success: true; data: unknown; error: null; repairApplied: boolean; rawExtracted: string }
  | { success: false; data: null; error: string; repairApplied: boolean; rawExtracted: string };

export type SafeParseOptions = {
  strict?: boolean;
};

const FENCE_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)```/g;

function scanStrings(text: string, visit: (char: string, index: number) => void): { inString: boolean; danglingEscape: boolean } {
  let inString = false;
  let escapeNext = false;
  for (let i = 0; i < text.length; i += 1) {
    const char = text.charAt(i);
    if (escapeNext) {
      escapeNext = false;
      continue;
    }
    if (inString) {
      if (char === "\\") {
        escapeNext = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
      continue;
    }
    visit(char, i);
  }
  return { inString, danglingEscape: escapeNext };
}

/**
 * Pulls the JSON payload out of a model response: the first fenced block that
 * starts like JSON, else the first balanced `{...}` or `[...]` span. Braces inside
 * string literals are ignored. Unbalanced input returns everything from the
 * opening delimiter on, so truncation repair can finish it.
 */
export function extractJsonBlock(input: string): string {
  let text = input.trim();

  for (const match of text.matchAll(FENCE_PATTERN)) {
    const cleaned = (match[1] ?? "").trim();
    if (cleaned.startsWith("{") || cleaned.startsWith("[")) {
      return cleaned;
    }
  }

  if (text.startsWith("```json")) {
    text = text.slice(7);
  } else if (text.startsWith("```")) {
    text = text.slice(3);
  }
  if (text.endsWith("```")) {
    text = text.slice(0, -3);
  }
  text = text.trim();

  const firstBrace = text.indexOf("{");
  const firstBracket = text.indexOf("[");
  if (firstBrace === -1 && firstBracket === -1) {
    return text;
  }

  const start = firstBrace === -1 ? firstBracket : firstBracket === -1 ? firstBrace : Math.min(firstBrace, firstBracket);
  const open = text.charAt(start);
  const close = open === "{" ? "}" : "]";
  const tail = text.slice(start);

  let depth = 0;
  let end = -1;
  scanStrings(tail, (char, index) => {
    if (end !== -1) {
      return;
    }
    if (char === open) {
      depth += 1;
    } else if (char === close) {
      depth -= 1;
      if (depth === 0) {
        end = index + 1;
      }
    }
  });

  return end === -1 ? tail : tail.slice(0, end);
}

/** Drops commas that directly precede a closing brace or bracket. */
export function removeTrailingCommas(text: string): string {
  const drop = new Set<number>();
  scanStrings(text, (char, index) => {
    if (char !== ",") {
      return;
    }
    let next = index + 1;
    while (next < text.length && /\s/.test(text.charAt(next))) {
      next += 1;
    }
    const following = text.charAt(next);
    if (following === "}" || following === "]") {
      drop.add(index);
    }
  });

  if (drop.size === 0) {
    return text;
  }
  let out = "";
  for (let i = 0; i < text.length; i += 1) {
    if (!drop.has(i)) {
      out += text.charAt(i);
    }
  }
  return out;
}

/**
 * Closes a response that was cut off mid-document: terminates an open string,
 * then appends the missing closers innermost first.
 */
export function repairTruncatedJson(text: string): string {
  const closers: string[] = [];
  const { inString, danglingEscape } = scanStrings(text, (char) => {
    if (char === "{") {
      closers.push("}");
    } else if (char === "[") {
      closers.push("]");
    } else if ((char === "}" || char === "]") && closers[closers.length - 1] === char) {
      closers.pop();
    }
  });

  let out = text;
  if (inString) {
    if (danglingEscape) {
      out = out.slice(0, -1);
    }
    out += '"';
  } else {
    out = out.trimEnd();
    if (out.endsWith(",")) {
      out = out.slice(0, -1);
    } else if (out.endsWith(":")) {
      out += "null";
    }
  }

  return out + closers.reverse().join("");
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parses possibly malformed model output. Each repair runs only when the
 * previous form failed to parse. Never throws.
 */
export function safeParseJson(text: string, options: SafeParseOptions = {}): JsonParseResult {
  const extracted = extractJsonBlock(text);

  const direct = tryParse(extracted);
  if (direct.ok) {
    return { success: true, data: direct.value, error: null, repairApplied: false, rawExtracted: extracted };
  }
  if (options.strict) {
    return {
      success: false,
      data: null,
      error: `JSON parse error: ${direct.message}`,
      repairApplied: false,
      rawExtracted: extracted,
    };
  }

  const withoutCommas = removeTrailingCommas(extracted);
  const commaRepaired = tryParse(withoutCommas);
  if (commaRepaired.ok) {
    return { success: true, data: commaRepaired.value, error: null, repairApplied: true, rawExtracted: extracted };
  }

  const closed = removeTrailingCommas(repairTruncatedJson(withoutCommas));
  const truncationRepaired = tryParse(closed);
  if (truncationRepaired.ok) {
    return { success: true, data: truncationRepaired.value, error: null, repairApplied: true, rawExtracted: extracted };
  }

  return {
    success: false,
    data: null,
    error: `JSON parse error after repairs: ${truncationRepaired.message}`,
    repairApplied: false,
    rawExtracted: extracted,
  };
}
