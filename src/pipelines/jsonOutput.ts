const FENCE_PATTERN = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = FENCE_PATTERN.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * Pulls the first JSON object out of a model reply that may be fenced or
 * wrapped in prose. Returns undefined when no object parses.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const body = stripCodeFences(text);
  let start = body.indexOf("{");
  while (start >= 0) {
    const end = findObjectEnd(body, start);
    if (end < 0) {
      return undefined;
    }
    const parsed = tryParse(body.slice(start, end + 1));
    if (isPlainObject(parsed)) {
      return parsed;
    }
    start = body.indexOf("{", start + 1);
  }
  return undefined;
}

/** Index of the brace closing the object opened at `start`, or -1. */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
