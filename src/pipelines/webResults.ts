import { WebEvidence } from "../domain/types.js";
import { RawWebResult } from "../infra/search/types.js";

export const MAX_SNIPPET_CHARS = 400;

const MAX_FLATTEN_DEPTH = 2;
const MAX_OBJECT_ENTRIES = 10;
const MAX_ARRAY_ITEMS = 5;

export function normalizeWebResults(results: RawWebResult[], limit: number): WebEvidence[] {
  return results.slice(0, Math.max(limit, 0)).map((result) => {
    const url = result.url?.trim() ?? "";
    const evidence: WebEvidence = {
      source_tag: "web",
      url,
      title: result.title?.trim() || url || "Untitled page",
      snippet: cleanSnippet(result.content ?? "").slice(0, MAX_SNIPPET_CHARS),
      score: typeof result.score === "number" && Number.isFinite(result.score) ? result.score : 0,
    };
    const publishedAt = result.published_date?.trim();
    if (publishedAt) {
      evidence.published_at = publishedAt;
    }
    return evidence;
  });
}

/**
 * Some pages come back as serialized objects; render those as `key: value` text.
 */
export function cleanSnippet(raw: string): string {
  const snippet = raw.trim();
  if (!snippet.startsWith("{") && !snippet.startsWith("[")) {
    return snippet;
  }

  const parsed = parseLooseJson(snippet);
  if (parsed === undefined) {
    return snippet.replace(/\\/g, "").trim();
  }
  return formatStructuredData(parsed, 0);
}

function parseLooseJson(text: string): unknown {
  for (const candidate of [text, text.replace(/'/g, '"')]) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return undefined;
}

function formatStructuredData(data: unknown, depth: number): string {
  if (depth >= MAX_FLATTEN_DEPTH) {
    return (typeof data === "string" ? data : JSON.stringify(data) ?? "").slice(0, 200);
  }

  if (Array.isArray(data)) {
    return data
      .slice(0, MAX_ARRAY_ITEMS)
      .map((item) => formatStructuredData(item, depth + 1))
      .join(", ");
  }

  if (data !== null && typeof data === "object") {
    return Object.entries(data)
      .slice(0, MAX_OBJECT_ENTRIES)
      .map(([key, value]) => {
        const rendered =
          value !== null && typeof value === "object"
            ? formatStructuredData(value, depth + 1)
            : String(value);
        return `${key}: ${rendered}`;
      })
      .join("; ");
  }

  return String(data);
}
