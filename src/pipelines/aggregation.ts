import {
  LocalEvidence,
  LocalSource,
  NormalizedContext,
  WebEvidence,
  WebSource,
} from "../domain/types.js";
import { collapseWhitespace, truncateText } from "../utils/text.js";

export const MAX_EXCERPT_CHARS = 400;
export const DEFAULT_BLOCK_BUDGET = 2000;

export interface AggregateOptions {
  /** Character budget for local excerpts; normalization stops once it is spent. */
  localBudget?: number;
  webBudget?: number;
}

/**
 * Normalizes adapter output into citation-ready sources and the prompt blocks
 * rendered from them. Input order is kept; the adapters already rank it.
 */
export function aggregate(
  localHits: LocalEvidence[],
  webHits: WebEvidence[],
  options: AggregateOptions = {},
): NormalizedContext {
  const localSources = normalizeLocal(localHits, options.localBudget ?? DEFAULT_BLOCK_BUDGET);
  const webSources = normalizeWeb(webHits, options.webBudget ?? DEFAULT_BLOCK_BUDGET);

  return {
    local_sources: localSources,
    web_sources: webSources,
    local_block: localSources.map(renderLocalLine).join("\n"),
    web_block: webSources.map(renderWebLine).join("\n"),
  };
}

export function renderLocalLine(source: LocalSource): string {
  const label = source.section ? `${source.chunk_id} | ${source.section}` : source.chunk_id;
  return `[${source.ref}] ${label}: ${source.text}`;
}

export function renderWebLine(source: WebSource): string {
  const published = source.published_at ? ` (${source.published_at})` : "";
  return `[${source.ref}] ${source.title} <${source.url}>${published}: ${source.snippet}`;
}

function normalizeLocal(hits: LocalEvidence[], budget: number): LocalSource[] {
  const seen = new Set<string>();
  const sources: LocalSource[] = [];
  let remaining = budget;

  for (const hit of hits) {
    if (remaining <= 0) {
      break;
    }
    const chunkId = hit.chunk_id.trim();
    const text = truncateText(collapseWhitespace(hit.text), MAX_EXCERPT_CHARS);
    if (!chunkId || !text || seen.has(chunkId)) {
      continue;
    }
    seen.add(chunkId);

    const source: LocalSource = {
      ref: `L${sources.length + 1}`,
      source_tag: "local",
      chunk_id: chunkId,
      text,
      score: hit.score,
    };
    const section = hit.section ? collapseWhitespace(hit.section) : "";
    if (section) {
      source.section = section;
    }
    sources.push(source);
    remaining -= text.length;
  }

  return sources;
}

function normalizeWeb(hits: WebEvidence[], budget: number): WebSource[] {
  const seen = new Set<string>();
  const sources: WebSource[] = [];
  let remaining = budget;

  for (const hit of hits) {
    if (remaining <= 0) {
      break;
    }
    const url = hit.url.trim();
    if (!url || seen.has(url)) {
      continue;
    }
    seen.add(url);

    const snippet = truncateText(collapseWhitespace(hit.snippet), MAX_EXCERPT_CHARS);
    const source: WebSource = {
      ref: `W${sources.length + 1}`,
      source_tag: "web",
      url,
      title: collapseWhitespace(hit.title) || url,
      snippet,
      score: hit.score,
    };
    const publishedAt = hit.published_at?.trim();
    if (publishedAt) {
      source.published_at = publishedAt;
    }
    sources.push(source);
    remaining -= snippet.length;
  }

  return sources;
}
