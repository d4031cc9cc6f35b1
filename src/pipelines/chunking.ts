import { normalizeText } from "../utils/text.js";

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 100;
export const DEFAULT_SECTION_TITLE = "Introduction";

export interface SectionBlock {
  title: string;
  body: string;
}

export interface SectionChunk {
  section: string;
  text: string;
}

/**
 * Splits a markdown document on `#` headings. Text before the first heading
 * belongs to a section named "Introduction"; headings with no body are dropped.
 */
export function splitIntoSections(text: string): SectionBlock[] {
  const sections: SectionBlock[] = [];
  let currentTitle = DEFAULT_SECTION_TITLE;
  let currentLines: string[] = [];

  const flush = () => {
    const body = normalizeText(currentLines.join("\n"));
    if (body) {
      sections.push({ title: currentTitle, body });
    }
    currentLines = [];
  };

  for (const line of normalizeText(text).split("\n")) {
    const heading = /^\s*#{1,6}\s*(.*)$/.exec(line);
    if (heading) {
      flush();
      currentTitle = heading[1].replace(/#+\s*$/, "").trim() || currentTitle;
      continue;
    }
    currentLines.push(line);
  }
  flush();

  return sections;
}

export function chunkDocument(
  text: string,
  maxChars: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): SectionChunk[] {
  const chunks: SectionChunk[] = [];
  for (const section of splitIntoSections(text)) {
    for (const piece of splitIntoChunks(section.body, maxChars, overlap)) {
      chunks.push({ section: section.title, text: piece });
    }
  }
  return chunks;
}

export function splitIntoChunks(
  text: string,
  maxChars: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): string[] {
  if (maxChars < 1) {
    throw new RangeError("maxChars must be at least 1");
  }
  const safeOverlap = Math.min(Math.max(overlap, 0), maxChars - 1);
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }
  if (normalized.length <= maxChars) {
    return [normalized];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < normalized.length) {
    const hardEnd = Math.min(start + maxChars, normalized.length);
    let end = hardEnd;

    if (hardEnd < normalized.length) {
      const boundary = findLastBoundary(normalized.slice(start, hardEnd));
      // Only back off to a boundary in the second half of the window.
      if (boundary >= Math.floor(maxChars * 0.5)) {
        end = start + boundary;
      }
    }

    const piece = normalized.slice(start, end).trim();
    if (piece) {
      chunks.push(piece);
    }

    if (end >= normalized.length) {
      break;
    }

    const nextStart = end - safeOverlap;
    start = nextStart > start ? nextStart : end;
  }

  return chunks;
}

function findLastBoundary(window: string): number {
  const candidates = [
    window.lastIndexOf("\n\n"),
    window.lastIndexOf("\n"),
    window.lastIndexOf(". "),
    window.lastIndexOf("! "),
    window.lastIndexOf("? "),
    window.lastIndexOf("; "),
    window.lastIndexOf(", "),
    window.lastIndexOf(" "),
  ];
  const best = Math.max(...candidates);
  return best < 0 ? window.length : best + 1;
}
