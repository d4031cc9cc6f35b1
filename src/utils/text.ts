const WORD_REGEX = /[\p{L}\p{N}]+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Cuts `text` to at most `maxChars` characters, ending in "..." when shortened.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  if (maxChars <= 3) {
    return text.slice(0, maxChars);
  }
  return `${text.slice(0, maxChars - 3)}...`;
}

/** Distinct lower-cased word tokens, in first-seen order. */
export function tokenize(text: string): string[] {
  return [...new Set(tokenizeForBm25(text))];
}

export function tokenizeForBm25(text: string): string[] {
  const words = text.toLowerCase().match(WORD_REGEX) ?? [];
  const expanded: string[] = [];
  for (const word of words) {
    expanded.push(...expandTokenVariants(word));
  }
  return expanded;
}

export function scoreByTokenOverlap(query: string, target: string): number {
  const queryTokens = new Set(tokenize(query));
  if (queryTokens.size === 0) {
    return 0;
  }

  const targetTokens = new Set(tokenize(target));
  if (targetTokens.size === 0) {
    return 0;
  }

  let overlap = 0;
  for (const token of queryTokens) {
    if (targetTokens.has(token)) {
      overlap += 1;
    }
  }

  const tokenScore = overlap / Math.sqrt(queryTokens.size * targetTokens.size);
  const ngramScore = scoreByCharNgramJaccard(query, target);

  return Math.max(tokenScore, ngramScore * 0.85);
}

// Plural "s" is folded for ASCII words of four letters or more.
function expandTokenVariants(word: string): string[] {
  if (word.length < 2) {
    return [];
  }
  if (word.length >= 4 && word.endsWith("s") && /^[a-z0-9]+$/.test(word)) {
    return [word, word.slice(0, -1)];
  }
  return [word];
}

function scoreByCharNgramJaccard(query: string, target: string): number {
  const qNgrams = buildCharNgrams(query, 2);
  const tNgrams = buildCharNgrams(target.slice(0, 1200), 2);

  if (qNgrams.size === 0 || tNgrams.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const item of qNgrams) {
    if (tNgrams.has(item)) {
      intersection += 1;
    }
  }

  const union = qNgrams.size + tNgrams.size - intersection;
  return union > 0 ? intersection / union : 0;
}

function buildCharNgrams(input: string, n: number): Set<string> {
  const compact = input.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
  const grams = new Set<string>();
  for (let i = 0; i <= compact.length - n; i += 1) {
    grams.add(compact.slice(i, i + n));
  }
  return grams;
}
