import { LocalEvidence, WebEvidence } from "../domain/types.js";
import { tokenize, tokenizeForBm25 } from "../utils/text.js";
import { minMaxNormalize } from "../utils/vector.js";

export interface LocalRerankWeights {
  vector: number;
  bm25: number;
}

export interface WebRerankWeights {
  recency: number;
  authority: number;
  relevance: number;
}

const AUTHORITATIVE_DOMAINS = [
  "wikipedia.org",
  "nature.com",
  "science.org",
  "arxiv.org",
  "ieee.org",
  "acm.org",
];

const DAY_MS = 24 * 60 * 60 * 1000;

const NEUTRAL_SCORE = 0.5;

/**
 * Reorders local candidates by a weighted mix of their (min-max normalized)
 * retrieval score and a BM25 score computed over the candidate set itself.
 * Returned items carry the mixed score.
 */
export function rerankLocal(
  query: string,
  items: LocalEvidence[],
  weights: LocalRerankWeights,
): LocalEvidence[] {
  if (items.length === 0) {
    return [];
  }

  const vectorScores = minMaxNormalize(items.map((item) => item.score));
  const bm25Scores = scoreBm25OverCandidates(
    query,
    items.map((item) => item.text),
  );

  return items
    .map((item, i) => ({
      ...item,
      score: weights.vector * vectorScores[i] + weights.bm25 * bm25Scores[i],
    }))
    .sort((a, b) => b.score - a.score);
}

/**
 * Reorders web results by recency, domain authority and provider relevance.
 */
export function rerankWeb(
  items: WebEvidence[],
  weights: WebRerankWeights,
  now: Date = new Date(),
): WebEvidence[] {
  if (items.length === 0) {
    return [];
  }

  const relevanceScores = minMaxNormalize(items.map((item) => item.score));

  return items
    .map((item, i) => ({
      ...item,
      score:
        weights.recency * scoreRecency(item.published_at, now) +
        weights.authority * scoreAuthority(item.url) +
        weights.relevance * relevanceScores[i],
    }))
    .sort((a, b) => b.score - a.score);
}

/**
 * 1.0 within 30 days, linear decay up to a year, 0.1 beyond that.
 * Missing or unparseable dates score 0.5.
 */
export function scoreRecency(publishedAt: string | undefined, now: Date): number {
  if (!publishedAt) {
    return NEUTRAL_SCORE;
  }
  const published = Date.parse(publishedAt);
  if (Number.isNaN(published)) {
    return NEUTRAL_SCORE;
  }

  const days = Math.floor((now.getTime() - published) / DAY_MS);
  if (days <= 30) {
    return 1;
  }
  if (days <= 365) {
    return 1 - ((days - 30) / 365) * 0.9;
  }
  return 0.1;
}

export function scoreAuthority(url: string): number {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return NEUTRAL_SCORE;
  }

  if (AUTHORITATIVE_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`))) {
    return 1;
  }
  if (host.endsWith(".edu") || host.endsWith(".gov")) {
    return 0.9;
  }
  if (host.endsWith(".org")) {
    return 0.7;
  }
  if (host.endsWith(".com") || host.endsWith(".net")) {
    return 0.6;
  }
  return NEUTRAL_SCORE;
}

function scoreBm25OverCandidates(query: string, texts: string[]): number[] {
  const queryTerms = tokenize(query);
  if (queryTerms.length === 0) {
    return texts.map(() => 0);
  }

  const k1 = 1.5;
  const b = 0.75;
  const docs = texts.map((text) => tokenizeForBm25(text));
  const avgDocLength = docs.reduce((sum, doc) => sum + doc.length, 0) / docs.length;

  const docFreq = new Map<string, number>();
  for (const doc of docs) {
    const unique = new Set(doc);
    for (const term of queryTerms) {
      if (unique.has(term)) {
        docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      }
    }
  }

  const scores = docs.map((doc) => {
    let score = 0;
    for (const term of queryTerms) {
      const tf = doc.filter((token) => token === term).length;
      if (tf === 0) {
        continue;
      }
      const df = docFreq.get(term) ?? 1;
      const idf = Math.log(1 + (docs.length - df + 0.5) / (df + 0.5));
      score +=
        (idf * (tf * (k1 + 1))) / (tf + k1 * (1 - b + b * (doc.length / Math.max(avgDocLength, 1))));
    }
    return score;
  });

  const max = Math.max(...scores);
  return max > 0 ? scores.map((score) => score / max) : scores.map(() => 0);
}
