export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  if (length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Min-max scales scores into [0, 1]; a constant list maps to all ones. */
export function minMaxNormalize(scores: number[]): number[] {
  if (scores.length === 0) {
    return [];
  }
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  if (max - min < 1e-12) {
    return scores.map(() => 1);
  }
  return scores.map((score) => (score - min) / (max - min));
}
