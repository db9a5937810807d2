export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Maximal marginal relevance selection. Returns indexes into `candidates`,
 * in selection order.
 */
export function maximalMarginalRelevance(
  queryVector: number[],
  candidates: number[][],
  k: number,
  lambdaMult = 0.5
): number[] {
  const limit = Math.min(Math.max(0, k), candidates.length);
  if (limit === 0) {
    return [];
  }

  const relevance = candidates.map((candidate) => cosineSimilarity(queryVector, candidate));
  const selected: number[] = [];
  const remaining = new Set(candidates.map((_candidate, index) => index));

  while (selected.length < limit) {
    let bestIndex = -1;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (const index of remaining) {
      const redundancy = selected.reduce(
        (max, chosen) => Math.max(max, cosineSimilarity(candidates[index], candidates[chosen])),
        selected.length === 0 ? 0 : Number.NEGATIVE_INFINITY
      );
      const score = lambdaMult * relevance[index] - (1 - lambdaMult) * redundancy;
      if (score > bestScore) {
        bestScore = score;
        bestIndex = index;
      }
    }

    selected.push(bestIndex);
    remaining.delete(bestIndex);
  }

  return selected;
}
