export function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/** Cosine similarity; zero vectors are dissimilar to everything. */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[],
  normA = vectorNorm(a),
  normB = vectorNorm(b)
): number {
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot(a, b) / (normA * normB);
}
