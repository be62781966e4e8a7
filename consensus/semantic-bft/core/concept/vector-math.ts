// consensus/semantic-bft/core/concept/vector-math.ts
// Vector statistics shared by the verifier and the analytics

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Population variance (divides by n)
 */
export function populationVariance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mu = mean(values);
  let sum = 0;
  for (const value of values) sum += (value - mu) * (value - mu);
  return sum / values.length;
}

export function stddev(values: readonly number[]): number {
  return Math.sqrt(populationVariance(values));
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export function norm(values: readonly number[]): number {
  return Math.sqrt(dot(values, values));
}

/**
 * 0 when lengths differ or either vector has zero norm
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) return 0;
  const normA = norm(a);
  const normB = norm(b);
  if (normA === 0 || normB === 0) return 0;
  return dot(a, b) / (normA * normB);
}

/**
 * Dense matrix-vector product; rows of `matrix` must match `vector` length
 */
export function multiply(matrix: readonly (readonly number[])[], vector: readonly number[]): number[] {
  return matrix.map(row => dot(row, vector));
}
