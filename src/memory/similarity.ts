import { DimensionMismatchError } from "../errors.js";

/** Norm products below this are treated as zero vectors. */
const MIN_NORM_PRODUCT = 1e-10;

const SECONDS_PER_HOUR = 3600;

export function vectorNorm(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) sum += value * value;
  return Math.sqrt(sum);
}

/** dot(a, b) / (|a| * |b|); 0 when either vector is (near) zero. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  for (let i = 0; i < a.length; i += 1) dot += a[i] * b[i];

  const normProduct = vectorNorm(a) * vectorNorm(b);
  if (normProduct < MIN_NORM_PRODUCT) return 0;
  return dot / normProduct;
}

/** exp(-factor * ageHours), for entries `ageSeconds` old. */
export function timeDecay(ageSeconds: number, factor: number): number {
  return Math.exp(-factor * (ageSeconds / SECONDS_PER_HOUR));
}
