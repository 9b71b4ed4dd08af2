import { EmbeddingDimensionError, ValidationError } from "../domain/errors.js";
import { Modality } from "../domain/types.js";

export function l2Distance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}.`);
  }

  let sum = 0;
  for (let index = 0; index < a.length; index += 1) {
    const diff = a[index] - b[index];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

export function assertEmbeddingDimension(
  modality: Modality,
  embedding: number[],
  expected: number,
): void {
  if (embedding.length !== expected) {
    throw new EmbeddingDimensionError(modality, expected, embedding.length);
  }
  if (!embedding.every((value) => Number.isFinite(value))) {
    throw new ValidationError(`Embedding for ${modality} contains non-finite values.`);
  }
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
