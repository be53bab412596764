import { InvalidInputError } from "../errors";
import type { EmbeddingVector } from "../llm/types";

export function assertTopK(topK: number): void {
    if (!Number.isInteger(topK) || topK <= 0) {
        throw new InvalidInputError(`top_k must be a positive integer, got ${topK}.`);
    }
}

export function assertDimension(vector: EmbeddingVector, dimension: number, what: string): void {
    if (vector.length !== dimension) {
        throw new InvalidInputError(`${what} has dimension ${vector.length}, expected ${dimension}.`);
    }
}
