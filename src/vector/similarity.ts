/**
 * Vector math for the in-process index and the local embedding model.
 */

import type { EmbeddingVector } from "../llm/types";

export function dot(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }

    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

export function magnitude(vector: readonly number[]): number {
    let sum = 0;
    for (const value of vector) {
        sum += value * value;
    }
    return Math.sqrt(sum);
}

/** Unit-length copy of `vector`. A zero vector stays all zeros. */
export function l2Normalize(vector: readonly number[]): EmbeddingVector {
    const norm = magnitude(vector);
    if (norm === 0) {
        return vector.map(() => 0);
    }
    return vector.map((value) => value / norm);
}

/** Cosine similarity in [-1, 1]; 0 when either vector has zero magnitude. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length === 0 && b.length === 0) {
        return 0;
    }

    const norms = magnitude(a) * magnitude(b);
    if (norms === 0) {
        return 0;
    }
    return dot(a, b) / norms;
}
