import type { Logger } from "pino";
import type { EmbeddingModelConfig } from "../../config/types";
import { mergeLimits } from "../../utils/providerUtils";
import { l2Normalize } from "../../vector/similarity";
import { BaseEmbeddingProvider } from "../base";
import type { EmbeddingVector } from "../types";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const SIGN_SEED = 0x9747b28c;

const WORD_WEIGHT = 1;
const TRIGRAM_WEIGHT = 0.5;

export function tokenize(text: string): string[] {
    return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function fnv1a(value: string, seed: number = FNV_OFFSET_BASIS): number {
    let hash = seed;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, FNV_PRIME);
    }
    return hash >>> 0;
}

function addFeature(vector: number[], feature: string, weight: number): void {
    const slot = fnv1a(feature) % vector.length;
    const sign = (fnv1a(feature, SIGN_SEED) & 1) === 0 ? 1 : -1;
    vector[slot] += sign * weight;
}

/**
 * Signed feature hashing over lowercase words and their character trigrams, L2-normalized.
 * Identical input always yields a bit-identical vector; text without any word
 * characters maps to the zero vector.
 */
export function featureHashEmbedding(text: string, dimension: number): EmbeddingVector {
    const vector = new Array<number>(dimension).fill(0);

    for (const token of tokenize(text)) {
        addFeature(vector, `w:${token}`, WORD_WEIGHT);

        if (token.length > 3) {
            for (let i = 0; i + 3 <= token.length; i++) {
                addFeature(vector, `t:${token.slice(i, i + 3)}`, TRIGRAM_WEIGHT);
            }
        }
    }

    return l2Normalize(vector);
}

/** Local embedding model: no network, no weights to download. */
export class HashingEmbeddingProvider extends BaseEmbeddingProvider {
    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!Number.isInteger(config.dimension) || config.dimension <= 0) {
            throw new Error(`Embedding dimension must be a positive integer, got ${config.dimension}.`);
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 256,
                    concurrency: 1,
                    retries: 0,
                },
                config.limits
            ),
            logger
        );
    }

    protected async sendEmbeddingRequest(texts: string[]): Promise<EmbeddingVector[]> {
        return texts.map((text) => featureHashEmbedding(text, this.config.dimension));
    }
}
