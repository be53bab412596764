import type { Logger } from "pino";
import { InvalidInputError, ModelUnavailableError, errorMessage } from "../errors";
import { Lazy } from "../utils/lazy";
import type { EmbedOptions, EmbeddingProvider, EmbeddingVector } from "./types";

export interface EmbedderOptions {
    dimension: number;
    loadProvider: () => Promise<EmbeddingProvider>;
    logger?: Logger;
}

function isBlank(text: string): boolean {
    return text.trim().length === 0;
}

/**
 * Maps text to fixed-dimension vectors. Blank text maps to the zero vector without touching
 * the model; everything else goes through a provider that is loaded once, on first use.
 */
export class Embedder {
    readonly dimension: number;

    private readonly provider: Lazy<EmbeddingProvider>;
    private readonly logger?: Logger;

    constructor(options: EmbedderOptions) {
        if (!Number.isInteger(options.dimension) || options.dimension <= 0) {
            throw new InvalidInputError(`Embedding dimension must be a positive integer, got ${options.dimension}.`);
        }

        this.dimension = options.dimension;
        this.logger = options.logger;
        this.provider = new Lazy(async () => {
            const started = Date.now();
            const provider = await options.loadProvider();
            if (provider.dimension !== this.dimension) {
                throw new Error(
                    `Embedding provider reports dimension ${provider.dimension}, expected ${this.dimension}.`
                );
            }
            this.logger?.info(
                { provider: provider.config.provider, model: provider.config.model, durationMs: Date.now() - started },
                "Embedding model loaded."
            );
            return provider;
        });
    }

    isLoaded(): boolean {
        return this.provider.isReady();
    }

    zeroVector(): EmbeddingVector {
        return new Array<number>(this.dimension).fill(0);
    }

    async embed(text: string, options?: EmbedOptions): Promise<EmbeddingVector> {
        const [vector] = await this.embedMany([text], options);
        return vector ?? this.zeroVector();
    }

    async embedMany(texts: readonly string[], options?: EmbedOptions): Promise<EmbeddingVector[]> {
        const pending: { position: number; text: string }[] = [];
        texts.forEach((text, position) => {
            if (!isBlank(text)) {
                pending.push({ position, text });
            }
        });

        const vectors = texts.map(() => this.zeroVector());
        if (pending.length === 0) {
            return vectors;
        }

        const provider = await this.loadProvider();

        let encoded: EmbeddingVector[];
        try {
            encoded = await provider.embedDocuments(
                pending.map((entry) => entry.text),
                options
            );
        } catch (error) {
            throw new ModelUnavailableError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
        }

        if (encoded.length !== pending.length) {
            throw new ModelUnavailableError(
                `Embedding provider returned ${encoded.length} vectors for ${pending.length} texts.`
            );
        }

        encoded.forEach((vector, i) => {
            if (vector.length !== this.dimension) {
                throw new ModelUnavailableError(
                    `Embedding provider returned a vector of dimension ${vector.length}, expected ${this.dimension}.`
                );
            }
            vectors[pending[i].position] = vector;
        });

        return vectors;
    }

    private async loadProvider(): Promise<EmbeddingProvider> {
        try {
            return await this.provider.get();
        } catch (error) {
            this.logger?.error({ err: error }, "Embedding model failed to load.");
            throw new ModelUnavailableError(`Embedding model unavailable: ${errorMessage(error)}`, { cause: error });
        }
    }
}
