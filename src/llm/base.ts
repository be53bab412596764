import type Bottleneck from "bottleneck";
import pLimit from "p-limit";
import pRetry, { type FailedAttemptError } from "p-retry";
import type { Logger } from "pino";
import type { EmbeddingModelConfig } from "../config/types";
import { type ProviderRateLimits, createRequestLimiter, toRequestBatches } from "../utils/providerUtils";
import type { EmbedOptions, EmbeddingProvider, EmbeddingVector } from "./types";

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
    protected readonly concurrencyLimit: number;
    protected readonly batchSize: number;
    protected readonly retries: number;

    private readonly requestLimiter: Bottleneck;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        protected readonly logger?: Logger
    ) {
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
        this.retries = Math.max(0, limits.retries ?? 3);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 4);

        this.requestLimiter = createRequestLimiter(this.concurrencyLimit, limits.maxRequestsPerMinute);
    }

    get dimension(): number {
        return this.config.dimension;
    }

    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = toRequestBatches(texts, this.batchSize);
        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;

        const results = await Promise.all(
            batches.map(({ batch, idx }) =>
                limit(async () => {
                    const embeddings = await this.schedule(
                        () => this.sendEmbeddingRequest(batch, options),
                        { logPrefix, signal: options?.signal }
                    );

                    if (embeddings.length !== batch.length) {
                        throw new Error(
                            `${logPrefix} returned ${embeddings.length} vectors for a batch of ${batch.length} texts.`
                        );
                    }

                    return { idx, embeddings };
                })
            )
        );

        return results
            .sort((a, b) => a.idx - b.idx)
            .flatMap((entry) => entry.embeddings);
    }

    async embedQuery(text: string, options?: EmbedOptions): Promise<EmbeddingVector> {
        const [embedding] = await this.embedDocuments([text], options);
        if (!embedding) {
            throw new Error(`${this.config.provider}:embed returned no vector for the query.`);
        }
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;

    private schedule<T>(task: () => Promise<T>, { logPrefix, signal }: ScheduleOptions): Promise<T> {
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }
}
