import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { embedMany, generateText } from "ai";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { mergeLimits, resolveBaseUrl } from "../../utils/providerUtils";
import { BaseEmbeddingProvider } from "../base";
import { buildPromptMessages } from "../prompt";
import type { ChatProvider, EmbedOptions, EmbeddingVector, GenerateAnswerOptions } from "../types";

const GOOGLE_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/";

export class GoogleEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Google API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 100,
                    concurrency: 2,
                    maxRequestsPerMinute: 1_500,
                    retries: 3,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GOOGLE_DEFAULT_BASE_URL),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]> {
        const model = this.sdk.textEmbeddingModel(this.config.model, {
            outputDimensionality: this.config.dimension,
        });
        const { embeddings } = await embedMany({
            model,
            values: texts,
            abortSignal: options?.signal,
            maxRetries: 0,
        });

        return embeddings;
    }
}

export class GoogleChatProvider implements ChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(public readonly config: ChatModelConfig, private readonly logger?: Logger) {
        if (!config.apiKey) {
            throw new Error("Google API key is required for chat completions.");
        }

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GOOGLE_DEFAULT_BASE_URL),
        });
    }

    async generateAnswer(options: GenerateAnswerOptions): Promise<string> {
        const { system, user } = buildPromptMessages(options);
        const { text } = await generateText({
            model: this.sdk(this.config.model),
            system,
            prompt: user,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            abortSignal: options.signal,
        });

        const answer = text.trim();
        if (!answer) {
            throw new Error("Gemini returned an empty response.");
        }

        this.logger?.debug({ model: this.config.model, length: answer.length }, "Generated answer.");
        return answer;
    }
}
