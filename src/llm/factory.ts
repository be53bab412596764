import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { Embedder } from "./embedder";
import { GoogleChatProvider, GoogleEmbeddingProvider } from "./providers/google";
import { HashingEmbeddingProvider } from "./providers/hashing";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import { createTemplateAnswerGenerator } from "./providers/template";
import type { AnswerGenerator, ChatProvider, EmbeddingProvider } from "./types";

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    switch (config.provider) {
        case "hashing":
            return new HashingEmbeddingProvider(config, logger);
        case "openai":
            return new OpenAIEmbeddingProvider(config, logger);
        case "google":
            return new GoogleEmbeddingProvider(config, logger);
        default:
            throw new Error(`Unsupported embedding provider: ${String(config.provider)}`);
    }
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider | null {
    switch (config.provider) {
        case "template":
            return null;
        case "openai":
            return new OpenAIChatProvider(config, logger);
        case "google":
            return new GoogleChatProvider(config, logger);
        default:
            throw new Error(`Unsupported chat provider: ${String(config.provider)}`);
    }
}

export function createAnswerGenerator(config: ChatModelConfig, logger?: Logger): AnswerGenerator {
    const provider = createChatProvider(config, logger);
    if (!provider) {
        return createTemplateAnswerGenerator();
    }

    return (question, contexts) => provider.generateAnswer({ question, contexts });
}

/** The provider is built on first use, so a missing API key surfaces as `ModelUnavailableError`. */
export function createEmbedder(config: EmbeddingModelConfig, logger?: Logger): Embedder {
    return new Embedder({
        dimension: config.dimension,
        loadProvider: async () => createEmbeddingProvider(config, logger),
        logger,
    });
}
