import type { Logger } from "pino";
import type { AppConfig } from "../../config/types";
import { ChatHistoryStore } from "../../history/chatHistory";
import { extractPlainText, type TextExtractor } from "../../ingest/extract";
import type { Embedder } from "../../llm/embedder";
import { createAnswerGenerator, createEmbedder } from "../../llm/factory";
import type { AnswerGenerator } from "../../llm/types";
import { RetrievalOrchestrator } from "../../retrieval/orchestrator";
import { createVectorIndex } from "../../vector/factory";
import type { VectorIndex } from "../../vector/types";

export interface ServerContext {
    config: AppConfig;
    embedder: Embedder;
    index: VectorIndex;
    orchestrator: RetrievalOrchestrator;
    history: ChatHistoryStore;
    generateAnswer: AnswerGenerator;
    extractText: TextExtractor;
}

export type ServerContextOverrides = Partial<Omit<ServerContext, "config" | "orchestrator">>;

/** Wires the pipeline from config. Overrides replace individual collaborators, mostly in tests. */
export function createServerContext(
    config: AppConfig,
    logger: Logger,
    overrides: ServerContextOverrides = {}
): ServerContext {
    const embedder = overrides.embedder ?? createEmbedder(config.embedding, logger);
    const index = overrides.index ?? createVectorIndex(config.vectorIndex, config.embedding.dimension, logger);

    return {
        config,
        embedder,
        index,
        orchestrator: new RetrievalOrchestrator({
            embedder,
            index,
            chunking: config.chunking,
            defaultTopK: config.query.topK,
            logger,
        }),
        history:
            overrides.history ??
            new ChatHistoryStore({
                storageDir: config.history.storageDir,
                maxMessages: config.history.maxMessages,
                logger,
            }),
        generateAnswer: overrides.generateAnswer ?? createAnswerGenerator(config.chat, logger),
        extractText: overrides.extractText ?? extractPlainText,
    };
}
