import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export type EmbeddingVector = number[];

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface GenerateAnswerOptions {
    question: string;
    contexts: string[];
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    readonly dimension: number;
    embedDocuments(texts: string[], options?: EmbedOptions): Promise<EmbeddingVector[]>;
    embedQuery(text: string, options?: EmbedOptions): Promise<EmbeddingVector>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateAnswer(options: GenerateAnswerOptions): Promise<string>;
}

/** Maps a question and its retrieved contexts to answer text. */
export type AnswerGenerator = (question: string, contexts: string[]) => Promise<string>;
