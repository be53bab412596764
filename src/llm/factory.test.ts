import { describe, expect, it } from "vitest";
import type { ChatModelConfig } from "../config/types";
import { createAnswerGenerator, createChatProvider, createEmbeddingProvider } from "./factory";
import { GoogleChatProvider } from "./providers/google";
import { HashingEmbeddingProvider } from "./providers/hashing";
import { OpenAIChatProvider } from "./providers/openai";
import { NO_RELEVANT_CONTENT_ANSWER } from "./providers/template";

const chat = (overrides: Partial<ChatModelConfig>): ChatModelConfig => ({
    provider: "template",
    model: "template",
    temperature: 0.2,
    ...overrides,
});

describe("llm factory", () => {
    it("builds the local embedding provider", () => {
        const provider = createEmbeddingProvider({ provider: "hashing", model: "feature-hashing-v1", dimension: 8 });
        expect(provider).toBeInstanceOf(HashingEmbeddingProvider);
        expect(provider.dimension).toBe(8);
    });

    it("requires an API key for remote embedding providers", () => {
        expect(() => createEmbeddingProvider({ provider: "google", model: "text-embedding-004", dimension: 8 })).toThrow(
            "Google API key is required for embeddings."
        );
    });

    it("builds chat providers for remote models", () => {
        expect(createChatProvider(chat({ provider: "template" }))).toBeNull();
        expect(createChatProvider(chat({ provider: "openai", model: "gpt-4o-mini", apiKey: "test-secret" }))).toBeInstanceOf(
            OpenAIChatProvider
        );
        expect(
            createChatProvider(chat({ provider: "google", model: "gemini-2.5-flash", apiKey: "test-secret" }))
        ).toBeInstanceOf(GoogleChatProvider);
    });

    it("falls back to the template answer generator", async () => {
        const generate = createAnswerGenerator(chat({}));
        await expect(generate("Q", [])).resolves.toBe(NO_RELEVANT_CONTENT_ANSWER);
    });
});
