import type { AnswerGenerator } from "../types";

const MAX_QUOTED_CONTEXTS = 3;
const MAX_CONTEXT_CHARS = 500;

export const NO_RELEVANT_CONTENT_ANSWER =
    "I couldn't find any relevant information in the uploaded documents to answer your question.";

function truncate(value: string, limit: number): string {
    const trimmed = value.trim();
    return trimmed.length > limit ? `${trimmed.slice(0, limit)}...` : trimmed;
}

/**
 * Answers without a language model by quoting the best matching excerpts. Used when no chat
 * provider is configured and in tests.
 */
export function createTemplateAnswerGenerator(): AnswerGenerator {
    return async (question, contexts) => {
        const quoted = contexts
            .map((context) => context.trim())
            .filter((context) => context.length > 0)
            .slice(0, MAX_QUOTED_CONTEXTS);

        if (quoted.length === 0) {
            return NO_RELEVANT_CONTENT_ANSWER;
        }

        const excerpts = quoted
            .map((context, index) => `[${index + 1}] ${truncate(context, MAX_CONTEXT_CHARS)}`)
            .join("\n\n");

        return `Based on your documents, here is what I found about "${question.trim()}":\n\n${excerpts}`;
    };
}
