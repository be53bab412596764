import type { GenerateAnswerOptions } from "./types";

const DEFAULT_SYSTEM_PROMPT = [
    "You are a careful study assistant that answers questions using excerpts from the user's uploaded documents.",
    "Use only the supplied excerpts to craft your answer.",
    "If the answer cannot be determined from the excerpts, say you do not know.",
].join(" ");

const MAX_CONTEXTS = 10;

function formatContexts(contexts: string[]): string {
    return contexts
        .slice(0, MAX_CONTEXTS)
        .map((context, index) => `Excerpt ${index + 1}:\n${context.trim()}`)
        .join("\n\n")
        .trim();
}

export function buildPromptMessages(options: GenerateAnswerOptions): { system: string; user: string } {
    const system = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    const formattedContext = formatContexts(options.contexts);

    const userSections: string[] = [];
    if (formattedContext.length > 0) {
        userSections.push("Use the provided excerpts to inform your response.", formattedContext);
    }

    userSections.push(`Question: ${options.question.trim()}`, "Answer:");

    return { system, user: userSections.join("\n\n") };
}
