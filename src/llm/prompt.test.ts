import { describe, expect, it } from "vitest";
import { buildPromptMessages } from "./prompt";

describe("buildPromptMessages", () => {
    it("numbers the excerpts ahead of the question", () => {
        const { user } = buildPromptMessages({
            question: " What is ATP? ",
            contexts: ["ATP stores energy. ", "Cells use ATP."],
        });

        expect(user).toBe(
            "Use the provided excerpts to inform your response.\n\nExcerpt 1:\nATP stores energy.\n\nExcerpt 2:\nCells use ATP.\n\nQuestion: What is ATP?\n\nAnswer:"
        );
    });

    it("omits the excerpt section without contexts", () => {
        expect(buildPromptMessages({ question: "Why?", contexts: [] }).user).toBe("Question: Why?\n\nAnswer:");
    });

    it("uses a custom system prompt when given", () => {
        const { system } = buildPromptMessages({ question: "Why?", contexts: [], systemPrompt: "Be brief." });
        expect(system).toBe("Be brief.");
    });
});
