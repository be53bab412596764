import type { Logger } from "pino";
import type { RetrievalErrorCode } from "../errors";
import { errorMessage } from "../errors";
import type { ChatHistoryStore } from "../history/chatHistory";
import { NO_RELEVANT_CONTENT_ANSWER } from "../llm/providers/template";
import type { AnswerGenerator } from "../llm/types";
import type { RetrievalOrchestrator } from "../retrieval/orchestrator";
import { getLogger } from "../utils/logger";
import type { SearchHit } from "../vector/types";

const PREVIEW_CHUNKS = 3;
const PREVIEW_CHARS = 200;

export interface AskQuestionOptions {
    question: string;
    topK?: number;
    filename?: string;
}

export interface AskQuestionDependencies {
    orchestrator: RetrievalOrchestrator;
    generateAnswer: AnswerGenerator;
    history?: ChatHistoryStore;
    logger?: Logger;
}

export interface AskSource {
    filename: string;
    chunkIndex: number;
    score: number;
}

export interface AskChunkPreview {
    text: string;
    filename: string;
}

export type AskQuestionResult =
    | { status: "answered"; answer: string; sources: AskSource[]; chunks: AskChunkPreview[] }
    | { status: "no_results"; answer: string; sources: []; chunks: [] }
    | { status: "error"; code: RetrievalErrorCode; message: string; retryable: boolean };

function preview(hit: SearchHit): AskChunkPreview {
    const text = hit.text.length > PREVIEW_CHARS ? `${hit.text.slice(0, PREVIEW_CHARS)}...` : hit.text;
    return { text, filename: hit.filename };
}

/**
 * Retrieves context for a question and hands it to the answer generator. The "no relevant
 * information" answer is only given when retrieval found nothing; a failing index is
 * reported as an error.
 */
export async function askQuestion(
    deps: AskQuestionDependencies,
    options: AskQuestionOptions
): Promise<AskQuestionResult> {
    const logger = deps.logger ?? getLogger();
    const question = options.question.trim();

    const retrieval = await deps.orchestrator.answerQuery(
        question,
        options.topK,
        options.filename ? { filename: options.filename } : undefined
    );

    if (retrieval.status === "error") {
        return retrieval;
    }

    if (retrieval.status === "empty") {
        logger.info({ question }, "No matching chunks found.");
        return { status: "no_results", answer: NO_RELEVANT_CONTENT_ANSWER, sources: [], chunks: [] };
    }

    const hits = retrieval.hits;
    let answer: string;
    try {
        answer = await deps.generateAnswer(
            question,
            hits.map((hit) => hit.text)
        );
    } catch (error) {
        logger.error({ err: error }, "Answer generation failed.");
        return {
            status: "error",
            code: "MODEL_UNAVAILABLE",
            message: `Answer generation failed: ${errorMessage(error)}`,
            retryable: true,
        };
    }

    if (deps.history) {
        const sourceIds = hits.map((hit) => `${hit.filename}_chunk_${hit.chunk_index}`);
        void deps.history.addMessage(question, answer, sourceIds).catch((error: unknown) => {
            logger.error({ err: error }, "Failed to record chat history.");
        });
    }

    logger.info({ sources: hits.length }, "Answered question.");
    return {
        status: "answered",
        answer,
        sources: hits.map((hit) => ({ filename: hit.filename, chunkIndex: hit.chunk_index, score: hit.score })),
        chunks: hits.slice(0, PREVIEW_CHUNKS).map(preview),
    };
}
