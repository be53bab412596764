import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { ChatHistoryStore } from "../../history/chatHistory";
import type { AnswerGenerator } from "../../llm/types";
import { askQuestion } from "../../query/askQuestion";
import type { RetrievalOrchestrator } from "../../retrieval/orchestrator";
import { describeValidationError, httpStatusForCode, sendError } from "../utils/http";

export interface AskRouteContext {
    orchestrator: RetrievalOrchestrator;
    generateAnswer: AnswerGenerator;
    history: ChatHistoryStore;
}

const MAX_TOP_K = 50;

const askBodySchema = z.object({
    question: z.string().trim().min(1, "Question is required"),
    topK: z.number().int().positive().max(MAX_TOP_K).optional(),
    filename: z.string().trim().min(1).optional(),
});

export async function handleAskRequest(
    req: Request,
    res: Response,
    context: AskRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = askBodySchema.safeParse(req.body);
    if (!parsed.success) {
        sendError(res, 400, describeValidationError(parsed.error), "INVALID_INPUT");
        return;
    }

    const result = await askQuestion(
        {
            orchestrator: context.orchestrator,
            generateAnswer: context.generateAnswer,
            history: context.history,
            logger,
        },
        parsed.data
    );

    if (result.status === "error") {
        res.status(httpStatusForCode(result.code)).json({
            status: "error",
            code: result.code,
            message: result.message,
            retryable: result.retryable,
        });
        return;
    }

    res.json({
        answer: result.answer,
        sources: result.sources,
        chunks: result.chunks,
    });
}
