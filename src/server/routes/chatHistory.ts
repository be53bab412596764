import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { errorMessage } from "../../errors";
import type { ChatHistoryStore } from "../../history/chatHistory";
import { describeValidationError, sendError } from "../utils/http";

export interface ChatHistoryRouteContext {
    history: ChatHistoryStore;
}

const historyQuerySchema = z.object({
    limit: z.coerce.number().int().min(0).default(20),
});

export async function handleGetHistoryRequest(
    req: Request,
    res: Response,
    context: ChatHistoryRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
        sendError(res, 400, describeValidationError(parsed.error), "INVALID_INPUT");
        return;
    }

    try {
        const history = await context.history.getHistory(parsed.data.limit);
        res.json({ history, count: history.length });
    } catch (error) {
        logger.error({ err: error }, "Failed to read chat history.");
        sendError(res, 500, `Failed to read chat history: ${errorMessage(error)}`);
    }
}

export async function handleClearHistoryRequest(
    _req: Request,
    res: Response,
    context: ChatHistoryRouteContext,
    logger: Logger
): Promise<void> {
    try {
        await context.history.clearHistory();
        res.json({ message: "Chat history cleared successfully" });
    } catch (error) {
        logger.error({ err: error }, "Failed to clear chat history.");
        sendError(res, 500, "Failed to clear chat history");
    }
}

export async function handleDeleteMessageRequest(
    req: Request,
    res: Response,
    context: ChatHistoryRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const deleted = await context.history.deleteMessage(req.params.id ?? "");
        if (!deleted) {
            sendError(res, 404, "Message not found", "NOT_FOUND");
            return;
        }
        res.json({ message: "Message deleted successfully" });
    } catch (error) {
        logger.error({ err: error }, "Failed to delete chat message.");
        sendError(res, 500, `Failed to delete message: ${errorMessage(error)}`);
    }
}

export async function handleHistoryStatsRequest(
    _req: Request,
    res: Response,
    context: ChatHistoryRouteContext,
    logger: Logger
): Promise<void> {
    try {
        res.json(await context.history.getStats());
    } catch (error) {
        logger.error({ err: error }, "Failed to read chat history stats.");
        sendError(res, 500, `Failed to read chat history stats: ${errorMessage(error)}`);
    }
}
