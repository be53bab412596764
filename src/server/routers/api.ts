import { Router } from "express";
import type { Logger } from "pino";
import { handleAskRequest } from "../routes/ask";
import {
    handleClearHistoryRequest,
    handleDeleteMessageRequest,
    handleGetHistoryRequest,
    handleHistoryStatsRequest,
} from "../routes/chatHistory";
import {
    handleDeleteDocumentRequest,
    handleListDocumentsRequest,
    handleUploadRequest,
} from "../routes/documents";
import { handleHealthRequest } from "../routes/health";
import type { ServerContext } from "../utils/context";
import { createUploadMiddleware } from "../utils/upload";

export function createApiRouter(context: ServerContext, logger: Logger): Router {
    const router = Router();

    router.get("/health", async (req, res) => {
        await handleHealthRequest(req, res, {
            backend: context.config.vectorIndex.backend,
            embedder: context.embedder,
            orchestrator: context.orchestrator,
        }, logger);
    });

    router.post("/documents", createUploadMiddleware(context.config.server.maxUploadBytes), async (req, res) => {
        await handleUploadRequest(req, res, context, logger);
    });

    router.get("/documents", async (req, res) => {
        await handleListDocumentsRequest(req, res, context, logger);
    });

    router.delete("/documents/:filename", async (req, res) => {
        await handleDeleteDocumentRequest(req, res, context);
    });

    router.post("/ask", async (req, res) => {
        await handleAskRequest(req, res, context, logger);
    });

    router.get("/chat/history", async (req, res) => {
        await handleGetHistoryRequest(req, res, context, logger);
    });

    router.delete("/chat/history", async (req, res) => {
        await handleClearHistoryRequest(req, res, context, logger);
    });

    router.delete("/chat/message/:id", async (req, res) => {
        await handleDeleteMessageRequest(req, res, context, logger);
    });

    router.get("/chat/stats", async (req, res) => {
        await handleHistoryStatsRequest(req, res, context, logger);
    });

    return router;
}
