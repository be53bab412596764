import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { Embedder } from "../../llm/embedder";
import type { RetrievalOrchestrator } from "../../retrieval/orchestrator";

export interface HealthRouteContext {
    backend: string;
    embedder: Embedder;
    orchestrator: RetrievalOrchestrator;
}

export async function handleHealthRequest(
    _req: Request,
    res: Response,
    context: HealthRouteContext,
    logger: Logger
): Promise<void> {
    const collection = await context.orchestrator.collectionStats();
    if (collection.status === "error") {
        logger.warn({ collection }, "Health check could not reach the vector index.");
    }

    res.status(collection.status === "ready" ? 200 : 503).json({
        status: collection.status === "ready" ? "ok" : "error",
        backend: context.backend,
        embeddingModelLoaded: context.embedder.isLoaded(),
        collection,
    });
}
