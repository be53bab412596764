import type { Logger } from "pino";
import type { ChunkingConfig, ChunkingStrategy } from "../config/types";
import { InvalidInputError, NotFoundError, errorMessage, isRetrievalError, type RetrievalErrorCode } from "../errors";
import { splitDocument } from "../ingest/chunker";
import type { Embedder } from "../llm/embedder";
import { scopedLogger } from "../utils/logger";
import { magnitude } from "../vector/similarity";
import type { CollectionStats, IndexedPoint, MetadataValue, SearchFilter, SearchHit, VectorIndex } from "../vector/types";
import { assertTopK } from "../vector/validation";
import { chunkChecksum, chunkPointId } from "./chunkId";

export interface IngestOptions {
    strategy?: ChunkingStrategy;
    chunkSize?: number;
    overlap?: number;
}

export interface IngestResult {
    status: "success" | "error";
    chunkCount: number;
    message: string;
    attemptedCount?: number;
    prunedCount?: number;
    errorCode?: RetrievalErrorCode;
    retryable?: boolean;
}

export type QueryResult =
    | { status: "ok"; hits: SearchHit[] }
    | { status: "empty"; hits: [] }
    | { status: "error"; code: RetrievalErrorCode; message: string; retryable: boolean };

export type DeleteResult =
    | { status: "success"; deleted: number; message: string }
    | { status: "error"; deleted: 0; code: RetrievalErrorCode; message: string; retryable: boolean };

export interface RetrievalOrchestratorOptions {
    embedder: Embedder;
    index: VectorIndex;
    chunking: ChunkingConfig;
    defaultTopK?: number;
    logger?: Logger;
}

function describeFailure(error: unknown): { code: RetrievalErrorCode; message: string; retryable: boolean } {
    if (isRetrievalError(error)) {
        return { code: error.code, message: error.message, retryable: error.retryable };
    }
    return { code: "BACKEND_UNAVAILABLE", message: errorMessage(error), retryable: false };
}

/** Highest score first; equal scores keep the order the index returned them in. */
export function rankHits(hits: readonly SearchHit[]): SearchHit[] {
    return [...hits].sort((a, b) => b.score - a.score);
}

/**
 * Ingest and query entry points over a chunker, an embedder and a vector index. Failures
 * come back as status payloads; nothing thrown by the index escapes `ingestDocument` or
 * `answerQuery`.
 *
 * Two concurrent ingestions of the same filename race: the last writer wins per chunk
 * position, and if the versions differ in chunk count the index can hold a mix of both
 * until the next successful ingestion prunes the tail.
 */
export class RetrievalOrchestrator {
    private readonly embedder: Embedder;
    private readonly index: VectorIndex;
    private readonly chunking: ChunkingConfig;
    private readonly defaultTopK: number;
    private readonly logger: Logger;

    constructor(options: RetrievalOrchestratorOptions) {
        this.embedder = options.embedder;
        this.index = options.index;
        this.chunking = options.chunking;
        this.defaultTopK = options.defaultTopK ?? 5;
        this.logger = scopedLogger(options.logger, { module: "orchestrator" });
    }

    async ingestDocument(
        filename: string,
        rawText: string,
        extraMetadata: Record<string, MetadataValue> = {},
        options: IngestOptions = {}
    ): Promise<IngestResult> {
        const name = filename.trim();
        if (!name) {
            return { status: "error", chunkCount: 0, message: "Filename must not be empty.", errorCode: "INVALID_INPUT", retryable: false };
        }

        let texts: string[];
        try {
            texts = splitDocument(name, rawText, {
                strategy: options.strategy ?? this.chunking.strategy,
                chunkSize: options.chunkSize ?? this.chunking.chunkSize,
                overlap: options.overlap ?? this.chunking.overlap,
            }).map((chunk) => chunk.text);
        } catch (error) {
            const failure = describeFailure(error);
            return { status: "error", chunkCount: 0, message: failure.message, errorCode: failure.code, retryable: failure.retryable };
        }

        if (texts.length === 0) {
            return {
                status: "error",
                chunkCount: 0,
                message: `No text content found in ${name}.`,
                errorCode: "INVALID_INPUT",
                retryable: false,
            };
        }

        const log = this.logger.child({ filename: name });
        log.info({ chunkCount: texts.length }, "Ingesting document.");

        try {
            const vectors = await this.embedder.embedMany(texts);
            const points: IndexedPoint[] = texts.map((text, index) => ({
                id: chunkPointId(name, index),
                vector: vectors[index],
                payload: {
                    ...extraMetadata,
                    text,
                    filename: name,
                    chunk_index: index,
                    total_chunks: texts.length,
                    checksum: chunkChecksum(text),
                },
            }));

            await this.index.ensureCollection();
            const { storedCount } = await this.index.upsert(points);

            const result: IngestResult = {
                status: "success",
                chunkCount: storedCount,
                message: `Indexed ${storedCount} chunk${storedCount === 1 ? "" : "s"} from ${name}.`,
            };

            if (this.chunking.pruneStaleChunks) {
                result.prunedCount = await this.pruneStale(log, name, texts.length);
            }

            log.info({ chunkCount: storedCount, prunedCount: result.prunedCount }, "Document ingested.");
            return result;
        } catch (error) {
            const failure = describeFailure(error);
            log.error({ err: error, code: failure.code }, "Document ingestion failed.");
            return {
                status: "error",
                chunkCount: 0,
                message: `Failed to ingest ${name}: ${failure.message}`,
                attemptedCount: texts.length,
                errorCode: failure.code,
                retryable: failure.retryable,
            };
        }
    }

    async answerQuery(question: string, topK: number = this.defaultTopK, filter?: SearchFilter): Promise<QueryResult> {
        try {
            if (!question.trim()) {
                throw new InvalidInputError("Question must not be empty.");
            }
            assertTopK(topK);

            const vector = await this.embedder.embed(question);
            if (magnitude(vector) === 0) {
                // Nothing embeddable in the question: any ranking would be arbitrary.
                this.logger.info({ question }, "Question has no embeddable content.");
                return { status: "empty", hits: [] };
            }

            await this.index.ensureCollection();
            const hits = rankHits(await this.index.search(vector, topK, filter));

            if (hits.length === 0) {
                return { status: "empty", hits: [] };
            }
            return { status: "ok", hits };
        } catch (error) {
            const failure = describeFailure(error);
            this.logger.warn({ err: error, code: failure.code }, "Query failed.");
            return { status: "error", ...failure };
        }
    }

    async deleteDocument(filename: string): Promise<DeleteResult> {
        try {
            const name = filename.trim();
            if (!name) {
                throw new InvalidInputError("Filename must not be empty.");
            }

            await this.index.ensureCollection();
            const existing = await this.index.countByFilename(name);
            if (existing === 0) {
                throw new NotFoundError(name);
            }

            await this.index.deleteByFilename(name);
            this.logger.info({ filename: name, deleted: existing }, "Document deleted.");
            return { status: "success", deleted: existing, message: `Deleted ${name}.` };
        } catch (error) {
            const failure = describeFailure(error);
            this.logger.warn({ err: error, filename }, "Delete failed.");
            return { status: "error", deleted: 0, ...failure };
        }
    }

    async listDocuments(): Promise<string[]> {
        await this.index.ensureCollection();
        return this.index.listDistinctFilenames();
    }

    collectionStats(): Promise<CollectionStats> {
        return this.index.collectionStats();
    }

    private async pruneStale(log: Logger, filename: string, totalChunks: number): Promise<number> {
        try {
            const pruned = await this.index.pruneChunks(filename, totalChunks);
            if (pruned > 0) {
                log.info({ pruned, totalChunks }, "Removed chunks left over from a longer version.");
            }
            return pruned;
        } catch (error) {
            // The new version is stored; stale tail chunks are retried on the next ingestion.
            log.warn({ err: error }, "Failed to prune stale chunks.");
            return 0;
        }
    }
}
