import type { Logger } from "pino";
import type { EmbeddingVector } from "../llm/types";
import { scopedLogger } from "../utils/logger";
import { dot, l2Normalize } from "./similarity";
import type {
    CollectionStats,
    IndexedPoint,
    PointPayload,
    SearchFilter,
    SearchHit,
    UpsertResult,
    VectorIndex,
} from "./types";
import { assertDimension, assertTopK } from "./validation";

interface StoredPoint {
    id: string;
    vector: EmbeddingVector;
    payload: PointPayload;
}

export interface InMemoryVectorIndexOptions {
    name?: string;
    dimension: number;
    logger?: Logger;
}

/**
 * Exact cosine search by linear scan. Every mutation builds a new array and swaps the
 * reference, so a search running alongside an upsert or delete sees one consistent snapshot.
 * Array order is insertion order; overwriting an id keeps its original slot.
 */
export class InMemoryVectorIndex implements VectorIndex {
    readonly name: string;
    readonly dimension: number;

    private points: readonly StoredPoint[] = [];
    private readonly logger: Logger;
    private created = false;

    constructor(options: InMemoryVectorIndexOptions) {
        this.name = options.name ?? "documents";
        this.dimension = options.dimension;
        this.logger = scopedLogger(options.logger, { module: "memory-index" });
    }

    async ensureCollection(): Promise<void> {
        if (!this.created) {
            this.created = true;
            this.logger.info({ collection: this.name, dimension: this.dimension }, "Created in-memory collection.");
        }
    }

    async upsert(points: readonly IndexedPoint[]): Promise<UpsertResult> {
        for (const point of points) {
            assertDimension(point.vector, this.dimension, `Vector for point ${point.id}`);
        }

        const next = [...this.points];
        const positions = new Map(next.map((point, position) => [point.id, position]));

        for (const point of points) {
            const stored: StoredPoint = {
                id: point.id,
                vector: l2Normalize(point.vector),
                payload: { ...point.payload },
            };

            const position = positions.get(point.id);
            if (position === undefined) {
                positions.set(point.id, next.length);
                next.push(stored);
            } else {
                next[position] = stored;
            }
        }

        this.points = next;
        return { storedCount: points.length };
    }

    async search(queryVector: EmbeddingVector, topK: number, filter?: SearchFilter): Promise<SearchHit[]> {
        assertTopK(topK);
        assertDimension(queryVector, this.dimension, "Query vector");

        const snapshot = this.points;
        const query = l2Normalize(queryVector);

        return snapshot
            .filter((point) => filter?.filename === undefined || point.payload.filename === filter.filename)
            .map((point) => ({ point, score: dot(query, point.vector) }))
            // Array#sort is stable, so equal scores keep insertion order.
            .sort((a, b) => b.score - a.score)
            .slice(0, topK)
            .map(({ point, score }) => ({
                id: point.id,
                text: point.payload.text,
                filename: point.payload.filename,
                chunk_index: point.payload.chunk_index,
                total_chunks: point.payload.total_chunks,
                score,
            }));
    }

    async deleteByFilename(filename: string): Promise<boolean> {
        const before = this.points.length;
        this.points = this.points.filter((point) => point.payload.filename !== filename);
        this.logger.debug({ filename, removed: before - this.points.length }, "Deleted points by filename.");
        return true;
    }

    async listDistinctFilenames(): Promise<string[]> {
        const filenames = new Set(this.points.map((point) => point.payload.filename));
        return [...filenames].sort();
    }

    async collectionStats(): Promise<CollectionStats> {
        const count = this.points.length;
        return { name: this.name, status: "ready", pointCount: count, vectorCount: count };
    }

    async countByFilename(filename: string): Promise<number> {
        return this.points.filter((point) => point.payload.filename === filename).length;
    }

    async pruneChunks(filename: string, totalChunks: number): Promise<number> {
        const before = this.points.length;
        this.points = this.points.filter(
            (point) => point.payload.filename !== filename || point.payload.chunk_index < totalChunks
        );
        return before - this.points.length;
    }

    async close(): Promise<void> {
        this.points = [];
    }
}
