import { Pool } from "pg";
import type { Logger } from "pino";
import { errorMessage } from "../../errors";
import type { EmbeddingVector } from "../../llm/types";
import { Lazy } from "../../utils/lazy";
import { scopedLogger } from "../../utils/logger";
import type {
    CollectionStats,
    IndexedPoint,
    SearchFilter,
    SearchHit,
    UpsertResult,
    VectorIndex,
} from "../types";
import { assertDimension, assertTopK } from "../validation";
import { toBackendError } from "./errors";
import * as points from "./points";
import { assertTableName, ensureSchema } from "./schema";
import { searchPoints } from "./search";
import type { SqlPool } from "./types";

export interface PostgresVectorIndexOptions {
    collection: string;
    dimension: number;
    databaseUrl?: string;
    timeoutMs: number;
    pageSize: number;
    logger?: Logger;
    /** Replaces the connection pool built from `databaseUrl`. */
    pool?: SqlPool;
}

function createPool(options: PostgresVectorIndexOptions, logger: Logger): SqlPool {
    if (!options.databaseUrl) {
        throw new Error("PostgresVectorIndex requires a databaseUrl when no pool is supplied.");
    }

    const pool = new Pool({
        connectionString: options.databaseUrl,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: options.timeoutMs,
        query_timeout: options.timeoutMs,
        statement_timeout: options.timeoutMs,
    });

    pool.on("error", (err) => {
        logger.error({ err }, "Unexpected error on idle PostgreSQL client");
    });

    return pool;
}

/** pgvector-backed index: one table per collection, HNSW over cosine distance. */
export class PostgresVectorIndex implements VectorIndex {
    readonly name: string;
    readonly dimension: number;

    protected readonly logger: Logger;
    protected readonly pool: SqlPool;

    private readonly pageSize: number;
    private readonly schemaReady: Lazy<void>;

    constructor(options: PostgresVectorIndexOptions) {
        this.name = assertTableName(options.collection);
        this.dimension = options.dimension;
        this.pageSize = Math.max(1, options.pageSize);
        this.logger = scopedLogger(options.logger, { module: "postgres-index" });
        this.pool = options.pool ?? createPool(options, this.logger);
        this.schemaReady = new Lazy(() => ensureSchema(this.pool, this.logger, this.name, this.dimension));
    }

    async ensureCollection(): Promise<void> {
        try {
            await this.schemaReady.get();
        } catch (error) {
            throw toBackendError(error, `creating collection "${this.name}"`);
        }
    }

    async upsert(pointsToStore: readonly IndexedPoint[]): Promise<UpsertResult> {
        for (const point of pointsToStore) {
            assertDimension(point.vector, this.dimension, `Vector for point ${point.id}`);
        }

        const storedCount = await points.upsertPoints(this.pool, this.logger, this.name, pointsToStore);
        return { storedCount };
    }

    async search(queryVector: EmbeddingVector, topK: number, filter?: SearchFilter): Promise<SearchHit[]> {
        assertTopK(topK);
        assertDimension(queryVector, this.dimension, "Query vector");

        try {
            return await searchPoints(this.pool, this.name, queryVector, topK, filter);
        } catch (error) {
            throw toBackendError(error, "search");
        }
    }

    async deleteByFilename(filename: string): Promise<boolean> {
        try {
            await points.deleteByFilename(this.pool, this.logger, this.name, filename);
            return true;
        } catch (error) {
            throw toBackendError(error, `delete of "${filename}"`);
        }
    }

    async listDistinctFilenames(): Promise<string[]> {
        try {
            return await points.listDistinctFilenames(this.pool, this.name, this.pageSize);
        } catch (error) {
            throw toBackendError(error, "filename listing");
        }
    }

    async collectionStats(): Promise<CollectionStats> {
        try {
            const count = await points.countPoints(this.pool, this.name);
            return { name: this.name, status: "ready", pointCount: count, vectorCount: count };
        } catch (error) {
            this.logger.warn({ err: error }, "Failed to read collection stats.");
            return { name: this.name, status: "error", error: errorMessage(error) };
        }
    }

    async countByFilename(filename: string): Promise<number> {
        try {
            return await points.countByFilename(this.pool, this.name, filename);
        } catch (error) {
            throw toBackendError(error, `count of "${filename}"`);
        }
    }

    async pruneChunks(filename: string, totalChunks: number): Promise<number> {
        try {
            return await points.pruneChunks(this.pool, this.name, filename, totalChunks);
        } catch (error) {
            throw toBackendError(error, `prune of "${filename}"`);
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
