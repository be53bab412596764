import type { Logger } from "pino";
import { z } from "zod";
import { UpsertFailedError, errorMessage } from "../../errors";
import type { IndexedPoint, MetadataValue } from "../types";
import { isConnectionError, isTimeoutError, toBackendError } from "./errors";
import type { SqlClient, SqlPool } from "./types";

const UPSERT_BATCH_SIZE = 100;
const RESERVED_KEYS = new Set(["text", "filename", "chunk_index", "total_chunks", "checksum"]);

const countRowSchema = z.object({ count: z.coerce.number() });
const filenameRowSchema = z.object({ filename: z.string() });

export function toVectorLiteral(vector: readonly number[]): string {
    return `[${vector.join(",")}]`;
}

function extraMetadata(point: IndexedPoint): Record<string, MetadataValue> {
    const metadata: Record<string, MetadataValue> = {};
    for (const [key, value] of Object.entries(point.payload)) {
        if (!RESERVED_KEYS.has(key)) {
            metadata[key] = value;
        }
    }
    return metadata;
}

function buildUpsertStatement(table: string, points: readonly IndexedPoint[]): { text: string; values: unknown[] } {
    const values: unknown[] = [];
    const placeholders: string[] = [];

    points.forEach((point) => {
        const rowValues: unknown[] = [
            point.id,
            toVectorLiteral(point.vector),
            point.payload.text,
            point.payload.filename,
            point.payload.chunk_index,
            point.payload.total_chunks,
            point.payload.checksum,
            JSON.stringify(extraMetadata(point)),
        ];
        const rowPlaceholders = rowValues.map((_, i) => {
            const paramIndex = values.length + i + 1;
            if (i === 1) return `$${paramIndex}::vector`;
            if (i === 7) return `$${paramIndex}::jsonb`;
            return `$${paramIndex}`;
        });
        placeholders.push(`(${rowPlaceholders.join(", ")})`);
        values.push(...rowValues);
    });

    const text = `
        INSERT INTO ${table} (id, embedding, text, filename, chunk_index, total_chunks, checksum, metadata)
        VALUES ${placeholders.join(", ")}
        ON CONFLICT (id) DO UPDATE SET
            embedding = EXCLUDED.embedding,
            text = EXCLUDED.text,
            filename = EXCLUDED.filename,
            chunk_index = EXCLUDED.chunk_index,
            total_chunks = EXCLUDED.total_chunks,
            checksum = EXCLUDED.checksum,
            metadata = EXCLUDED.metadata,
            updated_at = now()
    `;

    return { text, values };
}

/**
 * All batches go through one transaction: either every point is stored or none is.
 * Timeouts and lost connections surface as `BackendUnavailableError`; a statement the
 * database rejects surfaces as `UpsertFailedError`.
 */
export async function upsertPoints(
    pool: SqlPool,
    logger: Logger,
    table: string,
    points: readonly IndexedPoint[]
): Promise<number> {
    if (points.length === 0) {
        return 0;
    }

    let client: SqlClient;
    try {
        client = await pool.connect();
    } catch (error) {
        throw toBackendError(error, "connect");
    }

    try {
        await client.query("BEGIN");
        for (let offset = 0; offset < points.length; offset += UPSERT_BATCH_SIZE) {
            const { text, values } = buildUpsertStatement(table, points.slice(offset, offset + UPSERT_BATCH_SIZE));
            await client.query(text, values);
        }
        await client.query("COMMIT");
        logger.debug({ table, count: points.length }, "Upserted points.");
        return points.length;
    } catch (error) {
        try {
            await client.query("ROLLBACK");
        } catch (rollbackError) {
            logger.error({ err: rollbackError }, "Failed to roll back upsert transaction.");
        }
        if (isTimeoutError(error) || isConnectionError(error)) {
            throw toBackendError(error, "upsert");
        }
        throw new UpsertFailedError(errorMessage(error), points.length, { cause: error });
    } finally {
        client.release();
    }
}

export async function deleteByFilename(pool: SqlPool, logger: Logger, table: string, filename: string): Promise<number> {
    const result = await pool.query(`DELETE FROM ${table} WHERE filename = $1`, [filename]);
    const removed = result.rowCount ?? 0;
    logger.debug({ table, filename, removed }, "Deleted points by filename.");
    return removed;
}

export async function pruneChunks(
    pool: SqlPool,
    table: string,
    filename: string,
    totalChunks: number
): Promise<number> {
    const result = await pool.query(`DELETE FROM ${table} WHERE filename = $1 AND chunk_index >= $2`, [
        filename,
        totalChunks,
    ]);
    return result.rowCount ?? 0;
}

export async function countByFilename(pool: SqlPool, table: string, filename: string): Promise<number> {
    const result = await pool.query(`SELECT count(*) AS count FROM ${table} WHERE filename = $1`, [filename]);
    return countRowSchema.parse(result.rows[0]).count;
}

export async function countPoints(pool: SqlPool, table: string): Promise<number> {
    const result = await pool.query(`SELECT count(*) AS count FROM ${table}`);
    return countRowSchema.parse(result.rows[0]).count;
}

/** Keyset pagination over the filename column, `pageSize` names per round trip. */
export async function listDistinctFilenames(pool: SqlPool, table: string, pageSize: number): Promise<string[]> {
    const filenames: string[] = [];
    let after: string | null = null;

    for (;;) {
        const result = await pool.query(
            `SELECT DISTINCT filename FROM ${table} WHERE ($1::text IS NULL OR filename > $1) ORDER BY filename LIMIT $2`,
            [after, pageSize]
        );
        const page = result.rows.map((row) => filenameRowSchema.parse(row).filename);
        filenames.push(...page);

        const last = page.at(-1);
        if (page.length < pageSize || last === undefined) {
            break;
        }
        after = last;
    }

    return filenames;
}
