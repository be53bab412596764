import { z } from "zod";
import type { EmbeddingVector } from "../../llm/types";
import { magnitude } from "../similarity";
import type { SearchFilter, SearchHit } from "../types";
import { toVectorLiteral } from "./points";
import type { SqlPool } from "./types";

const searchRowSchema = z.object({
    id: z.string(),
    text: z.string(),
    filename: z.string(),
    chunk_index: z.coerce.number(),
    total_chunks: z.coerce.number(),
    score: z.coerce.number(),
});

export async function searchPoints(
    pool: SqlPool,
    table: string,
    queryVector: EmbeddingVector,
    topK: number,
    filter?: SearchFilter
): Promise<SearchHit[]> {
    const columns = "id, text, filename, chunk_index, total_chunks";
    const values: unknown[] = [];
    const where: string[] = [];

    if (filter?.filename !== undefined) {
        values.push(filter.filename);
        where.push(`filename = $${values.length}`);
    }
    const whereClause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";

    values.push(topK);
    const limitParam = `$${values.length}`;

    let text: string;
    if (magnitude(queryVector) === 0) {
        // Cosine distance to a zero vector is NaN in pgvector: every point scores 0, oldest first.
        text = `SELECT ${columns}, 0::float8 AS score FROM ${table} ${whereClause} ORDER BY seq LIMIT ${limitParam}`;
    } else {
        values.push(toVectorLiteral(queryVector));
        const vectorParam = `$${values.length}::vector`;
        text = `
            SELECT ${columns}, 1 - (embedding <=> ${vectorParam}) AS score
            FROM ${table}
            ${whereClause}
            ORDER BY embedding <=> ${vectorParam}, seq
            LIMIT ${limitParam}
        `;
    }

    const result = await pool.query(text, values);
    return result.rows.map((row) => searchRowSchema.parse(row));
}
