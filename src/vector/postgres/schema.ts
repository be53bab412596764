import type { Logger } from "pino";
import { InvalidInputError } from "../../errors";
import type { SqlPool } from "./types";

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

/** Collection names become table names, so they are restricted to plain SQL identifiers. */
export function assertTableName(name: string): string {
    if (!IDENTIFIER_PATTERN.test(name)) {
        throw new InvalidInputError(
            `Collection name "${name}" must start with a letter or underscore and contain only letters, digits and underscores.`
        );
    }
    return name;
}

export function buildSchemaStatements(table: string, dimension: number): string[] {
    return [
        "CREATE EXTENSION IF NOT EXISTS vector",
        `CREATE TABLE IF NOT EXISTS ${table} (
            id uuid PRIMARY KEY,
            seq bigserial NOT NULL,
            embedding vector(${dimension}) NOT NULL,
            text text NOT NULL,
            filename text NOT NULL,
            chunk_index integer NOT NULL,
            total_chunks integer NOT NULL,
            checksum text NOT NULL,
            metadata jsonb NOT NULL DEFAULT '{}'::jsonb,
            updated_at timestamptz NOT NULL DEFAULT now()
        )`,
        `CREATE INDEX IF NOT EXISTS ${table}_embedding_idx ON ${table} USING hnsw (embedding vector_cosine_ops)`,
        `CREATE INDEX IF NOT EXISTS ${table}_filename_idx ON ${table} (filename)`,
    ];
}

export async function ensureSchema(pool: SqlPool, logger: Logger, table: string, dimension: number): Promise<void> {
    for (const statement of buildSchemaStatements(table, dimension)) {
        await pool.query(statement);
    }
    logger.info({ table, dimension }, "Vector collection is ready.");
}
