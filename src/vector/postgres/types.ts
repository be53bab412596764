/** The slice of `pg`'s Pool/PoolClient surface the index uses. */
export interface SqlQueryResult {
    rows: unknown[];
    rowCount: number | null;
}

export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
    release(): void;
}

export interface SqlPool {
    query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
    connect(): Promise<SqlClient>;
    end(): Promise<void>;
}
