export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    port: number;
    maxUploadBytes: number;
}

export type ChunkingStrategy = "sentence" | "paragraph" | "words";

export interface ChunkingConfig {
    strategy: ChunkingStrategy;
    chunkSize: number;
    overlap: number;
    pruneStaleChunks: boolean;
}

export type EmbeddingProviderName =
    | "hashing"
    | "openai"
    | "google";

export type ChatProviderName =
    | "template"
    | "openai"
    | "google";

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    retries?: number;
}

export interface EmbeddingModelConfig {
    provider: EmbeddingProviderName;
    model: string;
    dimension: number;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface ChatModelConfig {
    provider: ChatProviderName;
    model: string;
    temperature: number;
    maxOutputTokens?: number;
    apiKey?: string;
    baseUrl?: string;
}

export type VectorBackendName = "memory" | "postgres";

export interface VectorIndexConfig {
    backend: VectorBackendName;
    collection: string;
    databaseUrl?: string;
    timeoutMs: number;
    pageSize: number;
}

export interface QueryConfig {
    topK: number;
}

export interface HistoryConfig {
    storageDir: string;
    maxMessages: number;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    chunking: ChunkingConfig;
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
    vectorIndex: VectorIndexConfig;
    query: QueryConfig;
    history: HistoryConfig;
}
