import { config as loadDotenv } from "dotenv";
import path from "node:path";
import type {
    AppConfig,
    ChatProviderName,
    ChunkingStrategy,
    EmbeddingProviderName,
    LoggingConfig,
    VectorBackendName,
} from "./types";

const DEFAULT_ENV_FILENAME = ".env";

const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace"];
const CHUNKING_STRATEGIES: readonly ChunkingStrategy[] = ["sentence", "paragraph", "words"];
const EMBEDDING_PROVIDERS: readonly EmbeddingProviderName[] = ["hashing", "openai", "google"];
const CHAT_PROVIDERS: readonly ChatProviderName[] = ["template", "openai", "google"];
const VECTOR_BACKENDS: readonly VectorBackendName[] = ["memory", "postgres"];

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProviderName, string> = {
    hashing: "feature-hashing-v1",
    openai: "text-embedding-3-small",
    google: "text-embedding-004",
};

const DEFAULT_CHAT_MODELS: Record<ChatProviderName, string> = {
    template: "template",
    openai: "gpt-4o-mini",
    google: "gemini-2.5-flash",
};

type Env = NodeJS.ProcessEnv;

function getEnv(env: Env, key: string, required = true): string | undefined {
    const value = env[key]?.trim();
    if (required && !value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvOptionalNumber(env: Env, key: string): number | undefined {
    const value = env[key]?.trim();
    if (!value) {
        return undefined;
    }
    return getEnvNumber(env, key, 0);
}

function getEnvBoolean(env: Env, key: string, defaultValue = false): boolean {
    const value = env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue: T): T {
    const value = env[key]?.trim().toLowerCase();
    if (!value) {
        return defaultValue;
    }

    const match = choices.find((choice) => choice === value);
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
    }
    return match;
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.DOCQA_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.DOCQA_CONFIG_PATH);
    }

    return path.resolve(process.cwd(), DEFAULT_ENV_FILENAME);
}

/**
 * Builds the application config from `DOCQA_*` variables. Every setting except the
 * Postgres connection string (when that backend is selected) and remote provider API
 * keys has a default, so an empty environment yields a working in-memory setup.
 */
export function buildAppConfig(env: Env): AppConfig {
    const embeddingProvider = getEnvChoice(env, "DOCQA_EMBEDDING_PROVIDER", EMBEDDING_PROVIDERS, "hashing");
    const chatProvider = getEnvChoice(env, "DOCQA_CHAT_PROVIDER", CHAT_PROVIDERS, "template");
    const backend = getEnvChoice(env, "DOCQA_VECTOR_BACKEND", VECTOR_BACKENDS, "memory");

    const chunkSize = getEnvNumber(env, "DOCQA_CHUNK_SIZE", 1000);
    const overlap = getEnvNumber(env, "DOCQA_CHUNK_OVERLAP", 200);
    if (!(chunkSize > overlap && overlap >= 0)) {
        throw new Error(
            `Chunking configuration requires DOCQA_CHUNK_SIZE > DOCQA_CHUNK_OVERLAP >= 0, got ${chunkSize} and ${overlap}.`
        );
    }

    const databaseUrl = getEnv(env, "DOCQA_DATABASE_URL", false) ?? getEnv(env, "DATABASE_URL", false);
    if (backend === "postgres" && !databaseUrl) {
        throw new Error("The postgres vector backend requires DOCQA_DATABASE_URL or DATABASE_URL.");
    }

    return {
        logging: {
            level: getEnvChoice(env, "DOCQA_LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean(env, "DOCQA_LOGGING_PRETTY", false),
        },
        server: {
            port: getEnvNumber(env, "DOCQA_SERVER_PORT", getEnvNumber(env, "PORT", 3000)),
            maxUploadBytes: getEnvNumber(env, "DOCQA_SERVER_MAX_UPLOAD_BYTES", 10 * 1024 * 1024),
        },
        chunking: {
            strategy: getEnvChoice(env, "DOCQA_CHUNK_STRATEGY", CHUNKING_STRATEGIES, "sentence"),
            chunkSize,
            overlap,
            pruneStaleChunks: getEnvBoolean(env, "DOCQA_PRUNE_STALE_CHUNKS", true),
        },
        embedding: {
            provider: embeddingProvider,
            model: getEnv(env, "DOCQA_EMBEDDING_MODEL", false) ?? DEFAULT_EMBEDDING_MODELS[embeddingProvider],
            dimension: getEnvNumber(env, "DOCQA_EMBEDDING_DIMENSION", 384),
            apiKey: getEnv(env, "DOCQA_EMBEDDING_API_KEY", false),
            baseUrl: getEnv(env, "DOCQA_EMBEDDING_BASE_URL", false),
            limits: {
                batchSize: getEnvOptionalNumber(env, "DOCQA_EMBEDDING_LIMITS_BATCH_SIZE"),
                concurrency: getEnvOptionalNumber(env, "DOCQA_EMBEDDING_LIMITS_CONCURRENCY"),
                maxRequestsPerMinute: getEnvOptionalNumber(env, "DOCQA_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                retries: getEnvOptionalNumber(env, "DOCQA_EMBEDDING_LIMITS_RETRIES"),
            },
        },
        chat: {
            provider: chatProvider,
            model: getEnv(env, "DOCQA_CHAT_MODEL", false) ?? DEFAULT_CHAT_MODELS[chatProvider],
            temperature: getEnvNumber(env, "DOCQA_CHAT_TEMPERATURE", 0.2),
            maxOutputTokens: getEnvOptionalNumber(env, "DOCQA_CHAT_MAX_OUTPUT_TOKENS"),
            apiKey: getEnv(env, "DOCQA_CHAT_API_KEY", false),
            baseUrl: getEnv(env, "DOCQA_CHAT_BASE_URL", false),
        },
        vectorIndex: {
            backend,
            collection: getEnv(env, "DOCQA_COLLECTION", false) ?? "documents",
            databaseUrl,
            timeoutMs: getEnvNumber(env, "DOCQA_VECTOR_TIMEOUT_MS", 10_000),
            pageSize: getEnvNumber(env, "DOCQA_VECTOR_PAGE_SIZE", 100),
        },
        query: {
            topK: getEnvNumber(env, "DOCQA_QUERY_TOP_K", 5),
        },
        history: {
            storageDir: getEnv(env, "DOCQA_HISTORY_DIR", false) ?? path.resolve(process.cwd(), "storage"),
            maxMessages: getEnvNumber(env, "DOCQA_HISTORY_MAX_MESSAGES", 50),
        },
    };
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // A missing default .env is fine: the variables may come from the process environment.
        if (configPath) {
            throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    return buildAppConfig(process.env);
}
