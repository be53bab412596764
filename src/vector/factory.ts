import type { Logger } from "pino";
import type { VectorIndexConfig } from "../config/types";
import { InMemoryVectorIndex } from "./memoryIndex";
import { PostgresVectorIndex } from "./postgres/client";
import type { VectorIndex } from "./types";

export function createVectorIndex(config: VectorIndexConfig, dimension: number, logger?: Logger): VectorIndex {
    switch (config.backend) {
        case "memory":
            return new InMemoryVectorIndex({ name: config.collection, dimension, logger });
        case "postgres":
            return new PostgresVectorIndex({
                collection: config.collection,
                dimension,
                databaseUrl: config.databaseUrl,
                timeoutMs: config.timeoutMs,
                pageSize: config.pageSize,
                logger,
            });
        default:
            throw new Error(`Unsupported vector backend: ${String(config.backend)}`);
    }
}
