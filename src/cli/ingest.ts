import { readFile } from "node:fs/promises";
import path from "node:path";
import { loadAppConfig } from "../config/loadConfig";
import type { ChunkingStrategy } from "../config/types";
import { extractPlainText } from "../ingest/extract";
import { createEmbedder } from "../llm/factory";
import { type IngestOptions, RetrievalOrchestrator } from "../retrieval/orchestrator";
import { configureLogger, getLogger } from "../utils/logger";
import { createVectorIndex } from "../vector/factory";

const STRATEGIES: readonly ChunkingStrategy[] = ["sentence", "paragraph", "words"];

interface CliOptions {
    configPath?: string;
    files: string[];
    ingest: IngestOptions;
}

function printHelp(): void {
    const lines = [
        "Usage: ingest [--config <path-to-env>] [--chunk-size N] [--overlap N] [--strategy S] <file...>",
        "",
        "Options:",
        "  -c, --config       Path to the .env configuration file (defaults to .env in the working directory).",
        "      --chunk-size   Characters (or words, for --strategy words) per chunk.",
        "      --overlap      Overlap between consecutive chunks.",
        "      --strategy     sentence | paragraph | words",
        "  -h, --help         Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseInteger(flag: string, value: string | undefined): number {
    const parsed = Number(value);
    if (value === undefined || !Number.isInteger(parsed)) {
        throw new Error(`${flag} expects an integer, got: ${value ?? "nothing"}`);
    }
    return parsed;
}

function parseStrategy(value: string | undefined): ChunkingStrategy {
    const match = STRATEGIES.find((strategy) => strategy === value);
    if (!match) {
        throw new Error(`--strategy must be one of ${STRATEGIES.join(", ")}, got: ${value ?? "nothing"}`);
    }
    return match;
}

/** Returns `null` when help was requested. */
function parseArgs(argv: string[]): CliOptions | null {
    const options: CliOptions = { files: [], ingest: {} };

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        switch (arg) {
            case "-h":
            case "--help":
                return null;
            case "-c":
            case "--config":
                options.configPath = argv[i + 1];
                i += 1;
                break;
            case "--chunk-size":
                options.ingest.chunkSize = parseInteger(arg, argv[i + 1]);
                i += 1;
                break;
            case "--overlap":
                options.ingest.overlap = parseInteger(arg, argv[i + 1]);
                i += 1;
                break;
            case "--strategy":
                options.ingest.strategy = parseStrategy(argv[i + 1]);
                i += 1;
                break;
            default:
                options.files.push(arg);
        }
    }

    return options;
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    if (!options) {
        printHelp();
        return;
    }
    if (options.files.length === 0) {
        printHelp();
        process.exitCode = 1;
        return;
    }

    const config = await loadAppConfig(options.configPath);
    const logger = configureLogger(config.logging);
    if (config.vectorIndex.backend === "memory") {
        logger.warn("The memory vector backend does not persist: indexed chunks are dropped when this command exits.");
    }

    const embedder = createEmbedder(config.embedding, logger);
    const index = createVectorIndex(config.vectorIndex, config.embedding.dimension, logger);
    const orchestrator = new RetrievalOrchestrator({
        embedder,
        index,
        chunking: config.chunking,
        defaultTopK: config.query.topK,
        logger,
    });

    let failures = 0;
    let totalChunks = 0;

    try {
        for (const file of options.files) {
            const filename = path.basename(file);
            try {
                const bytes = await readFile(file);
                const text = await extractPlainText(filename, bytes);
                const result = await orchestrator.ingestDocument(filename, text, { source_path: path.resolve(file) }, options.ingest);

                if (result.status === "success") {
                    totalChunks += result.chunkCount;
                    logger.info({ file, chunks: result.chunkCount }, result.message);
                } else {
                    failures += 1;
                    logger.error({ file, code: result.errorCode }, result.message);
                }
            } catch (error) {
                failures += 1;
                logger.error({ err: error, file }, "Failed to read document.");
            }
        }
    } finally {
        await index.close();
    }

    logger.info(`Processed documents: ${options.files.length - failures}`);
    logger.info(`Failed documents: ${failures}`);
    logger.info(`Chunks stored: ${totalChunks}`);

    if (failures > 0) {
        process.exitCode = 1;
    }
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Ingestion failed.");
    process.exitCode = 1;
});
