import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import type { ChunkingConfig } from "../config/types";
import { BackendUnavailableError, UpsertFailedError } from "../errors";
import { Embedder } from "../llm/embedder";
import { createEmbedder } from "../llm/factory";
import { InMemoryVectorIndex } from "../vector/memoryIndex";
import { chunkChecksum, chunkPointId } from "./chunkId";
import { RetrievalOrchestrator, rankHits } from "./orchestrator";

const NOTES = "Cats are mammals. Dogs are mammals too. Fish are not.";
const DIMENSION = 64;
const silent = pino({ level: "silent" });

const chunking: ChunkingConfig = { strategy: "sentence", chunkSize: 20, overlap: 5, pruneStaleChunks: true };

function setup(overrides: Partial<ChunkingConfig> = {}) {
    const embedder = createEmbedder({ provider: "hashing", model: "feature-hashing-v1", dimension: DIMENSION });
    const index = new InMemoryVectorIndex({ dimension: DIMENSION, logger: silent });
    const orchestrator = new RetrievalOrchestrator({
        embedder,
        index,
        chunking: { ...chunking, ...overrides },
        logger: silent,
    });
    return { embedder, index, orchestrator };
}

async function storedIds(index: InMemoryVectorIndex, filename: string): Promise<string[]> {
    const hits = await index.search(new Array(DIMENSION).fill(0), 100, { filename });
    return hits.map((hit) => hit.id);
}

describe("RetrievalOrchestrator.ingestDocument", () => {
    it("chunks, embeds and stores a document", async () => {
        const { index, orchestrator } = setup();

        const result = await orchestrator.ingestDocument("notes.txt", NOTES);

        expect(result).toEqual({ status: "success", chunkCount: 4, message: "Indexed 4 chunks from notes.txt.", prunedCount: 0 });
        await expect(index.listDistinctFilenames()).resolves.toEqual(["notes.txt"]);
    });

    it("is idempotent for the same file", async () => {
        const { index, orchestrator } = setup();

        await orchestrator.ingestDocument("notes.txt", NOTES);
        const firstIds = await storedIds(index, "notes.txt");
        await orchestrator.ingestDocument("notes.txt", NOTES);

        await expect(index.countByFilename("notes.txt")).resolves.toBe(4);
        expect(await storedIds(index, "notes.txt")).toEqual(firstIds);
        expect(firstIds).toEqual([0, 1, 2, 3].map((i) => chunkPointId("notes.txt", i)));
    });

    it("builds payloads whose reserved keys metadata cannot override", async () => {
        const { index, orchestrator } = setup();
        const upsert = vi.spyOn(index, "upsert");

        await orchestrator.ingestDocument("notes.txt", NOTES, { course: "bio", filename: "other.txt" });

        const [points] = upsert.mock.calls[0];
        expect(points[0].payload).toEqual({
            course: "bio",
            text: "Cats are mammals.",
            filename: "notes.txt",
            chunk_index: 0,
            total_chunks: 4,
            checksum: chunkChecksum("Cats are mammals."),
        });
        expect(points[0].id).toBe(chunkPointId("notes.txt", 0));
        expect(points[0].vector).toHaveLength(DIMENSION);
    });

    it("prunes chunks left over from a longer version", async () => {
        const { index, orchestrator } = setup();

        await orchestrator.ingestDocument("notes.txt", NOTES);
        const result = await orchestrator.ingestDocument("notes.txt", "Cats are mammals.");

        expect(result).toMatchObject({ status: "success", chunkCount: 1, prunedCount: 3 });
        await expect(index.countByFilename("notes.txt")).resolves.toBe(1);
    });

    it("leaves the stale tail in place when pruning is disabled", async () => {
        const { index, orchestrator } = setup({ pruneStaleChunks: false });

        await orchestrator.ingestDocument("notes.txt", NOTES);
        const result = await orchestrator.ingestDocument("notes.txt", "Cats are mammals.");

        expect(result.prunedCount).toBeUndefined();
        await expect(index.countByFilename("notes.txt")).resolves.toBe(4);
    });

    it("returns an error status when no chunks come out", async () => {
        const { orchestrator } = setup();

        await expect(orchestrator.ingestDocument("empty.txt", "  \n ")).resolves.toEqual({
            status: "error",
            chunkCount: 0,
            message: "No text content found in empty.txt.",
            errorCode: "INVALID_INPUT",
            retryable: false,
        });
    });

    it("rejects invalid chunking parameters before any I/O", async () => {
        const { index, orchestrator } = setup();
        const ensure = vi.spyOn(index, "ensureCollection");

        const result = await orchestrator.ingestDocument("notes.txt", NOTES, {}, { chunkSize: 10, overlap: 10 });

        expect(result).toMatchObject({ status: "error", chunkCount: 0, errorCode: "INVALID_INPUT" });
        expect(ensure).not.toHaveBeenCalled();
    });

    it("rejects an empty filename", async () => {
        const { orchestrator } = setup();
        await expect(orchestrator.ingestDocument("  ", NOTES)).resolves.toMatchObject({
            status: "error",
            errorCode: "INVALID_INPUT",
        });
    });

    it("reports an upsert failure with the attempted count", async () => {
        const { index, orchestrator } = setup();
        vi.spyOn(index, "upsert").mockRejectedValue(new UpsertFailedError("connection reset", 4));

        const result = await orchestrator.ingestDocument("notes.txt", NOTES);

        expect(result).toEqual({
            status: "error",
            chunkCount: 0,
            message: "Failed to ingest notes.txt: Upsert of 4 points failed: connection reset",
            attemptedCount: 4,
            errorCode: "UPSERT_FAILED",
            retryable: true,
        });
    });

    it("reports an unavailable model without writing anything", async () => {
        const index = new InMemoryVectorIndex({ dimension: DIMENSION, logger: silent });
        const upsert = vi.spyOn(index, "upsert");
        const embedder = new Embedder({
            dimension: DIMENSION,
            loadProvider: () => Promise.reject(new Error("weights missing")),
        });
        const orchestrator = new RetrievalOrchestrator({ embedder, index, chunking, logger: silent });

        const result = await orchestrator.ingestDocument("notes.txt", NOTES);

        expect(result).toMatchObject({ status: "error", errorCode: "MODEL_UNAVAILABLE", attemptedCount: 4, retryable: true });
        expect(upsert).not.toHaveBeenCalled();
    });
});

describe("RetrievalOrchestrator.answerQuery", () => {
    it("returns the best matching chunk of the mammals notes", async () => {
        const { index, orchestrator, embedder } = setup();
        await orchestrator.ingestDocument("notes.txt", NOTES);

        const result = await orchestrator.answerQuery("What are mammals?", 1);

        expect(result.status).toBe("ok");
        if (result.status !== "ok") return;
        expect(result.hits).toHaveLength(1);
        expect(result.hits[0].filename).toBe("notes.txt");

        const all = await index.search(await embedder.embed("What are mammals?"), 10);
        expect(all).toHaveLength(4);
        expect(result.hits[0].score).toBe(Math.max(...all.map((hit) => hit.score)));
    });

    it("returns an empty result for a question with nothing to embed", async () => {
        const { index, orchestrator } = setup();
        await orchestrator.ingestDocument("notes.txt", NOTES);
        const search = vi.spyOn(index, "search");

        await expect(orchestrator.answerQuery("???", 2)).resolves.toEqual({ status: "empty", hits: [] });
        expect(search).not.toHaveBeenCalled();
    });

    it("returns an explicit empty marker when nothing is indexed", async () => {
        const { orchestrator } = setup();
        await expect(orchestrator.answerQuery("What are mammals?", 3)).resolves.toEqual({ status: "empty", hits: [] });
    });

    it("only returns hits from the filtered file", async () => {
        const { orchestrator } = setup();
        await orchestrator.ingestDocument("notes.txt", NOTES);
        await orchestrator.ingestDocument("zoo.txt", "Mammals at the zoo include lions. Lions are mammals too.");

        const result = await orchestrator.answerQuery("mammals", 10, { filename: "zoo.txt" });

        expect(result.status).toBe("ok");
        if (result.status !== "ok") return;
        expect(result.hits.length).toBeGreaterThan(0);
        expect(result.hits.every((hit) => hit.filename === "zoo.txt")).toBe(true);
    });

    it.each([
        ["", 3],
        ["   ", 3],
        ["What?", 0],
        ["What?", 1.5],
    ])("rejects question=%j top_k=%s as invalid input", async (question, topK) => {
        const { orchestrator } = setup();
        await expect(orchestrator.answerQuery(question, topK)).resolves.toMatchObject({
            status: "error",
            code: "INVALID_INPUT",
            retryable: false,
        });
    });

    it("reports a backend failure distinctly from an empty result", async () => {
        const { index, orchestrator } = setup();
        vi.spyOn(index, "search").mockRejectedValue(
            new BackendUnavailableError("PostgreSQL search failed: timed out", { timedOut: true })
        );

        await expect(orchestrator.answerQuery("What are mammals?", 1)).resolves.toEqual({
            status: "error",
            code: "BACKEND_UNAVAILABLE",
            message: "PostgreSQL search failed: timed out",
            retryable: true,
        });
    });
});

describe("RetrievalOrchestrator.deleteDocument", () => {
    it("removes a document and reports NOT_FOUND afterwards", async () => {
        const { orchestrator } = setup();
        await orchestrator.ingestDocument("notes.txt", NOTES);

        await expect(orchestrator.deleteDocument("notes.txt")).resolves.toEqual({
            status: "success",
            deleted: 4,
            message: "Deleted notes.txt.",
        });
        await expect(orchestrator.listDocuments()).resolves.toEqual([]);
        await expect(orchestrator.answerQuery("mammals", 5)).resolves.toEqual({ status: "empty", hits: [] });

        await expect(orchestrator.deleteDocument("notes.txt")).resolves.toEqual({
            status: "error",
            deleted: 0,
            code: "NOT_FOUND",
            message: 'No indexed content found for "notes.txt".',
            retryable: false,
        });
    });
});

describe("rankHits", () => {
    it("sorts by score and keeps the order of equal scores", () => {
        const hit = (id: string, score: number) => ({ id, text: id, filename: "f", chunk_index: 0, total_chunks: 1, score });

        expect(rankHits([hit("a", 0.2), hit("b", 0.9), hit("c", 0.2), hit("d", 0.5)]).map((h) => h.id)).toEqual([
            "b",
            "d",
            "a",
            "c",
        ]);
    });
});
