import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildAppConfig } from "../config/loadConfig";
import { BackendUnavailableError } from "../errors";
import { createApp } from "./server";
import { type ServerContext, createServerContext } from "./utils/context";

const NOTES = "Cats are mammals. Dogs are mammals too. Fish are not.";
const silent = pino({ level: "silent" });

describe("HTTP API", () => {
    let storageDir: string;
    let context: ServerContext;
    let app: ReturnType<typeof createApp>;

    const uploadNotes = () =>
        request(app).post("/api/documents").send({ filename: "notes.txt", text: NOTES, chunkSize: 20, overlap: 5 });

    beforeEach(async () => {
        storageDir = await mkdtemp(path.join(os.tmpdir(), "docqa-server-"));
        const config = buildAppConfig({ DOCQA_HISTORY_DIR: storageDir, DOCQA_EMBEDDING_DIMENSION: "64" });
        context = createServerContext(config, silent);
        app = createApp(context, silent);
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(storageDir, { recursive: true, force: true });
    });

    it("reports health before anything is loaded", async () => {
        const response = await request(app).get("/api/health");

        expect(response.status).toBe(200);
        expect(response.body).toEqual({
            status: "ok",
            backend: "memory",
            embeddingModelLoaded: false,
            collection: { name: "documents", status: "ready", pointCount: 0, vectorCount: 0 },
        });
    });

    it("uploads, lists and deletes a document", async () => {
        const upload = await uploadNotes();
        expect(upload.status).toBe(201);
        expect(upload.body).toEqual({
            status: "success",
            message: "notes.txt uploaded and indexed successfully!",
            filename: "notes.txt",
            chunksStored: 4,
            prunedChunks: 0,
        });

        const list = await request(app).get("/api/documents");
        expect(list.body).toEqual({ documents: [{ name: "notes.txt" }], total: 1 });

        const removed = await request(app).delete("/api/documents/notes.txt");
        expect(removed.status).toBe(200);
        expect(removed.body).toEqual({ status: "success", deleted: 4, message: "Deleted notes.txt." });

        const again = await request(app).delete("/api/documents/notes.txt");
        expect(again.status).toBe(404);
        expect(again.body).toEqual({
            status: "error",
            code: "NOT_FOUND",
            message: 'No indexed content found for "notes.txt".',
        });
    });

    it("prunes chunks left over from a longer version", async () => {
        await uploadNotes();

        const shorter = await request(app)
            .post("/api/documents")
            .send({ filename: "notes.txt", text: "Cats are mammals.", chunkSize: 20, overlap: 5 });

        expect(shorter.body.chunksStored).toBe(1);
        expect(shorter.body.prunedChunks).toBe(3);
    });

    it("accepts a multipart file upload", async () => {
        const response = await request(app)
            .post("/api/documents")
            .field("chunkSize", "20")
            .field("overlap", "5")
            .attach("file", Buffer.from(NOTES, "utf8"), "notes.txt");

        expect(response.status).toBe(201);
        expect(response.body).toEqual({
            status: "success",
            message: "notes.txt uploaded and indexed successfully!",
            filename: "notes.txt",
            chunksStored: 4,
            prunedChunks: 0,
        });
    });

    it("rejects a multipart file above the upload limit", async () => {
        const config = buildAppConfig({ DOCQA_HISTORY_DIR: storageDir, DOCQA_SERVER_MAX_UPLOAD_BYTES: "16" });
        const small = createApp(createServerContext(config, silent), silent);

        const response = await request(small).post("/api/documents").attach("file", Buffer.from(NOTES, "utf8"), "notes.txt");

        expect(response.status).toBe(413);
        expect(response.body).toEqual({ status: "error", message: "File exceeds the 16 byte upload limit." });
    });

    it("maps an index outage during upload to 503", async () => {
        vi.spyOn(context.index, "upsert").mockRejectedValue(
            new BackendUnavailableError("PostgreSQL connect failed: timed out", { timedOut: true })
        );

        const response = await uploadNotes();

        expect(response.status).toBe(503);
        expect(response.body).toEqual({
            status: "error",
            code: "BACKEND_UNAVAILABLE",
            message: "Failed to ingest notes.txt: PostgreSQL connect failed: timed out",
            attemptedCount: 4,
            retryable: true,
        });
    });

    it("rejects uploads without content", async () => {
        const response = await request(app).post("/api/documents").send({ filename: "notes.txt" });

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
            status: "error",
            code: "INVALID_INPUT",
            message: "Either text or contentBase64 is required.",
        });
    });

    it("rejects binary formats without an extractor", async () => {
        const response = await request(app)
            .post("/api/documents")
            .send({ filename: "report.pdf", contentBase64: Buffer.from("%PDF-1.4").toString("base64") });

        expect(response.status).toBe(400);
        expect(response.body.message).toBe(
            'Cannot extract text from "report.pdf": .pdf files need a format-specific extractor.'
        );
    });

    it("rejects documents with no text", async () => {
        const response = await request(app).post("/api/documents").send({ filename: "notes.txt", text: "   \n " });

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
            status: "error",
            code: "INVALID_INPUT",
            message: "No text content found in notes.txt.",
            retryable: false,
        });
    });

    it("answers questions and keeps a chat history", async () => {
        await uploadNotes();

        const answer = await request(app).post("/api/ask").send({ question: "What are mammals?", topK: 1 });
        expect(answer.status).toBe(200);
        expect(answer.body.sources).toHaveLength(1);
        expect(answer.body.sources[0].filename).toBe("notes.txt");
        expect(answer.body.chunks).toHaveLength(1);
        expect(answer.body.answer.startsWith('Based on your documents, here is what I found about "What are mammals?":')).toBe(
            true
        );
        expect(context.embedder.isLoaded()).toBe(true);

        const history = await request(app).get("/api/chat/history");
        expect(history.body.count).toBe(1);
        expect(history.body.history[0].question).toBe("What are mammals?");

        const stats = await request(app).get("/api/chat/stats");
        expect(stats.body.totalMessages).toBe(1);
        expect(stats.body.oldestMessage).toBe(stats.body.newestMessage);

        const missing = await request(app).delete("/api/chat/message/msg_0_deadbeef");
        expect(missing.status).toBe(404);
        expect(missing.body).toEqual({ status: "error", code: "NOT_FOUND", message: "Message not found" });

        const cleared = await request(app).delete("/api/chat/history");
        expect(cleared.body).toEqual({ message: "Chat history cleared successfully" });
        const empty = await request(app).get("/api/chat/history");
        expect(empty.body).toEqual({ history: [], count: 0 });
    });

    it("answers with the no-results message on an empty index", async () => {
        const response = await request(app).post("/api/ask").send({ question: "What are mammals?" });

        expect(response.status).toBe(200);
        expect(response.body).toEqual({
            answer: "I couldn't find any relevant information in the uploaded documents to answer your question.",
            sources: [],
            chunks: [],
        });
    });

    it("rejects an empty question", async () => {
        const response = await request(app).post("/api/ask").send({ question: "   " });

        expect(response.status).toBe(400);
        expect(response.body).toEqual({
            status: "error",
            code: "INVALID_INPUT",
            message: "question: Question is required",
        });
    });

    it("maps an unreachable index to 503", async () => {
        vi.spyOn(context.index, "search").mockRejectedValue(new BackendUnavailableError("PostgreSQL search failed: timed out"));

        const response = await request(app).post("/api/ask").send({ question: "What are mammals?" });

        expect(response.status).toBe(503);
        expect(response.body).toEqual({
            status: "error",
            code: "BACKEND_UNAVAILABLE",
            message: "PostgreSQL search failed: timed out",
            retryable: true,
        });
    });

    it("rejects malformed JSON", async () => {
        const response = await request(app)
            .post("/api/ask")
            .set("Content-Type", "application/json")
            .send('{"question": ');

        expect(response.status).toBe(400);
        expect(response.body).toEqual({ status: "error", message: "Malformed request body." });
    });
});
