import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { errorMessage, isRetrievalError } from "../../errors";
import type { TextExtractor } from "../../ingest/extract";
import type { IngestOptions, RetrievalOrchestrator } from "../../retrieval/orchestrator";
import { describeValidationError, httpStatusForCode, sendError } from "../utils/http";

export interface DocumentsRouteContext {
    orchestrator: RetrievalOrchestrator;
    extractText: TextExtractor;
}

const STRATEGIES = ["sentence", "paragraph", "words"] as const;

const uploadBodySchema = z
    .object({
        filename: z.string().trim().min(1, "filename is required"),
        text: z.string().optional(),
        contentBase64: z.string().optional(),
        metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
        chunkSize: z.number().int().positive().optional(),
        overlap: z.number().int().nonnegative().optional(),
        strategy: z.enum(STRATEGIES).optional(),
    })
    .refine((body) => body.text !== undefined || body.contentBase64 !== undefined, {
        message: "Either text or contentBase64 is required.",
    });

// Multipart form fields arrive as strings.
const uploadFormSchema = z.object({
    filename: z.string().trim().min(1).optional(),
    chunkSize: z.coerce.number().int().positive().optional(),
    overlap: z.coerce.number().int().nonnegative().optional(),
    strategy: z.enum(STRATEGIES).optional(),
});

interface UploadRequest {
    filename: string;
    content: { kind: "text"; text: string } | { kind: "file"; bytes: Uint8Array };
    metadata: Record<string, string | number | boolean>;
    options: IngestOptions;
}

function parseUploadRequest(req: Request): { ok: true; upload: UploadRequest } | { ok: false; message: string } {
    if (req.file) {
        const parsed = uploadFormSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            return { ok: false, message: describeValidationError(parsed.error) };
        }
        const { filename, chunkSize, overlap, strategy } = parsed.data;
        return {
            ok: true,
            upload: {
                filename: filename ?? req.file.originalname,
                content: { kind: "file", bytes: req.file.buffer },
                metadata: {},
                options: { chunkSize, overlap, strategy },
            },
        };
    }

    const parsed = uploadBodySchema.safeParse(req.body);
    if (!parsed.success) {
        return { ok: false, message: describeValidationError(parsed.error) };
    }
    const body = parsed.data;
    return {
        ok: true,
        upload: {
            filename: body.filename,
            content:
                body.text !== undefined
                    ? { kind: "text", text: body.text }
                    : { kind: "file", bytes: Buffer.from(body.contentBase64 ?? "", "base64") },
            metadata: body.metadata ?? {},
            options: { chunkSize: body.chunkSize, overlap: body.overlap, strategy: body.strategy },
        },
    };
}

async function resolveText(upload: UploadRequest, extractText: TextExtractor): Promise<{ text: string; fileSize: number }> {
    if (upload.content.kind === "text") {
        return { text: upload.content.text, fileSize: Buffer.byteLength(upload.content.text, "utf8") };
    }
    const { bytes } = upload.content;
    return { text: await extractText(upload.filename, bytes), fileSize: bytes.length };
}

/** Accepts a JSON body (`text` or `contentBase64`) or a multipart form with a `file` field. */
export async function handleUploadRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    const parsed = parseUploadRequest(req);
    if (!parsed.ok) {
        sendError(res, 400, parsed.message, "INVALID_INPUT");
        return;
    }

    const { upload } = parsed;
    let extracted: { text: string; fileSize: number };
    try {
        extracted = await resolveText(upload, context.extractText);
    } catch (error) {
        if (isRetrievalError(error)) {
            sendError(res, httpStatusForCode(error.code), error.message, error.code);
            return;
        }
        logger.error({ err: error, filename: upload.filename }, "Text extraction failed.");
        sendError(res, 500, `Error processing file: ${errorMessage(error)}`);
        return;
    }

    const result = await context.orchestrator.ingestDocument(
        upload.filename,
        extracted.text,
        {
            ...upload.metadata,
            file_size: extracted.fileSize,
            text_length: extracted.text.length,
        },
        upload.options
    );

    if (result.status === "error") {
        const code = result.errorCode ?? "UPSERT_FAILED";
        res.status(httpStatusForCode(code)).json({
            status: "error",
            code,
            message: result.message,
            attemptedCount: result.attemptedCount,
            retryable: result.retryable ?? false,
        });
        return;
    }

    res.status(201).json({
        status: "success",
        message: `${upload.filename} uploaded and indexed successfully!`,
        filename: upload.filename,
        chunksStored: result.chunkCount,
        prunedChunks: result.prunedCount ?? 0,
    });
}

export async function handleListDocumentsRequest(
    _req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const filenames = await context.orchestrator.listDocuments();
        res.json({
            documents: filenames.map((name) => ({ name })),
            total: filenames.length,
        });
    } catch (error) {
        logger.error({ err: error }, "Failed to list documents.");
        if (isRetrievalError(error)) {
            sendError(res, httpStatusForCode(error.code), error.message, error.code);
            return;
        }
        sendError(res, 500, `Error listing documents: ${errorMessage(error)}`);
    }
}

export async function handleDeleteDocumentRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext
): Promise<void> {
    const result = await context.orchestrator.deleteDocument(req.params.filename ?? "");

    if (result.status === "error") {
        sendError(res, httpStatusForCode(result.code), result.message, result.code);
        return;
    }

    res.json(result);
}
