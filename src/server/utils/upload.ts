import type { RequestHandler } from "express";
import multer, { MulterError } from "multer";
import { sendError } from "./http";

/**
 * Parses a multipart `file` field into memory. Requests that are not multipart pass
 * straight through to the JSON handler.
 */
export function createUploadMiddleware(maxUploadBytes: number): RequestHandler {
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxUploadBytes, files: 1 },
    }).single("file");

    return (req, res, next) => {
        upload(req, res, (error: unknown) => {
            if (error instanceof MulterError) {
                if (error.code === "LIMIT_FILE_SIZE") {
                    sendError(res, 413, `File exceeds the ${maxUploadBytes} byte upload limit.`);
                    return;
                }
                sendError(res, 400, error.message, "INVALID_INPUT");
                return;
            }
            if (error) {
                next(error);
                return;
            }
            next();
        });
    };
}
