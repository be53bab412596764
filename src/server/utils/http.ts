import type { Response } from "express";
import type { ZodError } from "zod";
import type { RetrievalErrorCode } from "../../errors";

const STATUS_BY_CODE: Record<RetrievalErrorCode, number> = {
    INVALID_INPUT: 400,
    NOT_FOUND: 404,
    UPSERT_FAILED: 502,
    MODEL_UNAVAILABLE: 503,
    BACKEND_UNAVAILABLE: 503,
};

export function httpStatusForCode(code: RetrievalErrorCode): number {
    return STATUS_BY_CODE[code];
}

export function sendError(res: Response, status: number, message: string, code?: RetrievalErrorCode): void {
    res.status(status).json({ status: "error", message, ...(code ? { code } : {}) });
}

export function describeValidationError(error: ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
}
