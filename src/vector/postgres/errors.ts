import { BackendUnavailableError, errorMessage, isRetrievalError, type RetrievalError } from "../../errors";

const CONNECTION_ERROR_CODES = new Set([
    "ECONNREFUSED",
    "ECONNRESET",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ETIMEDOUT",
    "57P01",
    "57P03",
]);

// 57014: query_canceled, raised when statement_timeout fires.
const TIMEOUT_ERROR_CODE = "57014";

function errorCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}

export function isTimeoutError(error: unknown): boolean {
    const code = errorCode(error);
    if (code === TIMEOUT_ERROR_CODE || code === "ETIMEDOUT") {
        return true;
    }
    return /timeout|timed out/i.test(errorMessage(error));
}

export function isConnectionError(error: unknown): boolean {
    const code = errorCode(error);
    if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) {
        return true;
    }
    return /connection terminated|connect ECONNREFUSED/i.test(errorMessage(error));
}

export function toBackendError(error: unknown, action: string): RetrievalError {
    if (isRetrievalError(error)) {
        return error;
    }

    const timedOut = isTimeoutError(error);
    const detail = timedOut ? "timed out" : errorMessage(error);
    return new BackendUnavailableError(`PostgreSQL ${action} failed: ${detail}`, { cause: error, timedOut });
}
