export type RetrievalErrorCode =
    | "INVALID_INPUT"
    | "MODEL_UNAVAILABLE"
    | "BACKEND_UNAVAILABLE"
    | "UPSERT_FAILED"
    | "NOT_FOUND";

export abstract class RetrievalError extends Error {
    abstract readonly code: RetrievalErrorCode;
    readonly retryable: boolean = false;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Rejected before any backend call: empty question, bad top_k, bad chunking parameters. */
export class InvalidInputError extends RetrievalError {
    readonly code = "INVALID_INPUT";
}

/** The embedding backend could not be initialized or failed to encode. The next call retries the load. */
export class ModelUnavailableError extends RetrievalError {
    readonly code = "MODEL_UNAVAILABLE";
    override readonly retryable = true;
}

export class BackendUnavailableError extends RetrievalError {
    readonly code = "BACKEND_UNAVAILABLE";
    override readonly retryable = true;
    readonly timedOut: boolean;

    constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
        super(message, options);
        this.timedOut = options?.timedOut ?? false;
    }
}

export class UpsertFailedError extends RetrievalError {
    readonly code = "UPSERT_FAILED";
    override readonly retryable = true;
    readonly reason: string;
    readonly attemptedCount: number;

    constructor(reason: string, attemptedCount: number, options?: { cause?: unknown }) {
        super(`Upsert of ${attemptedCount} point${attemptedCount === 1 ? "" : "s"} failed: ${reason}`, options);
        this.reason = reason;
        this.attemptedCount = attemptedCount;
    }
}

export class NotFoundError extends RetrievalError {
    readonly code = "NOT_FOUND";
    readonly target: string;

    constructor(target: string, message?: string) {
        super(message ?? `No indexed content found for "${target}".`);
        this.target = target;
    }
}

export function isRetrievalError(value: unknown): value is RetrievalError {
    return value instanceof RetrievalError;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
