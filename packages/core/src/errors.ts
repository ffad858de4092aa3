/**
 * Stable error codes surfaced by sidstore core and adapters.
 */
export type ErrorCode =
    | "SESSION_REQUIRED"
    | "INVALID_COOKIE"
    | "LOCK_TIMEOUT"
    | "STORE_UNAVAILABLE"
    | "INTERNAL_ERROR";

/**
 * Canonical error type used across sidstore packages.
 *
 * Lookups never throw it: a missing session is `null`, not an error.
 */
export class SidstoreError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SidstoreError";
        this.details = details;
    }
}

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract accepted by every sidstore component.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

export function isSidstoreError(error: unknown): error is SidstoreError {
    return error instanceof SidstoreError;
}

/**
 * Converts unknown errors into {@link SidstoreError}.
 */
export function toSidstoreError(error: unknown): SidstoreError {
    if (isSidstoreError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new SidstoreError("INTERNAL_ERROR", error.message, error);
    }

    return new SidstoreError("INTERNAL_ERROR", "Unexpected internal error.", error);
}

export function statusFromErrorCode(code: ErrorCode): number {
    switch (code) {
        case "SESSION_REQUIRED":
            return 401;
        case "STORE_UNAVAILABLE":
        case "LOCK_TIMEOUT":
            return 503;
        case "INVALID_COOKIE":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}
