export type WhisperErrorKind =
    | "connection"
    | "io"
    | "protocol"
    | "application"
    | "timeout"
    | "input"
    | "aborted";

/**
 * Error thrown by the Whisper transport client for every failed call.
 * Expects: kind is stable and drives retry and HTTP status decisions in callers.
 */
export class WhisperError extends Error {
    readonly kind: WhisperErrorKind;

    constructor(kind: WhisperErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "WhisperError";
        this.kind = kind;
    }
}

export function whisperErrorIs(error: unknown, kind?: WhisperErrorKind): error is WhisperError {
    if (!(error instanceof WhisperError)) {
        return false;
    }
    return kind === undefined || error.kind === kind;
}

/**
 * Wraps any thrown value into a WhisperError of the given kind, keeping existing WhisperErrors as-is.
 */
export function whisperErrorFrom(error: unknown, kind: WhisperErrorKind, context: string): WhisperError {
    if (error instanceof WhisperError) {
        return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new WhisperError(kind, `${context}: ${detail}`, { cause: error });
}
