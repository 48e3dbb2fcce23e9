import type { WhisperErrorKind } from "../whisper/whisperError.js";

/**
 * Maps a client failure kind to the HTTP status the gateway answers with.
 */
export function apiErrorStatusResolve(kind: WhisperErrorKind): number {
    switch (kind) {
        case "input":
            return 400;
        case "aborted":
            return 499;
        case "application":
            return 500;
        case "io":
        case "protocol":
            return 502;
        case "connection":
            return 503;
        case "timeout":
            return 504;
    }
}
