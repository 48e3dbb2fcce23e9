import { getLogger } from "../log.js";
import { whisperErrorIs } from "../whisper/whisperError.js";

const logger = getLogger("command");

/**
 * Prints a Whisper client failure and marks the process as failed.
 * Expects: anything else is rethrown.
 */
export function commandFailureReport(error: unknown): void {
    if (!whisperErrorIs(error)) {
        throw error;
    }
    logger.debug({ kind: error.kind, error }, "error: Command failed");
    console.error(`Error (${error.kind}): ${error.message}`);
    process.exitCode = 1;
}
