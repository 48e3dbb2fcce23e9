import type { FastifyReply } from "fastify";

import { getLogger } from "../log.js";
import { whisperErrorIs } from "../whisper/whisperError.js";
import { apiErrorStatusResolve } from "./apiErrorStatusResolve.js";

const logger = getLogger("api.error");

/**
 * Answers with the status matching a Whisper client failure.
 * Expects: anything that is not a WhisperError is rethrown for fastify's default handler.
 */
export function apiErrorReply(reply: FastifyReply, error: unknown, route: string): FastifyReply {
    if (!whisperErrorIs(error)) {
        throw error;
    }
    const status = apiErrorStatusResolve(error.kind);
    logger.warn({ route, status, kind: error.kind, error }, `error: ${route} failed`);
    return reply.status(status).send({ error: error.message });
}
