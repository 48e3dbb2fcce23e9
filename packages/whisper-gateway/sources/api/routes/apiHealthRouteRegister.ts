import type { FastifyInstance } from "fastify";

import type { WhisperApiClient } from "../apiTypes.js";

/**
 * Registers GET /api/health; it never touches the backend.
 */
export function apiHealthRouteRegister(app: FastifyInstance, client: WhisperApiClient, version: string): void {
    app.get("/api/health", async (_request, reply) => {
        return reply.send({
            status: "ok",
            server_time: new Date().toISOString(),
            version,
            backend: { connected: client.connected }
        });
    });
}
