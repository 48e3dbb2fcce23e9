import type { FastifyInstance } from "fastify";

import { apiErrorReply } from "../apiErrorReply.js";
import type { WhisperApiClient } from "../apiTypes.js";

export function apiModelsRouteRegister(app: FastifyInstance, client: WhisperApiClient): void {
    app.get("/api/models", async (_request, reply) => {
        try {
            const models = await client.listModels();
            return reply.send({
                available_models: models.available,
                loaded_models: models.loaded
            });
        } catch (error) {
            return apiErrorReply(reply, error, "GET /api/models");
        }
    });
}
