import type { FastifyInstance } from "fastify";

import type { WhisperApiClient } from "../apiTypes.js";

export function apiMetricsRouteRegister(app: FastifyInstance, client: WhisperApiClient): void {
    app.get("/api/metrics", async (_request, reply) => {
        const metrics = client.metricsSnapshot();
        return reply.send({
            requests_total: metrics.requestsTotal,
            errors_total: metrics.errorsTotal,
            processing_time_ms: metrics.processingTimeMs
        });
    });
}
