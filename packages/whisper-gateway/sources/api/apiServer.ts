import multipart from "@fastify/multipart";
import fastify, { type FastifyInstance } from "fastify";

import type { Config } from "../config/configTypes.js";
import { getLogger } from "../log.js";
import type { WhisperApiClient } from "./apiTypes.js";
import { apiHealthRouteRegister } from "./routes/apiHealthRouteRegister.js";
import { apiMetricsRouteRegister } from "./routes/apiMetricsRouteRegister.js";
import { apiModelsRouteRegister } from "./routes/apiModelsRouteRegister.js";
import { apiStaticRouteRegister } from "./routes/apiStaticRouteRegister.js";
import { apiTranscribeRouteRegister } from "./routes/apiTranscribeRouteRegister.js";

export type ApiServerOptions = {
    config: Config;
    client: WhisperApiClient;
    version: string;
};

export type ApiServer = {
    url: string;
    close: () => Promise<void>;
};

const CORS_HEADERS = {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type, Content-Length, Accept-Encoding, Authorization"
} as const;

const logger = getLogger("api.server");

/**
 * Builds the gateway HTTP app around an already constructed Whisper client.
 * Expects: the caller owns the client and closes it after the app.
 */
export async function apiServerCreate(options: ApiServerOptions): Promise<FastifyInstance> {
    const { config, client } = options;
    const app = fastify({ logger: false });

    await app.register(multipart, {
        limits: {
            fileSize: config.server.maxUploadBytes
        }
    });

    if (config.server.cors) {
        app.addHook("onRequest", async (_request, reply) => {
            reply.headers(CORS_HEADERS);
        });
        app.options("*", async (_request, reply) => {
            return reply.status(204).send();
        });
    }

    apiHealthRouteRegister(app, client, options.version);
    apiModelsRouteRegister(app, client);
    apiMetricsRouteRegister(app, client);
    apiTranscribeRouteRegister(app, config, client);
    await apiStaticRouteRegister(app, config.server.staticDir);

    return app;
}

/**
 * Creates the app and listens on config.server host and port.
 */
export async function apiServerStart(options: ApiServerOptions): Promise<ApiServer> {
    const app = await apiServerCreate(options);
    const url = await app.listen({ host: options.config.server.host, port: options.config.server.port });
    logger.info(
        { url, backend: `${options.config.whisper.host}:${options.config.whisper.port}` },
        "start: Gateway listening"
    );

    return {
        url,
        close: async () => {
            await app.close();
            logger.info("event: Gateway server closed");
        }
    };
}
