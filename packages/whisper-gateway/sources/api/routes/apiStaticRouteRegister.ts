import { promises as fs } from "node:fs";

import fastifyStatic from "@fastify/static";
import type { FastifyInstance } from "fastify";

import { getLogger } from "../../log.js";

const logger = getLogger("api.static");

/**
 * Serves the web UI: /static/* from staticDir and / as its index.html.
 * Returns false and registers nothing when staticDir is not a directory.
 */
export async function apiStaticRouteRegister(app: FastifyInstance, staticDir: string): Promise<boolean> {
    if (!(await directoryIs(staticDir))) {
        logger.debug({ staticDir }, "event: Static directory missing, web UI disabled");
        return false;
    }

    await app.register(fastifyStatic, {
        root: staticDir,
        prefix: "/static/"
    });
    app.get("/", async (_request, reply) => {
        return reply.sendFile("index.html");
    });
    logger.info({ staticDir }, "ready: Web UI served");
    return true;
}

async function directoryIs(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isDirectory();
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return false;
        }
        throw error;
    }
}
