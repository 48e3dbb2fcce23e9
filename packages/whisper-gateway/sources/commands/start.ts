import path from "node:path";

import { apiServerStart } from "../api/apiServer.js";
import { configLoad, DEFAULT_SETTINGS_PATH } from "../config/configLoad.js";
import { getLogger } from "../log.js";
import { packageVersion } from "../packageVersion.js";
import { awaitShutdown, onShutdown } from "../util/shutdown.js";
import { whisperClientCreate } from "../whisper/whisperClientCreate.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
};

/**
 * Runs the HTTP gateway until SIGINT or SIGTERM.
 * The backend connection is opened lazily by the first request.
 */
export async function startCommand(options: StartOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    logger.info({ settings: config.settingsPath }, "start: Starting whisper gateway");

    const client = whisperClientCreate(config);
    const server = await apiServerStart({ config, client, version: packageVersion() });

    onShutdown("api-server", () => server.close());
    onShutdown("whisper-client", () => {
        client.close();
    });

    logger.info({ url: server.url }, "ready: Ready. Accepting transcription requests.");
    const signal = await awaitShutdown();
    logger.info({ signal, metrics: client.metricsSnapshot() }, "event: Shutdown complete");
    process.exit(0);
}
