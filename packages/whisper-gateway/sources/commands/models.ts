import path from "node:path";

import { configLoad, DEFAULT_SETTINGS_PATH } from "../config/configLoad.js";
import { whisperClientCreate } from "../whisper/whisperClientCreate.js";
import { commandFailureReport } from "./commandFailureReport.js";

export type ModelsCommandOptions = {
    settings?: string;
};

/**
 * Prints the backend's available and loaded models as JSON.
 */
export async function modelsCommand(options: ModelsCommandOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    const client = whisperClientCreate(config);
    try {
        const models = await client.listModels();
        console.log(
            JSON.stringify({ available_models: models.available, loaded_models: models.loaded }, null, 2)
        );
    } catch (error) {
        commandFailureReport(error);
    } finally {
        client.close();
    }
}
