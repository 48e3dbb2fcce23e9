import { promises as fs } from "node:fs";
import path from "node:path";

import { configEnvApply } from "./configEnvApply.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config } from "./configTypes.js";

export const DEFAULT_SETTINGS_PATH = "whisper-gateway.json";

/**
 * Loads, validates, and resolves the config from disk and the environment into an immutable snapshot.
 * Expects: settingsPath points at a JSON settings file; a missing file means defaults.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    try {
        const content = await fs.readFile(resolvedPath, "utf8");
        raw = JSON.parse(content);
    } catch (error) {
        if (!fileMissingIs(error)) {
            throw error;
        }
    }

    const settings = configEnvApply(configSettingsParse(raw), env);
    return configResolve(settings, resolvedPath);
}

function fileMissingIs(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
