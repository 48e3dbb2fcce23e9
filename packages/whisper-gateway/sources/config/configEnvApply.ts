import type { SettingsConfig } from "./configTypes.js";

/**
 * Overlays WHISPER_HOST, WHISPER_PORT, WHISPER_IO_TIMEOUT_MS, SERVER_HOST, SERVER_PORT and SERVER_STATIC_DIR onto
 * settings.
 * Blank variables are ignored; malformed numbers throw.
 */
export function configEnvApply(settings: SettingsConfig, env: NodeJS.ProcessEnv): SettingsConfig {
    const whisperHost = envString(env, "WHISPER_HOST");
    const whisperPort = envInteger(env, "WHISPER_PORT", 1, 65_535);
    const ioTimeoutMs = envInteger(env, "WHISPER_IO_TIMEOUT_MS", 1, Number.MAX_SAFE_INTEGER);
    const serverHost = envString(env, "SERVER_HOST");
    const serverPort = envInteger(env, "SERVER_PORT", 1, 65_535);
    const staticDir = envString(env, "SERVER_STATIC_DIR");

    return {
        ...settings,
        whisper: {
            ...settings.whisper,
            ...(whisperHost !== undefined ? { host: whisperHost } : {}),
            ...(whisperPort !== undefined ? { port: whisperPort } : {}),
            ...(ioTimeoutMs !== undefined ? { ioTimeoutMs } : {})
        },
        server: {
            ...settings.server,
            ...(serverHost !== undefined ? { host: serverHost } : {}),
            ...(serverPort !== undefined ? { port: serverPort } : {}),
            ...(staticDir !== undefined ? { staticDir } : {})
        }
    };
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function envInteger(env: NodeJS.ProcessEnv, name: string, min: number, max: number): number | undefined {
    const value = envString(env, name);
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
        throw new Error(`${name} must be an integer between ${min} and ${max}, got "${value}".`);
    }
    return parsed;
}
