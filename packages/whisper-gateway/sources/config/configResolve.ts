import os from "node:os";
import path from "node:path";

import { WHISPER_IO_TIMEOUT_MS } from "../whisper/whisperClient.js";
import {
    WHISPER_CONNECT_TIMEOUT_MS,
    WHISPER_MAX_FRAME_BYTES,
    WHISPER_RETRY_DELAY_MS
} from "../whisper/whisperConnection.js";
import type { Config, SettingsConfig } from "./configTypes.js";

const DEFAULT_WHISPER_HOST = "127.0.0.1";
const DEFAULT_WHISPER_PORT = 9000;
const DEFAULT_SERVER_HOST = "0.0.0.0";
const DEFAULT_SERVER_PORT = 8080;
const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;
const DEFAULT_STATIC_DIR = "static";

/**
 * Fills defaults into a frozen Config snapshot; every section is frozen too.
 * Expects: settings already validated and overlaid with the environment.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string): Config {
    const whisper = settings.whisper;
    const server = settings.server;
    const transcribe = settings.transcribe;

    return Object.freeze({
        settingsPath: path.resolve(settingsPath),
        whisper: Object.freeze({
            host: whisper?.host ?? DEFAULT_WHISPER_HOST,
            port: whisper?.port ?? DEFAULT_WHISPER_PORT,
            connectTimeoutMs: whisper?.connectTimeoutMs ?? WHISPER_CONNECT_TIMEOUT_MS,
            retryDelayMs: whisper?.retryDelayMs ?? WHISPER_RETRY_DELAY_MS,
            ioTimeoutMs: whisper?.ioTimeoutMs ?? WHISPER_IO_TIMEOUT_MS,
            maxFrameBytes: whisper?.maxFrameBytes ?? WHISPER_MAX_FRAME_BYTES
        }),
        server: Object.freeze({
            host: server?.host ?? DEFAULT_SERVER_HOST,
            port: server?.port ?? DEFAULT_SERVER_PORT,
            maxUploadBytes: server?.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES,
            cors: server?.cors ?? true,
            staticDir: path.resolve(server?.staticDir ?? DEFAULT_STATIC_DIR)
        }),
        transcribe: Object.freeze({
            defaultModel: transcribe?.defaultModel ?? "base",
            defaultTask: transcribe?.defaultTask ?? "transcribe",
            upload: transcribe?.upload ?? "bytes",
            uploadDir: path.resolve(transcribe?.uploadDir ?? os.tmpdir())
        })
    });
}
