import type { Config } from "../config/configTypes.js";
import { WhisperClient } from "./whisperClient.js";

export function whisperClientCreate(config: Config): WhisperClient {
    return new WhisperClient({
        host: config.whisper.host,
        port: config.whisper.port,
        connectTimeoutMs: config.whisper.connectTimeoutMs,
        retryDelayMs: config.whisper.retryDelayMs,
        ioTimeoutMs: config.whisper.ioTimeoutMs,
        maxFrameBytes: config.whisper.maxFrameBytes
    });
}
