export { apiServerCreate, apiServerStart, type ApiServer, type ApiServerOptions } from "./api/apiServer.js";
export type { WhisperApiClient } from "./api/apiTypes.js";
export { configLoad } from "./config/configLoad.js";
export type { Config, SettingsConfig } from "./config/configTypes.js";
export { frameDecode, FRAME_PAYLOAD_MAX_BYTES } from "./whisper/frame/frameDecode.js";
export { frameEncode, FRAME_HEADER_BYTES } from "./whisper/frame/frameEncode.js";
export { FrameReader } from "./whisper/frame/frameReader.js";
export { WHISPER_IO_TIMEOUT_MS, WhisperClient, type WhisperClientOptions } from "./whisper/whisperClient.js";
export { whisperClientCreate } from "./whisper/whisperClientCreate.js";
export {
    WHISPER_CONNECT_TIMEOUT_MS,
    WHISPER_DIAL_ATTEMPTS,
    WHISPER_MAX_FRAME_BYTES,
    WHISPER_RETRY_DELAY_MS,
    WhisperConnection,
    type WhisperConnectionOptions
} from "./whisper/whisperConnection.js";
export { WhisperError, type WhisperErrorKind, whisperErrorIs } from "./whisper/whisperError.js";
export type {
    ModelsResult,
    TranscriptionResult,
    TranscriptionSegment,
    WhisperCallOptions,
    WhisperMetricsSnapshot
} from "./whisper/whisperTypes.js";
