import type { WhisperClient } from "../whisper/whisperClient.js";

/** The part of WhisperClient the HTTP routes call; tests pass a fake. */
export type WhisperApiClient = Pick<
    WhisperClient,
    "transcribeByPath" | "transcribeByBytes" | "listModels" | "metricsSnapshot" | "connected"
>;
