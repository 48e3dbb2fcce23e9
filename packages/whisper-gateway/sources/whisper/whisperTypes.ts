/**
 * Request and response shapes of the Whisper backend protocol plus the typed results returned to callers.
 * Wire field names stay snake_case; caller-facing results are camelCase.
 */

type WhisperTranscribeOptionsWire = {
    model?: string;
    /** Omitted for auto-detection; never an empty string. */
    language?: string;
    task?: string;
};

export type WhisperTranscribePathRequest = WhisperTranscribeOptionsWire & {
    command: "transcribe";
    audio_path: string;
};

export type WhisperTranscribeDataRequest = WhisperTranscribeOptionsWire & {
    command: "transcribe";
    /** Base64-encoded audio bytes. */
    audio_data: string;
};

export type WhisperListModelsRequest = {
    command: "list_models";
};

export type WhisperRequest = WhisperTranscribePathRequest | WhisperTranscribeDataRequest | WhisperListModelsRequest;

export type TranscriptionSegment = {
    text: string;
    start: number;
    end: number;
};

export type TranscriptionResult = {
    text: string;
    language: string;
    segments: TranscriptionSegment[];
    /** Backend processing time in seconds. */
    processingTime: number;
};

export type ModelsResult = {
    /** Model name mapped to its description. */
    available: Record<string, string>;
    loaded: string[];
};

export type WhisperMetricsSnapshot = {
    requestsTotal: number;
    errorsTotal: number;
    processingTimeMs: number;
};

export type WhisperCallOptions = {
    /** Checked once before the call queues for the connection; in-flight calls are not cancelled. */
    signal?: AbortSignal;
};
