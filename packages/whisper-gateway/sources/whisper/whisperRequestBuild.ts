import type {
    WhisperListModelsRequest,
    WhisperTranscribeDataRequest,
    WhisperTranscribePathRequest
} from "./whisperTypes.js";

export type WhisperTranscribeParams = {
    model: string;
    language?: string | null;
    task: string;
};

/**
 * Builds a transcribe request that points the backend at a file on the shared filesystem.
 * Expects: audioPath is already absolute.
 */
export function whisperTranscribePathRequestBuild(
    audioPath: string,
    params: WhisperTranscribeParams
): WhisperTranscribePathRequest {
    return {
        command: "transcribe",
        audio_path: audioPath,
        ...whisperTranscribeOptionsBuild(params)
    };
}

/**
 * Builds a transcribe request carrying the audio inline as base64.
 */
export function whisperTranscribeDataRequestBuild(
    data: Uint8Array,
    params: WhisperTranscribeParams
): WhisperTranscribeDataRequest {
    return {
        command: "transcribe",
        audio_data: Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("base64"),
        ...whisperTranscribeOptionsBuild(params)
    };
}

export function whisperListModelsRequestBuild(): WhisperListModelsRequest {
    return { command: "list_models" };
}

/**
 * Normalizes a language hint: blank or missing means auto-detection.
 */
export function whisperLanguageNormalize(language: string | null | undefined): string | undefined {
    const trimmed = language?.trim();
    return trimmed ? trimmed : undefined;
}

function whisperTranscribeOptionsBuild(params: WhisperTranscribeParams): {
    model?: string;
    language?: string;
    task?: string;
} {
    const options: { model?: string; language?: string; task?: string } = {};
    const model = params.model.trim();
    if (model) {
        options.model = model;
    }
    const language = whisperLanguageNormalize(params.language);
    if (language) {
        options.language = language;
    }
    const task = params.task.trim();
    if (task) {
        options.task = task;
    }
    return options;
}
