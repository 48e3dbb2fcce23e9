import { promises as fs } from "node:fs";
import path from "node:path";

import { configLoad, DEFAULT_SETTINGS_PATH } from "../config/configLoad.js";
import { whisperClientCreate } from "../whisper/whisperClientCreate.js";
import { WhisperError } from "../whisper/whisperError.js";
import type { TranscriptionResult } from "../whisper/whisperTypes.js";
import { commandFailureReport } from "./commandFailureReport.js";

export type TranscribeCommandOptions = {
    settings?: string;
    model?: string;
    language?: string;
    task?: string;
    bytes?: boolean;
};

/**
 * Transcribes one local file and prints the result as JSON.
 * By default the backend reads the file itself; --bytes sends the contents inline.
 */
export async function transcribeCommand(file: string, options: TranscribeCommandOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    const client = whisperClientCreate(config);
    const model = options.model ?? config.transcribe.defaultModel;
    const task = options.task ?? config.transcribe.defaultTask;

    try {
        let result: TranscriptionResult;
        if (options.bytes) {
            const data = await audioBytesRead(file);
            result = await client.transcribeByBytes(data, model, options.language, task);
        } else {
            result = await client.transcribeByPath(file, model, options.language, task);
        }
        console.log(
            JSON.stringify(
                {
                    text: result.text,
                    language: result.language,
                    segments: result.segments,
                    processing_time: result.processingTime
                },
                null,
                2
            )
        );
    } catch (error) {
        commandFailureReport(error);
    } finally {
        client.close();
    }
}

async function audioBytesRead(file: string): Promise<Buffer> {
    const resolved = path.resolve(file);
    try {
        return await fs.readFile(resolved);
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            throw new WhisperError("input", `Audio file not found: ${resolved}`, { cause: error });
        }
        const detail = error instanceof Error ? error.message : String(error);
        throw new WhisperError("input", `Audio file could not be read: ${detail}`, { cause: error });
    }
}
