import { z } from "zod";

import { WhisperError } from "./whisperError.js";
import type { ModelsResult, TranscriptionResult } from "./whisperTypes.js";

const errorField = z.string().optional();

// Backend segments carry extra decoder fields (id, tokens, ...); only text and timing are kept.
const segmentSchema = z
    .object({
        text: z.string(),
        start: z.number(),
        end: z.number()
    })
    .passthrough();

const transcriptionSchema = z
    .object({
        text: z.string().optional(),
        language: z.string().optional(),
        segments: z.array(segmentSchema).nullish(),
        processing_time: z.number().optional(),
        error: errorField
    })
    .passthrough();

const modelsSchema = z
    .object({
        available_models: z.record(z.string()).nullish(),
        loaded_models: z.array(z.string()).nullish(),
        error: errorField
    })
    .passthrough();

/**
 * Decodes a transcription response payload.
 * Throws: protocol errors for undecodable payloads, application errors for a non-empty error field.
 */
export function whisperTranscriptionParse(payload: Buffer): TranscriptionResult {
    const response = payloadParse(payload, transcriptionSchema);
    applicationErrorCheck(response.error);
    return {
        text: response.text ?? "",
        language: response.language ?? "",
        segments: (response.segments ?? []).map((segment) => ({
            text: segment.text,
            start: segment.start,
            end: segment.end
        })),
        processingTime: response.processing_time ?? 0
    };
}

/**
 * Decodes a list_models response payload.
 * Throws: protocol errors for undecodable payloads, application errors for a non-empty error field.
 */
export function whisperModelsParse(payload: Buffer): ModelsResult {
    const response = payloadParse(payload, modelsSchema);
    applicationErrorCheck(response.error);
    return {
        available: { ...(response.available_models ?? {}) },
        loaded: [...(response.loaded_models ?? [])]
    };
}

function payloadParse<T>(payload: Buffer, schema: z.ZodType<T>): T {
    let raw: unknown;
    try {
        raw = JSON.parse(payload.toString("utf8"));
    } catch (error) {
        throw new WhisperError("protocol", "Backend response is not valid JSON.", { cause: error });
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const location = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new WhisperError(
            "protocol",
            `Backend response has an unexpected shape${location}: ${issue?.message ?? "invalid"}`,
            { cause: result.error }
        );
    }
    return result.data;
}

function applicationErrorCheck(error: string | undefined): void {
    if (error && error.length > 0) {
        throw new WhisperError("application", error);
    }
}
