import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import type { Config } from "../../config/configTypes.js";
import { getLogger } from "../../log.js";
import type { TranscriptionResult } from "../../whisper/whisperTypes.js";
import { apiErrorReply } from "../apiErrorReply.js";
import type { WhisperApiClient } from "../apiTypes.js";

type TranscribeUpload = {
    filename: string;
    data: Buffer;
};

type TranscribeForm = {
    upload: TranscribeUpload | null;
    fields: Record<string, string>;
};

const transcribeFieldsSchema = z.object({
    model: z.string().min(1).optional(),
    language: z.string().min(1).optional(),
    task: z.enum(["transcribe", "translate"]).optional()
});

const logger = getLogger("api.transcribe");

/**
 * Registers POST /api/transcribe: a multipart upload with a `file` part and optional model, language and task fields.
 * Expects: @fastify/multipart is registered on app with the upload size limit.
 */
export function apiTranscribeRouteRegister(app: FastifyInstance, config: Config, client: WhisperApiClient): void {
    app.post("/api/transcribe", async (request, reply) => {
        const startedAt = Date.now();

        let form: TranscribeForm;
        try {
            form = await transcribeFormRead(request);
        } catch (error) {
            return multipartErrorReply(reply, error, config.server.maxUploadBytes);
        }
        if (!form.upload) {
            return reply.status(400).send({ error: "File not found in request" });
        }

        const fields = transcribeFieldsSchema.safeParse(form.fields);
        if (!fields.success) {
            return reply.status(400).send({
                error: "Invalid payload",
                details: fields.error.flatten()
            });
        }

        const model = fields.data.model ?? config.transcribe.defaultModel;
        const task = fields.data.task ?? config.transcribe.defaultTask;
        const language = fields.data.language;
        logger.info(
            { filename: form.upload.filename, bytes: form.upload.data.length, model, task, language },
            "event: Transcription requested"
        );

        try {
            const result =
                config.transcribe.upload === "path"
                    ? await transcribeByPath(config, client, form.upload, model, language, task)
                    : await client.transcribeByBytes(form.upload.data, model, language, task);
            return reply.send({
                text: result.text,
                language: result.language,
                segments: result.segments,
                processing_time: (Date.now() - startedAt) / 1000
            });
        } catch (error) {
            return apiErrorReply(reply, error, "POST /api/transcribe");
        }
    });
}

async function transcribeFormRead(request: FastifyRequest): Promise<TranscribeForm> {
    let upload: TranscribeUpload | null = null;
    const fields: Record<string, string> = {};

    for await (const part of request.parts()) {
        if (part.type === "file") {
            if (part.fieldname === "file" && !upload) {
                upload = { filename: part.filename, data: await part.toBuffer() };
            } else {
                part.file.resume();
            }
            continue;
        }
        if (typeof part.value === "string" && part.value.trim().length > 0) {
            fields[part.fieldname] = part.value.trim();
        }
    }

    return { upload, fields };
}

// Path mode: the backend reads the upload from uploadDir, which it must share with the gateway.
async function transcribeByPath(
    config: Config,
    client: WhisperApiClient,
    upload: TranscribeUpload,
    model: string,
    language: string | undefined,
    task: string
): Promise<TranscriptionResult> {
    const extension = path.extname(path.basename(upload.filename)).replace(/[^.a-zA-Z0-9]/g, "");
    const filePath = path.join(config.transcribe.uploadDir, `whisper-upload-${randomUUID()}${extension}`);
    await fs.writeFile(filePath, upload.data);
    try {
        return await client.transcribeByPath(filePath, model, language, task);
    } finally {
        await fs.rm(filePath, { force: true });
    }
}

function multipartErrorReply(reply: FastifyReply, error: unknown, maxUploadBytes: number): FastifyReply {
    const code = errorCodeGet(error);
    if (code === "FST_REQ_FILE_TOO_LARGE") {
        return reply.status(413).send({ error: `File exceeds the ${maxUploadBytes} byte upload limit` });
    }
    if (code === "FST_INVALID_MULTIPART_CONTENT_TYPE") {
        return reply.status(400).send({ error: "Request is not multipart/form-data" });
    }
    throw error;
}

function errorCodeGet(error: unknown): string | undefined {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}
