import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import type { FastifyInstance } from "fastify";
import { afterEach, describe, expect, it, vi } from "vitest";

import { configResolve } from "../config/configResolve.js";
import type { SettingsConfig } from "../config/configTypes.js";
import { WhisperError } from "../whisper/whisperError.js";
import type { TranscriptionResult } from "../whisper/whisperTypes.js";
import { apiServerCreate } from "./apiServer.js";
import type { WhisperApiClient } from "./apiTypes.js";

type MultipartEntry = { name: string; value: string } | { name: string; filename: string; data: Buffer };

const BOUNDARY = "----whisper-test-boundary";
const apps: FastifyInstance[] = [];
const tmpDirs: string[] = [];

afterEach(async () => {
    for (const app of apps.splice(0)) {
        await app.close();
    }
    for (const dir of tmpDirs.splice(0)) {
        await fs.rm(dir, { recursive: true, force: true });
    }
});

const transcription: TranscriptionResult = {
    text: "hello",
    language: "en",
    segments: [{ text: "hello", start: 0, end: 1.2 }],
    processingTime: 0.4
};

function clientFake() {
    const transcribeByPath = vi.fn<WhisperApiClient["transcribeByPath"]>(async () => transcription);
    const transcribeByBytes = vi.fn<WhisperApiClient["transcribeByBytes"]>(async () => transcription);
    const listModels = vi.fn<WhisperApiClient["listModels"]>(async () => ({
        available: { base: "Base model" },
        loaded: ["base"]
    }));
    const metricsSnapshot = vi.fn<WhisperApiClient["metricsSnapshot"]>(() => ({
        requestsTotal: 3,
        errorsTotal: 1,
        processingTimeMs: 250
    }));
    const client: WhisperApiClient = {
        transcribeByPath,
        transcribeByBytes,
        listModels,
        metricsSnapshot,
        connected: true
    };
    return { client, transcribeByPath, transcribeByBytes, listModels };
}

async function appCreate(client: WhisperApiClient, settings: SettingsConfig = {}): Promise<FastifyInstance> {
    const app = await apiServerCreate({
        config: configResolve(settings, "settings.json"),
        client,
        version: "1.0.0"
    });
    apps.push(app);
    return app;
}

function multipartBuild(entries: MultipartEntry[]): Buffer {
    const chunks: Buffer[] = [];
    for (const entry of entries) {
        if ("data" in entry) {
            chunks.push(
                Buffer.from(
                    `--${BOUNDARY}\r\n` +
                        `Content-Disposition: form-data; name="${entry.name}"; filename="${entry.filename}"\r\n` +
                        "Content-Type: application/octet-stream\r\n\r\n"
                ),
                entry.data,
                Buffer.from("\r\n")
            );
        } else {
            chunks.push(
                Buffer.from(
                    `--${BOUNDARY}\r\n` +
                        `Content-Disposition: form-data; name="${entry.name}"\r\n\r\n` +
                        `${entry.value}\r\n`
                )
            );
        }
    }
    chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));
    return Buffer.concat(chunks);
}

function transcribeInject(app: FastifyInstance, entries: MultipartEntry[]) {
    return app.inject({
        method: "POST",
        url: "/api/transcribe",
        headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}` },
        payload: multipartBuild(entries)
    });
}

describe("apiServer", () => {
    it("reports health with CORS headers", async () => {
        const app = await appCreate(clientFake().client);

        const response = await app.inject({ method: "GET", url: "/api/health" });

        expect(response.statusCode).toBe(200);
        expect(response.headers["access-control-allow-origin"]).toBe("*");
        expect(response.json()).toMatchObject({
            status: "ok",
            version: "1.0.0",
            backend: { connected: true }
        });
    });

    it("answers preflight requests with 204", async () => {
        const app = await appCreate(clientFake().client);

        const response = await app.inject({ method: "OPTIONS", url: "/api/transcribe" });

        expect(response.statusCode).toBe(204);
        expect(response.headers["access-control-allow-methods"]).toBe("GET, POST, OPTIONS");
        expect(response.headers["access-control-allow-headers"]).toBe(
            "Content-Type, Content-Length, Accept-Encoding, Authorization"
        );
    });

    it("omits CORS headers when disabled", async () => {
        const app = await appCreate(clientFake().client, { server: { cors: false } });

        const response = await app.inject({ method: "GET", url: "/api/health" });

        expect(response.headers["access-control-allow-origin"]).toBeUndefined();
    });

    it("lists models in wire shape", async () => {
        const app = await appCreate(clientFake().client);

        const response = await app.inject({ method: "GET", url: "/api/models" });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            available_models: { base: "Base model" },
            loaded_models: ["base"]
        });
    });

    it("maps an unreachable backend to 503", async () => {
        const fake = clientFake();
        fake.listModels.mockRejectedValueOnce(new WhisperError("connection", "Unable to connect"));
        const app = await appCreate(fake.client);

        const response = await app.inject({ method: "GET", url: "/api/models" });

        expect(response.statusCode).toBe(503);
        expect(response.json()).toEqual({ error: "Unable to connect" });
    });

    it("reports client metrics", async () => {
        const app = await appCreate(clientFake().client);

        const response = await app.inject({ method: "GET", url: "/api/metrics" });

        expect(response.json()).toEqual({ requests_total: 3, errors_total: 1, processing_time_ms: 250 });
    });

    it("transcribes an upload inline", async () => {
        const fake = clientFake();
        const app = await appCreate(fake.client);

        const response = await transcribeInject(app, [
            { name: "file", filename: "a.wav", data: Buffer.from("RIFF") },
            { name: "model", value: "small" },
            { name: "language", value: "" },
            { name: "task", value: "translate" }
        ]);

        expect(response.statusCode).toBe(200);
        const body = response.json<{ text: string; processing_time: number }>();
        expect(body).toMatchObject({
            text: "hello",
            language: "en",
            segments: [{ text: "hello", start: 0, end: 1.2 }]
        });
        expect(body.processing_time).toBeGreaterThanOrEqual(0);
        expect(fake.transcribeByBytes).toHaveBeenCalledTimes(1);
        const [data, model, language, task] = fake.transcribeByBytes.mock.calls[0] ?? [];
        expect(Buffer.from(data ?? new Uint8Array()).toString()).toBe("RIFF");
        expect([model, language, task]).toEqual(["small", undefined, "translate"]);
    });

    it("applies default model and task", async () => {
        const fake = clientFake();
        const app = await appCreate(fake.client, { transcribe: { defaultModel: "tiny" } });

        const response = await transcribeInject(app, [{ name: "file", filename: "a.wav", data: Buffer.from("RIFF") }]);

        expect(response.statusCode).toBe(200);
        expect(fake.transcribeByBytes.mock.calls[0]?.slice(1)).toEqual(["tiny", undefined, "transcribe"]);
    });

    it("rejects requests without a file", async () => {
        const fake = clientFake();
        const app = await appCreate(fake.client);

        const response = await transcribeInject(app, [{ name: "model", value: "base" }]);

        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({ error: "File not found in request" });
        expect(fake.transcribeByBytes).not.toHaveBeenCalled();
    });

    it("rejects unknown tasks", async () => {
        const app = await appCreate(clientFake().client);

        const response = await transcribeInject(app, [
            { name: "file", filename: "a.wav", data: Buffer.from("RIFF") },
            { name: "task", value: "summarize" }
        ]);

        expect(response.statusCode).toBe(400);
        expect(response.json()).toMatchObject({ error: "Invalid payload" });
    });

    it("rejects uploads above the size limit", async () => {
        const fake = clientFake();
        const app = await appCreate(fake.client, { server: { maxUploadBytes: 4 } });

        const response = await transcribeInject(app, [
            { name: "file", filename: "a.wav", data: Buffer.from("0123456789") }
        ]);

        expect(response.statusCode).toBe(413);
        expect(response.json()).toEqual({ error: "File exceeds the 4 byte upload limit" });
        expect(fake.transcribeByBytes).not.toHaveBeenCalled();
    });

    it("rejects non-multipart bodies", async () => {
        const app = await appCreate(clientFake().client);

        const response = await app.inject({
            method: "POST",
            url: "/api/transcribe",
            headers: { "content-type": "application/json" },
            payload: JSON.stringify({ model: "base" })
        });

        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({ error: "Request is not multipart/form-data" });
    });

    it("maps backend errors to statuses", async () => {
        const fake = clientFake();
        fake.transcribeByBytes.mockRejectedValueOnce(new WhisperError("application", "model not found"));
        fake.transcribeByBytes.mockRejectedValueOnce(new WhisperError("timeout", "No response"));
        const app = await appCreate(fake.client);
        const entries = [{ name: "file", filename: "a.wav", data: Buffer.from("RIFF") }];

        const first = await transcribeInject(app, entries);
        const second = await transcribeInject(app, entries);

        expect(first.statusCode).toBe(500);
        expect(first.json()).toEqual({ error: "model not found" });
        expect(second.statusCode).toBe(504);
    });

    it("hands uploads to the backend by path and removes them afterwards", async () => {
        const uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), "whisper-upload-"));
        tmpDirs.push(uploadDir);
        const fake = clientFake();
        const seen: string[] = [];
        fake.transcribeByPath.mockImplementationOnce(async (audioPath) => {
            seen.push(path.dirname(audioPath), path.extname(audioPath), await fs.readFile(audioPath, "utf8"));
            return transcription;
        });
        const app = await appCreate(fake.client, { transcribe: { upload: "path", uploadDir } });

        const response = await transcribeInject(app, [
            { name: "file", filename: "voice memo.mp3", data: Buffer.from("ID3") }
        ]);

        expect(response.statusCode).toBe(200);
        expect(seen).toEqual([uploadDir, ".mp3", "ID3"]);
        expect(fake.transcribeByBytes).not.toHaveBeenCalled();
        expect(await fs.readdir(uploadDir)).toEqual([]);
    });

    it("serves the web UI from the static directory", async () => {
        const staticDir = await fs.mkdtemp(path.join(os.tmpdir(), "whisper-static-"));
        tmpDirs.push(staticDir);
        await fs.writeFile(path.join(staticDir, "index.html"), "<h1>Whisper</h1>");
        await fs.writeFile(path.join(staticDir, "app.js"), "console.log(1);");
        const app = await appCreate(clientFake().client, { server: { staticDir } });

        const index = await app.inject({ method: "GET", url: "/" });
        const script = await app.inject({ method: "GET", url: "/static/app.js" });

        expect(index.statusCode).toBe(200);
        expect(index.body).toBe("<h1>Whisper</h1>");
        expect(index.headers["content-type"]).toContain("text/html");
        expect(script.statusCode).toBe(200);
        expect(script.body).toBe("console.log(1);");
    });

    it("skips the web UI when the static directory is missing", async () => {
        const missing = path.join(os.tmpdir(), "whisper-static-missing", "ui");
        const app = await appCreate(clientFake().client, { server: { staticDir: missing } });

        const index = await app.inject({ method: "GET", url: "/" });

        expect(index.statusCode).toBe(404);
    });
});
