import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
    portUnusedResolve,
    type WhisperBackendFake,
    whisperBackendStart
} from "../whisper/whisperBackendTestUtils.js";
import { modelsCommand } from "./models.js";
import { transcribeCommand } from "./transcribe.js";

const backends: WhisperBackendFake[] = [];
const tmpDirs: string[] = [];

afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    for (const backend of backends.splice(0)) {
        await backend.close();
    }
    for (const dir of tmpDirs.splice(0)) {
        await fs.rm(dir, { recursive: true, force: true });
    }
});

async function settingsCreate(port: number): Promise<{ dir: string; settingsPath: string }> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "whisper-command-"));
    tmpDirs.push(dir);
    const settingsPath = path.join(dir, "settings.json");
    await fs.writeFile(
        settingsPath,
        JSON.stringify({ whisper: { host: "127.0.0.1", port, retryDelayMs: 0 }, transcribe: { defaultModel: "tiny" } })
    );
    vi.stubEnv("WHISPER_HOST", "");
    vi.stubEnv("WHISPER_PORT", "");
    return { dir, settingsPath };
}

describe("transcribeCommand", () => {
    it("sends file contents with --bytes and prints the result", async () => {
        const backend = await whisperBackendStart((_request, reply) => {
            reply.json({ text: "hi", language: "en", segments: [], processing_time: 0.5 });
        });
        backends.push(backend);
        const { dir, settingsPath } = await settingsCreate(backend.port);
        const audioPath = path.join(dir, "a.wav");
        await fs.writeFile(audioPath, "RIFF");
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

        await transcribeCommand(audioPath, { settings: settingsPath, bytes: true, language: "en" });

        expect(backend.requests).toEqual([
            { command: "transcribe", audio_data: "UklGRg==", model: "tiny", language: "en", task: "transcribe" }
        ]);
        expect(log).toHaveBeenCalledWith(
            JSON.stringify({ text: "hi", language: "en", segments: [], processing_time: 0.5 }, null, 2)
        );
    });

    it("reports an unreachable backend and sets the exit code", async () => {
        const port = await portUnusedResolve();
        const { dir, settingsPath } = await settingsCreate(port);
        const audioPath = path.join(dir, "a.wav");
        await fs.writeFile(audioPath, "RIFF");
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

        await transcribeCommand(audioPath, { settings: settingsPath });

        expect(process.exitCode).toBe(1);
        expect(error).toHaveBeenCalledTimes(1);
        expect(String(error.mock.calls[0]?.[0])).toContain("Error (connection): Unable to connect");
    });

    it("reports a missing file with --bytes as an input error", async () => {
        const backend = await whisperBackendStart((_request, reply) => {
            reply.json({ text: "", language: "en", segments: [] });
        });
        backends.push(backend);
        const { dir, settingsPath } = await settingsCreate(backend.port);
        const missing = path.join(dir, "missing.wav");
        const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

        await transcribeCommand(missing, { settings: settingsPath, bytes: true });

        expect(process.exitCode).toBe(1);
        expect(error).toHaveBeenCalledWith(`Error (input): Audio file not found: ${missing}`);
        expect(backend.connections()).toBe(0);
    });
});

describe("modelsCommand", () => {
    it("prints models in wire shape", async () => {
        const backend = await whisperBackendStart((_request, reply) => {
            reply.json({ available_models: { base: "Base model" }, loaded_models: [] });
        });
        backends.push(backend);
        const { settingsPath } = await settingsCreate(backend.port);
        const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

        await modelsCommand({ settings: settingsPath });

        expect(log).toHaveBeenCalledWith(
            JSON.stringify({ available_models: { base: "Base model" }, loaded_models: [] }, null, 2)
        );
        expect(process.exitCode).toBeUndefined();
    });
});
