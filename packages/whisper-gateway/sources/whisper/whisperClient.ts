import { promises as fs } from "node:fs";
import path from "node:path";

import { getLogger } from "../log.js";
import { AsyncLock } from "../util/lock.js";
import { frameEncode } from "./frame/frameEncode.js";
import { WhisperConnection, type WhisperConnectionOptions } from "./whisperConnection.js";
import { WhisperError, whisperErrorFrom } from "./whisperError.js";
import { WhisperMetrics } from "./whisperMetrics.js";
import {
    whisperListModelsRequestBuild,
    whisperTranscribeDataRequestBuild,
    whisperTranscribePathRequestBuild
} from "./whisperRequestBuild.js";
import { whisperModelsParse, whisperTranscriptionParse } from "./whisperResponseParse.js";
import type {
    ModelsResult,
    TranscriptionResult,
    WhisperCallOptions,
    WhisperMetricsSnapshot,
    WhisperRequest
} from "./whisperTypes.js";

export const WHISPER_IO_TIMEOUT_MS = 30 * 60 * 1000;

export type WhisperClientOptions = WhisperConnectionOptions & {
    /** Deadline for writing one request and reading its response. */
    ioTimeoutMs?: number;
};

const logger = getLogger("whisper.client");

/**
 * Typed RPC surface of the Whisper backend over one persistent connection.
 * Calls are serialized on the connection; metrics count every call that passes pre-flight checks.
 */
export class WhisperClient {
    private readonly connection: WhisperConnection;
    private readonly lock = new AsyncLock();
    private readonly metrics = new WhisperMetrics();
    private readonly ioTimeoutMs: number;

    constructor(options: WhisperClientOptions) {
        this.connection = new WhisperConnection(options);
        this.ioTimeoutMs = options.ioTimeoutMs ?? WHISPER_IO_TIMEOUT_MS;
    }

    get connected(): boolean {
        return this.connection.connected;
    }

    /**
     * Transcribes a file the backend reads from the shared filesystem.
     * Throws: input errors when the path does not name an existing file; no I/O happens then.
     */
    async transcribeByPath(
        audioPath: string,
        model: string,
        language: string | null | undefined,
        task: string,
        options: WhisperCallOptions = {}
    ): Promise<TranscriptionResult> {
        callAbortCheck(options.signal);
        const resolved = await audioPathResolve(audioPath);
        const request = whisperTranscribePathRequestBuild(resolved, { model, language, task });
        return this.call(request, whisperTranscriptionParse);
    }

    async transcribeByBytes(
        data: Uint8Array,
        model: string,
        language: string | null | undefined,
        task: string,
        options: WhisperCallOptions = {}
    ): Promise<TranscriptionResult> {
        callAbortCheck(options.signal);
        const request = whisperTranscribeDataRequestBuild(data, { model, language, task });
        return this.call(request, whisperTranscriptionParse);
    }

    async listModels(options: WhisperCallOptions = {}): Promise<ModelsResult> {
        callAbortCheck(options.signal);
        return this.call(whisperListModelsRequestBuild(), whisperModelsParse);
    }

    metricsSnapshot(): WhisperMetricsSnapshot {
        return this.metrics.snapshot();
    }

    close(): void {
        this.connection.close();
    }

    private async call<T>(request: WhisperRequest, parse: (payload: Buffer) => T): Promise<T> {
        const frame = frameEncode(Buffer.from(JSON.stringify(request), "utf8"));
        this.metrics.requestRecord();
        const startedAt = Date.now();
        try {
            const payload = await this.lock.inLock(() => this.connection.exchange(frame, this.ioTimeoutMs));
            return parse(payload);
        } catch (error) {
            this.metrics.errorRecord();
            const failure = whisperErrorFrom(error, "io", `Whisper ${request.command} failed`);
            logger.warn(
                { command: request.command, kind: failure.kind, error: failure },
                "error: Whisper backend call failed"
            );
            throw failure;
        } finally {
            const durationMs = Date.now() - startedAt;
            this.metrics.durationRecord(durationMs);
            logger.debug({ command: request.command, durationMs }, "event: Whisper backend call finished");
        }
    }
}

function callAbortCheck(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new WhisperError("aborted", "Whisper call aborted before it started.", { cause: signal.reason });
    }
}

async function audioPathResolve(audioPath: string): Promise<string> {
    if (audioPath.trim().length === 0) {
        throw new WhisperError("input", "Audio path is empty.");
    }
    const resolved = path.resolve(audioPath);
    let isFile: boolean;
    try {
        isFile = (await fs.stat(resolved)).isFile();
    } catch (error) {
        throw new WhisperError("input", `Audio file not found: ${resolved}`, { cause: error });
    }
    if (!isFile) {
        throw new WhisperError("input", `Audio path is not a file: ${resolved}`);
    }
    return resolved;
}
