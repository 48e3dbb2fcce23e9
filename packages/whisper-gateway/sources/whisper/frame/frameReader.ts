import type { Readable } from "node:stream";

import { WhisperError } from "../whisperError.js";
import { FRAME_PAYLOAD_MAX_BYTES, frameDecode } from "./frameDecode.js";
import { FRAME_HEADER_BYTES } from "./frameEncode.js";

type PendingRead = {
    resolve: (payload: Buffer) => void;
    reject: (error: WhisperError) => void;
};

/**
 * Incremental frame decoder bound to one byte stream.
 * Buffers incoming chunks and hands out exactly one whole payload per next() call.
 * Expects: at most one next() is outstanding at a time.
 */
export class FrameReader {
    private buffer: Buffer = Buffer.alloc(0);
    private pending: PendingRead | null = null;
    private failure: WhisperError | null = null;
    private ended = false;
    private readonly maxPayloadBytes: number;

    constructor(stream: Readable, maxPayloadBytes: number = FRAME_PAYLOAD_MAX_BYTES) {
        this.maxPayloadBytes = maxPayloadBytes;
        stream.on("data", (chunk: Buffer | string) => {
            this.chunkHandle(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
        });
        stream.on("end", () => {
            this.endHandle();
        });
        stream.on("close", () => {
            this.endHandle();
        });
        stream.on("error", (error: Error) => {
            this.failHandle(new WhisperError("io", `Connection error: ${error.message}`, { cause: error }));
        });
    }

    /** Bytes received but not yet handed out. */
    get buffered(): number {
        return this.buffer.length;
    }

    next(): Promise<Buffer> {
        if (this.pending) {
            return Promise.reject(new WhisperError("protocol", "Concurrent frame reads on one connection."));
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        return new Promise<Buffer>((resolve, reject) => {
            this.pending = { resolve, reject };
            this.drain();
        });
    }

    private chunkHandle(chunk: Buffer): void {
        if (this.failure) {
            return;
        }
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
        this.drain();
    }

    private endHandle(): void {
        if (this.ended) {
            return;
        }
        this.ended = true;
        this.drain();
    }

    private failHandle(error: WhisperError): void {
        if (this.failure) {
            return;
        }
        this.failure = error;
        const pending = this.pending;
        this.pending = null;
        pending?.reject(error);
    }

    private drain(): void {
        const pending = this.pending;
        if (!pending || this.failure) {
            return;
        }

        let decoded: ReturnType<typeof frameDecode>;
        try {
            decoded = frameDecode(this.buffer, this.maxPayloadBytes);
        } catch (error) {
            this.failHandle(
                error instanceof WhisperError ? error : new WhisperError("protocol", String(error), { cause: error })
            );
            return;
        }

        if (decoded) {
            this.buffer = decoded.rest;
            this.pending = null;
            pending.resolve(decoded.payload);
            return;
        }

        if (this.ended) {
            this.failHandle(this.truncatedError());
        }
    }

    private truncatedError(): WhisperError {
        if (this.buffer.length < FRAME_HEADER_BYTES) {
            return new WhisperError(
                "io",
                `Connection closed by backend after ${this.buffer.length} of ${FRAME_HEADER_BYTES} header bytes.`
            );
        }
        const expected = this.buffer.readBigUInt64BE(0).toString();
        const received = this.buffer.length - FRAME_HEADER_BYTES;
        return new WhisperError(
            "protocol",
            `Connection closed mid-frame: received ${received} of ${expected} payload bytes.`
        );
    }
}
