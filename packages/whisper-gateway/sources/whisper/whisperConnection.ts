import net from "node:net";
import { setTimeout as delay } from "node:timers/promises";

import { getLogger } from "../log.js";
import { FrameReader } from "./frame/frameReader.js";
import { WhisperError, whisperErrorFrom } from "./whisperError.js";

export const WHISPER_DIAL_ATTEMPTS = 3;
export const WHISPER_CONNECT_TIMEOUT_MS = 5_000;
export const WHISPER_RETRY_DELAY_MS = 2_000;
export const WHISPER_MAX_FRAME_BYTES = 256 * 1024 * 1024;
const KEEP_ALIVE_DELAY_MS = 30_000;

export type WhisperDial = (options: { host: string; port: number }) => net.Socket;

export type WhisperConnectionOptions = {
    host: string;
    port: number;
    connectTimeoutMs?: number;
    retryDelayMs?: number;
    maxFrameBytes?: number;
    dial?: WhisperDial;
};

export type OpenConnection = {
    socket: net.Socket;
    reader: FrameReader;
};

const logger = getLogger("whisper.connection");

/**
 * Owns the single persistent socket to the Whisper backend.
 * Dials lazily with a bounded retry budget and drops the socket on any I/O failure so the next call redials.
 * Expects: callers serialize ensure/exchange; close() may be called from anywhere.
 */
export class WhisperConnection {
    private readonly host: string;
    private readonly port: number;
    private readonly connectTimeoutMs: number;
    private readonly retryDelayMs: number;
    private readonly maxFrameBytes: number;
    private readonly dial: WhisperDial;
    private current: OpenConnection | null = null;

    constructor(options: WhisperConnectionOptions) {
        this.host = options.host;
        this.port = options.port;
        this.connectTimeoutMs = options.connectTimeoutMs ?? WHISPER_CONNECT_TIMEOUT_MS;
        this.retryDelayMs = options.retryDelayMs ?? WHISPER_RETRY_DELAY_MS;
        this.maxFrameBytes = options.maxFrameBytes ?? WHISPER_MAX_FRAME_BYTES;
        this.dial = options.dial ?? ((target) => net.createConnection(target));
    }

    get connected(): boolean {
        return this.current !== null;
    }

    get address(): string {
        return `${this.host}:${this.port}`;
    }

    /**
     * Returns the open connection, dialing up to WHISPER_DIAL_ATTEMPTS times when there is none.
     * Throws: connection errors once every attempt failed; the connection stays absent.
     */
    async ensure(): Promise<OpenConnection> {
        if (this.current) {
            if (socketUsable(this.current.socket)) {
                return this.current;
            }
            this.connectionDrop(this.current, "stale");
        }

        let lastError: unknown = null;
        for (let attempt = 1; attempt <= WHISPER_DIAL_ATTEMPTS; attempt += 1) {
            try {
                const socket = await this.dialOnce();
                this.current = this.connectionOpen(socket);
                logger.info({ address: this.address, attempt }, "event: Connected to Whisper backend");
                return this.current;
            } catch (error) {
                lastError = error;
                logger.warn(
                    { address: this.address, attempt, attempts: WHISPER_DIAL_ATTEMPTS, error },
                    "error: Whisper backend dial failed"
                );
                if (attempt < WHISPER_DIAL_ATTEMPTS) {
                    await delay(this.retryDelayMs);
                }
            }
        }

        const detail = lastError instanceof Error ? lastError.message : String(lastError);
        throw new WhisperError(
            "connection",
            `Unable to connect to Whisper backend at ${this.address} after ${WHISPER_DIAL_ATTEMPTS} attempts: ${detail}`,
            { cause: lastError }
        );
    }

    /**
     * Writes one request frame and reads one response frame under a single deadline.
     * Throws: timeout, io and protocol errors; each of them tears the connection down first.
     */
    async exchange(frame: Buffer, timeoutMs: number): Promise<Buffer> {
        const connection = await this.ensure();
        if (connection.reader.buffered > 0) {
            const unexpected = connection.reader.buffered;
            this.connectionDrop(connection, "unexpected data");
            throw new WhisperError("protocol", `Backend sent ${unexpected} unexpected bytes before the request.`);
        }

        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => {
                reject(new WhisperError("timeout", `No response from Whisper backend within ${timeoutMs}ms.`));
            }, timeoutMs);
        });

        try {
            return await Promise.race([roundTrip(connection, frame), deadline]);
        } catch (error) {
            const failure = whisperErrorFrom(error, "io", "Whisper backend exchange failed");
            this.connectionDrop(connection, failure.kind);
            throw failure;
        } finally {
            clearTimeout(timer);
        }
    }

    close(): void {
        if (this.current) {
            this.connectionDrop(this.current, "closed");
        }
    }

    private connectionOpen(socket: net.Socket): OpenConnection {
        socket.setNoDelay(true);
        socket.setKeepAlive(true, KEEP_ALIVE_DELAY_MS);
        const connection: OpenConnection = {
            socket,
            reader: new FrameReader(socket, this.maxFrameBytes)
        };
        // The peer's FIN or a socket error ends the connection before "close" arrives.
        const release = (reason: string) => {
            if (this.current === connection) {
                this.current = null;
                logger.info({ address: this.address, reason }, "event: Whisper backend connection closed by peer");
            }
        };
        socket.on("end", () => release("end"));
        socket.on("error", () => release("error"));
        socket.on("close", () => release("close"));
        return connection;
    }

    private connectionDrop(connection: OpenConnection, reason: string): void {
        if (this.current === connection) {
            this.current = null;
        }
        connection.socket.destroy();
        logger.debug({ address: this.address, reason }, "event: Whisper backend connection dropped");
    }

    private dialOnce(): Promise<net.Socket> {
        return new Promise<net.Socket>((resolve, reject) => {
            const socket = this.dial({ host: this.host, port: this.port });
            const timer = setTimeout(() => {
                cleanup();
                socket.destroy();
                reject(new WhisperError("timeout", `Connect timed out after ${this.connectTimeoutMs}ms.`));
            }, this.connectTimeoutMs);
            const onConnect = () => {
                cleanup();
                resolve(socket);
            };
            const onError = (error: Error) => {
                cleanup();
                socket.destroy();
                reject(error);
            };
            const cleanup = () => {
                clearTimeout(timer);
                socket.off("connect", onConnect);
                socket.off("error", onError);
            };
            socket.once("connect", onConnect);
            socket.once("error", onError);
        });
    }
}

function socketUsable(socket: net.Socket): boolean {
    return !socket.destroyed && !socket.readableEnded && socket.writable;
}

async function roundTrip(connection: OpenConnection, frame: Buffer): Promise<Buffer> {
    await socketWrite(connection.socket, frame);
    return connection.reader.next();
}

function socketWrite(socket: net.Socket, data: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        socket.write(data, (error) => {
            if (error) {
                reject(new WhisperError("io", `Write to Whisper backend failed: ${error.message}`, { cause: error }));
                return;
            }
            resolve();
        });
    });
}
