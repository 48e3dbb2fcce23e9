import net from "node:net";

import { frameEncode } from "./frame/frameEncode.js";
import { FrameReader } from "./frame/frameReader.js";

export type WhisperBackendReply = {
    json: (value: unknown) => void;
    raw: (data: Buffer) => void;
    /** Flushes optional bytes, then half-closes the socket. */
    end: (data?: Buffer) => void;
};

export type WhisperBackendHandler = (request: unknown, reply: WhisperBackendReply) => void | Promise<void>;

export type WhisperBackendFake = {
    port: number;
    /** Decoded requests in arrival order. */
    requests: unknown[];
    /** Number of accepted TCP connections. */
    connections: () => number;
    /** Destroys every open server-side socket. */
    dropAll: () => void;
    close: () => Promise<void>;
};

/**
 * Starts an in-process backend on 127.0.0.1 that speaks the length-prefixed JSON protocol.
 * Requests on one connection are handled one at a time, like the real backend.
 */
export async function whisperBackendStart(handler: WhisperBackendHandler): Promise<WhisperBackendFake> {
    const sockets = new Set<net.Socket>();
    const requests: unknown[] = [];
    let connections = 0;

    const serve = async (socket: net.Socket, reader: FrameReader): Promise<void> => {
        const reply: WhisperBackendReply = {
            json: (value) => {
                socket.write(frameEncode(Buffer.from(JSON.stringify(value), "utf8")));
            },
            raw: (data) => {
                socket.write(data);
            },
            end: (data) => {
                if (data) {
                    socket.end(data);
                    return;
                }
                socket.end();
            }
        };
        while (!socket.destroyed) {
            let payload: Buffer;
            try {
                payload = await reader.next();
            } catch {
                // Client went away.
                return;
            }
            const request: unknown = JSON.parse(payload.toString("utf8"));
            requests.push(request);
            await handler(request, reply);
        }
    };

    const server = net.createServer((socket) => {
        connections += 1;
        sockets.add(socket);
        socket.on("close", () => {
            sockets.delete(socket);
        });
        const reader = new FrameReader(socket);
        serve(socket, reader).catch((error: unknown) => {
            socket.destroy(error instanceof Error ? error : new Error(String(error)));
        });
    });

    const port = await new Promise<number>((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (!address || typeof address === "string") {
                reject(new Error("Failed to allocate test backend port."));
                return;
            }
            resolve(address.port);
        });
    });

    return {
        port,
        requests,
        connections: () => connections,
        dropAll: () => {
            for (const socket of sockets) {
                socket.destroy();
            }
        },
        close: async () => {
            for (const socket of sockets) {
                socket.destroy();
            }
            await new Promise<void>((resolve) => {
                server.close(() => resolve());
            });
        }
    };
}

/**
 * Returns a loopback port with nothing listening on it.
 */
export async function portUnusedResolve(): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = net.createServer();
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (!address || typeof address === "string") {
                server.close();
                reject(new Error("Failed to allocate random test port."));
                return;
            }
            const port = address.port;
            server.close(() => resolve(port));
        });
        server.on("error", reject);
    });
}
