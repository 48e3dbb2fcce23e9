export const FRAME_HEADER_BYTES = 8;

/**
 * Prepends the 8-byte unsigned big-endian payload length to the payload.
 */
export function frameEncode(payload: Uint8Array): Buffer {
    const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
    frame.writeBigUInt64BE(BigInt(payload.length), 0);
    frame.set(payload, FRAME_HEADER_BYTES);
    return frame;
}
