import { WhisperError } from "../whisperError.js";
import { FRAME_HEADER_BYTES } from "./frameEncode.js";

/** Largest length a frame header may declare; tighter caps belong to the caller. */
export const FRAME_PAYLOAD_MAX_BYTES = 2 ** 32 - 1;

export type FrameDecoded = {
    payload: Buffer;
    rest: Buffer;
};

/**
 * Reads the declared payload length from a frame header.
 * Expects: header holds at least FRAME_HEADER_BYTES bytes.
 */
export function frameLengthRead(header: Buffer, maxPayloadBytes: number = FRAME_PAYLOAD_MAX_BYTES): number {
    const declared = header.readBigUInt64BE(0);
    if (declared > BigInt(maxPayloadBytes)) {
        throw new WhisperError(
            "protocol",
            `Frame declares ${declared.toString()} payload bytes, above the ${maxPayloadBytes} byte limit.`
        );
    }
    return Number(declared);
}

/**
 * Decodes one frame from the start of the buffer.
 * Returns null while the header or payload is still incomplete.
 */
export function frameDecode(buffer: Buffer, maxPayloadBytes: number = FRAME_PAYLOAD_MAX_BYTES): FrameDecoded | null {
    if (buffer.length < FRAME_HEADER_BYTES) {
        return null;
    }
    const length = frameLengthRead(buffer, maxPayloadBytes);
    const end = FRAME_HEADER_BYTES + length;
    if (buffer.length < end) {
        return null;
    }
    return {
        payload: buffer.subarray(FRAME_HEADER_BYTES, end),
        rest: buffer.subarray(end)
    };
}
