import type { WhisperMetricsSnapshot } from "./whisperTypes.js";

/**
 * Cumulative call counters for one Whisper client.
 * Counters only grow; there is no windowing or reset.
 */
export class WhisperMetrics {
    private requestsTotal = 0;
    private errorsTotal = 0;
    private processingTimeMs = 0;

    requestRecord(): void {
        this.requestsTotal += 1;
    }

    errorRecord(): void {
        this.errorsTotal += 1;
    }

    durationRecord(durationMs: number): void {
        this.processingTimeMs += Math.max(0, Math.floor(durationMs));
    }

    snapshot(): WhisperMetricsSnapshot {
        return Object.freeze({
            requestsTotal: this.requestsTotal,
            errorsTotal: this.errorsTotal,
            processingTimeMs: this.processingTimeMs
        });
    }
}
