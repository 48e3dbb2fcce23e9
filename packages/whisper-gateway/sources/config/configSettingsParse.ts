import { z } from "zod";

import type { SettingsConfig } from "./configTypes.js";

const port = z.number().int().min(1).max(65_535);
const milliseconds = z.number().int().positive();

const settingsSchema = z
    .object({
        whisper: z
            .object({
                host: z.string().min(1).optional(),
                port: port.optional(),
                connectTimeoutMs: milliseconds.optional(),
                retryDelayMs: z.number().int().min(0).optional(),
                ioTimeoutMs: milliseconds.optional(),
                maxFrameBytes: z.number().int().positive().optional()
            })
            .passthrough()
            .optional(),
        server: z
            .object({
                host: z.string().min(1).optional(),
                port: port.optional(),
                maxUploadBytes: z.number().int().positive().optional(),
                cors: z.boolean().optional(),
                staticDir: z.string().min(1).optional()
            })
            .passthrough()
            .optional(),
        transcribe: z
            .object({
                defaultModel: z.string().min(1).optional(),
                defaultTask: z.enum(["transcribe", "translate"]).optional(),
                upload: z.enum(["bytes", "path"]).optional(),
                uploadDir: z.string().min(1).optional()
            })
            .passthrough()
            .optional()
    })
    .passthrough();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; unknown keys are kept.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw);
}
