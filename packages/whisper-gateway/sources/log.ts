import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";

export type LogConfig = {
    level: string;
    format: LogFormat;
    /** Pretty lines go to stderr on a terminal so stdout stays free for command output. */
    stream: "stdout" | "stderr";
};

type PrettyFactory = (options: Record<string, unknown>) => DestinationStream;

const REDACT_PATHS = ["authorization", "*.authorization", "audio_data", "*.audio_data"];
const MODULE_WIDTH = 18;
const DETAIL_MAX_LENGTH = 160;
const PRETTY_HIDDEN_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (!rootLogger) {
        rootLogger = loggerCreate(logConfigResolve(overrides));
    }
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: moduleLabel(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

/**
 * Reads GATEWAY_LOG_LEVEL (or LOG_LEVEL) and GATEWAY_LOG_FORMAT (or LOG_FORMAT); overrides win.
 * Silent under vitest unless a level is set.
 */
export function logConfigResolve(overrides: Partial<LogConfig> = {}): LogConfig {
    const level =
        overrides.level ??
        envValue("GATEWAY_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (process.env.VITEST ? "silent" : process.env.NODE_ENV === "production" ? "info" : "debug");
    const format = overrides.format ?? logFormatParse(envValue("GATEWAY_LOG_FORMAT") ?? envValue("LOG_FORMAT"));
    return {
        level,
        format,
        stream: overrides.stream ?? (process.stdout.isTTY ? "stderr" : "stdout")
    };
}

/**
 * Formats one pretty log line as `[hh:mm:ss] [module] message key=value`.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = clockFormat(log.time);
    const label = `[${moduleLabel(typeof log.module === "string" ? log.module : undefined)
        .slice(0, MODULE_WIDTH)
        .padEnd(MODULE_WIDTH, " ")}]`;
    const rawMessage = log[messageKey];
    const message = rawMessage === undefined || rawMessage === null ? "" : String(rawMessage);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_HIDDEN_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${detailFormat(key, value)}`);
    }
    const body = [label, message, ...details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${body}`;
}

function loggerCreate(config: LogConfig): Logger {
    const fd = config.stream === "stderr" ? 2 : 1;
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: "whisper-gateway" },
        redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
        errorKey: "error",
        serializers: { error: pino.stdSerializers.err }
    };

    const prettyFactory = config.format === "pretty" ? prettyFactoryLoad() : null;
    if (prettyFactory) {
        return pino(
            options,
            prettyFactory({
                colorize: true,
                translateTime: false,
                ignore: "pid,hostname,level,service,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                singleLine: true,
                destination: fd
            })
        );
    }
    return pino(options, pino.destination(fd));
}

function detailFormat(key: string, value: unknown): string {
    let text: string;
    if (value instanceof Error) {
        text = value.message;
    } else if (key === "error" && typeof value === "object" && value !== null && "message" in value) {
        text = String(value.message);
    } else if (typeof value === "object" && value !== null) {
        try {
            text = JSON.stringify(value);
        } catch {
            // Circular structures.
            text = String(value);
        }
    } else {
        text = String(value);
    }
    if (text.length > DETAIL_MAX_LENGTH) {
        text = `${text.slice(0, DETAIL_MAX_LENGTH)}...`;
    }
    if (text.length === 0) {
        return '""';
    }
    return /[=\s]/.test(text) ? JSON.stringify(text) : text;
}

function clockFormat(value: unknown): string {
    const parsed = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    const date = Number.isNaN(parsed.getTime()) ? new Date() : parsed;
    return [date.getHours(), date.getMinutes(), date.getSeconds()]
        .map((part) => String(part).padStart(2, "0"))
        .join(":");
}

function moduleLabel(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function prettyFactoryLoad(): PrettyFactory | null {
    const loaded: unknown = nodeRequire("pino-pretty");
    return prettyFactoryIs(loaded) ? loaded : null;
}

function prettyFactoryIs(value: unknown): value is PrettyFactory {
    return typeof value === "function";
}

function logFormatParse(value: string | null): LogFormat {
    return value?.toLowerCase() === "json" ? "json" : "pretty";
}

function envValue(key: string): string | null {
    const trimmed = process.env[key]?.trim();
    return trimmed ? trimmed : null;
}
