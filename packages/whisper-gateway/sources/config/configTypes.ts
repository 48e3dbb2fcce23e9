export type WhisperTaskSetting = "transcribe" | "translate";
export type UploadMode = "bytes" | "path";

export type WhisperSettings = {
    host?: string;
    port?: number;
    connectTimeoutMs?: number;
    retryDelayMs?: number;
    ioTimeoutMs?: number;
    maxFrameBytes?: number;
};

export type ServerSettings = {
    host?: string;
    port?: number;
    maxUploadBytes?: number;
    cors?: boolean;
    /** Web UI served at / and /static/* when the directory exists. */
    staticDir?: string;
};

export type TranscribeSettings = {
    defaultModel?: string;
    defaultTask?: WhisperTaskSetting;
    /** "path" hands uploads to the backend through uploadDir; the backend must see the same filesystem. */
    upload?: UploadMode;
    uploadDir?: string;
};

export type SettingsConfig = {
    whisper?: WhisperSettings;
    server?: ServerSettings;
    transcribe?: TranscribeSettings;
};

export type Config = {
    /** Absolute path of the settings file; it may not exist. */
    settingsPath: string;
    whisper: Required<WhisperSettings>;
    server: Required<ServerSettings>;
    transcribe: Required<TranscribeSettings>;
};
