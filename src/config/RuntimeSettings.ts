import { LogLevel, resolveLogLevel } from "../utils/StructuredLogger.js";

export interface RuntimeSettings {
    logLevel: LogLevel;
    wasmDir?: string;
    maxFileBytes: number;
    defaultTimeoutMs: number;
    pythonExecutable: string;
    preferredDetector?: string;
    openAiKeyEnv: string;
    openAiModel: string;
}

export const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_PYTHON = "python3";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export function resolveRuntimeSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
    return {
        logLevel: resolveLogLevel(env),
        wasmDir: normalizeString(env.SURFACE_MCP_WASM_DIR),
        maxFileBytes: parsePositiveInt(env.SURFACE_MCP_MAX_FILE_BYTES, DEFAULT_MAX_FILE_BYTES),
        defaultTimeoutMs: parsePositiveInt(env.SURFACE_MCP_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
        pythonExecutable: normalizeString(env.SURFACE_MCP_PYTHON) ?? DEFAULT_PYTHON,
        preferredDetector: normalizeString(env.SURFACE_MCP_DETECTOR)?.toLowerCase(),
        openAiKeyEnv: normalizeString(env.SURFACE_MCP_OPENAI_KEY_ENV) ?? "OPENAI_API_KEY",
        openAiModel: normalizeString(env.SURFACE_MCP_OPENAI_MODEL) ?? DEFAULT_OPENAI_MODEL
    };
}

function normalizeString(value: string | undefined): string | undefined {
    if (!value) return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
