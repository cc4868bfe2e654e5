import { resolveLoungePath } from "./paths.js";

/**
 * A stdio MCP server started by the backend. `${VAR}` references in args and env
 * are expanded from the process environment when the config is resolved.
 */
export type McpServerSettings = {
    command: string;
    args?: string[];
    env?: Record<string, string>;
};

export type EngineSettings = {
    dataDir?: string;
    /** Root the policy gate confines file actions to; defaults to dataDir. */
    sandboxDir?: string;
    sessionFile?: string;
    logFile?: string;
};

export type LoopSettings = {
    intervalMs?: number;
};

export type TurnSettings = {
    inactivityTimeoutMs?: number;
    compactPrompt?: string;
};

export type BackendSettings = {
    model?: string;
    systemPrompt?: string;
    allowedTools?: string[];
    disallowedTools?: string[];
    mcpServers?: Record<string, McpServerSettings>;
};

export type SettingsConfig = {
    engine?: EngineSettings;
    loop?: LoopSettings;
    turn?: TurnSettings;
    backend?: BackendSettings;
};

export const DEFAULT_SETTINGS_PATH = resolveLoungePath("settings.json");

export const DEFAULT_INTERVAL_MS = 3_000;
export const DEFAULT_INACTIVITY_TIMEOUT_MS = 300_000;
export const DEFAULT_COMPACT_PROMPT = "/compact";
export const DEFAULT_ALLOWED_TOOLS = ["Read", "Write", "Glob", "WebFetch", "WebSearch", "mcp__discord__*"];
