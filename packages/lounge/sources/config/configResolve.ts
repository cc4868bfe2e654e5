import path from "node:path";

import { DEFAULT_LOUNGE_DIR } from "../paths.js";
import {
    DEFAULT_ALLOWED_TOOLS,
    DEFAULT_COMPACT_PROMPT,
    DEFAULT_INACTIVITY_TIMEOUT_MS,
    DEFAULT_INTERVAL_MS,
    type McpServerSettings,
    type SettingsConfig
} from "../settings.js";
import { freezeDeep } from "../util/freezeDeep.js";
import { configEnvExpand } from "./configEnvExpand.js";
import type { Config, ConfigOverrides, ResolvedMcpServer } from "./configTypes.js";

/**
 * Resolves derived paths and defaults into an immutable Config snapshot.
 * Expects: settings already validated.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolvedSettingsPath = path.resolve(settingsPath);
    const configDir = path.dirname(resolvedSettingsPath);
    const dataDir = path.resolve(settings.engine?.dataDir ?? DEFAULT_LOUNGE_DIR);
    const sandboxDir = path.resolve(dataDir, settings.engine?.sandboxDir ?? ".");
    const sessionPath = path.resolve(dataDir, settings.engine?.sessionFile ?? "session_id");
    const logPath = path.resolve(dataDir, settings.engine?.logFile ?? "agent.log");
    const env = overrides.env ?? process.env;
    const backend = settings.backend;

    return freezeDeep({
        settingsPath: resolvedSettingsPath,
        configDir,
        dataDir,
        sandboxDir,
        sessionPath,
        logPath,
        loop: {
            intervalMs: settings.loop?.intervalMs ?? DEFAULT_INTERVAL_MS
        },
        turn: {
            inactivityTimeoutMs: settings.turn?.inactivityTimeoutMs ?? DEFAULT_INACTIVITY_TIMEOUT_MS,
            compactPrompt: settings.turn?.compactPrompt ?? DEFAULT_COMPACT_PROMPT
        },
        backend: {
            model: backend?.model ?? null,
            systemPrompt: backend?.systemPrompt ?? null,
            allowedTools: toolListNormalize(backend?.allowedTools ?? DEFAULT_ALLOWED_TOOLS),
            disallowedTools: toolListNormalize(backend?.disallowedTools ?? []),
            mcpServers: mcpServersResolve(backend?.mcpServers ?? {}, env)
        },
        verbose: overrides.verbose ?? false
    });
}

function mcpServersResolve(
    servers: Record<string, McpServerSettings>,
    env: NodeJS.ProcessEnv
): Record<string, ResolvedMcpServer> {
    const resolved: Record<string, ResolvedMcpServer> = {};
    for (const [name, server] of Object.entries(servers)) {
        resolved[name] = {
            command: configEnvExpand(server.command, env),
            args: (server.args ?? []).map((arg) => configEnvExpand(arg, env)),
            env: Object.fromEntries(
                Object.entries(server.env ?? {}).map(([key, value]) => [key, configEnvExpand(value, env)])
            )
        };
    }
    return resolved;
}

function toolListNormalize(tools: string[]): string[] {
    return Array.from(new Set(tools.map((tool) => tool.trim()).filter((tool) => tool.length > 0)));
}
