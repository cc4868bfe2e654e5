import { z } from "zod";

import type { SettingsConfig } from "../settings.js";

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible and matches the settings schema.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    const mcpServer = z
        .object({
            command: z.string().min(1),
            args: z.array(z.string()).optional(),
            env: z.record(z.string()).optional()
        })
        .passthrough();

    const toolName = z.string().trim().min(1);

    const settingsSchema = z
        .object({
            engine: z
                .object({
                    dataDir: z.string().min(1).optional(),
                    sandboxDir: z.string().min(1).optional(),
                    sessionFile: z.string().min(1).optional(),
                    logFile: z.string().min(1).optional()
                })
                .passthrough()
                .optional(),
            loop: z
                .object({
                    intervalMs: z.number().int().nonnegative().optional()
                })
                .passthrough()
                .optional(),
            turn: z
                .object({
                    inactivityTimeoutMs: z.number().int().positive().optional(),
                    compactPrompt: z.string().trim().min(1).optional()
                })
                .passthrough()
                .optional(),
            backend: z
                .object({
                    model: z.string().min(1).optional(),
                    systemPrompt: z.string().min(1).optional(),
                    allowedTools: z.array(toolName).optional(),
                    disallowedTools: z.array(toolName).optional(),
                    mcpServers: z.record(mcpServer).optional()
                })
                .passthrough()
                .optional()
        })
        .passthrough();

    return settingsSchema.parse(raw);
}
