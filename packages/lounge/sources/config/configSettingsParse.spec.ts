import { describe, expect, it } from "vitest";

import { configSettingsParse } from "./configSettingsParse.js";

describe("configSettingsParse", () => {
    it("accepts an empty settings object", () => {
        expect(configSettingsParse({})).toEqual({});
    });

    it("accepts engine paths and timing settings", () => {
        const parsed = configSettingsParse({
            engine: {
                dataDir: "/tmp/lounge",
                sandboxDir: "workspace",
                sessionFile: "session_id",
                logFile: "agent.log"
            },
            loop: { intervalMs: 0 },
            turn: { inactivityTimeoutMs: 60_000, compactPrompt: "/compact" }
        });

        expect(parsed.engine?.sandboxDir).toBe("workspace");
        expect(parsed.loop?.intervalMs).toBe(0);
        expect(parsed.turn?.inactivityTimeoutMs).toBe(60_000);
    });

    it("accepts backend settings with mcp servers", () => {
        const parsed = configSettingsParse({
            backend: {
                model: "claude-sonnet-4-5",
                allowedTools: [" Read ", "mcp__chat__*"],
                mcpServers: {
                    chat: {
                        command: "node",
                        args: ["${CHAT_MCP_PATH}"],
                        env: { CHAT_TOKEN: "${CHAT_TOKEN}" }
                    }
                }
            }
        });

        expect(parsed.backend?.allowedTools).toEqual(["Read", "mcp__chat__*"]);
        expect(parsed.backend?.mcpServers?.chat?.env).toEqual({ CHAT_TOKEN: "${CHAT_TOKEN}" });
    });

    it("rejects a non-positive inactivity timeout", () => {
        expect(() => configSettingsParse({ turn: { inactivityTimeoutMs: 0 } })).toThrow();
    });

    it("rejects a negative loop interval", () => {
        expect(() => configSettingsParse({ loop: { intervalMs: -1 } })).toThrow();
    });

    it("rejects mcp servers without a command", () => {
        expect(() => configSettingsParse({ backend: { mcpServers: { chat: { args: [] } } } })).toThrow();
    });

    it("rejects blank tool names", () => {
        expect(() => configSettingsParse({ backend: { allowedTools: ["  "] } })).toThrow();
    });
});
