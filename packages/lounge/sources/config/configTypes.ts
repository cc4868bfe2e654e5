export type ResolvedMcpServer = {
    command: string;
    args: string[];
    env: Record<string, string>;
};

export type Config = {
    settingsPath: string;
    configDir: string;
    dataDir: string;
    sandboxDir: string;
    sessionPath: string;
    logPath: string;
    loop: {
        intervalMs: number;
    };
    turn: {
        inactivityTimeoutMs: number;
        compactPrompt: string;
    };
    backend: {
        model: string | null;
        /** Overrides the bundled system prompt when set. */
        systemPrompt: string | null;
        allowedTools: string[];
        disallowedTools: string[];
        mcpServers: Record<string, ResolvedMcpServer>;
    };
    verbose: boolean;
};

export type ConfigOverrides = {
    verbose?: boolean;
    /** Environment used for `${VAR}` expansion; defaults to process.env. */
    env?: NodeJS.ProcessEnv;
};
