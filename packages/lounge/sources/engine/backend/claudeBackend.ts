import {
    type CanUseTool,
    type HookCallback,
    type Options,
    type Query,
    query,
    type SDKUserMessage
} from "@anthropic-ai/claude-agent-sdk";

import { getLogger } from "../../log.js";
import { AsyncQueue } from "../../util/asyncQueue.js";
import { policyDenyMessage } from "../policy/policyDenyMessage.js";
import type { ActionAuthorizer } from "../policy/policyTypes.js";
import type { BackendConnection, BackendConnector, BackendOpenOptions, TurnEvent } from "./backendTypes.js";
import { argsRead, claudeMessageMap } from "./claudeMessageMap.js";

const logger = getLogger("backend.claude");

export type ClaudeMcpServer = {
    command: string;
    args: string[];
    env: Record<string, string>;
};

export type ClaudeBackendOptions = {
    /** Working directory of the agent process; relative tool paths resolve here. */
    cwd: string;
    model: string | null;
    systemPrompt: string;
    allowedTools: string[];
    disallowedTools: string[];
    mcpServers: Record<string, ClaudeMcpServer>;
};

/**
 * Opens Agent SDK sessions in streaming-input mode.
 * Every tool call passes the authorizer twice: as a PreToolUse hook, which runs even for
 * pre-approved tools, and as canUseTool for everything else.
 */
export class ClaudeBackend implements BackendConnector {
    private readonly options: ClaudeBackendOptions;

    constructor(options: ClaudeBackendOptions) {
        this.options = options;
    }

    async open(openOptions: BackendOpenOptions): Promise<BackendConnection> {
        const input = new AsyncQueue<SDKUserMessage>();
        const abortController = new AbortController();
        const options: Options = {
            cwd: this.options.cwd,
            model: this.options.model ?? undefined,
            systemPrompt: this.options.systemPrompt,
            allowedTools: [...this.options.allowedTools],
            disallowedTools: [...this.options.disallowedTools],
            mcpServers: { ...this.options.mcpServers },
            resume: openOptions.resume ?? undefined,
            permissionMode: "default",
            abortController,
            hooks: {
                PreToolUse: [{ hooks: [claudePreToolUseHook(openOptions.authorize)] }]
            },
            canUseTool: claudeCanUseTool(openOptions.authorize)
        };

        logger.info(
            { resume: openOptions.resume ?? "fresh", mcpServers: Object.keys(this.options.mcpServers) },
            "open: Opening backend session"
        );
        const stream = query({ prompt: input, options });
        return new ClaudeConnection(stream, input, abortController, openOptions.resume);
    }
}

class ClaudeConnection implements BackendConnection {
    private readonly stream: Query;
    private readonly input: AsyncQueue<SDKUserMessage>;
    private readonly abortController: AbortController;
    private readonly resume: string | null;
    private closed = false;

    constructor(
        stream: Query,
        input: AsyncQueue<SDKUserMessage>,
        abortController: AbortController,
        resume: string | null
    ) {
        this.stream = stream;
        this.input = input;
        this.abortController = abortController;
        this.resume = resume;
    }

    async send(prompt: string): Promise<void> {
        if (this.closed) {
            throw new Error("Backend connection is closed.");
        }
        // Resumption goes through options.resume; a session id here makes the CLI reply empty.
        this.input.push({
            type: "user",
            message: { role: "user", content: prompt },
            parent_tool_use_id: null,
            session_id: ""
        });
    }

    async *receive(): AsyncGenerator<TurnEvent, void, undefined> {
        while (!this.closed) {
            const next = await this.stream.next();
            if (next.done) {
                return;
            }
            for (const event of claudeMessageMap(next.value)) {
                yield event;
                if (event.type === "result") {
                    return;
                }
            }
        }
    }

    async interrupt(): Promise<void> {
        if (this.closed) {
            return;
        }
        await this.stream.interrupt();
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.input.close();
        this.abortController.abort();
        logger.debug({ resume: this.resume ?? "fresh" }, "close: Backend session closed");
    }
}

function claudePreToolUseHook(authorize: ActionAuthorizer): HookCallback {
    return async (input) => {
        if (input.hook_event_name !== "PreToolUse") {
            return { continue: true };
        }
        const decision = authorize(input.tool_name, argsRead(input.tool_input));
        if (decision.behavior === "allow") {
            return { continue: true };
        }
        return {
            hookSpecificOutput: {
                hookEventName: "PreToolUse",
                permissionDecision: "deny",
                permissionDecisionReason: policyDenyMessage(input.tool_name, decision.reason)
            }
        };
    };
}

function claudeCanUseTool(authorize: ActionAuthorizer): CanUseTool {
    return async (toolName, toolInput) => {
        const decision = authorize(toolName, toolInput);
        if (decision.behavior === "allow") {
            return { behavior: "allow", updatedInput: toolInput };
        }
        return { behavior: "deny", message: policyDenyMessage(toolName, decision.reason) };
    };
}
