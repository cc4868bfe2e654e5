import type { ActionArgs } from "../policy/policyTypes.js";
import type { AssistantBlock, TurnEvent } from "./backendTypes.js";

/**
 * Maps one Agent SDK message to turn events.
 * User messages carrying tool results become one `action_result` per block; message types
 * without a dedicated event surface as `system` events named after their type.
 * Expects: message is an SDK message object; anything else maps to no events.
 */
export function claudeMessageMap(message: unknown): TurnEvent[] {
    if (!isRecord(message)) {
        return [];
    }
    const type = message.type;
    if (typeof type !== "string") {
        return [];
    }
    const sessionId = stringOrNull(message.session_id);

    switch (type) {
        case "system":
            return [
                {
                    type: "system",
                    subtype: typeof message.subtype === "string" ? message.subtype : "unknown",
                    sessionId
                }
            ];
        case "assistant":
            return [{ type: "assistant", blocks: assistantBlocksRead(message.message) }];
        case "user":
            return actionResultsRead(message.message);
        case "result":
            return [
                {
                    type: "result",
                    sessionId,
                    isError: message.is_error === true,
                    numTurns: typeof message.num_turns === "number" ? message.num_turns : 0,
                    subtype: typeof message.subtype === "string" ? message.subtype : "unknown"
                }
            ];
        default:
            return [{ type: "system", subtype: type, sessionId }];
    }
}

function assistantBlocksRead(payload: unknown): AssistantBlock[] {
    const blocks: AssistantBlock[] = [];
    for (const block of contentBlocksRead(payload)) {
        if (block.type === "text" && typeof block.text === "string") {
            blocks.push({ type: "text", text: block.text });
        } else if (block.type === "tool_use" && typeof block.name === "string") {
            blocks.push({
                type: "action",
                id: typeof block.id === "string" ? block.id : "",
                name: block.name,
                args: argsRead(block.input)
            });
        }
    }
    return blocks;
}

function actionResultsRead(payload: unknown): TurnEvent[] {
    const events: TurnEvent[] = [];
    for (const block of contentBlocksRead(payload)) {
        if (block.type !== "tool_result") {
            continue;
        }
        events.push({
            type: "action_result",
            actionId: typeof block.tool_use_id === "string" ? block.tool_use_id : "",
            isError: block.is_error === true,
            content: resultContentRead(block.content)
        });
    }
    return events;
}

function contentBlocksRead(payload: unknown): Record<string, unknown>[] {
    if (!isRecord(payload) || !Array.isArray(payload.content)) {
        return [];
    }
    return payload.content.filter(isRecord);
}

function resultContentRead(content: unknown): string {
    if (typeof content === "string") {
        return content;
    }
    if (!Array.isArray(content)) {
        return "";
    }
    return content
        .filter(isRecord)
        .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
        .filter((text) => text.length > 0)
        .join("\n");
}

export function argsRead(input: unknown): ActionArgs {
    return isRecord(input) ? { ...input } : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
    return typeof value === "string" && value.length > 0 ? value : null;
}
