import { getLogger } from "../../log.js";
import { stringTruncate } from "../../util/stringTruncate.js";
import type { BackendConnection, TurnEvent } from "../backend/backendTypes.js";
import { policyArgumentPreview } from "../policy/policyArgumentPreview.js";
import { QueryError, TurnTimeoutError } from "./turnErrors.js";
import { turnOverflowDetect } from "./turnOverflowDetect.js";
import type { TurnExecuteOptions, TurnOutcome } from "./turnTypes.js";

const logger = getLogger("turn.execute");

const PROMPT_PREVIEW_LENGTH = 80;
const TEXT_PREVIEW_LENGTH = 200;
const SESSION_PREFIX_LENGTH = 12;

/**
 * Sends one prompt and drains the event stream until the terminal result.
 * Overflow notices are recorded without stopping the drain. A stream that ends without
 * a result yields an incomplete outcome. Throws TurnTimeoutError when no event arrives within
 * the inactivity deadline and QueryError for any other connection fault.
 */
export async function turnExecute(
    connection: BackendConnection,
    prompt: string,
    options: TurnExecuteOptions
): Promise<TurnOutcome> {
    const preview = (text: string, length: number) => (options.verbose ? text : stringTruncate(text, length));
    logger.info({ prompt: preview(prompt, PROMPT_PREVIEW_LENGTH) }, "turn: Sending prompt");
    logger.debug({ prompt }, "turn: Full prompt");

    try {
        await connection.send(prompt);
    } catch (error) {
        throw new QueryError("Failed to send prompt.", { cause: error });
    }

    const iterator = connection.receive()[Symbol.asyncIterator]();
    let overflow = false;
    let actionCount = 0;

    for (;;) {
        const next = await turnEventNext(iterator, options.inactivityTimeoutMs);
        if (next.done) {
            logger.warn({ actionCount }, "turn: Stream ended without a result");
            return { completed: false, sessionId: null, overflow, isError: false, numTurns: 0, actionCount };
        }

        const event = next.value;
        switch (event.type) {
            case "system":
                logger.debug({ subtype: event.subtype }, "event: System message");
                break;
            case "assistant":
                for (const block of event.blocks) {
                    if (block.type === "text") {
                        logger.info({ text: preview(block.text, TEXT_PREVIEW_LENGTH) }, "event: Assistant text");
                        logger.debug({ text: block.text }, "event: Assistant full text");
                        if (turnOverflowDetect(block.text)) {
                            overflow = true;
                        }
                    } else {
                        actionCount += 1;
                        const args = policyArgumentPreview(block.args, options.verbose ? null : undefined);
                        logger.info({ action: block.name, args }, "event: Action requested");
                    }
                }
                break;
            case "action_result":
                if (event.isError) {
                    logger.info(
                        { actionId: event.actionId, content: preview(event.content, TEXT_PREVIEW_LENGTH) },
                        "event: Action failed"
                    );
                }
                break;
            case "result": {
                const sessionPrefix = event.sessionId ? event.sessionId.slice(0, SESSION_PREFIX_LENGTH) : "none";
                logger.info(
                    { session: sessionPrefix, numTurns: event.numTurns, isError: event.isError, overflow },
                    "turn: Turn complete"
                );
                return {
                    completed: true,
                    sessionId: event.sessionId,
                    overflow,
                    isError: event.isError,
                    numTurns: event.numTurns,
                    actionCount
                };
            }
            default: {
                const unexpected: never = event;
                throw new QueryError(`Unexpected turn event: ${JSON.stringify(unexpected)}`);
            }
        }
    }
}

async function turnEventNext(
    iterator: AsyncIterator<TurnEvent, unknown, undefined>,
    timeoutMs: number
): Promise<IteratorResult<TurnEvent, unknown>> {
    const pending = iterator.next();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TurnTimeoutError(timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([pending, deadline]);
    } catch (error) {
        if (error instanceof TurnTimeoutError) {
            // The abandoned read settles once the connection is interrupted or closed.
            void pending.catch((late: unknown) => {
                logger.debug({ error: late }, "event: Abandoned read failed");
            });
            throw error;
        }
        if (error instanceof QueryError) {
            throw error;
        }
        throw new QueryError("Backend stream failed.", { cause: error });
    } finally {
        clearTimeout(timer);
    }
}
