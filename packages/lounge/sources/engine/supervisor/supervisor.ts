import { getLogger } from "../../log.js";
import { sleepAbortable } from "../../util/sleepAbortable.js";
import { stringTruncate } from "../../util/stringTruncate.js";
import type { SessionController } from "../session/sessionController.js";

const logger = getLogger("supervisor");

const PROMPT_PREVIEW_LENGTH = 80;

export type SupervisorPrompts = {
    /** Sent once when no session has been persisted yet. */
    init: string;
    /** Sent on every steady-state iteration. */
    idle: string;
};

export type SupervisorOptions = {
    controller: SessionController;
    prompts: SupervisorPrompts;
    intervalMs: number;
    signal: AbortSignal;
};

/**
 * Keeps the session busy: one initialization turn for a fresh session, then the idle prompt
 * every interval until the signal aborts. Iteration failures are logged and the loop continues.
 */
export class Supervisor {
    private readonly options: SupervisorOptions;
    private iterationCount = 0;

    constructor(options: SupervisorOptions) {
        this.options = options;
    }

    get iterations(): number {
        return this.iterationCount;
    }

    /**
     * Runs until shutdown. Rejects only when the controller cannot be opened.
     */
    async run(): Promise<void> {
        const { controller, signal } = this.options;
        const stop = () => {
            void controller.close();
        };
        signal.addEventListener("abort", stop, { once: true });

        try {
            logger.info({ intervalMs: this.options.intervalMs }, "start: Supervisor starting");
            try {
                await controller.open();
            } catch (error) {
                if (signal.aborted) {
                    logger.info("event: Shutdown requested during startup");
                    return;
                }
                throw error;
            }

            if (!controller.initialized && !signal.aborted) {
                logger.info("start: No persisted session, running initialization turn");
                await this.iterationRun(this.options.prompts.init);
            }

            while (!signal.aborted) {
                await this.iterationRun(this.options.prompts.idle);
                await sleepAbortable(this.options.intervalMs, signal);
            }
            logger.info({ iterations: this.iterationCount }, "event: Supervisor stopping");
        } finally {
            signal.removeEventListener("abort", stop);
            await controller.close();
        }
    }

    private async iterationRun(prompt: string): Promise<void> {
        this.iterationCount += 1;
        const iteration = this.iterationCount;
        logger.info({ iteration }, "loop: Iteration");
        try {
            const outcome = await this.options.controller.runTurn(prompt);
            logger.debug({ iteration, ...outcome }, "loop: Iteration complete");
        } catch (error) {
            if (this.options.signal.aborted) {
                logger.debug({ iteration, error }, "loop: Iteration interrupted by shutdown");
                return;
            }
            logger.error(
                { iteration, prompt: stringTruncate(prompt, PROMPT_PREVIEW_LENGTH), error },
                "error: Iteration failed"
            );
        }
    }
}
