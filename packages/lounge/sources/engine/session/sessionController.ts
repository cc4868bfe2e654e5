import type { ActionAuthorizer, BackendConnection, BackendConnector, TurnOutcome } from "@/types";

import { getLogger } from "../../log.js";
import { stringTruncate } from "../../util/stringTruncate.js";
import { TurnTimeoutError } from "../turn/turnErrors.js";
import { turnExecute } from "../turn/turnExecute.js";
import { SessionBusyError } from "./sessionErrors.js";
import type { SessionStore } from "./sessionStore.js";
import type { SessionState } from "./sessionTypes.js";

const logger = getLogger("session.ctrl");

const MAX_COMPACTIONS = 1;
const MAX_RESTARTS = 1;
const PROMPT_PREVIEW_LENGTH = 80;

export type SessionControllerOptions = {
    connector: BackendConnector;
    store: SessionStore;
    authorize: ActionAuthorizer;
    inactivityTimeoutMs: number;
    compactPrompt: string;
    verbose?: boolean;
};

type RecoveryStep = "compact" | "restart" | "done";

/**
 * Owns the session identity and the single backend connection, and runs turns through
 * the bounded recovery chain: overflow triggers one compaction and one retry; a failed
 * compaction triggers one fresh-session restart and one retry.
 */
export class SessionController {
    private readonly options: SessionControllerOptions;
    private current: SessionState = "idle";
    private connection: BackendConnection | null = null;
    private identity: string | null = null;
    private loaded = false;
    private closing: Promise<void> | null = null;

    constructor(options: SessionControllerOptions) {
        this.options = options;
    }

    get state(): SessionState {
        return this.current;
    }

    get sessionId(): string | null {
        return this.identity;
    }

    /**
     * True when a session identity was persisted by an earlier turn.
     * Expects: open() has completed.
     */
    get initialized(): boolean {
        return this.identity !== null;
    }

    /**
     * Loads the persisted identity and opens the connection resuming it.
     */
    async open(): Promise<void> {
        this.assertOpen();
        await this.identityLoad();
        await this.connectionEnsure();
    }

    async runTurn(prompt: string): Promise<TurnOutcome> {
        const state = this.current;
        if (state === "closed") {
            throw new Error("Session controller is closed.");
        }
        if (state !== "idle") {
            throw new SessionBusyError(state);
        }

        this.stateSet("executing");
        try {
            await this.identityLoad();
            return await this.turnRecover(prompt);
        } finally {
            if (this.current !== "closed") {
                this.stateSet("idle");
            }
        }
    }

    /**
     * Interrupts an in-flight turn and releases the connection. Never throws.
     * Later calls resolve together with the first one.
     */
    close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.closeRun();
        }
        return this.closing;
    }

    private async closeRun(): Promise<void> {
        const previous = this.current;
        this.stateSet("closed");
        const connection = this.connection;
        this.connection = null;
        if (!connection) {
            return;
        }
        if (previous !== "idle") {
            try {
                await connection.interrupt();
            } catch (error) {
                logger.warn({ error }, "close: Interrupt failed");
            }
        }
        try {
            await connection.close();
        } catch (error) {
            logger.warn({ error }, "close: Connection close failed");
        }
        logger.info("close: Session controller closed");
    }

    private async turnRecover(prompt: string): Promise<TurnOutcome> {
        let outcome = await this.turnAttempt(prompt);
        await this.identityPersist(outcome);

        let compactions = 0;
        let restarts = 0;
        let step: RecoveryStep = outcome.overflow ? "compact" : "done";

        while (step !== "done") {
            if (step === "compact" && compactions < MAX_COMPACTIONS) {
                compactions += 1;
                if (!(await this.compact())) {
                    step = "restart";
                    continue;
                }
                this.stateSet("executing");
                outcome = await this.turnAttempt(prompt);
                await this.identityPersist(outcome);
                if (outcome.overflow) {
                    logger.warn("turn: Prompt still overflows after compaction; not retrying");
                }
                step = "done";
            } else if (step === "restart" && restarts < MAX_RESTARTS) {
                restarts += 1;
                outcome = await this.restart(prompt);
                step = "done";
            } else {
                step = "done";
            }
        }
        return outcome;
    }

    private async compact(): Promise<boolean> {
        this.stateSet("compacting");
        logger.warn({ session: this.identity }, "compact: Context overflow, compacting session");
        let outcome: TurnOutcome;
        try {
            outcome = await this.turnAttempt(this.options.compactPrompt);
        } catch (error) {
            logger.warn({ error }, "compact: Compaction failed");
            return false;
        }
        if (!outcome.completed || outcome.isError || outcome.overflow) {
            logger.warn(
                { completed: outcome.completed, isError: outcome.isError, overflow: outcome.overflow },
                "compact: Compaction did not succeed"
            );
            return false;
        }
        await this.identityPersist(outcome);
        logger.info({ session: this.identity }, "compact: Compaction complete");
        return true;
    }

    private async restart(prompt: string): Promise<TurnOutcome> {
        this.stateSet("restarting");
        logger.warn({ session: this.identity }, "restart: Discarding session and starting fresh");
        await this.options.store.clear();
        this.identity = null;
        await this.connectionDiscard(false);
        const outcome = await this.turnAttempt(prompt);
        await this.identityPersist(outcome);
        return outcome;
    }

    private async turnAttempt(prompt: string): Promise<TurnOutcome> {
        const connection = await this.connectionEnsure();
        try {
            return await turnExecute(connection, prompt, {
                inactivityTimeoutMs: this.options.inactivityTimeoutMs,
                verbose: this.options.verbose
            });
        } catch (error) {
            if (error instanceof TurnTimeoutError) {
                logger.warn(
                    { timeoutMs: error.timeoutMs, prompt: stringTruncate(prompt, PROMPT_PREVIEW_LENGTH) },
                    "turn: Turn stalled, discarding connection"
                );
                await this.connectionDiscard(true);
            } else {
                logger.error(
                    { prompt: stringTruncate(prompt, PROMPT_PREVIEW_LENGTH), error },
                    "error: Turn failed, discarding connection"
                );
                await this.connectionDiscard(false);
            }
            throw error;
        }
    }

    private async identityLoad(): Promise<void> {
        if (this.loaded) {
            return;
        }
        this.identity = await this.options.store.load();
        this.loaded = true;
        logger.info({ session: this.identity ?? "none" }, "start: Session identity loaded");
    }

    private async identityPersist(outcome: TurnOutcome): Promise<void> {
        if (!outcome.completed || outcome.sessionId === null) {
            return;
        }
        await this.options.store.save(outcome.sessionId);
        this.identity = outcome.sessionId;
    }

    private async connectionEnsure(): Promise<BackendConnection> {
        this.assertOpen();
        if (this.connection) {
            return this.connection;
        }
        const connection = await this.options.connector.open({
            resume: this.identity,
            authorize: this.options.authorize
        });
        // close() may have run while the connection was opening.
        if (this.current === "closed") {
            await connection.close();
            throw new Error("Session controller is closed.");
        }
        this.connection = connection;
        return connection;
    }

    private async connectionDiscard(interrupt: boolean): Promise<void> {
        const connection = this.connection;
        this.connection = null;
        if (!connection) {
            return;
        }
        if (interrupt) {
            try {
                await connection.interrupt();
            } catch (error) {
                logger.warn({ error }, "turn: Interrupt failed");
            }
        }
        try {
            await connection.close();
        } catch (error) {
            logger.warn({ error }, "turn: Connection close failed");
        }
    }

    private assertOpen(): void {
        if (this.current === "closed") {
            throw new Error("Session controller is closed.");
        }
    }

    private stateSet(next: SessionState): void {
        const previous = this.current;
        if (previous === next) {
            return;
        }
        this.current = next;
        logger.debug({ from: previous, to: next }, "state: Session state changed");
    }
}
