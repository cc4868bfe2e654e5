import { policyDenyMessage } from "../policy/policyDenyMessage.js";
import type { ActionArgs, ActionAuthorizer } from "../policy/policyTypes.js";
import type { BackendConnection, BackendConnector, BackendOpenOptions, TurnEvent } from "./backendTypes.js";

export type FakeTurnStep =
    | { kind: "event"; event: TurnEvent }
    | { kind: "action"; id: string; name: string; args: ActionArgs }
    | { kind: "stall" }
    | { kind: "delay"; ms: number }
    | { kind: "fail"; error: Error };

export type FakeTurnRequest = {
    prompt: string;
    /** Resume target the serving connection was opened with. */
    resume: string | null;
    /** Zero-based index of the serving connection. */
    connection: number;
};

export type FakeTurnHandler = (request: FakeTurnRequest) => FakeTurnStep[];

export type FakeActionRecord = {
    name: string;
    args: ActionArgs;
    allowed: boolean;
    content: string;
};

export function fakeText(text: string): FakeTurnStep {
    return { kind: "event", event: { type: "assistant", blocks: [{ type: "text", text }] } };
}

export function fakeResult(sessionId: string | null, options: { isError?: boolean; numTurns?: number } = {}): FakeTurnStep {
    return {
        kind: "event",
        event: {
            type: "result",
            sessionId,
            isError: options.isError ?? false,
            numTurns: options.numTurns ?? 1,
            subtype: options.isError ? "error_during_execution" : "success"
        }
    };
}

export function fakeAction(name: string, args: ActionArgs, id = `action-${name}`): FakeTurnStep {
    return { kind: "action", id, name, args };
}

export function fakeStall(): FakeTurnStep {
    return { kind: "stall" };
}

export function fakeDelay(ms: number): FakeTurnStep {
    return { kind: "delay", ms };
}

export function fakeFail(error: Error): FakeTurnStep {
    return { kind: "fail", error };
}

/**
 * In-process backend driven by a turn handler.
 * Action steps go through the authorizer given to `open`, so denials surface the same way
 * they do against the real backend: as an error result carrying the denial text.
 */
export class FakeBackend implements BackendConnector {
    readonly opens: BackendOpenOptions[] = [];
    readonly requests: FakeTurnRequest[] = [];
    readonly actions: FakeActionRecord[] = [];
    interrupts = 0;
    closes = 0;
    /** Time interrupt() takes to acknowledge after it has ended the current turn. */
    interruptDelayMs = 0;
    openError: Error | null = null;
    private handler: FakeTurnHandler;

    constructor(handler: FakeTurnHandler = () => [fakeResult("sess-fake")]) {
        this.handler = handler;
    }

    get prompts(): string[] {
        return this.requests.map((request) => request.prompt);
    }

    respond(handler: FakeTurnHandler): void {
        this.handler = handler;
    }

    async open(options: BackendOpenOptions): Promise<BackendConnection> {
        if (this.openError) {
            throw this.openError;
        }
        const index = this.opens.length;
        this.opens.push(options);
        return new FakeConnection(this, index, options.resume, options.authorize);
    }

    /** @internal */
    turnSteps(request: FakeTurnRequest): FakeTurnStep[] {
        this.requests.push(request);
        return this.handler(request);
    }
}

class FakeConnection implements BackendConnection {
    private readonly backend: FakeBackend;
    private readonly index: number;
    private readonly resume: string | null;
    private readonly authorize: ActionAuthorizer;
    private steps: FakeTurnStep[] = [];
    private wake: (() => void) | null = null;
    private closed = false;

    constructor(backend: FakeBackend, index: number, resume: string | null, authorize: ActionAuthorizer) {
        this.backend = backend;
        this.index = index;
        this.resume = resume;
        this.authorize = authorize;
    }

    async send(prompt: string): Promise<void> {
        if (this.closed) {
            throw new Error("Fake connection is closed.");
        }
        this.steps = this.backend.turnSteps({ prompt, resume: this.resume, connection: this.index });
    }

    async *receive(): AsyncGenerator<TurnEvent, void, undefined> {
        const steps = this.steps;
        this.steps = [];
        for (const step of steps) {
            if (step.kind === "event") {
                yield step.event;
                continue;
            }
            if (step.kind === "fail") {
                throw step.error;
            }
            if (step.kind === "delay") {
                await new Promise<void>((resolve) => setTimeout(resolve, step.ms));
                continue;
            }
            if (step.kind === "stall") {
                if (this.closed) {
                    return;
                }
                await new Promise<void>((resolve) => {
                    this.wake = resolve;
                });
                return;
            }
            yield { type: "assistant", blocks: [{ type: "action", id: step.id, name: step.name, args: step.args }] };
            const decision = this.authorize(step.name, step.args);
            const content =
                decision.behavior === "allow" ? "ok" : policyDenyMessage(step.name, decision.reason);
            this.backend.actions.push({ name: step.name, args: step.args, allowed: decision.behavior === "allow", content });
            yield { type: "action_result", actionId: step.id, isError: decision.behavior === "deny", content };
        }
    }

    async interrupt(): Promise<void> {
        this.backend.interrupts += 1;
        this.release();
        if (this.backend.interruptDelayMs > 0) {
            await new Promise<void>((resolve) => setTimeout(resolve, this.backend.interruptDelayMs));
        }
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        this.backend.closes += 1;
        this.release();
    }

    private release(): void {
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }
}
