/**
 * Transport or backend fault while a turn was running.
 */
export class QueryError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "QueryError";
    }
}

/**
 * No event arrived from the backend within the inactivity deadline.
 */
export class TurnTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`No backend activity for ${timeoutMs}ms.`);
        this.name = "TurnTimeoutError";
        this.timeoutMs = timeoutMs;
    }
}
