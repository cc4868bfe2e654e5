/**
 * The persisted session identity could not be written or cleared.
 */
export class SessionPersistError extends Error {
    readonly filePath: string;

    constructor(message: string, filePath: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "SessionPersistError";
        this.filePath = filePath;
    }
}

/**
 * A turn was requested while another one is still in flight.
 */
export class SessionBusyError extends Error {
    readonly state: string;

    constructor(state: string) {
        super(`Session is busy (state: ${state}).`);
        this.name = "SessionBusyError";
        this.state = state;
    }
}
