export type TurnOutcome = {
    /** A terminal result event was received. */
    completed: boolean;
    /** Session id reported by the terminal result; null for incomplete turns. */
    sessionId: string | null;
    /** Assistant text reported that the context window overflowed. */
    overflow: boolean;
    isError: boolean;
    numTurns: number;
    actionCount: number;
};

export type TurnExecuteOptions = {
    /** Maximum gap between two events before the turn fails. */
    inactivityTimeoutMs: number;
    /** Log prompts and assistant text in full at info level. */
    verbose?: boolean;
};
