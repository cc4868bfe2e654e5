/**
 * Persists the single opaque session identifier across process restarts.
 */
export interface SessionStore {
    /** Returns null when nothing usable is persisted. */
    load(): Promise<string | null>;
    save(sessionId: string): Promise<void>;
    clear(): Promise<void>;
}
