import { promises as fs } from "node:fs";

import { getLogger } from "../../log.js";
import { atomicWrite } from "../../util/atomicWrite.js";
import { SessionPersistError } from "./sessionErrors.js";
import type { SessionStore } from "./sessionStore.js";

const logger = getLogger("session.store");

/**
 * Keeps the session id as plain text in a single file.
 * Writes go through a temp file and rename so readers never see a partial id.
 */
export class SessionStoreFile implements SessionStore {
    readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    async load(): Promise<string | null> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, "utf8");
        } catch (error) {
            if (errorCodeIs(error, "ENOENT")) {
                return null;
            }
            throw error;
        }
        const sessionId = content.trim();
        return sessionId.length > 0 ? sessionId : null;
    }

    async save(sessionId: string): Promise<void> {
        const normalized = sessionId.trim();
        if (normalized.length === 0) {
            throw new SessionPersistError("Session id must not be blank.", this.filePath);
        }
        try {
            await atomicWrite(this.filePath, normalized);
        } catch (error) {
            logger.error({ error, path: this.filePath }, "error: Failed to save session id");
            throw new SessionPersistError("Failed to save session id.", this.filePath, { cause: error });
        }
        logger.debug({ sessionId: normalized }, "save: Session id saved");
    }

    async clear(): Promise<void> {
        try {
            await fs.rm(this.filePath, { force: true });
        } catch (error) {
            logger.error({ error, path: this.filePath }, "error: Failed to clear session id");
            throw new SessionPersistError("Failed to clear session id.", this.filePath, { cause: error });
        }
        logger.debug("clear: Session id cleared");
    }
}

function errorCodeIs(error: unknown, code: string): boolean {
    return error instanceof Error && "code" in error && error.code === code;
}
