const MAX_PATH_LENGTH = 4096;

/**
 * Rejects action paths the gate refuses to resolve: over-long values, null bytes,
 * and ASCII control characters other than tab.
 */
export function pathSanitize(target: string): void {
    if (target.length > MAX_PATH_LENGTH) {
        throw new Error(`Path exceeds maximum length of ${MAX_PATH_LENGTH} characters.`);
    }

    if (target.includes("\x00")) {
        throw new Error("Path contains null byte.");
    }

    for (let i = 0; i < target.length; i++) {
        const code = target.charCodeAt(i);
        if (code < 32 && code !== 9) {
            throw new Error("Path contains invalid control character.");
        }
    }
}
