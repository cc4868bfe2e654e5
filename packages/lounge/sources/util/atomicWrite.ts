import { promises as fs } from "node:fs";
import path from "node:path";

/**
 * Writes a file atomically by renaming a flushed temp file into place.
 * Creates the parent directory when missing; the temp file is removed if any step fails.
 */
export async function atomicWrite(filePath: string, payload: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
    try {
        const handle = await fs.open(tempPath, "w", 0o600);
        try {
            await handle.writeFile(payload, "utf8");
            await handle.sync();
        } finally {
            await handle.close();
        }
        await fs.rename(tempPath, filePath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
    }
}
