import { promises as fs } from "node:fs";

import { parse as dotenvParse } from "dotenv";

/**
 * Reads KEY=value pairs from a dotenv file. A missing file yields an empty map.
 */
export async function configEnvFileRead(filePath: string): Promise<Record<string, string>> {
    let content: string;
    try {
        content = await fs.readFile(filePath, "utf8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return {};
        }
        throw error;
    }
    return dotenvParse(content);
}
