import { promises as fs } from "node:fs";

export type BundledPromptName = "system" | "init" | "idle";

/**
 * Reads a bundled prompt from the prompts directory.
 */
export async function promptBundledRead(name: BundledPromptName): Promise<string> {
    const promptPath = new URL(`../../prompts/${name}.md`, import.meta.url);
    const content = await fs.readFile(promptPath, "utf8");
    return content.trim();
}
