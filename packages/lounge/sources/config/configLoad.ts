import { promises as fs } from "node:fs";
import path from "node:path";

import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { configEnvFileRead } from "./configEnvFileRead.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

/**
 * Loads, validates, and resolves the config from disk into an immutable snapshot.
 * A missing settings file resolves to defaults. A `.env` beside the settings file supplies
 * `${VAR}` values the process environment does not set.
 * Expects: settingsPath points at the JSON settings file.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {}
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    try {
        const content = await fs.readFile(resolvedPath, "utf8");
        raw = JSON.parse(content);
    } catch (error) {
        if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
            throw error;
        }
    }

    const settings = configSettingsParse(raw);
    const fileEnv = await configEnvFileRead(path.join(path.dirname(resolvedPath), ".env"));
    const env = { ...fileEnv, ...(overrides.env ?? process.env) };
    return configResolve(settings, resolvedPath, { ...overrides, env });
}
