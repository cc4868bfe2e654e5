import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { SessionStoreFile } from "../engine/session/sessionStoreFile.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";

export type StatusOptions = {
    settings?: string;
};

export async function statusCommand(options: StatusOptions): Promise<void> {
    const lines = await statusLinesBuild(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    console.log(lines.join("\n"));
}

/**
 * Builds the status report: where lounge keeps its state and which session it would resume.
 */
export async function statusLinesBuild(settingsPath: string): Promise<string[]> {
    const config = await configLoad(settingsPath);
    const sessionId = await new SessionStoreFile(config.sessionPath).load();
    return [
        `Settings:  ${config.settingsPath}`,
        `Data dir:  ${config.dataDir}`,
        `Sandbox:   ${config.sandboxDir}`,
        `Log file:  ${config.logPath}`,
        `Session:   ${sessionId ?? "none (next run starts fresh)"}`
    ];
}
