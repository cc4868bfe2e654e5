import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { statusLinesBuild } from "./status.js";

describe("statusLinesBuild", () => {
    let dir: string;
    let settingsPath: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "lounge-status-"));
        settingsPath = path.join(dir, "settings.json");
        await fs.writeFile(settingsPath, JSON.stringify({ engine: { dataDir: dir, sandboxDir: "workspace" } }));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("reports a fresh start without a persisted session", async () => {
        expect(await statusLinesBuild(settingsPath)).toEqual([
            `Settings:  ${settingsPath}`,
            `Data dir:  ${dir}`,
            `Sandbox:   ${path.join(dir, "workspace")}`,
            `Log file:  ${path.join(dir, "agent.log")}`,
            "Session:   none (next run starts fresh)"
        ]);
    });

    it("reports the persisted session id", async () => {
        await fs.writeFile(path.join(dir, "session_id"), "sess-42\n");
        const lines = await statusLinesBuild(settingsPath);
        expect(lines[4]).toBe("Session:   sess-42");
    });
});
