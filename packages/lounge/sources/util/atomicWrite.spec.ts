import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { atomicWrite } from "./atomicWrite.js";

describe("atomicWrite", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "lounge-atomic-"));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("writes the payload and leaves no temp files", async () => {
        const target = path.join(dir, "state", "value");
        await atomicWrite(target, "one");
        await atomicWrite(target, "two");

        expect(await fs.readFile(target, "utf8")).toBe("two");
        expect(await fs.readdir(path.dirname(target))).toEqual(["value"]);
    });

    it("removes the temp file when the rename fails", async () => {
        const target = path.join(dir, "occupied");
        await fs.mkdir(target);

        await expect(atomicWrite(target, "value")).rejects.toThrow();
        expect(await fs.readdir(dir)).toEqual(["occupied"]);
    });
});
