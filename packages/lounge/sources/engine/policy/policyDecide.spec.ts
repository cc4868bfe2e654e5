import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { policyDecide } from "./policyDecide.js";
import type { PolicySandbox } from "./policyTypes.js";

describe("policyDecide", () => {
    let root: string;
    let outside: string;
    let sandbox: PolicySandbox;

    beforeEach(() => {
        root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "lounge-policy-")));
        outside = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "lounge-outside-")));
        fs.writeFileSync(path.join(outside, "secret.txt"), "top secret");
        fs.mkdirSync(path.join(root, "notes"));
        fs.writeFileSync(path.join(root, "notes", "today.md"), "hello");
        sandbox = { sandboxRoot: root, workingRoot: root };
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
        fs.rmSync(outside, { recursive: true, force: true });
    });

    describe("path actions", () => {
        it("allows existing and new files inside the sandbox", () => {
            expect(policyDecide(sandbox, "Read", { file_path: "notes/today.md" })).toEqual({ behavior: "allow" });
            expect(policyDecide(sandbox, "Write", { file_path: path.join(root, "notes.md") })).toEqual({
                behavior: "allow"
            });
            expect(policyDecide(sandbox, "Write", { file_path: "a/b/c/new.md" })).toEqual({ behavior: "allow" });
        });

        it("accepts the generic path argument and lowercase names", () => {
            expect(policyDecide(sandbox, "read", { path: "notes/today.md" })).toEqual({ behavior: "allow" });
        });

        it("allows the sandbox root itself", () => {
            expect(policyDecide(sandbox, "LS", { path: root })).toEqual({ behavior: "allow" });
            expect(policyDecide(sandbox, "Glob", { path: ".", pattern: "*.md" })).toEqual({ behavior: "allow" });
        });

        it("allows entries whose names start with two dots", () => {
            fs.writeFileSync(path.join(root, "..notes.md"), "dotted");
            expect(policyDecide(sandbox, "Read", { file_path: path.join(root, "..notes.md") })).toEqual({
                behavior: "allow"
            });
            expect(policyDecide(sandbox, "Write", { file_path: "..cache/x" })).toEqual({ behavior: "allow" });
        });

        it("denies parent traversal out of the sandbox", () => {
            expect(policyDecide(sandbox, "read", { path: "../../etc/passwd" })).toEqual({
                behavior: "deny",
                reason: "outside sandbox",
                subject: "../../etc/passwd"
            });
            expect(policyDecide(sandbox, "Read", { file_path: "notes/../../outside.txt" })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
        });

        it("denies absolute paths outside the sandbox", () => {
            expect(policyDecide(sandbox, "Read", { file_path: path.join(outside, "secret.txt") })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
        });

        it("denies sibling directories sharing the root prefix", () => {
            expect(policyDecide(sandbox, "Write", { file_path: `${root}-evil/file.md` })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
        });

        it("denies symlinks that point outside the sandbox", () => {
            fs.symlinkSync(outside, path.join(root, "escape"));
            expect(policyDecide(sandbox, "Read", { file_path: "escape/secret.txt" })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
            expect(policyDecide(sandbox, "Write", { file_path: "escape/new.txt" })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
        });

        it("denies dangling symlinks whose target is outside the sandbox", () => {
            fs.symlinkSync(path.join(outside, "missing.txt"), path.join(root, "dangling"));
            expect(policyDecide(sandbox, "Write", { file_path: "dangling" })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
        });

        it("allows symlinks that stay inside the sandbox", () => {
            fs.symlinkSync(path.join(root, "notes"), path.join(root, "alias"));
            expect(policyDecide(sandbox, "Read", { file_path: "alias/today.md" })).toEqual({ behavior: "allow" });
        });

        it("denies non-listing actions without a path", () => {
            expect(policyDecide(sandbox, "Read", {})).toEqual({
                behavior: "deny",
                reason: "missing path",
                subject: null
            });
            expect(policyDecide(sandbox, "Write", { file_path: "" })).toMatchObject({ reason: "missing path" });
        });

        it("defaults listing actions to the working root", () => {
            expect(policyDecide(sandbox, "Glob", { pattern: "**/*.md" })).toEqual({ behavior: "allow" });
            expect(policyDecide(sandbox, "Grep", { pattern: "hello" })).toEqual({ behavior: "allow" });
        });

        it("denies a working root outside the sandbox for listing defaults", () => {
            expect(policyDecide({ sandboxRoot: root, workingRoot: outside }, "Glob", { pattern: "*" })).toMatchObject({
                behavior: "deny",
                reason: "outside sandbox"
            });
        });

        it("denies malformed path arguments", () => {
            expect(policyDecide(sandbox, "Read", { file_path: 42 })).toEqual({
                behavior: "deny",
                reason: "invalid path",
                subject: 42
            });
            expect(policyDecide(sandbox, "Read", { file_path: "notes\x00.md" })).toMatchObject({
                reason: "invalid path"
            });
        });

        it("denies glob patterns that escape the search root", () => {
            expect(policyDecide(sandbox, "Glob", { pattern: "../../**" })).toEqual({
                behavior: "deny",
                reason: "outside sandbox",
                subject: "../../**"
            });
            expect(policyDecide(sandbox, "Glob", { pattern: `${outside}/*` })).toMatchObject({
                reason: "outside sandbox"
            });
            expect(policyDecide(sandbox, "Glob", { path: "notes", pattern: "../*.md" })).toEqual({ behavior: "allow" });
        });
    });

    describe("shell actions", () => {
        it("allows only sleep with a number", () => {
            expect(policyDecide(sandbox, "Bash", { command: "sleep 30" })).toEqual({ behavior: "allow" });
            expect(policyDecide(sandbox, "Bash", { command: "  sleep 1.5 \n" })).toEqual({ behavior: "allow" });
            expect(policyDecide(sandbox, "shell", { command: "sleep 0" })).toEqual({ behavior: "allow" });
        });

        it("denies every other command", () => {
            for (const command of ["sleep 30; rm -rf /", "SLEEP 30", "sleep", "sleep -1", "sleep 1e3", "sleep 3\nls", "ls"]) {
                expect(policyDecide(sandbox, "Bash", { command })).toEqual({
                    behavior: "deny",
                    reason: "command not permitted",
                    subject: command
                });
            }
        });

        it("denies missing or non-string commands", () => {
            expect(policyDecide(sandbox, "Bash", {})).toEqual({
                behavior: "deny",
                reason: "command not permitted",
                subject: null
            });
            expect(policyDecide(sandbox, "Bash", { command: 30 })).toMatchObject({ reason: "command not permitted" });
        });
    });

    it("allows all other actions unconditionally", () => {
        expect(policyDecide(sandbox, "WebFetch", { url: "https://example.com" })).toEqual({ behavior: "allow" });
        expect(policyDecide(sandbox, "mcp__discord__send_message", { path: "../../etc/passwd" })).toEqual({
            behavior: "allow"
        });
    });
});
