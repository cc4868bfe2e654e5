import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const logger = vi.hoisted(() => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }));
vi.mock("../../log.js", () => ({ getLogger: () => logger }));

import {
    FakeBackend,
    fakeAction,
    fakeDelay,
    fakeFail,
    fakeResult,
    fakeStall,
    fakeText
} from "../backend/backendFakeTestUtils.js";
import { policyArgumentPreview } from "../policy/policyArgumentPreview.js";
import { PolicyGate } from "../policy/policyGate.js";
import { QueryError, TurnTimeoutError } from "./turnErrors.js";
import { turnExecute } from "./turnExecute.js";

const allowAll = () => ({ behavior: "allow" }) as const;

describe("turnExecute", () => {
    it("returns the session id from the terminal result", async () => {
        const backend = new FakeBackend(() => [fakeText("hello"), fakeResult("sess-1", { numTurns: 2 })]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        const outcome = await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 });

        expect(outcome).toEqual({
            completed: true,
            sessionId: "sess-1",
            overflow: false,
            isError: false,
            numTurns: 2,
            actionCount: 0
        });
        expect(backend.prompts).toEqual(["hi"]);
    });

    it("logs action arguments truncated by default and whole in verbose mode", async () => {
        const command = `sleep 1 # ${"x".repeat(200)}`;
        const backend = new FakeBackend(() => [fakeAction("Bash", { command }), fakeResult("sess-3")]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        logger.info.mockClear();
        await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 });
        expect(logger.info).toHaveBeenCalledWith(
            { action: "Bash", args: policyArgumentPreview({ command }) },
            "event: Action requested"
        );

        logger.info.mockClear();
        await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000, verbose: true });
        expect(logger.info).toHaveBeenCalledWith(
            { action: "Bash", args: JSON.stringify({ command }) },
            "event: Action requested"
        );
    });

    it("flags overflow and still drains to the result", async () => {
        const backend = new FakeBackend(() => [
            fakeText("Prompt is too long"),
            fakeText("still here"),
            fakeResult("sess-2", { isError: true })
        ]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        const outcome = await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 });

        expect(outcome).toMatchObject({ completed: true, sessionId: "sess-2", overflow: true, isError: true });
    });

    it("matches the overflow marker inside longer text", async () => {
        const backend = new FakeBackend(() => [fakeText("Error: PROMPT IS TOO LONG: 210000 tokens"), fakeResult("s")]);
        const connection = await backend.open({ resume: null, authorize: allowAll });
        expect((await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 })).overflow).toBe(true);
    });

    it("returns an incomplete outcome when the stream ends without a result", async () => {
        const backend = new FakeBackend(() => [fakeText("partial")]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        const outcome = await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 });

        expect(outcome).toEqual({
            completed: false,
            sessionId: null,
            overflow: false,
            isError: false,
            numTurns: 0,
            actionCount: 0
        });
    });

    it("fails with a timeout when the stream stalls", async () => {
        const backend = new FakeBackend(() => [fakeText("thinking"), fakeStall()]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        const error = await turnExecute(connection, "hi", { inactivityTimeoutMs: 30 }).catch(
            (caught: unknown) => caught
        );
        await connection.close();

        expect(error).toBeInstanceOf(TurnTimeoutError);
        expect(error).toMatchObject({ timeoutMs: 30 });
    });

    it("resets the deadline on every event", async () => {
        const backend = new FakeBackend(() => [
            fakeDelay(25),
            fakeText("one"),
            fakeDelay(25),
            fakeText("two"),
            fakeDelay(25),
            fakeResult("sess-3")
        ]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        const outcome = await turnExecute(connection, "hi", { inactivityTimeoutMs: 60 });

        expect(outcome.sessionId).toBe("sess-3");
    });

    it("wraps stream faults in QueryError", async () => {
        const fault = new Error("socket closed");
        const backend = new FakeBackend(() => [fakeFail(fault)]);
        const connection = await backend.open({ resume: null, authorize: allowAll });

        const error = await turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 }).catch(
            (caught: unknown) => caught
        );

        expect(error).toBeInstanceOf(QueryError);
        expect(error).toMatchObject({ cause: fault });
    });

    it("wraps send failures in QueryError", async () => {
        const backend = new FakeBackend();
        const connection = await backend.open({ resume: null, authorize: allowAll });
        await connection.close();

        await expect(turnExecute(connection, "hi", { inactivityTimeoutMs: 1_000 })).rejects.toBeInstanceOf(QueryError);
    });

    describe("with the policy gate", () => {
        let root: string;

        beforeEach(() => {
            root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "lounge-turn-")));
        });

        afterEach(() => {
            fs.rmSync(root, { recursive: true, force: true });
        });

        it("returns denials to the backend and counts the action", async () => {
            const gate = new PolicyGate({ sandboxRoot: root });
            const backend = new FakeBackend(() => [
                fakeAction("Read", { file_path: "../../etc/passwd" }),
                fakeAction("Bash", { command: "sleep 1" }),
                fakeResult("sess-4")
            ]);
            const connection = await backend.open({
                resume: null,
                authorize: (name, args) => gate.decide(name, args)
            });

            const outcome = await turnExecute(connection, "look around", { inactivityTimeoutMs: 1_000 });

            expect(outcome).toMatchObject({ completed: true, actionCount: 2 });
            expect(backend.actions).toEqual([
                {
                    name: "Read",
                    args: { file_path: "../../etc/passwd" },
                    allowed: false,
                    content:
                        "Read denied: path is outside sandbox. Only files under the working directory are accessible."
                },
                { name: "Bash", args: { command: "sleep 1" }, allowed: true, content: "ok" }
            ]);
        });
    });
});
