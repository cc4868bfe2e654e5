import path from "node:path";

import type { Config } from "@/types";

import { configLoad } from "../config/configLoad.js";
import { ClaudeBackend } from "../engine/backend/claudeBackend.js";
import { PolicyGate } from "../engine/policy/policyGate.js";
import { promptBundledRead } from "../engine/prompts/promptBundledRead.js";
import { SessionController } from "../engine/session/sessionController.js";
import { SessionStoreFile } from "../engine/session/sessionStoreFile.js";
import { Supervisor } from "../engine/supervisor/supervisor.js";
import { getLogger, logFileAttach } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { awaitShutdown, onShutdown, requestShutdown, shutdownSignal } from "../util/shutdown.js";

const logger = getLogger("command.run");

export type RunOptions = {
    settings?: string;
    verbose?: boolean;
};

export async function runCommand(options: RunOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath, { verbose: options.verbose ?? false });
    logFileAttach(config.logPath);
    logger.info(
        { settings: config.settingsPath, dataDir: config.dataDir, sandbox: config.sandboxDir },
        "start: Starting lounge"
    );

    const supervisor = await supervisorBuild(config);
    const finished = supervisor.run().then(
        () => {
            requestShutdown("SIGTERM");
            return 0;
        },
        (error: unknown) => {
            logger.error({ error }, "error: Supervisor failed to start");
            requestShutdown("fatal");
            return 1;
        }
    );
    onShutdown("supervisor", async () => {
        await finished;
    });

    const signal = await awaitShutdown();
    const exitCode = await finished;
    logger.info({ signal, iterations: supervisor.iterations }, "event: Shutdown complete");
    process.exit(exitCode);
}

async function supervisorBuild(config: Config): Promise<Supervisor> {
    const [systemPrompt, initPrompt, idlePrompt] = await Promise.all([
        config.backend.systemPrompt ?? promptBundledRead("system"),
        promptBundledRead("init"),
        promptBundledRead("idle")
    ]);

    const gate = new PolicyGate({ sandboxRoot: config.sandboxDir });
    const connector = new ClaudeBackend({
        cwd: gate.sandbox.workingRoot,
        model: config.backend.model,
        systemPrompt,
        allowedTools: config.backend.allowedTools,
        disallowedTools: config.backend.disallowedTools,
        mcpServers: config.backend.mcpServers
    });
    const controller = new SessionController({
        connector,
        store: new SessionStoreFile(config.sessionPath),
        authorize: (actionName, args) => gate.decide(actionName, args),
        inactivityTimeoutMs: config.turn.inactivityTimeoutMs,
        compactPrompt: config.turn.compactPrompt,
        verbose: config.verbose
    });

    return new Supervisor({
        controller,
        prompts: { init: initPrompt, idle: idlePrompt },
        intervalMs: config.loop.intervalMs,
        signal: shutdownSignal
    });
}
