#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { Command } from "commander";

import { runCommand } from "./commands/run.js";
import { statusCommand } from "./commands/status.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const version =
    typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
        ? pkg.version
        : "0.0.0";

const program = new Command();

initLogging();

program.name("lounge").description("Keeps one long-lived agent session running").version(version);

program
    .command("run")
    .description("Start the agent loop")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("-v, --verbose", "Log full prompts and responses")
    .action(runCommand);

program
    .command("status")
    .description("Show data paths and the persisted session")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(statusCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
