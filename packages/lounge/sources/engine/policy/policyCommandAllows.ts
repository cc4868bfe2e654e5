const SLEEP_COMMAND = /^sleep \d+(\.\d+)?$/;

/**
 * Shell allowlist: only `sleep <seconds>` may run.
 */
export function policyCommandAllows(command: unknown): boolean {
    return typeof command === "string" && SLEEP_COMMAND.test(command.trim());
}
