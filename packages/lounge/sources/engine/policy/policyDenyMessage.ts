import type { PolicyDenyReason } from "./policyTypes.js";

/**
 * Builds the denial text returned to the backend in place of an action result.
 */
export function policyDenyMessage(actionName: string, reason: PolicyDenyReason): string {
    switch (reason) {
        case "missing path":
            return `${actionName} denied: missing path. Provide a path inside the sandbox.`;
        case "invalid path":
            return `${actionName} denied: invalid path.`;
        case "outside sandbox":
            return `${actionName} denied: path is outside sandbox. Only files under the working directory are accessible.`;
        case "command not permitted":
            return `${actionName} denied: command not permitted. Only "sleep <seconds>" may run.`;
    }
}
