import { policyCommandAllows } from "./policyCommandAllows.js";
import { policyGlobBase } from "./policyGlobBase.js";
import { pathIsWithin, policyPathResolve } from "./policyPathResolve.js";
import type { ActionArgs, PolicyDecision, PolicyDenyReason, PolicySandbox } from "./policyTypes.js";

type PathAction = {
    /** Argument keys holding the path, first present wins. */
    keys: string[];
    /** Listing actions fall back to the working root when no path is given. */
    listing: boolean;
    /** Argument holding a glob pattern that is resolved beneath the path. */
    pattern?: string;
};

const PATH_ACTIONS = new Map<string, PathAction>([
    ["read", { keys: ["file_path", "path"], listing: false }],
    ["write", { keys: ["file_path", "path"], listing: false }],
    ["edit", { keys: ["file_path", "path"], listing: false }],
    ["multiedit", { keys: ["file_path", "path"], listing: false }],
    ["notebookedit", { keys: ["notebook_path"], listing: false }],
    ["glob", { keys: ["path"], listing: true, pattern: "pattern" }],
    ["grep", { keys: ["path"], listing: true }],
    ["ls", { keys: ["path"], listing: true }]
]);

const SHELL_ACTIONS = new Set(["bash", "shell"]);

const ALLOW: PolicyDecision = { behavior: "allow" };

/**
 * Decides whether an action may run inside the sandbox.
 * Path actions must stay within sandboxRoot after symlink resolution, shell actions must be
 * `sleep <n>`, every other action is allowed. Action names match case-insensitively.
 */
export function policyDecide(sandbox: PolicySandbox, actionName: string, args: ActionArgs): PolicyDecision {
    const name = actionName.trim().toLowerCase();

    const pathAction = PATH_ACTIONS.get(name);
    if (pathAction) {
        return pathActionDecide(sandbox, pathAction, args);
    }

    if (SHELL_ACTIONS.has(name)) {
        const command = args.command;
        return policyCommandAllows(command) ? ALLOW : deny("command not permitted", command ?? null);
    }

    return ALLOW;
}

function pathActionDecide(sandbox: PolicySandbox, action: PathAction, args: ActionArgs): PolicyDecision {
    const value = pathArgumentRead(args, action.keys);

    let searchRoot: string;
    if (value === null) {
        if (!action.listing) {
            return deny("missing path", null);
        }
        searchRoot = sandbox.workingRoot;
    } else {
        const resolved = pathResolveOrNull(sandbox.sandboxRoot, value);
        if (resolved === null) {
            return deny("invalid path", value);
        }
        searchRoot = resolved;
    }

    if (!pathIsWithin(sandbox.sandboxRoot, searchRoot)) {
        return deny("outside sandbox", value);
    }

    if (!action.pattern) {
        return ALLOW;
    }

    const pattern = pathArgumentRead(args, [action.pattern]);
    if (pattern === null) {
        return ALLOW;
    }
    const patternBase = typeof pattern === "string" ? pathResolveOrNull(searchRoot, policyGlobBase(pattern)) : null;
    if (patternBase === null) {
        return deny("invalid path", pattern);
    }
    return pathIsWithin(sandbox.sandboxRoot, patternBase) ? ALLOW : deny("outside sandbox", pattern);
}

// Empty strings count as absent, non-strings are returned as-is so they can be reported.
function pathArgumentRead(args: ActionArgs, keys: string[]): unknown {
    for (const key of keys) {
        const value = args[key];
        if (value === undefined || value === null || value === "") {
            continue;
        }
        return value;
    }
    return null;
}

function pathResolveOrNull(base: string, value: unknown): string | null {
    if (typeof value !== "string") {
        return null;
    }
    try {
        return policyPathResolve(base, value);
    } catch {
        return null;
    }
}

function deny(reason: PolicyDenyReason, subject: unknown): PolicyDecision {
    return { behavior: "deny", reason, subject };
}
