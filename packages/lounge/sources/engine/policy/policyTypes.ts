export type ActionArgs = Record<string, unknown>;

export type PolicyDenyReason = "missing path" | "invalid path" | "outside sandbox" | "command not permitted";

export type PolicyDecision =
    | { behavior: "allow" }
    | {
          behavior: "deny";
          reason: PolicyDenyReason;
          /** The argument value that caused the denial, null when it was absent. */
          subject: unknown;
      };

/**
 * Filesystem roots the gate checks against.
 * Both are absolute and already symlink-resolved.
 */
export type PolicySandbox = {
    sandboxRoot: string;
    workingRoot: string;
};

/**
 * Decides whether a requested action may run.
 */
export type ActionAuthorizer = (actionName: string, args: ActionArgs) => PolicyDecision;
