import { getLogger } from "../../log.js";
import { policyArgumentPreview } from "./policyArgumentPreview.js";
import { policyDecide } from "./policyDecide.js";
import { policyPathResolve } from "./policyPathResolve.js";
import type { ActionArgs, PolicyDecision, PolicySandbox } from "./policyTypes.js";

const logger = getLogger("policy.gate");

export type PolicyGateOptions = {
    sandboxRoot: string;
    /** Default root for listing actions without a path; defaults to sandboxRoot. */
    workingRoot?: string;
};

/**
 * Authorizes action requests against a fixed sandbox. Roots are resolved once at construction.
 * Denials are logged with a preview of the offending argument; allows are not logged.
 */
export class PolicyGate {
    readonly sandbox: PolicySandbox;

    constructor(options: PolicyGateOptions) {
        const sandboxRoot = policyPathResolve("/", options.sandboxRoot);
        this.sandbox = {
            sandboxRoot,
            workingRoot: options.workingRoot ? policyPathResolve(sandboxRoot, options.workingRoot) : sandboxRoot
        };
    }

    decide(actionName: string, args: ActionArgs): PolicyDecision {
        const decision = policyDecide(this.sandbox, actionName, args);
        if (decision.behavior === "deny") {
            logger.warn(
                { action: actionName, reason: decision.reason, argument: policyArgumentPreview(decision.subject) },
                "deny: Action denied"
            );
            logger.debug({ action: actionName, args }, "deny: Denied action arguments");
        }
        return decision;
    }
}
