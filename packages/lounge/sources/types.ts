// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Config
export type { Config, ConfigOverrides, ResolvedMcpServer } from "./config/configTypes.js";
// Backend
export type {
    AssistantBlock,
    BackendConnection,
    BackendConnector,
    BackendOpenOptions,
    TurnEvent
} from "./engine/backend/backendTypes.js";
// Policy
export type { ActionArgs, ActionAuthorizer, PolicyDecision, PolicyDenyReason, PolicySandbox } from "./engine/policy/policyTypes.js";
// Session
export type { SessionStore } from "./engine/session/sessionStore.js";
export type { SessionState } from "./engine/session/sessionTypes.js";
// Turns
export type { TurnExecuteOptions, TurnOutcome } from "./engine/turn/turnTypes.js";
