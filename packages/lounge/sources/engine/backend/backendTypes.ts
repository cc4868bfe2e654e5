import type { ActionArgs, ActionAuthorizer } from "../policy/policyTypes.js";

export type AssistantTextBlock = {
    type: "text";
    text: string;
};

export type AssistantActionBlock = {
    type: "action";
    id: string;
    name: string;
    args: ActionArgs;
};

export type AssistantBlock = AssistantTextBlock | AssistantActionBlock;

/**
 * Events streamed by a backend connection during one turn.
 * `result` is terminal; the stream for the turn ends after it.
 */
export type TurnEvent =
    | {
          type: "system";
          subtype: string;
          sessionId: string | null;
      }
    | {
          type: "assistant";
          blocks: AssistantBlock[];
      }
    | {
          type: "action_result";
          actionId: string;
          isError: boolean;
          content: string;
      }
    | {
          type: "result";
          sessionId: string | null;
          isError: boolean;
          numTurns: number;
          subtype: string;
      };

export type BackendOpenOptions = {
    /** Session to resume, null starts a fresh one. */
    resume: string | null;
    /** Consulted before every action the backend wants to run. */
    authorize: ActionAuthorizer;
};

/**
 * A live bidirectional session with the backend.
 * Expects: one turn at a time; `receive` is consumed to completion before the next `send`.
 */
export interface BackendConnection {
    send(prompt: string): Promise<void>;
    /** Streams events for the current turn and ends after the terminal result. */
    receive(): AsyncIterable<TurnEvent>;
    /** Asks the backend to stop the in-flight turn. */
    interrupt(): Promise<void>;
    close(): Promise<void>;
}

export interface BackendConnector {
    open(options: BackendOpenOptions): Promise<BackendConnection>;
}
