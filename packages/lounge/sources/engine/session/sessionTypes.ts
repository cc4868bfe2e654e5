export type SessionState = "idle" | "executing" | "compacting" | "restarting" | "closed";
