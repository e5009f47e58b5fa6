/** Minimal logging surface used by limiters and middleware. `console` satisfies it. */
export type Logger = Pick<Console, "debug" | "warn" | "error">;
