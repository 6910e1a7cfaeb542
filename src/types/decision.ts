/**
 * The command to run: argv[0] is the executable, the rest its arguments.
 * Taken verbatim from the wrapper's own arguments.
 */
export type CommandInvocation = readonly string[];

/** Process-wide settings read once at startup. */
export interface LaunchEnvironment {
  readonly escalationDisabled: boolean;
  readonly searchPath: string;
  readonly configPath: string;
}

/** Computed once per invocation and never reconsidered. */
export type ExecutionDecision =
  | { readonly mode: "direct" }
  | { readonly mode: "escalated"; readonly helper: string; readonly helperPath: string; readonly preserveEnvFlag: string }
  | { readonly mode: "direct-fallback"; readonly helper: string };

export type ExecutionMode = ExecutionDecision["mode"];

/** How the launched process ended. */
export type LaunchOutcome =
  | { readonly kind: "exited"; readonly code: number }
  | { readonly kind: "signaled"; readonly signal: NodeJS.Signals };
