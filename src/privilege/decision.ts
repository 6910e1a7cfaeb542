// The escalation decision. Rules, first match wins:
//   1. RUN_ELEVATED_DISABLE_SUDO=1 → direct (helper is not probed)
//   2. helper found on PATH        → escalated
//   3. otherwise                   → direct-fallback
// decide() depends only on its arguments, so repeated calls agree.
import type { WrapperConfig } from "../types/config.js";
import type { CommandInvocation, ExecutionDecision, LaunchEnvironment } from "../types/decision.js";
import { LaunchError, LaunchErrorCode } from "../shared/errors.js";
import { findExecutable } from "./probe.js";
import { logger } from "../logger.js";

export type ExecutableProbe = (name: string, searchPath: string) => string | null;

export function decide(
  environment: LaunchEnvironment,
  privilege: WrapperConfig["privilege"],
  probe: ExecutableProbe = findExecutable,
): ExecutionDecision {
  if (environment.escalationDisabled) {
    return { mode: "direct" };
  }

  const helperPath = probe(privilege.helper, environment.searchPath);
  if (helperPath !== null) {
    return {
      mode: "escalated",
      helper: privilege.helper,
      helperPath,
      preserveEnvFlag: privilege.preserve_env_flag,
    };
  }

  if (!privilege.degrade_without_helper) {
    throw new LaunchError(
      LaunchErrorCode.HELPER_UNAVAILABLE,
      `${privilege.helper}: escalation helper not found`,
      { helper: privilege.helper },
    );
  }

  logger.warn({ helper: privilege.helper }, "Escalation helper not found, running command directly");
  return { mode: "direct-fallback", helper: privilege.helper };
}

/**
 * Final argv for a decision. The helper keeps the name it was probed under so
 * the OS resolves it exactly as the probe did.
 */
export function buildArgv(decision: ExecutionDecision, invocation: CommandInvocation): string[] {
  switch (decision.mode) {
    case "escalated":
      return [decision.helper, decision.preserveEnvFlag, ...invocation];
    case "direct":
    case "direct-fallback":
      return [...invocation];
  }
}
