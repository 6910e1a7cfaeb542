import { join } from "node:path";
import { homedir } from "node:os";
import type { LaunchEnvironment } from "../types/decision.js";

export const DISABLE_ESCALATION_ENV = "RUN_ELEVATED_DISABLE_SUDO";
export const CONFIG_PATH_ENV = "RUN_ELEVATED_CONFIG";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "run-elevated", "config.yaml");

/**
 * Snapshot the variables the decision depends on. Only the literal "1"
 * disables escalation; "true", "yes", " 1" and the like do not.
 */
export function readLaunchEnvironment(env: NodeJS.ProcessEnv): LaunchEnvironment {
  const configPath = env[CONFIG_PATH_ENV];
  return {
    escalationDisabled: env[DISABLE_ESCALATION_ENV] === "1",
    searchPath: env.PATH ?? "",
    configPath: configPath !== undefined && configPath !== "" ? configPath : DEFAULT_CONFIG_PATH,
  };
}
