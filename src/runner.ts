// One wrapper invocation: environment → config → decision → argv → launch.
import type { CommandInvocation, LaunchOutcome } from "./types/decision.js";
import { readLaunchEnvironment } from "./config/environment.js";
import { loadConfig } from "./config/loader.js";
import { decide, buildArgv } from "./privilege/decision.js";
import type { ExecutableProbe } from "./privilege/decision.js";
import { launch } from "./execution/launcher.js";
import type { SignalSource, SpawnFn } from "./execution/launcher.js";
import { logger } from "./logger.js";

export interface RunDeps {
  spawn?: SpawnFn;
  signals?: SignalSource;
  probe?: ExecutableProbe;
}

export async function run(
  invocation: CommandInvocation,
  env: NodeJS.ProcessEnv,
  deps: RunDeps = {},
): Promise<LaunchOutcome> {
  const environment = readLaunchEnvironment(env);
  const { config } = loadConfig(environment.configPath);
  const decision = decide(environment, config.privilege, deps.probe);
  const argv = buildArgv(decision, invocation);
  logger.debug({ decision, argv }, "Execution decided");

  // The environment goes through untouched; under escalation the helper's
  // preserve flag is what keeps it.
  return launch(argv, { env, spawn: deps.spawn, signals: deps.signals });
}
