export { run } from "./runner.js";
export type { RunDeps } from "./runner.js";
export { decide, buildArgv } from "./privilege/decision.js";
export type { ExecutableProbe } from "./privilege/decision.js";
export { findExecutable, isExecutableFile } from "./privilege/probe.js";
export { launch, FORWARDED_SIGNALS, TERMINAL_SIGNALS } from "./execution/launcher.js";
export type { ChildHandle, LaunchOptions, SignalSource, SpawnFn } from "./execution/launcher.js";
export { readLaunchEnvironment, DISABLE_ESCALATION_ENV, CONFIG_PATH_ENV } from "./config/environment.js";
export { loadConfig, DEFAULT_CONFIG } from "./config/loader.js";
export type { ConfigResult } from "./config/loader.js";
export { LaunchError, LaunchErrorCode } from "./shared/errors.js";
export type { WrapperConfig } from "./types/config.js";
export type {
  CommandInvocation,
  ExecutionDecision,
  ExecutionMode,
  LaunchEnvironment,
  LaunchOutcome,
} from "./types/decision.js";
