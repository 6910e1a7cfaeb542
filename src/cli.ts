#!/usr/bin/env node
// run-elevated <executable> [argument ...]
// Takes no options of its own: every argument is the command to run.
import { constants } from "node:os";
import { run } from "./runner.js";
import { LaunchError } from "./shared/errors.js";
import type { CommandInvocation, LaunchOutcome } from "./types/decision.js";

/** The process-level effects of the entry point; `process` in production. */
export interface ProcessControl {
  exit(code: number): void;
  setExitCode(code: number): void;
  raise(signal: NodeJS.Signals): void;
  writeError(line: string): void;
}

export interface CliDeps {
  run?: (invocation: CommandInvocation, env: NodeJS.ProcessEnv) => Promise<LaunchOutcome>;
  env?: NodeJS.ProcessEnv;
  control?: ProcessControl;
}

const processControl: ProcessControl = {
  exit: (code) => process.exit(code),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  raise: (signal) => {
    process.kill(process.pid, signal);
  },
  writeError: (line) => {
    process.stderr.write(line);
  },
};

export function signalNumber(signal: NodeJS.Signals): number {
  return constants.signals[signal];
}

/** End this process the way the child ended. */
export function terminate(outcome: LaunchOutcome, control: ProcessControl = processControl): void {
  if (outcome.kind === "exited") {
    control.exit(outcome.code);
    return;
  }
  // Re-raise so our parent sees the same cause of death; the exit code
  // covers a signal that does not kill us.
  control.setExitCode(128 + signalNumber(outcome.signal));
  control.raise(outcome.signal);
}

export async function main(argv: string[] = process.argv.slice(2), deps: CliDeps = {}): Promise<void> {
  const control = deps.control ?? processControl;
  let outcome: LaunchOutcome;
  try {
    outcome = await (deps.run ?? run)(argv, deps.env ?? process.env);
  } catch (err) {
    if (err instanceof LaunchError) {
      control.writeError(`run-elevated: ${err.message}\n`);
      control.exit(err.exitCode);
      return;
    }
    control.writeError(`run-elevated: ${err instanceof Error ? err.message : String(err)}\n`);
    control.exit(1);
    return;
  }
  terminate(outcome, control);
}

if (require.main === module) {
  void main();
}
