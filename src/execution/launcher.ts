// Launch layer: the one place the wrapper hands control to another program.
// Node cannot replace its own process image, so the command runs as a child that
// inherits our stdio, cwd and environment; the signals we receive while it runs
// are passed on, and its termination is reported back untranslated.
import { spawn as nodeSpawn } from "node:child_process";
import type { SpawnOptions } from "node:child_process";
import { isatty } from "node:tty";
import type { LaunchOutcome } from "../types/decision.js";
import { LaunchError, LaunchErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  "SIGINT",
  "SIGTERM",
  "SIGHUP",
  "SIGQUIT",
  "SIGUSR1",
  "SIGUSR2",
];

/** Sent by the terminal driver to the whole foreground process group. */
export const TERMINAL_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGQUIT"];

/** The parts of a ChildProcess the launcher touches. */
export interface ChildHandle {
  kill(signal: NodeJS.Signals): boolean;
  once(event: "error", listener: (err: Error) => void): unknown;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (file: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

/** Where forwarded signals come from; `process` in production. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface LaunchOptions {
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
  signals?: SignalSource;
  /**
   * True when the child shares a controlling terminal with us, so the
   * terminal already delivers SIGINT and SIGQUIT to it. Those are then
   * absorbed instead of forwarded. Defaults to whether fd 0 is a TTY.
   */
  terminalAttached?: boolean;
}

const defaultSpawn: SpawnFn = (file, args, options) => nodeSpawn(file, args, options);

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** Translate a failed spawn into the exit-code convention of a POSIX shell. */
export function toLaunchError(file: string, err: unknown): LaunchError {
  const code = errnoCode(err);
  const cause = err instanceof Error ? err.message : String(err);
  if (code === "ENOENT") {
    return new LaunchError(LaunchErrorCode.COMMAND_NOT_FOUND, `${file}: command not found`, { file, cause });
  }
  const reason = code === "EACCES" ? "Permission denied" : code ?? cause;
  return new LaunchError(LaunchErrorCode.COMMAND_NOT_EXECUTABLE, `${file}: ${reason}`, { file, cause });
}

/**
 * Run argv[0] with argv[1..] and resolve with how it ended. Rejects with a
 * LaunchError when nothing could be started.
 */
export function launch(argv: readonly string[], options: LaunchOptions = {}): Promise<LaunchOutcome> {
  if (argv.length === 0 || argv[0] === "") {
    return Promise.reject(new LaunchError(LaunchErrorCode.NO_COMMAND, "no command specified"));
  }
  const file = argv[0];
  const args = argv.slice(1);
  const spawn = options.spawn ?? defaultSpawn;
  const signals = options.signals ?? process;
  const terminalAttached = options.terminalAttached ?? isatty(0);

  return new Promise<LaunchOutcome>((resolve, reject) => {
    let child: ChildHandle;
    try {
      child = spawn(file, args, { stdio: "inherit", env: options.env ?? process.env });
    } catch (err) {
      reject(toLaunchError(file, err));
      return;
    }
    logger.debug({ argv }, "Launched");

    const forward = (signal: NodeJS.Signals): void => {
      if (terminalAttached && TERMINAL_SIGNALS.includes(signal)) {
        logger.debug({ signal }, "Terminal signal already delivered to child");
        return;
      }
      logger.debug({ signal }, "Forwarding signal");
      child.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) signals.on(signal, forward);

    let settled = false;
    const settle = (): boolean => {
      if (settled) return false;
      settled = true;
      for (const signal of FORWARDED_SIGNALS) signals.removeListener(signal, forward);
      return true;
    };

    child.once("error", (err) => {
      if (!settle()) return;
      reject(toLaunchError(file, err));
    });

    child.once("exit", (code, signal) => {
      if (!settle()) return;
      logger.debug({ code, signal }, "Child terminated");
      resolve(signal !== null ? { kind: "signaled", signal } : { kind: "exited", code: code ?? 1 });
    });
  });
}
