// Logger for the wrapper itself. Always stderr, never stdout: stdout belongs to
// the launched command. Silent unless RUN_ELEVATED_LOG_LEVEL asks for more.
import pino from "pino";

export const LOG_LEVEL_ENV = "RUN_ELEVATED_LOG_LEVEL";

/** Map a requested level name to a pino level; unknown names mean silent. */
export function resolveLogLevel(requested: string | undefined): string {
  if (requested === undefined) return "silent";
  const level = requested.trim().toLowerCase();
  return level === "silent" || Object.hasOwn(pino.levels.values, level) ? level : "silent";
}

export const logger = pino(
  { name: "run-elevated", level: resolveLogLevel(process.env[LOG_LEVEL_ENV]) },
  // Synchronous so nothing is lost when the wrapper calls process.exit().
  pino.destination({ dest: 2, sync: true }),
);
