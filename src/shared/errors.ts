export enum LaunchErrorCode {
  NO_COMMAND = "NO_COMMAND",
  COMMAND_NOT_FOUND = "COMMAND_NOT_FOUND",
  COMMAND_NOT_EXECUTABLE = "COMMAND_NOT_EXECUTABLE",
  HELPER_UNAVAILABLE = "HELPER_UNAVAILABLE",
}

/** Shell convention: 127 for "not found", 126 for "found but not runnable". */
const EXIT_CODES: Record<LaunchErrorCode, number> = {
  [LaunchErrorCode.NO_COMMAND]: 127,
  [LaunchErrorCode.COMMAND_NOT_FOUND]: 127,
  [LaunchErrorCode.COMMAND_NOT_EXECUTABLE]: 126,
  [LaunchErrorCode.HELPER_UNAVAILABLE]: 126,
};

export class LaunchError extends Error {
  readonly code: LaunchErrorCode;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(code: LaunchErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "LaunchError";
    this.code = code;
    this.exitCode = EXIT_CODES[code];
    this.context = context;
  }
}
