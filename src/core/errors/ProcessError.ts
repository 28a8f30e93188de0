import { BaseError } from "./BaseError";

/**
 * External command error codes
 */
export enum ProcessErrorCode {
  /** Binary not found or not executable */
  UNAVAILABLE = "TOOL_UNAVAILABLE",
  TIMEOUT = "TOOL_TIMEOUT",
  /** Non-zero exit status */
  FAILED = "TOOL_FAILED",
  /** sudo refused to run without a password */
  ELEVATION_DENIED = "TOOL_ELEVATION_DENIED",
  /** Killed by shutdown */
  ABORTED = "TOOL_ABORTED",
}

/**
 * Failure of an external tool invocation
 */
export class ProcessError extends BaseError {
  constructor(
    message: string,
    public readonly code: ProcessErrorCode,
    public readonly command: string,
    public readonly exitCode: number | null = null,
    public readonly stderr: string = "",
    recoverable: boolean = true,
  ) {
    super(message, code, recoverable, { command, exitCode, stderr });
  }

  static unavailable(command: string, reason: string): ProcessError {
    return new ProcessError(
      `Command not available: ${command} (${reason})`,
      ProcessErrorCode.UNAVAILABLE,
      command,
    );
  }

  static timeout(command: string, timeoutMs: number): ProcessError {
    return new ProcessError(
      `Command timed out after ${timeoutMs}ms: ${command}`,
      ProcessErrorCode.TIMEOUT,
      command,
    );
  }

  static failed(command: string, exitCode: number, stderr: string): ProcessError {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
    return new ProcessError(
      `Command exited with code ${exitCode}: ${command}${detail}`,
      ProcessErrorCode.FAILED,
      command,
      exitCode,
      stderr,
    );
  }

  static elevationDenied(command: string, stderr: string): ProcessError {
    return new ProcessError(
      `Passwordless privilege escalation is not available for: ${command}`,
      ProcessErrorCode.ELEVATION_DENIED,
      command,
      1,
      stderr,
      false,
    );
  }

  static aborted(command: string): ProcessError {
    return new ProcessError(
      `Command aborted: ${command}`,
      ProcessErrorCode.ABORTED,
      command,
    );
  }
}
