import { Result, CommandOptions, CommandOutput } from "@core/types";
import { ProcessError } from "@core/errors";

/**
 * Process Runner Interface
 *
 * Single choke point for external tool invocations. Commands are argument
 * vectors, never shell strings, and every call is bounded by a timeout.
 */
export interface IProcessRunner {
  /**
   * Run a command and capture its output.
   * Exit codes outside `okExitCodes` are reported as TOOL_FAILED.
   */
  run(
    command: string,
    args: readonly string[],
    options?: CommandOptions,
  ): Promise<Result<CommandOutput, ProcessError>>;

  /**
   * Kill every in-flight command. Later calls fail with TOOL_ABORTED.
   */
  abortAll(): void;

  /**
   * Accept commands again after abortAll()
   */
  reset(): void;

  /**
   * Number of commands currently running
   */
  getInFlightCount(): number;
}
