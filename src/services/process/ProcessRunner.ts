import { execFile } from "child_process";
import { IProcessRunner } from "@core/interfaces";
import {
  Result,
  CommandOptions,
  CommandOutput,
  success,
  failure,
} from "@core/types";
import { ProcessError } from "@core/errors";
import {
  COMMAND_DEFAULT_TIMEOUT_MS,
  ELEVATION_COMMAND,
  ELEVATION_ARGS,
} from "@core/constants";
import { getLogger } from "@utils/logger";

const logger = getLogger("ProcessRunner");

// sudo -n prints this when a password would be needed
const PASSWORD_REQUIRED_PATTERN = /a password is required/i;
// sudo prints this when the wrapped binary does not exist
const SUDO_COMMAND_NOT_FOUND_PATTERN = /command not found/i;

const UNAVAILABLE_ERRNO_CODES = new Set(["ENOENT", "EACCES"]);

/**
 * Raw outcome of an execFile call before classification
 */
type ExecOutcome = {
  error: (Error & { code?: unknown; signal?: unknown }) | null;
  stdout: string;
  stderr: string;
};

/**
 * Process Runner
 *
 * Runs external tools with argument vectors (no shell). Every call gets its
 * own AbortController that is tied to a root controller, so a timeout kills
 * one child and abortAll() kills all of them. reset() installs a fresh root
 * controller for the next run.
 */
export class ProcessRunner implements IProcessRunner {
  private rootController = new AbortController();
  private inFlight = 0;

  constructor(
    private readonly defaultTimeoutMs: number = COMMAND_DEFAULT_TIMEOUT_MS,
  ) {}

  async run(
    command: string,
    args: readonly string[],
    options: CommandOptions = {},
  ): Promise<Result<CommandOutput, ProcessError>> {
    const elevated = options.elevated ?? false;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const okExitCodes = options.okExitCodes ?? [0];

    const display = [command, ...args].join(" ");
    const file = elevated ? ELEVATION_COMMAND : command;
    const argv = elevated ? [...ELEVATION_ARGS, command, ...args] : [...args];

    const root = this.rootController;
    if (root.signal.aborted) {
      return failure(ProcessError.aborted(display));
    }

    const controller = new AbortController();
    const onRootAbort = (): void => controller.abort();
    root.signal.addEventListener("abort", onRootAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    this.inFlight++;
    logger.debug(`Running${elevated ? " (elevated)" : ""}: ${display}`);

    try {
      const outcome = await new Promise<ExecOutcome>((resolve) => {
        execFile(
          file,
          argv,
          { signal: controller.signal, encoding: "utf8" },
          (error, stdout, stderr) => {
            resolve({ error, stdout, stderr });
          },
        );
      });

      const result = this.classify(outcome, {
        display,
        elevated,
        timedOut,
        aborted: root.signal.aborted,
        timeoutMs,
        okExitCodes,
      });
      if (!result.success) {
        logger.debug(`${result.error.code}: ${result.error.message}`);
      }
      return result;
    } finally {
      clearTimeout(timer);
      root.signal.removeEventListener("abort", onRootAbort);
      this.inFlight--;
    }
  }

  abortAll(): void {
    if (this.rootController.signal.aborted) {
      return;
    }
    logger.info(`Aborting ${this.inFlight} in-flight command(s)`);
    this.rootController.abort();
  }

  reset(): void {
    if (!this.rootController.signal.aborted) {
      return;
    }
    logger.debug("Accepting commands again");
    this.rootController = new AbortController();
  }

  getInFlightCount(): number {
    return this.inFlight;
  }

  /**
   * Map an execFile outcome onto the command error taxonomy
   */
  private classify(
    outcome: ExecOutcome,
    call: {
      display: string;
      elevated: boolean;
      timedOut: boolean;
      aborted: boolean;
      timeoutMs: number;
      okExitCodes: number[];
    },
  ): Result<CommandOutput, ProcessError> {
    const { error, stdout, stderr } = outcome;

    if (!error) {
      return success({ exitCode: 0, stdout, stderr });
    }

    if (call.timedOut) {
      return failure(ProcessError.timeout(call.display, call.timeoutMs));
    }

    if (call.aborted || error.name === "AbortError") {
      return failure(ProcessError.aborted(call.display));
    }

    const code = error.code;

    if (typeof code === "string" && UNAVAILABLE_ERRNO_CODES.has(code)) {
      return failure(ProcessError.unavailable(call.display, code));
    }

    if (typeof code === "number") {
      if (call.elevated && PASSWORD_REQUIRED_PATTERN.test(stderr)) {
        return failure(ProcessError.elevationDenied(call.display, stderr));
      }
      if (call.elevated && SUDO_COMMAND_NOT_FOUND_PATTERN.test(stderr)) {
        return failure(
          ProcessError.unavailable(call.display, "command not found"),
        );
      }
      if (call.okExitCodes.includes(code)) {
        return success({ exitCode: code, stdout, stderr });
      }
      return failure(ProcessError.failed(call.display, code, stderr));
    }

    if (typeof error.signal === "string") {
      const detail = stderr || `killed by ${error.signal}`;
      return failure(ProcessError.failed(call.display, -1, detail));
    }

    return failure(ProcessError.unavailable(call.display, error.message));
  }
}
