/**
 * Options for a single external command invocation
 */
export type CommandOptions = {
  /** Run through the privilege-escalation wrapper */
  elevated?: boolean;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Exit codes treated as success (default: [0]) */
  okExitCodes?: number[];
};

/**
 * Captured result of a finished command
 */
export type CommandOutput = {
  exitCode: number;
  stdout: string;
  stderr: string;
};
