/**
 * Type guards and utilities for safe type narrowing
 *
 * These utilities replace unsafe `as` type assertions with runtime checks
 * that provide proper type narrowing.
 */

/**
 * Convert an unknown caught error to an Error instance.
 *
 * In TypeScript, caught errors are typed as `unknown`. This function
 * safely converts any value to an Error instance for consistent handling.
 *
 * @param error - The caught error value
 * @returns An Error instance
 *
 * @example
 * ```ts
 * try {
 *   await riskyOperation();
 * } catch (err) {
 *   const error = toError(err);
 *   logger.error(error.message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Type guard for Node.js ErrnoException.
 *
 * Checks if an error is a Node.js system error with an error code.
 *
 * @param error - The error to check
 * @returns True if the error is an ErrnoException
 *
 * @example
 * ```ts
 * try {
 *   await fs.readFile(path);
 * } catch (err) {
 *   if (isNodeJSErrnoException(err) && err.code === "ENOENT") {
 *     // Handle file not found
 *   }
 * }
 * ```
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

/**
 * Type guard for error-like objects with code and getUserMessage.
 *
 * Checks if an object has the properties needed for error extraction,
 * even if it's not a true Error instance (e.g., mock objects in tests).
 */
function hasErrorInfo(
  error: unknown,
): error is { code: string; getUserMessage: () => string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    "getUserMessage" in error &&
    typeof error.getUserMessage === "function"
  );
}

/**
 * Extract error code and user message from a Result error, for the
 * status line the presentation layer shows after a failed action.
 *
 * Works with BaseError subclasses, plain Error instances, and
 * error-like objects.
 *
 * @param error - The error from a failed Result
 * @returns Object with code and message for API responses
 */
export function extractErrorInfo(error: unknown): {
  code: string;
  message: string;
} {
  // Handle BaseError and error-like objects with code and getUserMessage
  if (hasErrorInfo(error)) {
    return {
      code: error.code,
      message: error.getUserMessage(),
    };
  }
  // Handle plain Error instances
  if (error instanceof Error) {
    return {
      code: "UNKNOWN_ERROR",
      message: error.message,
    };
  }
  // Fallback for any other type
  return {
    code: "UNKNOWN_ERROR",
    message: String(error),
  };
}
