import { BaseError } from "./BaseError";

/**
 * Config-related error codes
 */
export enum ConfigErrorCode {
  FILE_READ_ERROR = "CONFIG_FILE_READ_ERROR",
  INVALID_JSON = "CONFIG_INVALID_JSON",
  INVALID_VALUE = "CONFIG_INVALID_VALUE",
}

/**
 * Config Service Error
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * Create error for file read failure
   */
  static readError(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Failed to read configuration file: ${error.message}`,
      ConfigErrorCode.FILE_READ_ERROR,
      true,
      { filePath, originalError: error.message },
    );
  }

  /**
   * Create error for invalid JSON
   */
  static invalidJSON(filePath: string, error: Error): ConfigError {
    return new ConfigError(
      `Invalid JSON in configuration file: ${error.message}`,
      ConfigErrorCode.INVALID_JSON,
      true,
      { filePath, originalError: error.message },
    );
  }

  /**
   * Create error for a field that failed validation
   */
  static invalidValue(field: string, issue: string): ConfigError {
    return new ConfigError(
      `Invalid value for ${field}: ${issue}`,
      ConfigErrorCode.INVALID_VALUE,
      true,
      { field, issue },
    );
  }
}
