import { BaseError } from "./BaseError";

/**
 * RaspAP client count error codes
 */
export enum ClientCountErrorCode {
  NETWORK_UNREACHABLE = "CLIENTS_NETWORK_UNREACHABLE",
  REQUEST_FAILED = "CLIENTS_REQUEST_FAILED",
  PARSE_ERROR = "CLIENTS_PARSE_ERROR",
}

export class ClientCountError extends BaseError {
  constructor(
    message: string,
    public readonly code: ClientCountErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  /**
   * The RaspAP API did not answer
   */
  static networkUnreachable(url: string, error?: Error): ClientCountError {
    return new ClientCountError(
      `Request to ${url} failed: ${error?.message ?? "unknown error"}`,
      ClientCountErrorCode.NETWORK_UNREACHABLE,
      { url, originalError: error?.message },
    );
  }

  static requestFailed(status: number, statusText: string): ClientCountError {
    return new ClientCountError(
      `RaspAP replied HTTP ${status}: ${statusText}`,
      ClientCountErrorCode.REQUEST_FAILED,
      { status },
    );
  }

  static parseError(detail: string): ClientCountError {
    return new ClientCountError(
      `Unexpected RaspAP response: ${detail}`,
      ClientCountErrorCode.PARSE_ERROR,
      { detail },
    );
  }
}
