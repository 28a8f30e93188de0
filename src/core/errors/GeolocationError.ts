import { BaseError } from "./BaseError";

/**
 * Geolocation and remote API error codes
 */
export enum GeolocationErrorCode {
  NETWORK_UNREACHABLE = "GEO_NETWORK_UNREACHABLE",
  LOOKUP_FAILED = "GEO_LOOKUP_FAILED",
  PARSE_ERROR = "GEO_PARSE_ERROR",
}

export class GeolocationError extends BaseError {
  constructor(
    message: string,
    public readonly code: GeolocationErrorCode,
    context?: Record<string, unknown>,
  ) {
    super(message, code, true, context);
  }

  /**
   * Request never got an HTTP response
   */
  static networkUnreachable(url: string, error?: Error): GeolocationError {
    return new GeolocationError(
      `Request to ${url} failed: ${error?.message ?? "unknown error"}`,
      GeolocationErrorCode.NETWORK_UNREACHABLE,
      { url, originalError: error?.message },
    );
  }

  /**
   * HTTP error or a body with a non-success status
   */
  static lookupFailed(reason: string): GeolocationError {
    return new GeolocationError(
      `Geolocation lookup failed: ${reason}`,
      GeolocationErrorCode.LOOKUP_FAILED,
      { reason },
    );
  }

  static parseError(detail: string): GeolocationError {
    return new GeolocationError(
      `Unexpected geolocation response: ${detail}`,
      GeolocationErrorCode.PARSE_ERROR,
      { detail },
    );
  }
}
