import { BaseError } from "./BaseError";

/**
 * WiFi error codes
 */
export enum WiFiErrorCode {
  PARSE_ERROR = "WIFI_PARSE_ERROR",
  BACKENDS_UNAVAILABLE = "WIFI_BACKENDS_UNAVAILABLE",
  NETWORK_NOT_SAVED = "WIFI_NETWORK_NOT_SAVED",
  CONNECTION_FAILED = "WIFI_CONNECTION_FAILED",
  DISCONNECT_FAILED = "WIFI_DISCONNECT_FAILED",
}

/**
 * WiFi reader and connection errors
 */
export class WiFiError extends BaseError {
  constructor(
    message: string,
    public readonly code: WiFiErrorCode,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * Tool output did not have the expected shape
   */
  static parseError(tool: string, detail: string): WiFiError {
    return new WiFiError(
      `Unexpected ${tool} output: ${detail}`,
      WiFiErrorCode.PARSE_ERROR,
      true,
      { tool, detail },
    );
  }

  /**
   * Neither nmcli nor wpa_cli is installed
   */
  static backendsUnavailable(): WiFiError {
    return new WiFiError(
      "No Wi-Fi backend found (nmcli and wpa_cli are both missing)",
      WiFiErrorCode.BACKENDS_UNAVAILABLE,
      false,
    );
  }

  /**
   * Connecting to a network that has no saved profile
   */
  static networkNotSaved(ssid: string): WiFiError {
    return new WiFiError(
      `Network "${ssid}" has no saved profile`,
      WiFiErrorCode.NETWORK_NOT_SAVED,
      true,
      { ssid },
    );
  }

  static connectionFailed(ssid: string, error?: Error): WiFiError {
    const detail = error ? `: ${error.message}` : "";
    return new WiFiError(
      `Failed to connect to "${ssid}"${detail}`,
      WiFiErrorCode.CONNECTION_FAILED,
      true,
      { ssid, originalError: error?.message },
    );
  }

  static disconnectFailed(iface: string, error?: Error): WiFiError {
    const detail = error ? `: ${error.message}` : "";
    return new WiFiError(
      `Failed to disconnect ${iface}${detail}`,
      WiFiErrorCode.DISCONNECT_FAILED,
      true,
      { iface, originalError: error?.message },
    );
  }
}
