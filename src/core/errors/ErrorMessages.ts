/**
 * Centralized error messages for all error classes.
 *
 * NOTE: This file uses string literals for error codes to avoid circular
 * dependencies with the error class files. The error codes match the enum
 * values defined in each error class.
 *
 * @example
 * ```typescript
 * import { getUserMessage } from '@errors/ErrorMessages';
 *
 * const message = getUserMessage("VPN_PROFILE_NOT_FOUND");
 * // Returns: "VPN profile file is missing."
 * ```
 */

/**
 * External tool user messages
 */
export const TOOL_ERROR_MESSAGES: Record<string, string> = {
  TOOL_UNAVAILABLE: "A required system tool is not installed.",
  TOOL_TIMEOUT: "A system tool did not respond in time.",
  TOOL_FAILED: "A system command failed.",
  TOOL_ELEVATION_DENIED: "Passwordless sudo is not configured.",
  TOOL_ABORTED: "Command cancelled during shutdown.",
};

/**
 * WiFi error user messages
 */
export const WIFI_ERROR_MESSAGES: Record<string, string> = {
  WIFI_PARSE_ERROR: "Could not read Wi-Fi status.",
  WIFI_BACKENDS_UNAVAILABLE: "Wi-Fi tools not found. Wi-Fi is unavailable.",
  WIFI_NETWORK_NOT_SAVED: "This network is not saved.",
  WIFI_CONNECTION_FAILED: "Failed to connect to the network.",
  WIFI_DISCONNECT_FAILED: "Failed to disconnect from the network.",
};

/**
 * VPN error user messages
 */
export const VPN_ERROR_MESSAGES: Record<string, string> = {
  VPN_PROFILE_NOT_FOUND: "VPN profile file is missing.",
  VPN_INVALID_PROFILE_PATH: "VPN profile file is not in the profile folder.",
  VPN_UNKNOWN_PROFILE: "Unknown VPN profile.",
  VPN_LAUNCH_FAILED: "Failed to start VPN.",
};

/**
 * Geolocation error user messages
 */
export const GEO_ERROR_MESSAGES: Record<string, string> = {
  GEO_NETWORK_UNREACHABLE: "Location service unreachable.",
  GEO_LOOKUP_FAILED: "Location lookup failed.",
  GEO_PARSE_ERROR: "Location service sent an unexpected reply.",
};

/**
 * RaspAP client count error user messages
 */
export const CLIENTS_ERROR_MESSAGES: Record<string, string> = {
  CLIENTS_NETWORK_UNREACHABLE: "RaspAP API unreachable.",
  CLIENTS_REQUEST_FAILED: "RaspAP API request failed.",
  CLIENTS_PARSE_ERROR: "RaspAP API sent an unexpected reply.",
};

/**
 * Config error user messages
 */
export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_FILE_READ_ERROR: "Could not read config.json. Using defaults.",
  CONFIG_INVALID_JSON: "config.json is not valid JSON. Using defaults.",
  CONFIG_INVALID_VALUE: "config.json has an invalid value. Using defaults.",
};

/**
 * Combined mapping of all error codes to their user messages.
 */
export const ERROR_MESSAGES: Record<string, string> = {
  ...TOOL_ERROR_MESSAGES,
  ...WIFI_ERROR_MESSAGES,
  ...VPN_ERROR_MESSAGES,
  ...GEO_ERROR_MESSAGES,
  ...CLIENTS_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
};

/**
 * Default fallback messages by error category (prefix before the first underscore).
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  TOOL: "System command error.",
  WIFI: "Wi-Fi error occurred.",
  VPN: "VPN error occurred.",
  GEO: "Location unavailable.",
  CLIENTS: "Connected client count unavailable.",
  CONFIG: "Configuration error. Using default settings.",
};

/**
 * Get the user-friendly message for an error code.
 *
 * @example
 * ```typescript
 * getUserMessage("WIFI_SOMETHING_NEW")
 * // Returns: "Wi-Fi error occurred."
 * ```
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return "An error occurred.";
}
