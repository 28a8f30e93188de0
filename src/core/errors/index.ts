/**
 * Core error classes
 *
 * All custom errors extend BaseError and include an error code, timestamp,
 * context data, a recoverable flag and a user-facing message looked up in
 * ErrorMessages.ts.
 */

export * from "./BaseError";
export * from "./ProcessError";
export * from "./WiFiError";
export * from "./VpnError";
export * from "./GeolocationError";
export * from "./ClientCountError";
export * from "./ConfigError";
export * from "./ErrorMessages";
