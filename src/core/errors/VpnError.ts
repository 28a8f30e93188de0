import { BaseError } from "./BaseError";

/**
 * VPN error codes
 */
export enum VpnErrorCode {
  PROFILE_NOT_FOUND = "VPN_PROFILE_NOT_FOUND",
  INVALID_PROFILE_PATH = "VPN_INVALID_PROFILE_PATH",
  UNKNOWN_PROFILE = "VPN_UNKNOWN_PROFILE",
  LAUNCH_FAILED = "VPN_LAUNCH_FAILED",
}

/**
 * VPN controller errors
 */
export class VpnError extends BaseError {
  constructor(
    message: string,
    public readonly code: VpnErrorCode,
    recoverable: boolean = true,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * The profile's config file does not exist
   */
  static profileNotFound(configPath: string): VpnError {
    return new VpnError(
      `VPN config file not found: ${configPath}`,
      VpnErrorCode.PROFILE_NOT_FOUND,
      true,
      { configPath },
    );
  }

  /**
   * The profile's file resolves outside the profile directory
   */
  static invalidProfilePath(file: string, directory: string): VpnError {
    return new VpnError(
      `VPN config "${file}" is outside ${directory}`,
      VpnErrorCode.INVALID_PROFILE_PATH,
      true,
      { file, directory },
    );
  }

  /**
   * No profile with this display name in the configuration
   */
  static unknownProfile(displayName: string): VpnError {
    return new VpnError(
      `No VPN profile named "${displayName}"`,
      VpnErrorCode.UNKNOWN_PROFILE,
      true,
      { displayName },
    );
  }

  static launchFailed(profileName: string, error: Error): VpnError {
    return new VpnError(
      `Failed to start VPN "${profileName}": ${error.message}`,
      VpnErrorCode.LAUNCH_FAILED,
      true,
      { profileName, originalError: error.message },
    );
  }
}
