import { Result, AppConfig, VpnProfile } from "@core/types";
import { ConfigError } from "@core/errors";

/**
 * Config Service Interface
 *
 * Loads config.json once. A missing or invalid file yields defaults.
 */
export interface IConfigService {
  /**
   * Load configuration from file.
   * A failure result still leaves the service usable with defaults.
   */
  initialize(): Promise<Result<void, ConfigError>>;

  getConfig(): AppConfig;

  getUpdateIntervalMs(): number;

  getGeoipIntervalMs(): number;

  getVpnProfiles(): VpnProfile[];

  /**
   * Find a VPN profile by display name
   */
  findVpnProfile(displayName: string): VpnProfile | undefined;
}
