import { VpnProfile } from "./VpnTypes";

/**
 * Application-wide configuration (from config.json)
 */
export type AppConfig = {
  /** Status poll period in seconds */
  updateInterval: number;

  /** Periodic geolocation refresh in seconds */
  geoipInterval: number;

  /** Screen the presentation layer opens first */
  defaultScreen: string;

  /** VPN profiles in display order */
  vpnProfiles: VpnProfile[];

  /** Colours, passed through to the presentation layer */
  theme: Record<string, string>;

  /** Font sizes, passed through to the presentation layer */
  fonts: Record<string, string>;
};

/**
 * Paths and credentials taken from the environment
 */
export type EnvironmentConfig = {
  configPath: string;
  hostapdConfPath: string;
  wpaSupplicantConfPath: string;
  ovpnDirectory: string;
  raspapApiKey: string | null;
  raspapBaseUrl: string;
};
