import { Result, InterfaceRoles, WifiState, WifiBackendSet } from "@core/types";
import { WiFiError } from "@core/errors";

/**
 * Wi-Fi State Reader Interface
 *
 * Reconciles saved profiles and live scans from nmcli and wpa_cli.
 */
export interface IWiFiStateReader {
  /**
   * Probe the installed backends. Called once at startup.
   */
  initialize(): Promise<WifiBackendSet>;

  /**
   * Backends chosen at startup
   */
  getBackends(): WifiBackendSet;

  /**
   * Read the merged Wi-Fi state of the client interface.
   * Never rejects; a failing backend contributes nothing.
   */
  read(roles: InterfaceRoles): Promise<WifiState>;
}

/**
 * Wi-Fi connection actions on saved networks
 */
export interface IWiFiConnectionManager {
  /**
   * Associate the client interface with a saved network
   */
  connect(roles: InterfaceRoles, ssid: string): Promise<Result<void, WiFiError>>;

  /**
   * Drop the client association and flush its addresses
   */
  disconnect(roles: InterfaceRoles): Promise<Result<void, WiFiError>>;
}
