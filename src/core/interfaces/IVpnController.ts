import { Result, VpnProfile, VpnState } from "@core/types";
import { VpnError } from "@core/errors";

/**
 * VPN Controller Interface
 *
 * Owns the VPN state. connect/disconnect are the only ways to change it
 * from outside; probe() reconciles it with the process table.
 */
export interface IVpnController {
  getState(): VpnState;

  /**
   * Start the VPN client for a profile.
   * Returns the current state unchanged when already CONNECTING/CONNECTED.
   */
  connect(profile: VpnProfile): Promise<Result<VpnState, VpnError>>;

  /**
   * Stop every VPN client process and clear the routes left on the
   * client interface. Always ends DISCONNECTED.
   */
  disconnect(clientIface: string): Promise<VpnState>;

  /**
   * Check whether the VPN process is alive and update the state
   */
  probe(): Promise<VpnState>;

  /**
   * Register a callback for state changes
   * @returns Unsubscribe function
   */
  onStateChange(
    callback: (state: VpnState, previousState: VpnState) => void,
  ): () => void;
}
