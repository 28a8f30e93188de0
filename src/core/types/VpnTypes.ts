/**
 * VPN profile from configuration
 */
export type VpnProfile = {
  displayName: string;
  /** openvpn config file name, relative to the profile directory */
  file: string;
};

/**
 * VPN lifecycle states
 */
export enum VpnStatus {
  DISCONNECTED = "DISCONNECTED",
  CONNECTING = "CONNECTING",
  CONNECTED = "CONNECTED",
  DISCONNECTING = "DISCONNECTING",
}

/**
 * VPN controller state.
 * A CONNECTED state with a null profile is an openvpn process that was
 * already running and was not started by the controller.
 */
export type VpnState =
  | { status: VpnStatus.DISCONNECTED }
  | { status: VpnStatus.CONNECTING; profile: VpnProfile; since: number }
  | { status: VpnStatus.CONNECTED; profile: VpnProfile | null }
  | { status: VpnStatus.DISCONNECTING };
