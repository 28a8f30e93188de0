import { InterfaceRoles, WifiState } from "./NetworkTypes";
import { VpnState } from "./VpnTypes";
import { GeoLocation } from "./GeolocationTypes";
import { SystemStatus } from "./SystemTypes";

/**
 * Features that can be missing on a host
 */
export type FeatureAvailability = {
  /** At least one Wi-Fi backend is installed */
  wifi: boolean;
};

/**
 * Composite state published to the presentation layer.
 * Snapshots are frozen and replaced wholesale.
 */
export type StatusSnapshot = {
  /** Increases by one with every publish */
  sequence: number;
  roles: InterfaceRoles;
  wifi: WifiState;
  vpn: VpnState;
  system: SystemStatus;
  geolocation: GeoLocation | null;
  features: FeatureAvailability;
  updatedAt: Date;
};

export type SnapshotListener = (
  snapshot: StatusSnapshot,
  previous: StatusSnapshot | null,
) => void;
