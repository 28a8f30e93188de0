/**
 * Which radio hosts the access point and which one connects outward.
 * The two interface names are never equal.
 */
export type InterfaceRoles = {
  apIface: string;
  clientIface: string;
  /** SSID broadcast by the access point, from the same hostapd file */
  apSsid: string | null;
};

/**
 * Wi-Fi tool that can report scans and associations
 */
export enum WifiBackend {
  /** NetworkManager CLI */
  NMCLI = "nmcli",
  /** wpa_supplicant CLI */
  WPA_CLI = "wpa_cli",
}

/**
 * Backends found on this host, probed once at startup
 */
export type WifiBackendSet = {
  nmcli: boolean;
  wpaCli: boolean;
};

/**
 * Security label shown next to a network
 */
export type WifiSecurity = "Open" | "WEP" | "WPA" | "WPA2" | "WPA3" | "Unknown";

/**
 * A single network seen by one backend's scan
 */
export type ScanObservation = {
  ssid: string;
  signal: number; // 0-100
  security: WifiSecurity;
};

/**
 * One backend's view of the client radio
 */
export type BackendScan = {
  backend: WifiBackend;
  networks: ScanObservation[];
  /** SSID the backend reports as associated, if any */
  activeSsid: string | null;
};

/**
 * Merged scan/saved-profile row
 */
export type ScanEntry = {
  ssid: string;
  signal: number; // 0-100, 0 when not in range
  saved: boolean;
  inRange: boolean;
  /** "Unknown" for saved networks that are not in range */
  security: WifiSecurity;
  /** True for the network the client radio is associated with */
  current: boolean;
};

/**
 * Complete Wi-Fi view produced by one poll
 */
export type WifiState = {
  connectedSsid: string | null;
  entries: ScanEntry[];
  backends: WifiBackendSet;
};
