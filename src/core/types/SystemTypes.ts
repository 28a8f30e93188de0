/**
 * Host status shown next to the network state
 */
export type SystemStatus = {
  hostname: string | null;
  /** Human readable uptime, e.g. "2 hours, 5 minutes" */
  uptime: string | null;
  cpuTempC: number | null;
  /** hostapd service active */
  apActive: boolean;
  apSsid: string | null;
  apIpAddress: string | null;
  clientIpAddress: string | null;
  /** Client radio has an IPv4 address */
  clientOnline: boolean;
  /** Stations associated with the access point (RaspAP API) */
  connectedClients: number;
};
