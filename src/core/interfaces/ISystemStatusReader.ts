import { InterfaceRoles, SystemStatus } from "@core/types";

/**
 * Host status reader (hostapd, addresses, temperature, uptime)
 */
export interface ISystemStatusReader {
  read(roles: InterfaceRoles): Promise<SystemStatus>;
}

/**
 * Access point client counter (RaspAP API)
 */
export interface IClientCountService {
  /**
   * Number of stations on the AP interface; 0 when unknown
   */
  getClientCount(apIface: string): Promise<number>;
}
