import { IWiFiConnectionManager, IProcessRunner } from "@core/interfaces";
import { Result, InterfaceRoles, success, failure } from "@core/types";
import { WiFiError } from "@core/errors";
import { KeyedOperationLock } from "@utils/operationLock";
import { getLogger } from "@utils/logger";
import { NmcliBackend } from "./NmcliBackend";
import { WpaCliBackend } from "./WpaCliBackend";
import { WiFiStateReader } from "./WiFiStateReader";

const logger = getLogger("WiFiConnectionManager");

/**
 * Connects the client radio to saved networks and disconnects it.
 * Shares the per-interface lock with the state reader so a connect never
 * runs during a scan of the same radio.
 */
export class WiFiConnectionManager implements IWiFiConnectionManager {
  constructor(
    private readonly reader: WiFiStateReader,
    private readonly nmcli: NmcliBackend,
    private readonly wpaCli: WpaCliBackend,
    private readonly runner: IProcessRunner,
    private readonly interfaceLocks: KeyedOperationLock,
  ) {}

  async connect(
    roles: InterfaceRoles,
    ssid: string,
  ): Promise<Result<void, WiFiError>> {
    const backends = this.reader.getBackends();
    if (!backends.nmcli && !backends.wpaCli) {
      return failure(WiFiError.backendsUnavailable());
    }

    const iface = roles.clientIface;
    return this.interfaceLocks.runExclusive(iface, async () => {
      logger.info(`Connecting ${iface} to "${ssid}"`);

      if (backends.wpaCli) {
        const networks = await this.wpaCli.listNetworks(iface);
        const network = networks.success
          ? networks.data.find((candidate) => candidate.ssid === ssid)
          : undefined;
        if (network) {
          const result = await this.wpaCli.connect(iface, network.id);
          if (!result.success) {
            logger.error(`wpa_cli connect failed: ${result.error.message}`);
            return failure(WiFiError.connectionFailed(ssid, result.error));
          }
          logger.info(`Selected network ${network.id} ("${ssid}")`);
          return success(undefined);
        }
      }

      if (backends.nmcli) {
        const profiles = await this.nmcli.listSavedSsids();
        if (profiles.success && profiles.data.includes(ssid)) {
          const result = await this.nmcli.connect(iface, ssid);
          if (!result.success) {
            logger.error(`nmcli connect failed: ${result.error.message}`);
            return failure(WiFiError.connectionFailed(ssid, result.error));
          }
          logger.info(`Connected to "${ssid}" via NetworkManager`);
          return success(undefined);
        }
      }

      logger.warn(`"${ssid}" is not a saved network`);
      return failure(WiFiError.networkNotSaved(ssid));
    });
  }

  async disconnect(roles: InterfaceRoles): Promise<Result<void, WiFiError>> {
    const backends = this.reader.getBackends();
    if (!backends.nmcli && !backends.wpaCli) {
      return failure(WiFiError.backendsUnavailable());
    }

    const iface = roles.clientIface;
    return this.interfaceLocks.runExclusive(iface, async () => {
      logger.info(`Disconnecting ${iface}`);

      if (backends.nmcli) {
        const result = await this.nmcli.disconnect(iface);
        if (!result.success) {
          return failure(WiFiError.disconnectFailed(iface, result.error));
        }
      } else {
        const networks = await this.wpaCli.listNetworks(iface);
        if (!networks.success) {
          return failure(WiFiError.disconnectFailed(iface, networks.error));
        }
        const ids = networks.data.map((network) => network.id);
        const result = await this.wpaCli.disconnect(iface, ids);
        if (!result.success) {
          return failure(WiFiError.disconnectFailed(iface, result.error));
        }
      }

      const flush = await this.runner.run(
        "ip",
        ["addr", "flush", "dev", iface],
        { elevated: true },
      );
      if (!flush.success) {
        return failure(WiFiError.disconnectFailed(iface, flush.error));
      }
      return success(undefined);
    });
  }
}
