import { IWiFiStateReader } from "@core/interfaces";
import {
  BackendScan,
  InterfaceRoles,
  WifiBackendSet,
  WifiState,
} from "@core/types";
import { BaseError, ProcessErrorCode, WiFiError } from "@core/errors";
import { KeyedOperationLock } from "@utils/operationLock";
import { getLogger } from "@utils/logger";
import { BackendProbe } from "./BackendProbe";
import { NmcliBackend } from "./NmcliBackend";
import { WpaCliBackend } from "./WpaCliBackend";
import { mergeScans } from "./ScanMerger";

const logger = getLogger("WiFiStateReader");

/**
 * Wi-Fi State Reader
 *
 * Combines saved profiles and live scans from nmcli and wpa_cli into one
 * list per poll. Backends are chosen once by initialize(). A failing
 * backend contributes nothing to the result; reads of the same interface
 * never overlap.
 */
export class WiFiStateReader implements IWiFiStateReader {
  private backends: WifiBackendSet = { nmcli: false, wpaCli: false };
  /** Sources whose last call failed, to warn once per outage */
  private readonly failingSources = new Set<string>();

  constructor(
    private readonly probe: BackendProbe,
    private readonly nmcli: NmcliBackend,
    private readonly wpaCli: WpaCliBackend,
    private readonly interfaceLocks: KeyedOperationLock = new KeyedOperationLock(),
  ) {}

  async initialize(): Promise<WifiBackendSet> {
    this.backends = await this.probe.probe();
    if (!this.backends.nmcli && !this.backends.wpaCli) {
      logger.error(WiFiError.backendsUnavailable().message);
    }
    return this.getBackends();
  }

  getBackends(): WifiBackendSet {
    return { ...this.backends };
  }

  async read(roles: InterfaceRoles): Promise<WifiState> {
    const backends = this.getBackends();
    if (!backends.nmcli && !backends.wpaCli) {
      return { connectedSsid: null, entries: [], backends };
    }

    return this.interfaceLocks.runExclusive(roles.clientIface, () =>
      this.readInterface(roles.clientIface, backends),
    );
  }

  private async readInterface(
    iface: string,
    backends: WifiBackendSet,
  ): Promise<WifiState> {
    const saved = new Set<string>();
    const scans: BackendScan[] = [];
    let connectedSsid: string | null = null;

    if (backends.wpaCli) {
      const networks = await this.wpaCli.listNetworks(iface);
      if (networks.success) {
        this.noteSuccess("wpa_cli list_networks");
        for (const network of networks.data) saved.add(network.ssid);
      } else {
        this.noteFailure("wpa_cli list_networks", networks.error);
      }
    }
    if (saved.size === 0) {
      for (const ssid of await this.wpaCli.readSavedFromConfig()) {
        saved.add(ssid);
      }
    }

    if (backends.nmcli) {
      const profiles = await this.nmcli.listSavedSsids();
      if (profiles.success) {
        this.noteSuccess("nmcli connection show");
        for (const ssid of profiles.data) saved.add(ssid);
      } else {
        this.noteFailure("nmcli connection show", profiles.error);
      }

      const scan = await this.nmcli.scan(iface);
      if (scan.success) {
        this.noteSuccess("nmcli scan");
        scans.push(scan.data);
        connectedSsid = scan.data.activeSsid;
      } else {
        this.noteFailure("nmcli scan", scan.error);
      }
    }

    if (backends.wpaCli) {
      const scan = await this.wpaCli.scan(iface);
      if (scan.success) {
        this.noteSuccess("wpa_cli scan");
        scans.push(scan.data);
      } else {
        this.noteFailure("wpa_cli scan", scan.error);
      }

      if (connectedSsid === null) {
        const status = await this.wpaCli.status(iface);
        if (status.success) {
          this.noteSuccess("wpa_cli status");
          connectedSsid = status.data;
        } else {
          this.noteFailure("wpa_cli status", status.error);
        }
      }
    }

    const entries = mergeScans(scans, saved, connectedSsid);
    logger.debug(
      `${iface}: ${entries.length} networks, connected to ${connectedSsid ?? "none"}`,
    );
    return { connectedSsid, entries, backends };
  }

  private noteFailure(source: string, error: BaseError): void {
    if (
      error.code === ProcessErrorCode.ABORTED ||
      this.failingSources.has(source)
    ) {
      logger.debug(`${source} failed: ${error.message}`);
      return;
    }
    this.failingSources.add(source);
    logger.warn(`${source} failed: ${error.message}`);
  }

  private noteSuccess(source: string): void {
    if (this.failingSources.delete(source)) {
      logger.info(`${source} recovered`);
    }
  }
}
