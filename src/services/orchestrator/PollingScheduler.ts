import {
  IConfigService,
  IGeolocationRefresher,
  IInterfaceResolver,
  IProcessRunner,
  IStatusOrchestrator,
  ISystemStatusReader,
  IVpnController,
  IWiFiConnectionManager,
  IWiFiStateReader,
} from "@core/interfaces";
import {
  Result,
  RefreshReason,
  SnapshotListener,
  StatusSnapshot,
  VpnState,
  VpnStatus,
  WifiBackendSet,
  WifiState,
  failure,
} from "@core/types";
import { VpnError, WiFiError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { RefreshQueue } from "./RefreshQueue";
import { StateStore } from "./StateStore";

const logger = getLogger("PollingScheduler");

/**
 * Identity of the outward connectivity. A change of it moves the public
 * IP address, so it triggers a geolocation refresh.
 */
export function connectivitySignature(wifi: WifiState, vpn: VpnState): string {
  const profile =
    vpn.status === VpnStatus.CONNECTING || vpn.status === VpnStatus.CONNECTED
      ? (vpn.profile?.displayName ?? null)
      : null;
  return JSON.stringify([
    wifi.connectedSsid !== null,
    wifi.connectedSsid,
    vpn.status,
    profile,
  ]);
}

export type PollingSchedulerDependencies = {
  resolver: IInterfaceResolver;
  wifiReader: IWiFiStateReader;
  wifiConnections: IWiFiConnectionManager;
  vpn: IVpnController;
  geolocation: IGeolocationRefresher;
  system: ISystemStatusReader;
  config: IConfigService;
  runner: IProcessRunner;
};

/**
 * Polling Scheduler
 *
 * Drives the status poll and the geolocation triggers, and is the only
 * writer of published snapshots. Ticks never overlap.
 */
export class PollingScheduler implements IStatusOrchestrator {
  private readonly queue = new RefreshQueue();
  private running: boolean = false;
  private startupFired: boolean = false;
  private backends: WifiBackendSet = { nmcli: false, wpaCli: false };
  private lastSignature: string | null = null;
  private updateTimer: NodeJS.Timeout | null = null;
  private geoipTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly deps: PollingSchedulerDependencies,
    private readonly store: StateStore = new StateStore(),
    private readonly now: () => number = Date.now,
  ) {
    this.queue.setRefreshHandler(() => this.tick());
  }

  async start(): Promise<void> {
    if (this.running) {
      logger.warn("Scheduler already running");
      return;
    }

    // Commands were refused since the last stop()
    this.deps.runner.reset();
    this.backends = await this.deps.wifiReader.initialize();
    if (!this.backends.nmcli && !this.backends.wpaCli) {
      logger.warn("No Wi-Fi backend found, Wi-Fi features disabled");
    }

    const updateIntervalMs = this.deps.config.getUpdateIntervalMs();
    const geoipIntervalMs = this.deps.config.getGeoipIntervalMs();
    logger.info(
      `Starting scheduler (poll every ${updateIntervalMs}ms, geolocation every ${geoipIntervalMs}ms)`,
    );

    this.running = true;
    this.queue.open();

    this.updateTimer = setInterval(() => {
      this.requestRefresh();
    }, updateIntervalMs);
    this.geoipTimer = setInterval(() => {
      void this.refreshGeolocation(RefreshReason.PERIODIC);
    }, geoipIntervalMs);

    if (!this.startupFired) {
      this.startupFired = true;
      void this.refreshGeolocation(RefreshReason.STARTUP);
    }

    this.requestRefresh();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    logger.info("Stopping scheduler");

    this.running = false;
    if (this.updateTimer) {
      clearInterval(this.updateTimer);
      this.updateTimer = null;
    }
    if (this.geoipTimer) {
      clearInterval(this.geoipTimer);
      this.geoipTimer = null;
    }

    this.queue.close();
    this.deps.runner.abortAll();
    await this.queue.whenIdle();
  }

  requestRefresh(): void {
    if (this.running) {
      this.queue.request();
    }
  }

  getSnapshot(): StatusSnapshot | null {
    return this.store.getSnapshot();
  }

  subscribe(listener: SnapshotListener): () => void {
    return this.store.subscribe(listener);
  }

  async connectVpn(displayName: string): Promise<Result<VpnState, VpnError>> {
    const profile = this.deps.config.findVpnProfile(displayName);
    if (!profile) {
      logger.warn(`Unknown VPN profile "${displayName}"`);
      return failure(VpnError.unknownProfile(displayName));
    }

    const result = await this.deps.vpn.connect(profile);
    this.requestRefresh();
    return result;
  }

  async disconnectVpn(): Promise<VpnState> {
    const roles = await this.deps.resolver.resolve();
    const state = await this.deps.vpn.disconnect(roles.clientIface);
    this.requestRefresh();
    return state;
  }

  async connectWifi(ssid: string): Promise<Result<void, WiFiError>> {
    const roles = await this.deps.resolver.resolve();
    const result = await this.deps.wifiConnections.connect(roles, ssid);
    this.requestRefresh();
    return result;
  }

  async disconnectWifi(): Promise<Result<void, WiFiError>> {
    const roles = await this.deps.resolver.resolve();
    const result = await this.deps.wifiConnections.disconnect(roles);
    this.requestRefresh();
    return result;
  }

  private async tick(): Promise<void> {
    const roles = await this.deps.resolver.resolve();
    const [wifi, vpn, system] = await Promise.all([
      this.deps.wifiReader.read(roles),
      this.deps.vpn.probe(),
      this.deps.system.read(roles),
    ]);

    // Results read after stop() come from aborted commands
    if (!this.running) {
      return;
    }

    const signature = connectivitySignature(wifi, vpn);
    if (this.lastSignature !== null && signature !== this.lastSignature) {
      logger.info(`Connectivity changed: ${signature}`);
      void this.refreshGeolocation(RefreshReason.STATE_CHANGE);
    }
    this.lastSignature = signature;

    this.store.publish({
      roles,
      wifi,
      vpn,
      system,
      geolocation: this.deps.geolocation.getCurrent(),
      features: { wifi: this.backends.nmcli || this.backends.wpaCli },
    });
  }

  private async refreshGeolocation(reason: RefreshReason): Promise<void> {
    try {
      const location = await this.deps.geolocation.maybeRefresh(
        { reason },
        this.now(),
      );
      if (location) {
        this.requestRefresh();
      }
    } catch (error) {
      logger.error(`Geolocation refresh (${reason}) failed:`, error);
    }
  }
}
