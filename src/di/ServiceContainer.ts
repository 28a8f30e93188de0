import {
  IClientCountService,
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
import { EnvironmentConfig } from "@core/types";
import {
  CONFIG_DEFAULT_PATH,
  HOSTAPD_DEFAULT_CONF_PATH,
  OVPN_DEFAULT_DIRECTORY,
  RASPAP_DEFAULT_BASE_URL,
  WPA_SUPPLICANT_DEFAULT_CONF_PATH,
} from "@core/constants";
import { KeyedOperationLock } from "@utils/operationLock";
import { ConfigService } from "@services/config/ConfigService";
import { ProcessRunner } from "@services/process/ProcessRunner";
import { MockProcessRunner } from "@services/process/MockProcessRunner";
import { InterfaceResolver } from "@services/interfaces/InterfaceResolver";
import { BackendProbe } from "@services/wifi/BackendProbe";
import { NmcliBackend } from "@services/wifi/NmcliBackend";
import { WpaCliBackend } from "@services/wifi/WpaCliBackend";
import { WiFiStateReader } from "@services/wifi/WiFiStateReader";
import { WiFiConnectionManager } from "@services/wifi/WiFiConnectionManager";
import { VpnController } from "@services/vpn/VpnController";
import { GeolocationRefresher } from "@services/geolocation/GeolocationRefresher";
import { ClientCountService } from "@services/clients/ClientCountService";
import { SystemStatusReader } from "@services/system/SystemStatusReader";
import { PollingScheduler } from "@services/orchestrator/PollingScheduler";

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that manages service instances and their dependencies.
 * Provides factory methods for production and test setters for mocking.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private services: {
    config?: IConfigService;
    runner?: IProcessRunner;
    resolver?: IInterfaceResolver;
    wifiReader?: WiFiStateReader;
    wifiConnections?: IWiFiConnectionManager;
    vpn?: IVpnController;
    geolocation?: IGeolocationRefresher;
    clientCount?: IClientCountService;
    system?: ISystemStatusReader;
    orchestrator?: IStatusOrchestrator;
  } = {};

  /**
   * Scans and connection changes on one interface never overlap
   */
  private interfaceLocks = new KeyedOperationLock();

  private nmcli?: NmcliBackend;
  private wpaCli?: WpaCliBackend;

  private constructor() {}

  /**
   * Get singleton instance
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Reset the container (useful for testing)
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.services = {};
      ServiceContainer.instance.interfaceLocks = new KeyedOperationLock();
      ServiceContainer.instance.nmcli = undefined;
      ServiceContainer.instance.wpaCli = undefined;
    }
  }

  // Factory methods for production

  getConfigService(): IConfigService {
    if (!this.services.config) {
      this.services.config = new ConfigService(
        this.getEnvironmentConfig().configPath,
      );
    }
    return this.services.config;
  }

  /**
   * Get Process Runner
   * Uses the scripted demo runner on non-Linux platforms or when USE_MOCK_TOOLS=true
   */
  getProcessRunner(): IProcessRunner {
    if (!this.services.runner) {
      if (
        process.env.USE_MOCK_TOOLS === "true" ||
        process.platform !== "linux"
      ) {
        this.services.runner = MockProcessRunner.withDemoTools();
      } else {
        this.services.runner = new ProcessRunner();
      }
    }
    return this.services.runner;
  }

  getInterfaceResolver(): IInterfaceResolver {
    if (!this.services.resolver) {
      this.services.resolver = new InterfaceResolver(
        this.getEnvironmentConfig().hostapdConfPath,
      );
    }
    return this.services.resolver;
  }

  getWiFiStateReader(): IWiFiStateReader {
    return this.getConcreteWiFiStateReader();
  }

  getWiFiConnectionManager(): IWiFiConnectionManager {
    if (!this.services.wifiConnections) {
      this.services.wifiConnections = new WiFiConnectionManager(
        this.getConcreteWiFiStateReader(),
        this.getNmcliBackend(),
        this.getWpaCliBackend(),
        this.getProcessRunner(),
        this.interfaceLocks,
      );
    }
    return this.services.wifiConnections;
  }

  getVpnController(): IVpnController {
    if (!this.services.vpn) {
      this.services.vpn = new VpnController(
        this.getProcessRunner(),
        this.getEnvironmentConfig().ovpnDirectory,
      );
    }
    return this.services.vpn;
  }

  /**
   * Get Geolocation Refresher
   * Reads the interval from the config service, so initialize that first.
   */
  getGeolocationRefresher(): IGeolocationRefresher {
    if (!this.services.geolocation) {
      this.services.geolocation = new GeolocationRefresher({
        intervalMs: this.getConfigService().getGeoipIntervalMs(),
      });
    }
    return this.services.geolocation;
  }

  getClientCountService(): IClientCountService {
    if (!this.services.clientCount) {
      const env = this.getEnvironmentConfig();
      this.services.clientCount = new ClientCountService(
        env.raspapApiKey,
        env.raspapBaseUrl,
      );
    }
    return this.services.clientCount;
  }

  getSystemStatusReader(): ISystemStatusReader {
    if (!this.services.system) {
      this.services.system = new SystemStatusReader(
        this.getProcessRunner(),
        this.getClientCountService(),
      );
    }
    return this.services.system;
  }

  getStatusOrchestrator(): IStatusOrchestrator {
    if (!this.services.orchestrator) {
      this.services.orchestrator = new PollingScheduler({
        resolver: this.getInterfaceResolver(),
        wifiReader: this.getWiFiStateReader(),
        wifiConnections: this.getWiFiConnectionManager(),
        vpn: this.getVpnController(),
        geolocation: this.getGeolocationRefresher(),
        system: this.getSystemStatusReader(),
        config: this.getConfigService(),
        runner: this.getProcessRunner(),
      });
    }
    return this.services.orchestrator;
  }

  // Configuration helpers

  /**
   * Paths and credentials from the environment (see .env.example)
   */
  getEnvironmentConfig(): EnvironmentConfig {
    return {
      configPath: process.env.CONFIG_PATH || CONFIG_DEFAULT_PATH,
      hostapdConfPath: process.env.HOSTAPD_CONF || HOSTAPD_DEFAULT_CONF_PATH,
      wpaSupplicantConfPath:
        process.env.WPA_SUPPLICANT_CONF || WPA_SUPPLICANT_DEFAULT_CONF_PATH,
      ovpnDirectory: process.env.OVPN_DIR || OVPN_DEFAULT_DIRECTORY,
      raspapApiKey: process.env.RASPAP_API_KEY || null,
      raspapBaseUrl: process.env.RASPAP_API_BASE_URL || RASPAP_DEFAULT_BASE_URL,
    };
  }

  // Setters for testing

  /**
   * Set Config Service (for testing)
   */
  setConfigService(service: IConfigService): void {
    this.services.config = service;
  }

  /**
   * Set Process Runner (for testing)
   */
  setProcessRunner(runner: IProcessRunner): void {
    this.services.runner = runner;
  }

  /**
   * Set Interface Resolver (for testing)
   */
  setInterfaceResolver(resolver: IInterfaceResolver): void {
    this.services.resolver = resolver;
  }

  /**
   * Set Client Count Service (for testing)
   */
  setClientCountService(service: IClientCountService): void {
    this.services.clientCount = service;
  }

  // Private helpers

  private getConcreteWiFiStateReader(): WiFiStateReader {
    if (!this.services.wifiReader) {
      this.services.wifiReader = new WiFiStateReader(
        new BackendProbe(this.getProcessRunner()),
        this.getNmcliBackend(),
        this.getWpaCliBackend(),
        this.interfaceLocks,
      );
    }
    return this.services.wifiReader;
  }

  private getNmcliBackend(): NmcliBackend {
    if (!this.nmcli) {
      this.nmcli = new NmcliBackend(this.getProcessRunner());
    }
    return this.nmcli;
  }

  private getWpaCliBackend(): WpaCliBackend {
    if (!this.wpaCli) {
      this.wpaCli = new WpaCliBackend(
        this.getProcessRunner(),
        this.getEnvironmentConfig().wpaSupplicantConfPath,
      );
    }
    return this.wpaCli;
  }
}
