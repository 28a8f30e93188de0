import * as fs from "fs/promises";
import * as os from "os";
import {
  IClientCountService,
  IProcessRunner,
  ISystemStatusReader,
} from "@core/interfaces";
import { InterfaceRoles, SystemStatus } from "@core/types";
import { HOSTAPD_SERVICE_NAME, THERMAL_ZONE_PATH } from "@core/constants";
import { ipAddrOutputSchema } from "@core/validation/schemas";
import { getLogger } from "@utils/logger";

const logger = getLogger("SystemStatusReader");

/**
 * Reads the host facts shown beside the network state: hostapd status,
 * interface addresses, CPU temperature, uptime and AP client count.
 * Every field degrades to null/false/0 on its own.
 */
export class SystemStatusReader implements ISystemStatusReader {
  constructor(
    private readonly runner: IProcessRunner,
    private readonly clientCount: IClientCountService,
    private readonly thermalPath: string = THERMAL_ZONE_PATH,
  ) {}

  async read(roles: InterfaceRoles): Promise<SystemStatus> {
    const [apActive, apIpAddress, clientIpAddress, cpuTempC, uptime, clients] =
      await Promise.all([
        this.isHostapdActive(),
        this.readIpv4Address(roles.apIface),
        this.readIpv4Address(roles.clientIface),
        this.readCpuTemperature(),
        this.readUptime(),
        this.clientCount.getClientCount(roles.apIface),
      ]);

    return {
      hostname: os.hostname() || null,
      uptime,
      cpuTempC,
      apActive,
      apSsid: roles.apSsid,
      apIpAddress,
      clientIpAddress,
      clientOnline: clientIpAddress !== null,
      connectedClients: clients,
    };
  }

  private async isHostapdActive(): Promise<boolean> {
    // systemctl is-active exits 3 for an inactive unit
    const result = await this.runner.run(
      "systemctl",
      ["is-active", HOSTAPD_SERVICE_NAME],
      { okExitCodes: [0, 3] },
    );
    return result.success && result.data.stdout.trim() === "active";
  }

  /**
   * First IPv4 address of an interface, from `ip -j -4 addr show`
   */
  private async readIpv4Address(iface: string): Promise<string | null> {
    const result = await this.runner.run("ip", [
      "-j",
      "-4",
      "addr",
      "show",
      iface,
    ]);
    if (!result.success) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(result.data.stdout || "[]");
    } catch (error) {
      logger.debug(`Unparseable ip output for ${iface}:`, error);
      return null;
    }

    const parsed = ipAddrOutputSchema.safeParse(json);
    if (!parsed.success) {
      return null;
    }
    for (const link of parsed.data) {
      const address = link.addr_info.find((info) => info.local)?.local;
      if (address) {
        return address;
      }
    }
    return null;
  }

  private async readCpuTemperature(): Promise<number | null> {
    try {
      const raw = await fs.readFile(this.thermalPath, "utf8");
      const milli = parseInt(raw.trim(), 10);
      return Number.isNaN(milli) ? null : Math.round(milli / 100) / 10;
    } catch {
      return null;
    }
  }

  private async readUptime(): Promise<string | null> {
    const result = await this.runner.run("uptime", ["-p"]);
    if (!result.success) {
      return null;
    }
    const text = result.data.stdout.trim().replace(/^up\s+/, "");
    return text || null;
  }
}
