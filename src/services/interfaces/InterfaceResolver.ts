import * as fs from "fs/promises";
import { IInterfaceResolver } from "@core/interfaces";
import { InterfaceRoles } from "@core/types";
import {
  HOSTAPD_DEFAULT_CONF_PATH,
  DEFAULT_AP_IFACE,
  DEFAULT_CLIENT_IFACE,
  KNOWN_WIRELESS_IFACES,
} from "@core/constants";
import { isNodeJSErrnoException } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("InterfaceResolver");

const SECTION_PATTERN = /^\[(.+)\]$/;

/**
 * Values read from hostapd.conf
 */
type HostapdSettings = {
  iface: string | null;
  ssid: string | null;
};

/**
 * Interface Resolver
 *
 * Reads the access point interface from hostapd.conf and derives the client
 * interface from the two-radio convention. Parsed results are cached by the
 * file's modification time.
 */
export class InterfaceResolver implements IInterfaceResolver {
  private cache: { mtimeMs: number; roles: InterfaceRoles } | null = null;

  /**
   * @param confPath hostapd configuration file
   * @param section Only read keys inside this `[section]`; null reads the top level
   */
  constructor(
    private readonly confPath: string = HOSTAPD_DEFAULT_CONF_PATH,
    private readonly section: string | null = null,
  ) {}

  async resolve(): Promise<InterfaceRoles> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(this.confPath)).mtimeMs;
    } catch (error) {
      this.cache = null;
      if (isNodeJSErrnoException(error) && error.code === "ENOENT") {
        logger.debug(`${this.confPath} not found, using default interfaces`);
      } else {
        logger.warn(`Cannot stat ${this.confPath}:`, error);
      }
      return InterfaceResolver.defaultRoles(null);
    }

    if (this.cache && this.cache.mtimeMs === mtimeMs) {
      return this.cache.roles;
    }

    let content: string;
    try {
      content = await fs.readFile(this.confPath, "utf8");
    } catch (error) {
      logger.warn(`Cannot read ${this.confPath}:`, error);
      this.cache = null;
      return InterfaceResolver.defaultRoles(null);
    }

    const settings = this.parse(content);
    const roles = InterfaceResolver.rolesFor(settings);
    logger.info(
      `AP interface ${roles.apIface}, client interface ${roles.clientIface}`,
    );
    this.cache = { mtimeMs, roles };
    return roles;
  }

  /**
   * Pick the first `interface=` and `ssid=` lines in the configured scope
   */
  private parse(content: string): HostapdSettings {
    const settings: HostapdSettings = { iface: null, ssid: null };
    let currentSection: string | null = null;

    for (const rawLine of content.split("\n")) {
      const line = rawLine.trim();
      if (!line || line.startsWith("#")) continue;

      const sectionMatch = SECTION_PATTERN.exec(line);
      if (sectionMatch) {
        currentSection = sectionMatch[1].trim();
        continue;
      }
      if (currentSection !== this.section) continue;

      const separator = line.indexOf("=");
      if (separator < 0) continue;
      const key = line.slice(0, separator).trim();
      const value = line.slice(separator + 1).trim();

      if (key === "interface" && settings.iface === null && value) {
        settings.iface = value;
      } else if (key === "ssid" && settings.ssid === null && value) {
        settings.ssid = value;
      }
    }

    return settings;
  }

  private static rolesFor(settings: HostapdSettings): InterfaceRoles {
    const [first, second] = KNOWN_WIRELESS_IFACES;
    if (settings.iface === first) {
      return { apIface: first, clientIface: second, apSsid: settings.ssid };
    }
    if (settings.iface === second) {
      return { apIface: second, clientIface: first, apSsid: settings.ssid };
    }
    if (settings.iface !== null) {
      logger.warn(
        `Unsupported AP interface "${settings.iface}", using default interfaces`,
      );
    }
    return InterfaceResolver.defaultRoles(settings.ssid);
  }

  private static defaultRoles(apSsid: string | null): InterfaceRoles {
    return {
      apIface: DEFAULT_AP_IFACE,
      clientIface: DEFAULT_CLIENT_IFACE,
      apSsid,
    };
  }
}
