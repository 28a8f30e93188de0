import { IProcessRunner } from "@core/interfaces";
import {
  Result,
  BackendScan,
  ScanObservation,
  WifiBackend,
  success,
  failure,
} from "@core/types";
import { ProcessError, ProcessErrorCode, WiFiError } from "@core/errors";
import { NMCLI_CONNECT_TIMEOUT_MS } from "@core/constants";
import { getLogger } from "@utils/logger";
import { securityFromNmcli } from "./ScanMerger";

const logger = getLogger("NmcliBackend");

const WIFI_CONNECTION_TYPES = new Set(["802-11-wireless", "wifi"]);

/**
 * Split a line of nmcli terse output (-t) into fields.
 * Fields are separated by ':'; literal ':' and '\' are escaped with '\'.
 */
export function splitTerseLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === "\\" && i + 1 < line.length) {
      current += line[i + 1];
      i++;
    } else if (ch === ":") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function outputLines(stdout: string): string[] {
  return stdout.split("\n").filter((line) => line.trim() !== "");
}

/**
 * NetworkManager backend.
 * Uses nmcli to list Wi-Fi profiles, scan and (dis)connect.
 */
export class NmcliBackend {
  constructor(private readonly runner: IProcessRunner) {}

  /**
   * SSIDs of the saved Wi-Fi connection profiles
   */
  async listSavedSsids(): Promise<Result<string[], ProcessError>> {
    const listResult = await this.runner.run("nmcli", [
      "-t",
      "-f",
      "NAME,TYPE",
      "connection",
      "show",
    ]);
    if (!listResult.success) {
      return listResult;
    }

    const profileNames: string[] = [];
    for (const line of outputLines(listResult.data.stdout)) {
      const [name, type] = splitTerseLine(line);
      if (name && type !== undefined && WIFI_CONNECTION_TYPES.has(type)) {
        profileNames.push(name);
      }
    }

    const ssids: string[] = [];
    for (const name of profileNames) {
      const ssidResult = await this.runner.run("nmcli", [
        "-s",
        "-g",
        "802-11-wireless.ssid",
        "connection",
        "show",
        name,
      ]);
      if (!ssidResult.success) {
        if (ssidResult.error.code === ProcessErrorCode.ABORTED) {
          return ssidResult;
        }
        logger.debug(
          `No SSID for profile "${name}": ${ssidResult.error.message}`,
        );
        continue;
      }
      // The profile name is the SSID unless the profile says otherwise
      const ssid = splitTerseLine(ssidResult.data.stdout.trim()).join(":");
      ssids.push(ssid || name);
    }

    return success(ssids);
  }

  /**
   * Rescan and list visible networks on an interface
   */
  async scan(
    iface: string,
  ): Promise<Result<BackendScan, ProcessError | WiFiError>> {
    const rescan = await this.runner.run(
      "nmcli",
      ["device", "wifi", "rescan", "ifname", iface],
      { elevated: true },
    );
    if (!rescan.success) {
      if (
        rescan.error.code === ProcessErrorCode.UNAVAILABLE ||
        rescan.error.code === ProcessErrorCode.ABORTED
      ) {
        return rescan;
      }
      // NetworkManager refuses a rescan while one is running; the list is still usable
      logger.debug(`Rescan on ${iface} refused: ${rescan.error.message}`);
    }

    const listResult = await this.runner.run("nmcli", [
      "-t",
      "-f",
      "ACTIVE,SSID,SIGNAL,SECURITY",
      "device",
      "wifi",
      "list",
      "ifname",
      iface,
    ]);
    if (!listResult.success) {
      return listResult;
    }

    return this.parseWifiList(listResult.data.stdout);
  }

  async connect(
    iface: string,
    ssid: string,
  ): Promise<Result<void, ProcessError>> {
    const result = await this.runner.run(
      "nmcli",
      ["device", "wifi", "connect", ssid, "ifname", iface],
      { elevated: true, timeoutMs: NMCLI_CONNECT_TIMEOUT_MS },
    );
    return result.success ? success(undefined) : result;
  }

  async disconnect(iface: string): Promise<Result<void, ProcessError>> {
    const result = await this.runner.run(
      "nmcli",
      ["device", "disconnect", iface],
      { elevated: true },
    );
    return result.success ? success(undefined) : result;
  }

  private parseWifiList(stdout: string): Result<BackendScan, WiFiError> {
    const networks: ScanObservation[] = [];
    let activeSsid: string | null = null;
    let malformed = 0;
    const lines = outputLines(stdout);

    for (const line of lines) {
      const fields = splitTerseLine(line);
      if (fields.length !== 4) {
        malformed++;
        continue;
      }
      const [active, ssid, signal, security] = fields;
      // Hidden networks have no SSID
      if (!ssid) continue;

      const parsedSignal = parseInt(signal, 10);
      networks.push({
        ssid,
        signal: Number.isNaN(parsedSignal)
          ? 0
          : Math.max(0, Math.min(100, parsedSignal)),
        security: securityFromNmcli(security),
      });
      if (active === "yes" && activeSsid === null) {
        activeSsid = ssid;
      }
    }

    if (malformed > 0 && malformed === lines.length) {
      return failure(
        WiFiError.parseError("nmcli", `unrecognised line "${lines[0]}"`),
      );
    }

    return success({ backend: WifiBackend.NMCLI, networks, activeSsid });
  }
}
