import * as fs from "fs/promises";
import { IProcessRunner } from "@core/interfaces";
import {
  Result,
  BackendScan,
  CommandOutput,
  ScanObservation,
  WifiBackend,
  success,
  failure,
} from "@core/types";
import { ProcessError, ProcessErrorCode, WiFiError } from "@core/errors";
import {
  WPA_SUPPLICANT_DEFAULT_CONF_PATH,
  WPA_SCAN_RESULT_ATTEMPTS,
  WPA_SCAN_RESULT_DELAY_MS,
  WPA_FALLBACK_LEVEL_DBM,
} from "@core/constants";
import { getLogger } from "@utils/logger";
import { dbmToPercent, securityFromWpaFlags } from "./ScanMerger";

const logger = getLogger("WpaCliBackend");

const NETWORK_BLOCK_PATTERN = /network\s*=\s*\{([^}]*)\}/g;
const QUOTED_SSID_PATTERN = /^\s*ssid\s*=\s*"(.*)"\s*$/m;
const HEX_SSID_PATTERN = /^\s*ssid\s*=\s*([0-9a-fA-F]+)\s*$/m;

/**
 * A network block known to wpa_supplicant
 */
export type WpaNetwork = {
  id: string;
  ssid: string;
  current: boolean;
};

export type WpaCliBackendOptions = {
  /** scan_results reads after a scan request */
  resultAttempts?: number;
  /** Wait before each scan_results read (ms) */
  resultDelayMs?: number;
};

/**
 * Rows of wpa_cli tabular output, without the column header
 */
function dataRows(stdout: string, headerPrefix: string): string[][] {
  return stdout
    .split("\n")
    .map((line) => line.replace(/\r$/, ""))
    .filter(
      (line) =>
        line.trim() !== "" &&
        !line.startsWith(headerPrefix) &&
        !line.startsWith("Selected interface"),
    )
    .map((line) => line.split("\t"));
}

/**
 * wpa_supplicant backend.
 * Talks to wpa_supplicant through wpa_cli on a given interface.
 */
export class WpaCliBackend {
  private readonly resultAttempts: number;
  private readonly resultDelayMs: number;

  constructor(
    private readonly runner: IProcessRunner,
    private readonly supplicantConfPath: string = WPA_SUPPLICANT_DEFAULT_CONF_PATH,
    options: WpaCliBackendOptions = {},
  ) {
    this.resultAttempts = options.resultAttempts ?? WPA_SCAN_RESULT_ATTEMPTS;
    this.resultDelayMs = options.resultDelayMs ?? WPA_SCAN_RESULT_DELAY_MS;
  }

  /**
   * Configured networks (`list_networks`)
   */
  async listNetworks(
    iface: string,
  ): Promise<Result<WpaNetwork[], ProcessError>> {
    const result = await this.wpaCli(iface, ["list_networks"]);
    if (!result.success) {
      return result;
    }

    const networks: WpaNetwork[] = [];
    const rows = dataRows(result.data.stdout, "network id");
    for (const [id, ssid, , flags] of rows) {
      if (!/^\d+$/.test(id) || !ssid) continue;
      networks.push({
        id,
        ssid,
        current: (flags ?? "").includes("[CURRENT]"),
      });
    }
    return success(networks);
  }

  /**
   * SSIDs of the network blocks in wpa_supplicant.conf.
   * Used when wpa_cli cannot be queried; an unreadable file yields [].
   */
  async readSavedFromConfig(): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(this.supplicantConfPath, "utf8");
    } catch (error) {
      logger.debug(`Cannot read ${this.supplicantConfPath}:`, error);
      return [];
    }

    const ssids = new Set<string>();
    for (const match of content.matchAll(NETWORK_BLOCK_PATTERN)) {
      const block = match[1];
      const quoted = QUOTED_SSID_PATTERN.exec(block);
      if (quoted && quoted[1]) {
        ssids.add(quoted[1]);
        continue;
      }
      const hex = HEX_SSID_PATTERN.exec(block);
      if (hex) {
        ssids.add(Buffer.from(hex[1], "hex").toString("utf8"));
      }
    }
    return [...ssids];
  }

  /**
   * Request a scan and read the results, retrying while they are empty
   */
  async scan(
    iface: string,
  ): Promise<Result<BackendScan, ProcessError | WiFiError>> {
    const request = await this.wpaCli(iface, ["scan"]);
    if (!request.success) {
      if (
        request.error.code === ProcessErrorCode.UNAVAILABLE ||
        request.error.code === ProcessErrorCode.ABORTED
      ) {
        return request;
      }
      // FAIL-BUSY: a scan is already running, its results are still read below
      logger.debug(
        `Scan request on ${iface} refused: ${request.error.message}`,
      );
    }

    let networks: ScanObservation[] = [];
    for (let attempt = 1; attempt <= this.resultAttempts; attempt++) {
      await this.wait(this.resultDelayMs);
      const results = await this.wpaCli(iface, ["scan_results"]);
      if (!results.success) {
        return results;
      }
      const parsed = this.parseScanResults(results.data.stdout);
      if (!parsed.success) {
        return parsed;
      }
      networks = parsed.data;
      if (networks.length > 0) break;
    }

    return success({
      backend: WifiBackend.WPA_CLI,
      networks,
      activeSsid: null,
    });
  }

  /**
   * SSID of the completed association, or null
   */
  async status(iface: string): Promise<Result<string | null, ProcessError>> {
    const result = await this.wpaCli(iface, ["status"]);
    if (!result.success) {
      return result;
    }

    const fields = new Map<string, string>();
    for (const line of result.data.stdout.split("\n")) {
      const separator = line.indexOf("=");
      if (separator > 0) {
        fields.set(line.slice(0, separator), line.slice(separator + 1).trim());
      }
    }
    const ssid = fields.get("ssid");
    const completed = fields.get("wpa_state") === "COMPLETED";
    return success(completed && ssid ? ssid : null);
  }

  /**
   * Select, enable and persist a configured network
   */
  async connect(
    iface: string,
    networkId: string,
  ): Promise<Result<void, ProcessError>> {
    for (const args of [
      ["select_network", networkId],
      ["enable_network", networkId],
      ["save_config"],
    ]) {
      const result = await this.wpaCli(iface, args);
      if (!result.success) {
        return result;
      }
    }
    return success(undefined);
  }

  /**
   * Disconnect and disable every configured network so it does not reassociate
   */
  async disconnect(
    iface: string,
    networkIds: readonly string[],
  ): Promise<Result<void, ProcessError>> {
    const steps = [
      ["disconnect"],
      ...networkIds.map((id) => ["disable_network", id]),
      ["save_config"],
    ];
    for (const args of steps) {
      const result = await this.wpaCli(iface, args);
      if (!result.success) {
        return result;
      }
    }
    return success(undefined);
  }

  private parseScanResults(
    stdout: string,
  ): Result<ScanObservation[], WiFiError> {
    const rows = dataRows(stdout, "bssid");
    const networks: ScanObservation[] = [];
    let malformed = 0;

    for (const row of rows) {
      if (row.length < 4) {
        malformed++;
        continue;
      }
      const [, , level, flags, ssid] = row;
      // Hidden networks have no SSID
      if (!ssid) continue;

      const dbm = parseInt(level, 10);
      networks.push({
        ssid,
        signal: dbmToPercent(Number.isNaN(dbm) ? WPA_FALLBACK_LEVEL_DBM : dbm),
        security: securityFromWpaFlags(flags),
      });
    }

    if (malformed > 0 && malformed === rows.length) {
      const sample = rows[0].join("\t");
      return failure(
        WiFiError.parseError("wpa_cli", `unrecognised line "${sample}"`),
      );
    }
    return success(networks);
  }

  /**
   * Run wpa_cli against an interface. wpa_cli exits 0 on most errors and
   * prints FAIL instead, so that output is turned into a failure.
   */
  private async wpaCli(
    iface: string,
    args: readonly string[],
  ): Promise<Result<CommandOutput, ProcessError>> {
    const fullArgs = ["-i", iface, ...args];
    const result = await this.runner.run("wpa_cli", fullArgs, {
      elevated: true,
    });
    if (result.success && result.data.stdout.trim().startsWith("FAIL")) {
      return failure(
        ProcessError.failed(
          ["wpa_cli", ...fullArgs].join(" "),
          result.data.exitCode,
          result.data.stdout.trim(),
        ),
      );
    }
    return result;
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
