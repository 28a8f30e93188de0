import { IProcessRunner } from "@core/interfaces";
import { WifiBackendSet } from "@core/types";
import { ProcessErrorCode } from "@core/errors";
import { getLogger } from "@utils/logger";

const logger = getLogger("BackendProbe");

/**
 * Check once which Wi-Fi command line tools are installed.
 *
 * Only a missing binary counts as absent. A tool that exists but fails its
 * version query is still used, since the failure may be transient.
 */
export class BackendProbe {
  constructor(private readonly runner: IProcessRunner) {}

  async probe(): Promise<WifiBackendSet> {
    const [nmcli, wpaCli] = await Promise.all([
      this.isInstalled("nmcli", ["--version"]),
      this.isInstalled("wpa_cli", ["-v"]),
    ]);

    logger.info(
      `Wi-Fi backends: nmcli ${nmcli ? "found" : "missing"}, wpa_cli ${wpaCli ? "found" : "missing"}`,
    );
    return { nmcli, wpaCli };
  }

  private async isInstalled(
    command: string,
    args: readonly string[],
  ): Promise<boolean> {
    const result = await this.runner.run(command, args);
    if (result.success) {
      return true;
    }
    if (result.error.code === ProcessErrorCode.UNAVAILABLE) {
      return false;
    }
    logger.warn(`${command} version check failed: ${result.error.message}`);
    return true;
  }
}
