import { IProcessRunner } from "@core/interfaces";
import {
  Result,
  CommandOptions,
  CommandOutput,
  success,
  failure,
} from "@core/types";
import { ProcessError } from "@core/errors";
import { getLogger } from "@utils/logger";

const logger = getLogger("MockProcessRunner");

type ScriptedResponse =
  | { kind: "output"; output: CommandOutput }
  | { kind: "error"; error: ProcessError };

/**
 * A command the mock received
 */
export type RecordedCommand = {
  command: string;
  args: string[];
  options: CommandOptions;
};

/**
 * Mock Process Runner for development and testing
 *
 * Answers commands from a script keyed by the full command line
 * (`"nmcli -t -f NAME,TYPE connection show"`). Several responses for the
 * same line are returned in order and the last one repeats. Commands
 * without a script behave like a missing binary.
 */
export class MockProcessRunner implements IProcessRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly script = new Map<string, ScriptedResponse[]>();
  private aborted = false;

  /**
   * Answer a command line with stdout (and optionally a non-zero exit code)
   */
  respond(
    commandLine: string,
    stdout: string,
    exitCode: number = 0,
    stderr: string = "",
  ): this {
    return this.push(commandLine, {
      kind: "output",
      output: { exitCode, stdout, stderr },
    });
  }

  /**
   * Answer a command line with an error
   */
  fail(commandLine: string, error: ProcessError): this {
    return this.push(commandLine, { kind: "error", error });
  }

  /**
   * Command lines received so far, in order
   */
  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }

  async run(
    command: string,
    args: readonly string[],
    options: CommandOptions = {},
  ): Promise<Result<CommandOutput, ProcessError>> {
    const commandLine = [command, ...args].join(" ");
    this.calls.push({ command, args: [...args], options });

    if (this.aborted) {
      return failure(ProcessError.aborted(commandLine));
    }

    const response = this.take(commandLine);
    if (!response) {
      logger.debug(`No scripted response for: ${commandLine}`);
      return failure(ProcessError.unavailable(commandLine, "ENOENT"));
    }
    if (response.kind === "error") {
      return failure(response.error);
    }

    const { output } = response;
    const okExitCodes = options.okExitCodes ?? [0];
    if (!okExitCodes.includes(output.exitCode)) {
      return failure(
        ProcessError.failed(commandLine, output.exitCode, output.stderr),
      );
    }
    return success(output);
  }

  abortAll(): void {
    this.aborted = true;
  }

  reset(): void {
    this.aborted = false;
  }

  getInFlightCount(): number {
    return 0;
  }

  /**
   * Script with a plausible two-radio host, for running off the Pi
   */
  static withDemoTools(): MockProcessRunner {
    const runner = new MockProcessRunner();
    runner
      .respond("nmcli --version", "nmcli tool, version 1.42.4\n")
      .respond("wpa_cli -v", "wpa_cli v2.10\n")
      .respond(
        "nmcli -t -f NAME,TYPE connection show",
        "HomeNet:802-11-wireless\nWired connection 1:802-3-ethernet\n",
      )
      .respond(
        "nmcli -s -g 802-11-wireless.ssid connection show HomeNet",
        "HomeNet\n",
      )
      .respond("nmcli device wifi rescan ifname wlan0", "")
      .respond(
        "nmcli -t -f ACTIVE,SSID,SIGNAL,SECURITY device wifi list ifname wlan0",
        "yes:HomeNet:78:WPA2\nno:CoffeeShop:41:\nno:Neighbour:23:WPA1 WPA2\n",
      )
      .respond(
        "wpa_cli -i wlan0 list_networks",
        "network id / ssid / bssid / flags\n0\tHomeNet\tany\t[CURRENT]\n1\tOffice\tany\t\n",
      )
      .respond("wpa_cli -i wlan0 scan", "OK\n")
      .respond(
        "wpa_cli -i wlan0 scan_results",
        "bssid / frequency / signal level / flags / ssid\n" +
          "aa:bb:cc:dd:ee:01\t2437\t-58\t[WPA2-PSK-CCMP][ESS]\tHomeNet\n",
      )
      .respond("wpa_cli -i wlan0 status", "wpa_state=COMPLETED\nssid=HomeNet\n")
      .respond("pgrep -x openvpn", "", 1)
      .respond("systemctl is-active hostapd", "active\n")
      .respond("uptime -p", "up 2 hours, 5 minutes\n")
      .respond(
        "ip -j -4 addr show wlan0",
        '[{"ifname":"wlan0","addr_info":[{"local":"192.168.1.42"}]}]\n',
      )
      .respond(
        "ip -j -4 addr show wlan1",
        '[{"ifname":"wlan1","addr_info":[{"local":"10.3.141.1"}]}]\n',
      );
    return runner;
  }

  private push(commandLine: string, response: ScriptedResponse): this {
    const queue = this.script.get(commandLine) ?? [];
    queue.push(response);
    this.script.set(commandLine, queue);
    return this;
  }

  private take(commandLine: string): ScriptedResponse | undefined {
    const queue = this.script.get(commandLine);
    if (!queue || queue.length === 0) {
      return undefined;
    }
    return queue.length > 1 ? queue.shift() : queue[0];
  }
}
