jest.mock("fs/promises", () => ({
  readFile: jest.fn().mockRejectedValue(new Error("ENOENT")),
}));

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { WiFiConnectionManager } from "../WiFiConnectionManager";
import { WiFiStateReader } from "../WiFiStateReader";
import { BackendProbe } from "../BackendProbe";
import { NmcliBackend } from "../NmcliBackend";
import { WpaCliBackend } from "../WpaCliBackend";
import { MockProcessRunner } from "@services/process/MockProcessRunner";
import { KeyedOperationLock } from "@utils/operationLock";
import { ProcessError, WiFiErrorCode } from "@core/errors";
import { InterfaceRoles } from "@core/types";

const ROLES: InterfaceRoles = {
  apIface: "wlan1",
  clientIface: "wlan0",
  apSsid: null,
};

const LIST_HEADER = "network id / ssid / bssid / flags\n";

async function createManager(
  runner: MockProcessRunner,
): Promise<WiFiConnectionManager> {
  const locks = new KeyedOperationLock();
  const nmcli = new NmcliBackend(runner);
  const wpaCli = new WpaCliBackend(runner);
  const reader = new WiFiStateReader(
    new BackendProbe(runner),
    nmcli,
    wpaCli,
    locks,
  );
  await reader.initialize();
  runner.calls.length = 0;
  return new WiFiConnectionManager(reader, nmcli, wpaCli, runner, locks);
}

describe("WiFiConnectionManager", () => {
  let runner: MockProcessRunner;

  beforeEach(() => {
    runner = new MockProcessRunner();
  });

  describe("connect", () => {
    it("should select the saved wpa_supplicant network", async () => {
      runner
        .respond("wpa_cli -v", "wpa_cli v2.10\n")
        .respond(
          "wpa_cli -i wlan0 list_networks",
          LIST_HEADER + "0\tHome\tany\t\n3\tOffice\tany\t\n",
        )
        .respond("wpa_cli -i wlan0 select_network 3", "OK\n")
        .respond("wpa_cli -i wlan0 enable_network 3", "OK\n")
        .respond("wpa_cli -i wlan0 save_config", "OK\n");
      const manager = await createManager(runner);

      const result = await manager.connect(ROLES, "Office");

      expect(result.success).toBe(true);
      expect(runner.commandLines()).toEqual([
        "wpa_cli -i wlan0 list_networks",
        "wpa_cli -i wlan0 select_network 3",
        "wpa_cli -i wlan0 enable_network 3",
        "wpa_cli -i wlan0 save_config",
      ]);
    });

    it("should fall back to a NetworkManager profile", async () => {
      runner
        .respond("nmcli --version", "nmcli tool, version 1.42.4\n")
        .respond("wpa_cli -v", "wpa_cli v2.10\n")
        .respond("wpa_cli -i wlan0 list_networks", LIST_HEADER)
        .respond("nmcli -t -f NAME,TYPE connection show", "Cabin:wifi\n")
        .respond(
          "nmcli -s -g 802-11-wireless.ssid connection show Cabin",
          "Cabin\n",
        )
        .respond("nmcli device wifi connect Cabin ifname wlan0", "");
      const manager = await createManager(runner);

      const result = await manager.connect(ROLES, "Cabin");

      expect(result.success).toBe(true);
      expect(runner.commandLines()).toContain(
        "nmcli device wifi connect Cabin ifname wlan0",
      );
    });

    it("should refuse a network that is not saved", async () => {
      runner
        .respond("wpa_cli -v", "wpa_cli v2.10\n")
        .respond("wpa_cli -i wlan0 list_networks", LIST_HEADER + "0\tHome\tany\t\n");
      const manager = await createManager(runner);

      const result = await manager.connect(ROLES, "Stranger");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(WiFiErrorCode.NETWORK_NOT_SAVED);
      }
      expect(runner.commandLines()).toEqual(["wpa_cli -i wlan0 list_networks"]);
    });

    it("should report a failed association", async () => {
      runner
        .respond("nmcli --version", "nmcli tool, version 1.42.4\n")
        .respond("nmcli -t -f NAME,TYPE connection show", "Cabin:wifi\n")
        .respond(
          "nmcli -s -g 802-11-wireless.ssid connection show Cabin",
          "Cabin\n",
        )
        .fail(
          "nmcli device wifi connect Cabin ifname wlan0",
          ProcessError.timeout("nmcli device wifi connect", 35000),
        );
      const manager = await createManager(runner);

      const result = await manager.connect(ROLES, "Cabin");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(WiFiErrorCode.CONNECTION_FAILED);
        expect(result.error.message).toBe(
          'Failed to connect to "Cabin": Command timed out after 35000ms: nmcli device wifi connect',
        );
      }
    });

    it("should report missing backends", async () => {
      const manager = await createManager(runner);

      const result = await manager.connect(ROLES, "Home");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(WiFiErrorCode.BACKENDS_UNAVAILABLE);
      }
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe("disconnect", () => {
    it("should disconnect through nmcli and flush addresses", async () => {
      runner
        .respond("nmcli --version", "nmcli tool, version 1.42.4\n")
        .respond("nmcli device disconnect wlan0", "")
        .respond("ip addr flush dev wlan0", "");
      const manager = await createManager(runner);

      const result = await manager.disconnect(ROLES);

      expect(result.success).toBe(true);
      expect(runner.commandLines()).toEqual([
        "nmcli device disconnect wlan0",
        "ip addr flush dev wlan0",
      ]);
      expect(runner.calls[1].options).toEqual({ elevated: true });
    });

    it("should disable every wpa_supplicant network without nmcli", async () => {
      runner
        .respond("wpa_cli -v", "wpa_cli v2.10\n")
        .respond(
          "wpa_cli -i wlan0 list_networks",
          LIST_HEADER + "0\tHome\tany\t[CURRENT]\n2\tOffice\tany\t\n",
        )
        .respond("wpa_cli -i wlan0 disconnect", "OK\n")
        .respond("wpa_cli -i wlan0 disable_network 0", "OK\n")
        .respond("wpa_cli -i wlan0 disable_network 2", "OK\n")
        .respond("wpa_cli -i wlan0 save_config", "OK\n")
        .respond("ip addr flush dev wlan0", "");
      const manager = await createManager(runner);

      const result = await manager.disconnect(ROLES);

      expect(result.success).toBe(true);
      expect(runner.commandLines()).toEqual([
        "wpa_cli -i wlan0 list_networks",
        "wpa_cli -i wlan0 disconnect",
        "wpa_cli -i wlan0 disable_network 0",
        "wpa_cli -i wlan0 disable_network 2",
        "wpa_cli -i wlan0 save_config",
        "ip addr flush dev wlan0",
      ]);
    });

    it("should report a failed address flush", async () => {
      runner
        .respond("nmcli --version", "nmcli tool, version 1.42.4\n")
        .respond("nmcli device disconnect wlan0", "")
        .fail(
          "ip addr flush dev wlan0",
          ProcessError.elevationDenied("ip addr flush dev wlan0", "sudo: a password is required"),
        );
      const manager = await createManager(runner);

      const result = await manager.disconnect(ROLES);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(WiFiErrorCode.DISCONNECT_FAILED);
      }
    });
  });
});
