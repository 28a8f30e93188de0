const mockReadFile = jest.fn();

jest.mock("fs/promises", () => ({
  readFile: (...args: unknown[]) => mockReadFile(...args),
}));

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { ConfigService } from "@services/config/ConfigService";
import { ConfigErrorCode } from "@core/errors";

const CONFIG_PATH = "./test-config.json";

function enoent(): Error {
  return Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" });
}

describe("ConfigService", () => {
  let configService: ConfigService;

  beforeEach(() => {
    jest.clearAllMocks();
    configService = new ConfigService(CONFIG_PATH);
  });

  describe("initialization", () => {
    it("should use defaults when the file does not exist", async () => {
      mockReadFile.mockRejectedValue(enoent());

      const result = await configService.initialize();

      expect(result.success).toBe(true);
      expect(mockReadFile).toHaveBeenCalledWith(CONFIG_PATH, "utf-8");
      expect(configService.getUpdateIntervalMs()).toBe(2000);
      expect(configService.getGeoipIntervalMs()).toBe(300000);
      expect(configService.getVpnProfiles()).toEqual([]);
      expect(configService.getConfig().defaultScreen).toBe("main");
    });

    it("should load every field from the file", async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({
          update_interval: 5,
          geoip_interval: 600,
          default_screen: "vpn",
          vpn_profiles: [
            { display_name: "Office", file: "office.ovpn" },
            { display_name: "Home", file: "home.ovpn" },
          ],
          theme: { primary_color: "#000000" },
          fonts: { title: "40sp" },
        }),
      );

      const result = await configService.initialize();
      const config = configService.getConfig();

      expect(result.success).toBe(true);
      expect(configService.getUpdateIntervalMs()).toBe(5000);
      expect(configService.getGeoipIntervalMs()).toBe(600000);
      expect(config.defaultScreen).toBe("vpn");
      expect(configService.getVpnProfiles()).toEqual([
        { displayName: "Office", file: "office.ovpn" },
        { displayName: "Home", file: "home.ovpn" },
      ]);
      expect(config.theme.primary_color).toBe("#000000");
      expect(config.theme.accent_color).toBe("#2ECC71");
      expect(config.fonts.title).toBe("40sp");
      expect(config.fonts.small).toBe("16sp");
    });

    it("should only load the file once", async () => {
      mockReadFile.mockResolvedValue("{}");

      await configService.initialize();
      await configService.initialize();

      expect(mockReadFile).toHaveBeenCalledTimes(1);
    });

    it("should fail with INVALID_JSON and keep defaults", async () => {
      mockReadFile.mockResolvedValue("{ not json");

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.INVALID_JSON);
      }
      expect(configService.getUpdateIntervalMs()).toBe(2000);
    });

    it("should fail with FILE_READ_ERROR on other read errors", async () => {
      mockReadFile.mockRejectedValue(
        Object.assign(new Error("EACCES: permission denied"), {
          code: "EACCES",
        }),
      );

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.FILE_READ_ERROR);
      }
    });

    it("should reject a file that is not an object", async () => {
      mockReadFile.mockResolvedValue("[1, 2]");

      const result = await configService.initialize();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(ConfigErrorCode.INVALID_VALUE);
      }
    });
  });

  describe("field fallback", () => {
    it("should reset only the invalid fields", async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({
          update_interval: -1,
          geoip_interval: 1.5,
          default_screen: "wifi",
          theme: "dark",
        }),
      );

      const result = await configService.initialize();

      expect(result.success).toBe(true);
      expect(configService.getUpdateIntervalMs()).toBe(2000);
      expect(configService.getGeoipIntervalMs()).toBe(300000);
      expect(configService.getConfig().defaultScreen).toBe("wifi");
      expect(configService.getConfig().theme.primary_color).toBe("#3498DB");
    });

    it("should skip invalid and duplicate VPN profiles", async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({
          vpn_profiles: [
            { display_name: "Office", file: "office.ovpn" },
            { display_name: "", file: "empty.ovpn" },
            { display_name: "Travel" },
            { display_name: "Office", file: "other.ovpn" },
          ],
        }),
      );

      await configService.initialize();

      expect(configService.getVpnProfiles()).toEqual([
        { displayName: "Office", file: "office.ovpn" },
      ]);
    });

    it("should ignore vpn_profiles that is not a list", async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({ vpn_profiles: { display_name: "Office" } }),
      );

      await configService.initialize();

      expect(configService.getVpnProfiles()).toEqual([]);
    });
  });

  describe("findVpnProfile", () => {
    beforeEach(async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({
          vpn_profiles: [{ display_name: "Office", file: "office.ovpn" }],
        }),
      );
      await configService.initialize();
    });

    it("should find a profile by display name", () => {
      expect(configService.findVpnProfile("Office")).toEqual({
        displayName: "Office",
        file: "office.ovpn",
      });
    });

    it("should return undefined for an unknown name", () => {
      expect(configService.findVpnProfile("office")).toBeUndefined();
    });
  });
});
