import * as fs from "fs/promises";
import { z } from "zod";
import { IConfigService } from "@core/interfaces";
import { Result, AppConfig, VpnProfile, success, failure } from "@core/types";
import { ConfigError } from "@core/errors";
import {
  CONFIG_DEFAULT_PATH,
  DEFAULT_FONTS,
  DEFAULT_SCREEN,
  DEFAULT_THEME,
  GEOIP_DEFAULT_INTERVAL_S,
  UPDATE_DEFAULT_INTERVAL_S,
} from "@core/constants";
import {
  configFileSchema,
  intervalSecondsSchema,
  stringMapSchema,
  vpnProfileSchema,
} from "@core/validation/schemas";
import { isNodeJSErrnoException, toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("ConfigService");

/**
 * Config Service Implementation
 *
 * Loads config.json once at startup. Each field is validated on its own;
 * a missing or invalid field falls back to its default and the rest of
 * the file still applies.
 */
export class ConfigService implements IConfigService {
  private isInitialized: boolean = false;
  private config: AppConfig;

  constructor(private readonly configPath: string = CONFIG_DEFAULT_PATH) {
    this.config = this.getDefaultConfig();
  }

  /**
   * Initialize the config service.
   * A failure leaves the defaults in place.
   */
  async initialize(): Promise<Result<void, ConfigError>> {
    if (this.isInitialized) {
      return success(undefined);
    }
    this.isInitialized = true;

    const fileResult = await this.loadConfigFile();
    if (!fileResult.success) {
      logger.warn(`${fileResult.error.message}, using defaults`);
      return fileResult;
    }
    if (fileResult.data === null) {
      logger.info(`No config file at ${this.configPath}, using defaults`);
      return success(undefined);
    }

    this.config = this.buildConfig(fileResult.data);
    logger.info(
      `Loaded ${this.configPath} (${this.config.vpnProfiles.length} VPN profiles)`,
    );
    return success(undefined);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getUpdateIntervalMs(): number {
    return this.config.updateInterval * 1000;
  }

  getGeoipIntervalMs(): number {
    return this.config.geoipInterval * 1000;
  }

  getVpnProfiles(): VpnProfile[] {
    return this.config.vpnProfiles;
  }

  findVpnProfile(displayName: string): VpnProfile | undefined {
    return this.config.vpnProfiles.find(
      (profile) => profile.displayName === displayName,
    );
  }

  // Private helper methods

  /**
   * Read and parse the file. Resolves to null when it does not exist.
   */
  private async loadConfigFile(): Promise<
    Result<Record<string, unknown> | null, ConfigError>
  > {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf-8");
    } catch (error) {
      if (isNodeJSErrnoException(error) && error.code === "ENOENT") {
        return success(null);
      }
      return failure(ConfigError.readError(this.configPath, toError(error)));
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return failure(ConfigError.invalidJSON(this.configPath, toError(error)));
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      return failure(
        ConfigError.invalidValue("<root>", "expected a JSON object"),
      );
    }
    return success(parsed.data);
  }

  private buildConfig(raw: Record<string, unknown>): AppConfig {
    const defaults = this.getDefaultConfig();
    return {
      updateInterval: this.field(
        raw,
        "update_interval",
        intervalSecondsSchema,
        defaults.updateInterval,
      ),
      geoipInterval: this.field(
        raw,
        "geoip_interval",
        intervalSecondsSchema,
        defaults.geoipInterval,
      ),
      defaultScreen: this.field(
        raw,
        "default_screen",
        z.string().min(1),
        defaults.defaultScreen,
      ),
      vpnProfiles: this.parseVpnProfiles(raw["vpn_profiles"]),
      theme: {
        ...defaults.theme,
        ...this.field<Record<string, string>>(
          raw,
          "theme",
          stringMapSchema,
          {},
        ),
      },
      fonts: {
        ...defaults.fonts,
        ...this.field<Record<string, string>>(
          raw,
          "fonts",
          stringMapSchema,
          {},
        ),
      },
    };
  }

  private field<T>(
    raw: Record<string, unknown>,
    key: string,
    schema: z.ZodType<T>,
    fallback: T,
  ): T {
    if (raw[key] === undefined) {
      return fallback;
    }
    const parsed = schema.safeParse(raw[key]);
    if (parsed.success) {
      return parsed.data;
    }
    const issue = parsed.error.issues[0]?.message ?? "invalid";
    logger.warn(ConfigError.invalidValue(key, issue).message);
    return fallback;
  }

  /**
   * Invalid entries are skipped; the first of two equal names wins
   */
  private parseVpnProfiles(raw: unknown): VpnProfile[] {
    if (raw === undefined) {
      return [];
    }
    if (!Array.isArray(raw)) {
      logger.warn(
        ConfigError.invalidValue("vpn_profiles", "expected a list").message,
      );
      return [];
    }

    const profiles: VpnProfile[] = [];
    raw.forEach((entry: unknown, index: number) => {
      const parsed = vpnProfileSchema.safeParse(entry);
      if (!parsed.success) {
        const issue = parsed.error.issues[0]?.message ?? "invalid";
        logger.warn(
          ConfigError.invalidValue(`vpn_profiles[${index}]`, issue).message,
        );
        return;
      }
      const displayName = parsed.data.display_name;
      if (profiles.some((profile) => profile.displayName === displayName)) {
        logger.warn(`Duplicate VPN profile "${displayName}" ignored`);
        return;
      }
      profiles.push({ displayName, file: parsed.data.file });
    });
    return profiles;
  }

  private getDefaultConfig(): AppConfig {
    return {
      updateInterval: UPDATE_DEFAULT_INTERVAL_S,
      geoipInterval: GEOIP_DEFAULT_INTERVAL_S,
      defaultScreen: DEFAULT_SCREEN,
      vpnProfiles: [],
      theme: { ...DEFAULT_THEME },
      fonts: { ...DEFAULT_FONTS },
    };
  }
}
