import { IGeolocationRefresher } from "@core/interfaces";
import {
  Result,
  GeoLocation,
  RefreshReason,
  RefreshTrigger,
  success,
  failure,
} from "@core/types";
import { GeolocationError } from "@core/errors";
import {
  GEOIP_API_URL,
  GEOIP_DEBOUNCE_MS,
  GEOIP_DEFAULT_INTERVAL_S,
  GEOIP_REQUEST_TIMEOUT_MS,
} from "@core/constants";
import { geoIpResponseSchema } from "@core/validation/schemas";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("GeolocationRefresher");

export type GeolocationRefresherOptions = {
  /** Periodic floor between lookups (ms) */
  intervalMs?: number;
  /** Minimum gap between state-change lookups (ms) */
  debounceMs?: number;
  url?: string;
  requestTimeoutMs?: number;
};

/**
 * Geolocation Refresher
 *
 * Looks up the country and city of the public IP address. A trigger
 * leads to a lookup when:
 * - the periodic interval has passed since the last successful lookup
 * - it is a state change and the debounce window since the last
 *   state-change lookup has passed
 * - it is the first startup trigger of the process
 *
 * Only one lookup runs at a time. A state change that arrives during a
 * lookup is checked again when that lookup ends; other triggers are
 * dropped. Failed lookups do not move either timer.
 */
export class GeolocationRefresher implements IGeolocationRefresher {
  private current: GeoLocation | null = null;
  private lastFetchAt: number | null = null;
  private lastStateFetchAt: number | null = null;
  private startupHandled = false;
  private inFlight: Promise<GeoLocation | null> | null = null;
  private followUp: Promise<GeoLocation | null> | null = null;
  private pendingStateChangeAt: number | null = null;

  private readonly intervalMs: number;
  private readonly debounceMs: number;
  private readonly url: string;
  private readonly requestTimeoutMs: number;

  constructor(options: GeolocationRefresherOptions = {}) {
    this.intervalMs = options.intervalMs ?? GEOIP_DEFAULT_INTERVAL_S * 1000;
    this.debounceMs = options.debounceMs ?? GEOIP_DEBOUNCE_MS;
    this.url = options.url ?? GEOIP_API_URL;
    this.requestTimeoutMs =
      options.requestTimeoutMs ?? GEOIP_REQUEST_TIMEOUT_MS;
  }

  getCurrent(): GeoLocation | null {
    return this.current;
  }

  async maybeRefresh(
    trigger: RefreshTrigger,
    now: number,
  ): Promise<GeoLocation | null> {
    if (this.inFlight) {
      if (trigger.reason === RefreshReason.STATE_CHANGE) {
        return this.deferStateChange(this.inFlight, now);
      }
      logger.debug(`${trigger.reason} trigger skipped, lookup in progress`);
      return null;
    }
    if (!this.isDue(trigger, now)) {
      return null;
    }
    if (trigger.reason === RefreshReason.STARTUP) {
      this.startupHandled = true;
    }

    this.inFlight = this.refresh(trigger, now);
    return this.inFlight;
  }

  /**
   * Re-evaluate a state change once the running lookup has finished.
   * Later state changes in the meantime share the same follow-up.
   */
  private deferStateChange(
    inFlight: Promise<GeoLocation | null>,
    now: number,
  ): Promise<GeoLocation | null> {
    this.pendingStateChangeAt = now;
    if (this.followUp) {
      return this.followUp;
    }

    logger.debug("state_change trigger deferred, lookup in progress");
    const runFollowUp = (): Promise<GeoLocation | null> => {
      const at = this.pendingStateChangeAt ?? now;
      this.pendingStateChangeAt = null;
      this.followUp = null;
      return this.maybeRefresh({ reason: RefreshReason.STATE_CHANGE }, at);
    };
    this.followUp = inFlight.then(runFollowUp, runFollowUp);
    return this.followUp;
  }

  private async refresh(
    trigger: RefreshTrigger,
    now: number,
  ): Promise<GeoLocation | null> {
    try {
      logger.info(`Looking up public IP location (${trigger.reason})`);
      const result = await this.lookup(now);
      if (result.success) {
        this.current = result.data;
        this.lastFetchAt = now;
        if (trigger.reason === RefreshReason.STATE_CHANGE) {
          this.lastStateFetchAt = now;
        }
        const { city, country } = result.data;
        logger.info(`Public IP location: ${city ?? "?"}, ${country ?? "?"}`);
        return result.data;
      }

      logger.warn(result.error.message);
      if (this.current === null || this.current.status === "error") {
        this.current = {
          status: "error",
          country: null,
          city: null,
          fetchedAt: new Date(now),
        };
      }
      return null;
    } finally {
      this.inFlight = null;
    }
  }

  private isDue(trigger: RefreshTrigger, now: number): boolean {
    if (trigger.reason === RefreshReason.STARTUP && !this.startupHandled) {
      return true;
    }
    if (
      this.lastFetchAt === null ||
      now - this.lastFetchAt >= this.intervalMs
    ) {
      return true;
    }
    if (trigger.reason === RefreshReason.STATE_CHANGE) {
      return (
        this.lastStateFetchAt === null ||
        now - this.lastStateFetchAt >= this.debounceMs
      );
    }
    return false;
  }

  private async lookup(
    now: number,
  ): Promise<Result<GeoLocation, GeolocationError>> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      return failure(
        GeolocationError.networkUnreachable(this.url, toError(error)),
      );
    }
    if (!response.ok) {
      return failure(
        GeolocationError.lookupFailed(
          `HTTP ${response.status}: ${response.statusText}`,
        ),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return failure(GeolocationError.parseError(toError(error).message));
    }

    const parsed = geoIpResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return failure(
        GeolocationError.parseError(
          issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid body",
        ),
      );
    }
    if (parsed.data.status !== "success") {
      const reason = parsed.data.message ?? parsed.data.status;
      return failure(GeolocationError.lookupFailed(reason));
    }

    const location: GeoLocation = {
      status: "ok",
      country: parsed.data.country ?? null,
      city: parsed.data.city ?? null,
      fetchedAt: new Date(now),
    };
    return success(location);
  }
}
