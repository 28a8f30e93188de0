import { GeoLocation, RefreshTrigger } from "@core/types";

/**
 * Geolocation Refresher Interface
 *
 * Looks up the location of the public IP, throttled by a periodic floor
 * and a state-change debounce window.
 */
export interface IGeolocationRefresher {
  /**
   * Fetch if the trigger is allowed at `now` (epoch ms)
   * @returns The new location, or null when skipped or failed
   */
  maybeRefresh(trigger: RefreshTrigger, now: number): Promise<GeoLocation | null>;

  /**
   * Last known location (last good value, or an error marker before any success)
   */
  getCurrent(): GeoLocation | null;
}
