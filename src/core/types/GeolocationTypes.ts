/**
 * Location of the public IP address
 */
export type GeoLocation = {
  status: "ok" | "error";
  country: string | null;
  city: string | null;
  fetchedAt: Date;
};

/**
 * Why a geolocation refresh was requested
 */
export enum RefreshReason {
  STARTUP = "startup",
  PERIODIC = "periodic",
  STATE_CHANGE = "state_change",
}

export type RefreshTrigger = {
  reason: RefreshReason;
};
