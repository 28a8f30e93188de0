/**
 * Validation Schemas
 *
 * Zod schemas for the JSON this service reads: config.json, HTTP API
 * replies and `ip -j` output.
 */

import { z } from "zod";

// ============================================================================
// Config File Schemas
// ============================================================================

/**
 * Poll periods are whole seconds
 */
export const intervalSecondsSchema = z
  .number({ message: "Interval must be a number" })
  .int("Interval must be a whole number of seconds")
  .positive("Interval must be positive");

/**
 * VPN profile entry, e.g. { "display_name": "Office", "file": "office.ovpn" }
 */
export const vpnProfileSchema = z.object({
  display_name: z.string().min(1, "display_name must not be empty"),
  file: z.string().min(1, "file must not be empty"),
});

/**
 * Theme colours and font sizes are passed through untouched
 */
export const stringMapSchema = z.record(z.string());

/**
 * Top level of config.json. Fields are validated one by one so a bad
 * value only resets that field.
 */
export const configFileSchema = z.record(z.unknown());

// ============================================================================
// HTTP API Schemas
// ============================================================================

/**
 * ip-api.com reply (fields=status,message,country,city)
 */
export const geoIpResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  country: z.string().optional(),
  city: z.string().optional(),
});

/**
 * RaspAP /clients/{iface} reply; active_clients is a list or a map
 */
export const raspapClientsResponseSchema = z.object({
  active_clients: z
    .union([z.array(z.unknown()), z.record(z.unknown())])
    .nullish(),
});

// ============================================================================
// Command Output Schemas
// ============================================================================

/**
 * `ip -j -4 addr show <iface>`
 */
export const ipAddrOutputSchema = z.array(
  z.object({
    ifname: z.string().optional(),
    addr_info: z
      .array(z.object({ local: z.string().optional() }).passthrough())
      .default([]),
  }),
);
