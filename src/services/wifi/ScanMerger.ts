import {
  BackendScan,
  ScanEntry,
  ScanObservation,
  WifiSecurity,
} from "@core/types";

/**
 * Convert a wpa_cli signal level (dBm) to a 0-100 percentage
 */
export function dbmToPercent(dbm: number): number {
  return Math.max(0, Math.min(100, 2 * (dbm + 100)));
}

function matchSecurity(text: string): WifiSecurity | null {
  const upper = text.toUpperCase();
  if (upper.includes("WPA3") || upper.includes("SAE")) return "WPA3";
  if (upper.includes("WPA2") || upper.includes("RSN")) return "WPA2";
  if (upper.includes("WPA")) return "WPA";
  if (upper.includes("WEP")) return "WEP";
  return null;
}

/**
 * Security label from the nmcli SECURITY column ("WPA1 WPA2", "--", "")
 */
export function securityFromNmcli(raw: string): WifiSecurity {
  const trimmed = raw.trim();
  if (!trimmed || trimmed === "--") return "Open";
  return matchSecurity(trimmed) ?? "Unknown";
}

/**
 * Security label from wpa_cli scan flags ("[WPA2-PSK-CCMP][ESS]")
 */
export function securityFromWpaFlags(flags: string): WifiSecurity {
  return matchSecurity(flags) ?? "Open";
}

/**
 * Merge live scans with the saved SSIDs.
 *
 * Each SSID appears once, with the strongest signal any backend reported.
 * Saved SSIDs that no scan saw are kept with inRange=false and signal 0.
 */
export function mergeScans(
  scans: readonly BackendScan[],
  savedSsids: ReadonlySet<string>,
  connectedSsid: string | null,
): ScanEntry[] {
  const strongest = new Map<string, ScanObservation>();
  for (const scan of scans) {
    for (const network of scan.networks) {
      const known = strongest.get(network.ssid);
      if (!known) {
        strongest.set(network.ssid, network);
        continue;
      }
      const stronger = network.signal > known.signal ? network : known;
      const weaker = stronger === network ? known : network;
      strongest.set(network.ssid, {
        ssid: network.ssid,
        signal: stronger.signal,
        security:
          stronger.security === "Unknown" ? weaker.security : stronger.security,
      });
    }
  }

  const entries: ScanEntry[] = [];
  for (const network of strongest.values()) {
    entries.push({
      ssid: network.ssid,
      signal: network.signal,
      saved: savedSsids.has(network.ssid),
      inRange: true,
      security: network.security,
      current: network.ssid === connectedSsid,
    });
  }
  for (const ssid of savedSsids) {
    if (strongest.has(ssid)) continue;
    entries.push({
      ssid,
      signal: 0,
      saved: true,
      inRange: false,
      security: "Unknown",
      current: false,
    });
  }

  return entries.sort(compareEntries);
}

/**
 * Saved in range (current first, then signal, then name), saved out of
 * range (by name), then unsaved (by signal)
 */
function compareEntries(a: ScanEntry, b: ScanEntry): number {
  const rank = (entry: ScanEntry): number =>
    entry.saved ? (entry.inRange ? 0 : 1) : 2;
  const byRank = rank(a) - rank(b);
  if (byRank !== 0) return byRank;

  if (rank(a) === 0 && a.current !== b.current) {
    return a.current ? -1 : 1;
  }
  if (rank(a) !== 1 && a.signal !== b.signal) {
    return b.signal - a.signal;
  }
  return a.ssid.localeCompare(b.ssid);
}
