/**
 * Default Configuration Constants
 *
 * All default values used throughout the application, grouped by service.
 */

// =============================================================================
// Interface Defaults
// =============================================================================

/**
 * hostapd configuration naming the access point interface
 */
export const HOSTAPD_DEFAULT_CONF_PATH = "/etc/hostapd/hostapd.conf";

/**
 * Access point radio when hostapd.conf gives no usable answer
 */
export const DEFAULT_AP_IFACE = "wlan1";

/**
 * Client radio when hostapd.conf gives no usable answer
 */
export const DEFAULT_CLIENT_IFACE = "wlan0";

/**
 * The two radios of the fixed two-interface convention
 */
export const KNOWN_WIRELESS_IFACES: readonly [string, string] = [
  "wlan0",
  "wlan1",
];

// =============================================================================
// Wi-Fi Defaults
// =============================================================================

export const WPA_SUPPLICANT_DEFAULT_CONF_PATH =
  "/etc/wpa_supplicant/wpa_supplicant.conf";

/**
 * Number of scan_results reads after a wpa_cli scan request
 */
export const WPA_SCAN_RESULT_ATTEMPTS = 4;

/**
 * Wait between scan_results reads (ms)
 */
export const WPA_SCAN_RESULT_DELAY_MS = 800;

/**
 * dBm level assumed when wpa_cli prints an unparseable level
 */
export const WPA_FALLBACK_LEVEL_DBM = -90;

/**
 * Timeout for nmcli connect, which waits for association (ms)
 */
export const NMCLI_CONNECT_TIMEOUT_MS = 35000;

// =============================================================================
// Process Defaults
// =============================================================================

/**
 * Default timeout for any external command (ms)
 */
export const COMMAND_DEFAULT_TIMEOUT_MS = 10000;

/**
 * Privilege-escalation wrapper; -n fails instead of prompting for a password
 */
export const ELEVATION_COMMAND = "sudo";
export const ELEVATION_ARGS: readonly string[] = ["-n"];

// =============================================================================
// VPN Defaults
// =============================================================================

export const OVPN_DEFAULT_DIRECTORY = "./assets/ovpn";

export const VPN_PROCESS_NAME = "openvpn";

/**
 * A freshly launched VPN that is not yet visible in the process table
 * stays CONNECTING for this long (ms)
 */
export const VPN_CONNECT_GRACE_MS = 15000;

// =============================================================================
// Scheduler & Geolocation Defaults
// =============================================================================

/**
 * Status poll period in seconds
 */
export const UPDATE_DEFAULT_INTERVAL_S = 2;

/**
 * Periodic geolocation refresh in seconds
 */
export const GEOIP_DEFAULT_INTERVAL_S = 300;

/**
 * Minimum gap between two state-change triggered lookups (ms)
 */
export const GEOIP_DEBOUNCE_MS = 2000;

export const GEOIP_API_URL =
  "http://ip-api.com/json/?fields=status,message,country,city";

export const GEOIP_REQUEST_TIMEOUT_MS = 5000;

// =============================================================================
// RaspAP API Defaults
// =============================================================================

export const RASPAP_DEFAULT_BASE_URL = "http://localhost:8081";

export const RASPAP_REQUEST_TIMEOUT_MS = 5000;

// =============================================================================
// System Status Defaults
// =============================================================================

/**
 * CPU temperature in millidegrees Celsius
 */
export const THERMAL_ZONE_PATH = "/sys/class/thermal/thermal_zone0/temp";

export const HOSTAPD_SERVICE_NAME = "hostapd";

// =============================================================================
// Config Defaults
// =============================================================================

export const CONFIG_DEFAULT_PATH = "./config/config.json";

export const DEFAULT_SCREEN = "main";

export const DEFAULT_THEME: Record<string, string> = {
  primary_color: "#3498DB",
  accent_color: "#2ECC71",
  background_color: "#ECF0F1",
  text_light: "#FFFFFF",
  text_dark: "#2C3E50",
  button_normal: "#34495E",
  button_pressed: "#5D6D7E",
  button_off: "#C0392B",
};

export const DEFAULT_FONTS: Record<string, string> = {
  title: "42sp",
  header: "26sp",
  normal: "22sp",
  small: "16sp",
};
