import {
  Result,
  StatusSnapshot,
  SnapshotListener,
  VpnState,
} from "@core/types";
import { VpnError, WiFiError } from "@core/errors";

/**
 * Read side of the published state. The scheduler is the only writer.
 */
export interface IStatusReader {
  /**
   * Latest snapshot, or null before the first publish
   */
  getSnapshot(): StatusSnapshot | null;

  /**
   * Register a listener for new snapshots
   * @returns Unsubscribe function
   */
  subscribe(listener: SnapshotListener): () => void;
}

/**
 * Status Orchestrator Interface
 *
 * What the presentation layer talks to: published snapshots plus the
 * user actions of the touch panel.
 */
export interface IStatusOrchestrator extends IStatusReader {
  start(): Promise<void>;

  /**
   * Stop timers and abort in-flight commands
   */
  stop(): Promise<void>;

  /**
   * Run a poll as soon as possible (queued if one is running)
   */
  requestRefresh(): void;

  connectVpn(displayName: string): Promise<Result<VpnState, VpnError>>;

  disconnectVpn(): Promise<VpnState>;

  connectWifi(ssid: string): Promise<Result<void, WiFiError>>;

  disconnectWifi(): Promise<Result<void, WiFiError>>;
}
