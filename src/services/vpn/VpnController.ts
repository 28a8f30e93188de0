import * as fs from "fs/promises";
import * as path from "path";
import { IProcessRunner, IVpnController } from "@core/interfaces";
import {
  Result,
  VpnProfile,
  VpnState,
  VpnStatus,
  success,
  failure,
} from "@core/types";
import { VpnError } from "@core/errors";
import {
  OVPN_DEFAULT_DIRECTORY,
  VPN_PROCESS_NAME,
  VPN_CONNECT_GRACE_MS,
} from "@core/constants";
import { OperationLock } from "@utils/operationLock";
import { getLogger } from "@utils/logger";

const logger = getLogger("VpnController");

export type VpnControllerOptions = {
  /** How long a launched client may stay invisible to pgrep (ms) */
  connectGraceMs?: number;
  /** Clock, in epoch ms */
  now?: () => number;
};

function describeState(state: VpnState): string {
  switch (state.status) {
    case VpnStatus.CONNECTING:
      return `${state.status}(${state.profile.displayName})`;
    case VpnStatus.CONNECTED:
      return `${state.status}(${state.profile?.displayName ?? "external"})`;
    default:
      return state.status;
  }
}

/**
 * VPN Controller
 *
 * Starts and stops the openvpn daemon and tracks its lifecycle:
 * DISCONNECTED -> CONNECTING -> CONNECTED -> DISCONNECTING -> DISCONNECTED.
 * connect() and disconnect() hold a lock for the whole external call, so
 * two lifecycle operations never race on the process table.
 */
export class VpnController implements IVpnController {
  private state: VpnState = { status: VpnStatus.DISCONNECTED };
  private readonly lock = new OperationLock();
  private stateChangeCallbacks: Array<
    (state: VpnState, previousState: VpnState) => void
  > = [];
  private readonly connectGraceMs: number;
  private readonly now: () => number;

  constructor(
    private readonly runner: IProcessRunner,
    private readonly ovpnDirectory: string = OVPN_DEFAULT_DIRECTORY,
    options: VpnControllerOptions = {},
  ) {
    this.connectGraceMs = options.connectGraceMs ?? VPN_CONNECT_GRACE_MS;
    this.now = options.now ?? Date.now;
  }

  getState(): VpnState {
    return this.state;
  }

  async connect(profile: VpnProfile): Promise<Result<VpnState, VpnError>> {
    return this.lock.runExclusive(async () => {
      if (
        this.state.status === VpnStatus.CONNECTING ||
        this.state.status === VpnStatus.CONNECTED
      ) {
        logger.info(
          `connect("${profile.displayName}") ignored, VPN is ${describeState(this.state)}`,
        );
        return success(this.state);
      }

      const directory = path.resolve(this.ovpnDirectory);
      const configPath = path.resolve(directory, profile.file);
      const relative = path.relative(directory, configPath);
      if (
        relative === "" ||
        relative === ".." ||
        relative.startsWith(`..${path.sep}`) ||
        path.isAbsolute(relative)
      ) {
        logger.warn(`VPN config ${profile.file} is outside ${directory}`);
        return failure(VpnError.invalidProfilePath(profile.file, directory));
      }

      try {
        await fs.access(configPath);
      } catch {
        logger.warn(`VPN config not found: ${configPath}`);
        return failure(VpnError.profileNotFound(configPath));
      }

      // Clear a client left over from an earlier run before starting a new one
      const cleanup = await this.runner.run("killall", [VPN_PROCESS_NAME], {
        elevated: true,
        okExitCodes: [0, 1],
      });
      if (!cleanup.success) {
        logger.warn(`Could not stop old clients: ${cleanup.error.message}`);
      }

      this.setState({
        status: VpnStatus.CONNECTING,
        profile,
        since: this.now(),
      });

      const launch = await this.runner.run(
        VPN_PROCESS_NAME,
        ["--daemon", "--config", configPath],
        { elevated: true },
      );
      if (!launch.success) {
        logger.error(`openvpn failed to start: ${launch.error.message}`);
        this.setState({ status: VpnStatus.DISCONNECTED });
        return failure(
          VpnError.launchFailed(profile.displayName, launch.error),
        );
      }

      logger.info(`openvpn started for "${profile.displayName}"`);
      return success(this.state);
    });
  }

  async disconnect(clientIface: string): Promise<VpnState> {
    return this.lock.runExclusive(async () => {
      if (this.state.status === VpnStatus.DISCONNECTED) {
        logger.debug("disconnect() ignored, VPN is already disconnected");
        return this.state;
      }

      this.setState({ status: VpnStatus.DISCONNECTING });

      // killall exits 1 when no process matched
      const kill = await this.runner.run("killall", [VPN_PROCESS_NAME], {
        elevated: true,
        okExitCodes: [0, 1],
      });
      if (!kill.success) {
        logger.warn(`killall failed: ${kill.error.message}`);
      }

      // Drop the routes the client pushed onto the outward interface
      const flush = await this.runner.run(
        "ip",
        ["route", "flush", "dev", clientIface],
        { elevated: true, okExitCodes: [0, 1] },
      );
      if (!flush.success) {
        logger.warn(
          `Route flush on ${clientIface} failed: ${flush.error.message}`,
        );
      }

      this.setState({ status: VpnStatus.DISCONNECTED });
      return this.state;
    });
  }

  async probe(): Promise<VpnState> {
    if (this.lock.isLocked()) {
      return this.state;
    }

    const before = this.state;
    const result = await this.runner.run("pgrep", ["-x", VPN_PROCESS_NAME], {
      okExitCodes: [0, 1],
    });
    if (!result.success) {
      logger.debug(`VPN probe failed: ${result.error.message}`);
      return this.state;
    }
    // A lifecycle operation started while pgrep was running
    if (this.lock.isLocked() || this.state !== before) {
      return this.state;
    }

    const alive = result.data.exitCode === 0;
    const state = this.state;
    switch (state.status) {
      case VpnStatus.CONNECTING:
        if (alive) {
          this.setState({
            status: VpnStatus.CONNECTED,
            profile: state.profile,
          });
        } else if (this.now() - state.since >= this.connectGraceMs) {
          logger.warn(
            `openvpn for "${state.profile.displayName}" exited before connecting`,
          );
          this.setState({ status: VpnStatus.DISCONNECTED });
        }
        break;
      case VpnStatus.CONNECTED:
        if (!alive) {
          logger.warn("openvpn is no longer running");
          this.setState({ status: VpnStatus.DISCONNECTED });
        }
        break;
      case VpnStatus.DISCONNECTED:
        if (alive) {
          logger.info("Found an openvpn process started outside the panel");
          this.setState({ status: VpnStatus.CONNECTED, profile: null });
        }
        break;
      case VpnStatus.DISCONNECTING:
        break;
    }

    return this.state;
  }

  onStateChange(
    callback: (state: VpnState, previousState: VpnState) => void,
  ): () => void {
    this.stateChangeCallbacks.push(callback);

    return () => {
      const index = this.stateChangeCallbacks.indexOf(callback);
      if (index > -1) {
        this.stateChangeCallbacks.splice(index, 1);
      }
    };
  }

  private setState(next: VpnState): void {
    const previous = this.state;
    this.state = next;
    logger.info(
      `VPN state transition: ${describeState(previous)} -> ${describeState(next)}`,
    );

    for (const callback of this.stateChangeCallbacks) {
      try {
        callback(next, previous);
      } catch (error) {
        logger.error("Error in VPN state change callback:", error);
      }
    }
  }
}
