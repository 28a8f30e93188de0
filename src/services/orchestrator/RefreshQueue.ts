import { getLogger } from "@utils/logger";

const logger = getLogger("RefreshQueue");

/**
 * Runs poll ticks one at a time.
 *
 * A request that arrives while a tick is running is remembered and run
 * afterwards. Any number of such requests collapse into one.
 */
export class RefreshQueue {
  private isRefreshInProgress: boolean = false;
  private pendingRefresh: boolean = false;
  private closed: boolean = true;
  private running: Promise<void> | null = null;
  private refreshHandler: (() => Promise<void>) | null = null;

  /**
   * Set the handler that performs one tick
   */
  setRefreshHandler(handler: () => Promise<void>): void {
    this.refreshHandler = handler;
  }

  isInProgress(): boolean {
    return this.isRefreshInProgress;
  }

  hasPendingRefresh(): boolean {
    return this.pendingRefresh;
  }

  /**
   * Accept requests again after close()
   */
  open(): void {
    this.closed = false;
  }

  /**
   * Drop the pending request and ignore new ones
   */
  close(): void {
    this.closed = true;
    this.pendingRefresh = false;
  }

  /**
   * Request a tick.
   *
   * @returns true if the tick started immediately, false if queued or closed
   */
  request(): boolean {
    if (this.closed || !this.refreshHandler) {
      return false;
    }

    if (this.isRefreshInProgress) {
      this.pendingRefresh = true;
      logger.debug("Refresh queued, current tick in progress");
      return false;
    }

    this.isRefreshInProgress = true;
    this.running = this.run(this.refreshHandler);
    return true;
  }

  /**
   * Resolves once the running tick (if any) has finished
   */
  async whenIdle(): Promise<void> {
    if (this.running) {
      await this.running;
    }
  }

  private async run(handler: () => Promise<void>): Promise<void> {
    try {
      await handler();
    } catch (error) {
      logger.error("Refresh tick failed:", error);
    } finally {
      this.completeRefresh();
    }
  }

  private completeRefresh(): void {
    this.isRefreshInProgress = false;
    this.running = null;

    if (this.pendingRefresh && !this.closed) {
      this.pendingRefresh = false;
      logger.debug("Processing queued refresh");
      // setImmediate keeps back-to-back ticks off the same call stack
      setImmediate(() => {
        this.request();
      });
    }
  }
}
