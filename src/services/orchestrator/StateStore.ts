import { IStatusReader } from "@core/interfaces";
import { SnapshotListener, StatusSnapshot } from "@core/types";
import { getLogger } from "@utils/logger";

const logger = getLogger("StateStore");

/**
 * Everything a poll contributes to a snapshot
 */
export type SnapshotInput = Omit<StatusSnapshot, "sequence" | "updatedAt">;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Holds the latest published snapshot.
 *
 * Only the polling scheduler calls publish(). Snapshots are cloned and
 * frozen, so a reader never sees a half-updated state and never shares
 * an object with the services that produced it.
 */
export class StateStore implements IStatusReader {
  private current: StatusSnapshot | null = null;
  private sequence: number = 0;
  private listeners: Set<SnapshotListener> = new Set();

  getSnapshot(): StatusSnapshot | null {
    return this.current;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(input: SnapshotInput, now: Date = new Date()): StatusSnapshot {
    const previous = this.current;
    this.sequence += 1;

    const snapshot = deepFreeze<StatusSnapshot>({
      ...structuredClone(input),
      sequence: this.sequence,
      updatedAt: now,
    });
    this.current = snapshot;

    for (const listener of this.listeners) {
      try {
        listener(snapshot, previous);
      } catch (error) {
        logger.error("Snapshot listener failed:", error);
      }
    }
    return snapshot;
  }
}
