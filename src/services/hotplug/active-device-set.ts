import { createHotplugEvent, type HotplugEventT } from "./hotplug-types.js";

/**
 * Result of applying one scan to the active set
 */
export type ScanDiffT<TDevice> = {
  removed: HotplugEventT<TDevice>[];
  added: HotplugEventT<TDevice>[];
};

/**
 * Active device set
 *
 * Devices currently known to be connected, keyed by backend identity key.
 * Owned by a single scan loop and only mutated through `applyScan()`.
 */
export class ActiveDeviceSet<TDevice> {
  private readonly active = new Map<string, TDevice>();
  private readonly keyOf: (device: TDevice) => string;

  constructor(keyOf: (device: TDevice) => string) {
    this.keyOf = keyOf;
  }

  /**
   * Diff a scan result against the active set and update it.
   *
   * Keys already active are kept with their original handle. New keys are
   * collected once each, the last duplicate in the scan winning. Active keys
   * missing from the scan are dropped and reported with their last known
   * handle.
   */
  applyScan(devices: readonly TDevice[]): ScanDiffT<TDevice> {
    const seen = new Set<string>();
    const candidates = new Map<string, TDevice>();

    for (const device of devices) {
      const key = this.keyOf(device);
      if (this.active.has(key)) {
        seen.add(key);
      } else {
        candidates.set(key, device);
      }
    }

    const removed: HotplugEventT<TDevice>[] = [];
    for (const [key, device] of this.active) {
      if (!seen.has(key)) {
        removed.push(createHotplugEvent("removed", device, key));
      }
    }
    for (const event of removed) {
      this.active.delete(event.key);
    }

    const added: HotplugEventT<TDevice>[] = [];
    for (const [key, device] of candidates) {
      this.active.set(key, device);
      added.push(createHotplugEvent("added", device, key));
    }

    return { removed, added };
  }

  /**
   * Keys of all active devices, in insertion order
   */
  keys(): string[] {
    return [...this.active.keys()];
  }

  has(key: string): boolean {
    return this.active.has(key);
  }

  get size(): number {
    return this.active.size;
  }
}
