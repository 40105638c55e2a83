import { setTimeout as delay } from "node:timers/promises";
import type {
  BackendParamsT,
  UsbBusScannerBackendT,
} from "../backend-module.js";

// Long enough to be "never" while staying below the Node.js timer limit.
const DUMMY_RESCAN_INTERVAL_MS = 100_000_000;

/**
 * Dummy USB bus scanner
 *
 * Never detects anything. Used as a fallback when no suitable backend
 * exists for the current platform.
 */
export class DummyBackend implements UsbBusScannerBackendT<unknown> {
  readonly name = "dummy";
  private readonly objectKeys = new WeakMap<object, string>();
  private nextObjectKey = 1;

  configure(_params: BackendParamsT): void {
    // Nothing to filter
  }

  async isSupported(): Promise<boolean> {
    return true;
  }

  /**
   * Identity key: objects get a per-instance counter, primitives their
   * type and string value.
   */
  keyOf(device: unknown): string {
    if (typeof device === "object" && device !== null) {
      let key = this.objectKeys.get(device);
      if (!key) {
        key = `object#${this.nextObjectKey++}`;
        this.objectKeys.set(device, key);
      }
      return key;
    }
    return `${typeof device}:${String(device)}`;
  }

  async scan(): Promise<unknown[]> {
    return [];
  }

  async waitUntilNextScan(signal?: AbortSignal): Promise<void> {
    await delay(DUMMY_RESCAN_INTERVAL_MS, undefined, { signal });
  }
}
