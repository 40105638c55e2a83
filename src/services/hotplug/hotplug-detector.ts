import type {
  BackendFactoryT,
  BackendParamsT,
  UsbBusScannerBackendT,
} from "../../modules/backend-module.js";
import { chooseBackend } from "../../modules/index.js";
import { raceAbort } from "../../utils/abort.js";
import { silentLogger, type LoggerLikeT } from "../logger.js";
import { ActiveDeviceSet } from "./active-device-set.js";
import { normalizeBackendParams, toUsbId, type UsbIdInputT } from "./device-ids.js";
import { DeviceTaskSupervisor } from "./device-task-supervisor.js";
import { createScanFailedError } from "./hotplug-errors.js";
import type {
  DeviceTaskT,
  EventStreamOptionsT,
  HotplugEventT,
  RunForEachDeviceOptionsT,
} from "./hotplug-types.js";
import { SuspendGate } from "./suspend-gate.js";

export type HotplugDetectorOptionsT<TDevice> = {
  /**
   * Backend instance, or a factory called once per scan loop
   */
  backend: UsbBusScannerBackendT<TDevice> | BackendFactoryT<TDevice>;
  logger?: LoggerLikeT;
};

export type AutodetectOptionsT = {
  /**
   * Fall back to the dummy backend when no real backend is supported
   */
  allowFallback?: boolean;
  logger?: LoggerLikeT;
};

function hasBackend<TDevice>(
  options: AutodetectOptionsT | HotplugDetectorOptionsT<TDevice>
): options is HotplugDetectorOptionsT<TDevice> {
  return "backend" in options && options.backend !== undefined;
}

/**
 * Hotplug detector for USB devices
 *
 * Continuously scans the USB bus through a backend for devices matching the
 * configured parameters and reports devices that appear or disappear.
 *
 * Every call to `events()`, `addedDevices()`, `removedDevices()` or
 * `runForEachDevice()` runs its own scan loop with its own active set, so a
 * fresh stream first reports every matching device already connected. All
 * loops of one detector share its suspend gate.
 */
export class HotplugDetector<TDevice = unknown> {
  private readonly params: BackendParamsT;
  private readonly backend:
    | UsbBusScannerBackendT<TDevice>
    | BackendFactoryT<TDevice>;
  private readonly logger: LoggerLikeT;
  private readonly gate = new SuspendGate();

  /**
   * Create a detector whose backend is chosen for the current platform
   * when each scan loop starts.
   */
  static autodetect(
    params: BackendParamsT = {},
    options: AutodetectOptionsT = {}
  ): HotplugDetector<unknown> {
    return new HotplugDetector<unknown>(params, {
      backend: () =>
        chooseBackend({
          allowFallback: options.allowFallback,
          logger: options.logger,
        }),
      logger: options.logger,
    });
  }

  /**
   * Create a detector for devices matching a single VID:PID pair.
   *
   * Without a `backend` option the backend is autodetected.
   *
   * @param vid Vendor ID as a hex string ("0402", "0x0402") or an integer
   * @param pid Product ID as a hex string or an integer
   * @throws HotplugError (INVALID_DEVICE_ID) for malformed IDs
   */
  static forDevice(
    vid: UsbIdInputT,
    pid: UsbIdInputT,
    options?: AutodetectOptionsT
  ): HotplugDetector<unknown>;
  static forDevice<TDevice>(
    vid: UsbIdInputT,
    pid: UsbIdInputT,
    options: HotplugDetectorOptionsT<TDevice>
  ): HotplugDetector<TDevice>;
  static forDevice<TDevice>(
    vid: UsbIdInputT,
    pid: UsbIdInputT,
    options: AutodetectOptionsT | HotplugDetectorOptionsT<TDevice> = {}
  ): HotplugDetector<TDevice> | HotplugDetector<unknown> {
    const params: BackendParamsT = {
      idVendor: toUsbId(vid, "vendor ID"),
      idProduct: toUsbId(pid, "product ID"),
    };
    if (hasBackend(options)) {
      return new HotplugDetector<TDevice>(params, options);
    }
    return HotplugDetector.autodetect(params, options);
  }

  /**
   * @param params Backend configuration selecting the devices of interest.
   *   `vid`/`pid` aliases are rewritten to `idVendor`/`idProduct`.
   * @throws HotplugError (INVALID_DEVICE_ID) for malformed `vid`/`pid` values
   */
  constructor(params: BackendParamsT, options: HotplugDetectorOptionsT<TDevice>) {
    this.params = normalizeBackendParams(params);
    this.backend = options.backend;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Stream of hotplug events.
   *
   * Within one scan, removals are emitted before additions. The stream ends
   * when `options.signal` aborts and fails with SCAN_FAILED when a scan
   * rejects.
   */
  async *events(
    options: EventStreamOptionsT = {}
  ): AsyncGenerator<HotplugEventT<TDevice>, void, undefined> {
    const { signal } = options;
    if (signal?.aborted) {
      return;
    }

    const backend = await this.createBackend();
    try {
      backend.configure({ ...this.params });
      const active = new ActiveDeviceSet<TDevice>((device) =>
        backend.keyOf(device)
      );
      this.logger.debug?.(
        `[HotplugDetector] Scan loop started with backend ${backend.name}`
      );

      while (!signal?.aborted) {
        try {
          await this.gate.wait(signal);
        } catch (error: unknown) {
          if (signal?.aborted) {
            return;
          }
          throw error;
        }

        let devices: TDevice[];
        try {
          devices = await raceAbort(backend.scan(signal), signal);
        } catch (error: unknown) {
          if (signal?.aborted) {
            return;
          }
          throw createScanFailedError(error);
        }

        const { removed, added } = active.applyScan(devices);
        if (removed.length > 0 || added.length > 0) {
          this.logger.debug?.(
            `[HotplugDetector] Scan found ${devices.length} devices: ${added.length} added, ${removed.length} removed`
          );
        }

        for (const event of removed) {
          yield event;
        }
        for (const event of added) {
          yield event;
        }

        try {
          await raceAbort(backend.waitUntilNextScan(signal), signal);
        } catch (error: unknown) {
          if (signal?.aborted) {
            return;
          }
          throw error;
        }
      }
    } finally {
      backend.close?.();
      this.logger.debug?.(
        `[HotplugDetector] Scan loop with backend ${backend.name} stopped`
      );
    }
  }

  /**
   * Stream of devices whose addition was detected
   */
  async *addedDevices(
    options: EventStreamOptionsT = {}
  ): AsyncGenerator<TDevice, void, undefined> {
    for await (const event of this.events(options)) {
      if (event.type === "added") {
        yield event.device;
      }
    }
  }

  /**
   * Stream of devices whose removal was detected
   */
  async *removedDevices(
    options: EventStreamOptionsT = {}
  ): AsyncGenerator<TDevice, void, undefined> {
    for await (const event of this.events(options)) {
      if (event.type === "removed") {
        yield event.device;
      }
    }
  }

  /**
   * Run `task` for each device added to the bus.
   *
   * At most one task runs per device key. With `cancellable` (default) a
   * task's signal aborts when its device is removed. Resolves after
   * `options.signal` aborts and every task has settled; rejects with
   * TASK_FAILED (after cancelling the remaining tasks) when a task fails.
   */
  async runForEachDevice(
    task: DeviceTaskT<TDevice>,
    options: RunForEachDeviceOptionsT<TDevice> = {}
  ): Promise<void> {
    const { signal } = options;
    const supervisor = new DeviceTaskSupervisor<TDevice>(task, {
      predicate: options.predicate,
      cancellable: options.cancellable,
      logger: this.logger,
    });

    const onAbort = () => supervisor.cancel();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) {
      supervisor.cancel();
    }

    try {
      for await (const event of this.events({ signal: supervisor.signal })) {
        supervisor.dispatch(event);
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await supervisor.close();
    }

    supervisor.throwIfFailed();
  }

  /**
   * Temporarily suspend scanning. Calls nest: each suspend() needs a
   * matching resume().
   */
  suspend(): void {
    this.gate.suspend();
  }

  /**
   * Resume scanning after a suspend()
   *
   * @throws HotplugError (NOT_SUSPENDED) without a matching suspend()
   */
  resume(): void {
    this.gate.resume();
  }

  /**
   * Run `fn` with scanning suspended; resumes however `fn` exits
   */
  suspended<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.gate.suspended(fn);
  }

  get isSuspended(): boolean {
    return this.gate.isSuspended;
  }

  get suspendCount(): number {
    return this.gate.suspendCount;
  }

  private async createBackend(): Promise<UsbBusScannerBackendT<TDevice>> {
    if (typeof this.backend === "function") {
      return this.backend();
    }
    return this.backend;
  }
}
