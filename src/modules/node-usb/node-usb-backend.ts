import { setImmediate as yieldToEventLoop, setTimeout as delay } from "node:timers/promises";
import type { Device } from "usb";
import { createInvalidConfigurationError } from "../../services/hotplug/hotplug-errors.js";
import { silentLogger, type LoggerLikeT } from "../../services/logger.js";
import { toAbortError } from "../../utils/abort.js";
import type {
  BackendParamsT,
  UsbBusScannerBackendT,
} from "../backend-module.js";
import {
  UsbDeviceFilterSchema,
  type NodeUsbBackendOptionsT,
  type UsbBindingT,
  type UsbDeviceFilterT,
  type UsbDeviceLikeT,
} from "./node-usb-types.js";

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_SETTLE_MS = 500;

function hex4(value: number): string {
  return value.toString(16).toUpperCase().padStart(4, "0");
}

/**
 * Load the node-usb native binding.
 */
export async function loadUsbBinding(): Promise<UsbBindingT<Device>> {
  return import("usb");
}

/**
 * node-usb backend
 *
 * Enumerates devices through libusb (npm `usb`) and waits for the next scan
 * on attach/detach notifications, or on a timer when those are disabled.
 * The binding is loaded on first use, so a missing libusb only makes the
 * backend unsupported.
 */
export class NodeUsbBackend<TDevice extends UsbDeviceLikeT>
  implements UsbBusScannerBackendT<TDevice>
{
  readonly name = "node-usb";

  private readonly loadBinding: () => Promise<UsbBindingT<TDevice>>;
  private readonly hotplug: boolean;
  private readonly pollIntervalMs: number;
  private readonly settleMs: number;
  private readonly logger: LoggerLikeT;

  private bindingPromise: Promise<UsbBindingT<TDevice>> | null = null;
  private filter: UsbDeviceFilterT = {};

  // Hotplug notification bookkeeping
  private watchedBinding: UsbBindingT<TDevice> | null = null;
  private changeCount = 0;
  private changeCountAtScan = 0;
  private readonly changeWaiters = new Set<() => void>();
  private readonly onHotplug = () => {
    this.changeCount += 1;
    for (const notify of [...this.changeWaiters]) {
      notify();
    }
  };

  constructor(
    loadBinding: () => Promise<UsbBindingT<TDevice>>,
    options: NodeUsbBackendOptionsT & { logger?: LoggerLikeT } = {}
  ) {
    this.loadBinding = loadBinding;
    this.hotplug = options.hotplug ?? true;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate and store the device filter.
   *
   * @throws HotplugError (INVALID_CONFIGURATION) for unknown keys or
   *   out-of-range values
   */
  configure(params: BackendParamsT): void {
    const parsed = UsbDeviceFilterSchema.safeParse(params);
    if (!parsed.success) {
      throw createInvalidConfigurationError(
        "node-usb backend",
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "params"}: ${issue.message}`
        )
      );
    }
    this.filter = parsed.data;
  }

  /**
   * Supported when the binding loads and can enumerate the bus
   */
  async isSupported(): Promise<boolean> {
    try {
      const binding = await this.getBinding();
      binding.getDeviceList();
      return true;
    } catch (error: unknown) {
      this.bindingPromise = null;
      this.logger.debug?.(
        `[NodeUsbBackend] Not supported: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }

  /**
   * Key from vendor ID, product ID, bus number and address.
   *
   * The serial number is deliberately left out: reading it on every scan
   * makes some devices freeze.
   */
  keyOf(device: TDevice): string {
    const { idVendor, idProduct } = device.deviceDescriptor;
    return `${hex4(idVendor)}:${hex4(idProduct)} at bus ${device.busNumber}, address ${device.deviceAddress}`;
  }

  /**
   * Enumerate the bus and return the devices matching the filter.
   *
   * libusb enumeration is synchronous in the binding; the scan yields to the
   * event loop first and checks `signal` on both sides of it.
   */
  async scan(signal?: AbortSignal): Promise<TDevice[]> {
    const binding = await this.getBinding();
    if (this.hotplug) {
      this.watch(binding);
    }

    await yieldToEventLoop(undefined, { signal });
    this.changeCountAtScan = this.changeCount;
    const devices = binding.getDeviceList();
    if (signal?.aborted) {
      throw toAbortError(signal);
    }

    return devices.filter((device) => this.matches(device));
  }

  /**
   * Wait for the next hotplug notification and let the bus settle, or
   * sleep for the polling interval when notifications are off.
   */
  async waitUntilNextScan(signal?: AbortSignal): Promise<void> {
    if (!this.hotplug) {
      await delay(this.pollIntervalMs, undefined, { signal });
      return;
    }

    this.watch(await this.getBinding());

    // Notifications that arrived during the last scan count as a change
    if (this.changeCount === this.changeCountAtScan) {
      await this.waitForChange(signal);
    }

    // Coalesce bursts so one plug-in triggers one scan
    while (await this.waitForChange(signal, this.settleMs)) {
      this.logger.debug?.("[NodeUsbBackend] Bus still settling");
    }
  }

  /**
   * Stop listening for hotplug notifications
   */
  close(): void {
    if (!this.watchedBinding) {
      return;
    }
    this.watchedBinding.usb.off("attach", this.onHotplug);
    this.watchedBinding.usb.off("detach", this.onHotplug);
    this.watchedBinding = null;
    this.logger.debug?.("[NodeUsbBackend] Hotplug listeners removed");
  }

  private getBinding(): Promise<UsbBindingT<TDevice>> {
    if (!this.bindingPromise) {
      this.bindingPromise = this.loadBinding();
    }
    return this.bindingPromise;
  }

  private watch(binding: UsbBindingT<TDevice>): void {
    if (this.watchedBinding) {
      return;
    }
    binding.usb.on("attach", this.onHotplug);
    binding.usb.on("detach", this.onHotplug);
    this.watchedBinding = binding;
    this.logger.debug?.("[NodeUsbBackend] Hotplug listeners attached");
  }

  private matches(device: TDevice): boolean {
    const descriptor = device.deviceDescriptor;
    const filter = this.filter;
    return (
      (filter.idVendor === undefined || descriptor.idVendor === filter.idVendor) &&
      (filter.idProduct === undefined || descriptor.idProduct === filter.idProduct) &&
      (filter.bDeviceClass === undefined || descriptor.bDeviceClass === filter.bDeviceClass) &&
      (filter.bDeviceSubClass === undefined || descriptor.bDeviceSubClass === filter.bDeviceSubClass) &&
      (filter.bDeviceProtocol === undefined || descriptor.bDeviceProtocol === filter.bDeviceProtocol) &&
      (filter.bcdDevice === undefined || descriptor.bcdDevice === filter.bcdDevice) &&
      (filter.busNumber === undefined || device.busNumber === filter.busNumber) &&
      (filter.deviceAddress === undefined || device.deviceAddress === filter.deviceAddress)
    );
  }

  /**
   * Resolve `true` on the next hotplug notification, `false` when
   * `timeoutMs` passes first. Rejects when `signal` aborts.
   */
  private waitForChange(
    signal?: AbortSignal,
    timeoutMs?: number
  ): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) {
          clearTimeout(timer);
        }
        this.changeWaiters.delete(onChange);
        signal?.removeEventListener("abort", onAbort);
      };
      const onChange = () => {
        cleanup();
        resolve(true);
      };
      const onAbort = () => {
        cleanup();
        reject(signal ? toAbortError(signal) : new Error("Aborted"));
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }

      this.changeWaiters.add(onChange);
      signal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          resolve(false);
        }, timeoutMs);
      }
    });
  }
}

/**
 * Create a node-usb backend bound to the real `usb` package.
 */
export function createNodeUsbBackend(
  options: NodeUsbBackendOptionsT & { logger?: LoggerLikeT } = {}
): NodeUsbBackend<Device> {
  return new NodeUsbBackend<Device>(loadUsbBinding, options);
}
