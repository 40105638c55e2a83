/**
 * Backend-specific configuration passed to `configure()`.
 */
export type BackendParamsT = Record<string, unknown>;

/**
 * USB bus scanner backend interface
 *
 * Each scanning strategy (node-usb enumeration, dummy, etc.) implements this
 * interface. The hotplug detector only ever talks to a backend through it.
 */
export interface UsbBusScannerBackendT<TDevice = unknown> {
  /**
   * Backend identifier used in logs and autodetection
   */
  readonly name: string;

  /**
   * Specify which devices the backend should report.
   *
   * Called once before the first scan. The detector hands over a private
   * copy of its parameters, so the backend may keep the object as-is.
   *
   * @throws HotplugError (INVALID_CONFIGURATION) if the parameters are rejected
   */
  configure(params: BackendParamsT): void;

  /**
   * Capability probe: whether the backend works on the current platform.
   */
  isSupported(): Promise<boolean>;

  /**
   * Unique identity key of a connected device.
   *
   * Must be stable for the same device across consecutive scans and unique
   * among simultaneously connected devices. It must not depend on volatile
   * queries (serial numbers etc.). Two distinct devices sharing a key is a
   * contract violation the detector cannot notice.
   */
  keyOf(device: TDevice): string;

  /**
   * Scan the bus and return the matching devices.
   *
   * Must be safe to call repeatedly. Blocking work should be kept off the
   * event loop and should stop when `signal` aborts.
   */
  scan(signal?: AbortSignal): Promise<TDevice[]>;

  /**
   * Resolve when the next scan is due.
   *
   * The backend decides the trigger: a fixed interval, an OS hotplug
   * notification, etc. Rejects when `signal` aborts.
   */
  waitUntilNextScan(signal?: AbortSignal): Promise<void>;

  /**
   * Optional: release listeners and handles once a scan loop ends
   */
  close?(): void;
}

/**
 * Factory producing a fresh backend for each scan loop
 */
export type BackendFactoryT<TDevice = unknown> = () =>
  | UsbBusScannerBackendT<TDevice>
  | Promise<UsbBusScannerBackendT<TDevice>>;
