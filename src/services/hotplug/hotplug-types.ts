/**
 * Hotplug event type
 */
export type HotplugEventTypeT = "added" | "removed";

/**
 * Hotplug event emitted by the scan loop.
 *
 * `device` is the backend's handle, passed through untouched; `key` is the
 * identity the backend computed for it.
 */
export type HotplugEventT<TDevice = unknown> = Readonly<{
  type: HotplugEventTypeT;
  device: TDevice;
  key: string;
}>;

/**
 * Create a frozen hotplug event
 */
export function createHotplugEvent<TDevice>(
  type: HotplugEventTypeT,
  device: TDevice,
  key: string
): HotplugEventT<TDevice> {
  return Object.freeze({ type, device, key });
}

/**
 * Async task started for each added device.
 *
 * `signal` aborts when the device is removed (cancellable supervision) or
 * when the supervisor shuts down.
 */
export type DeviceTaskT<TDevice = unknown> = (
  device: TDevice,
  signal: AbortSignal
) => Promise<void>;

/**
 * Device filter applied before a task is started
 */
export type DevicePredicateT<TDevice = unknown> = (device: TDevice) => boolean;

/**
 * Options for a single event stream
 */
export type EventStreamOptionsT = {
  /**
   * Ends the stream when aborted
   */
  signal?: AbortSignal;
};

/**
 * Options for runForEachDevice()
 */
export type RunForEachDeviceOptionsT<TDevice = unknown> = {
  /**
   * Only devices matching the predicate get a task (default: all)
   */
  predicate?: DevicePredicateT<TDevice>;
  /**
   * Cancel a device's task when the device is removed (default: true)
   */
  cancellable?: boolean;
  /**
   * Stops scanning, cancels every task and waits for them when aborted
   */
  signal?: AbortSignal;
};
