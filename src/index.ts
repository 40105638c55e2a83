export { HotplugDetector } from "./services/hotplug/hotplug-detector.js";
export type {
  AutodetectOptionsT,
  HotplugDetectorOptionsT,
} from "./services/hotplug/hotplug-detector.js";
export { ActiveDeviceSet } from "./services/hotplug/active-device-set.js";
export type { ScanDiffT } from "./services/hotplug/active-device-set.js";
export { SuspendGate } from "./services/hotplug/suspend-gate.js";
export { DeviceTaskSupervisor } from "./services/hotplug/device-task-supervisor.js";
export type { DeviceTaskSupervisorOptionsT } from "./services/hotplug/device-task-supervisor.js";
export {
  normalizeBackendParams,
  toUsbId,
  UsbIdSchema,
} from "./services/hotplug/device-ids.js";
export type { UsbIdInputT } from "./services/hotplug/device-ids.js";
export { HotplugError, HotplugErrorCode } from "./services/hotplug/hotplug-errors.js";
export { createHotplugEvent } from "./services/hotplug/hotplug-types.js";
export type {
  DevicePredicateT,
  DeviceTaskT,
  EventStreamOptionsT,
  HotplugEventT,
  HotplugEventTypeT,
  RunForEachDeviceOptionsT,
} from "./services/hotplug/hotplug-types.js";
export {
  chooseBackend,
  createBackend,
  createNodeUsbBackend,
  DummyBackend,
  loadUsbBinding,
  NodeUsbBackend,
} from "./modules/index.js";
export type {
  BackendFactoryT,
  BackendKindT,
  BackendParamsT,
  ChooseBackendOptionsT,
  UsbBusScannerBackendT,
} from "./modules/index.js";
export type {
  NodeUsbBackendOptionsT,
  UsbBindingT,
  UsbDeviceFilterT,
  UsbDeviceLikeT,
} from "./modules/node-usb/node-usb-types.js";
export { createLogger } from "./services/logger.js";
export type { LoggerLikeT, LogLevelT } from "./services/logger.js";
