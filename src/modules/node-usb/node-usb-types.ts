import { z } from "zod";

/**
 * Descriptor fields the backend reads from a node-usb device
 */
export interface UsbDeviceDescriptorLikeT {
  idVendor: number;
  idProduct: number;
  bDeviceClass: number;
  bDeviceSubClass: number;
  bDeviceProtocol: number;
  bcdDevice: number;
}

/**
 * Structural view of a node-usb `Device`
 */
export interface UsbDeviceLikeT {
  busNumber: number;
  deviceAddress: number;
  deviceDescriptor: UsbDeviceDescriptorLikeT;
}

export type UsbHotplugEventNameT = "attach" | "detach";

/**
 * Hotplug notifications emitted by the node-usb `usb` object
 */
export interface UsbHotplugEmitterT<TDevice> {
  on(
    event: UsbHotplugEventNameT,
    listener: (device: TDevice) => void
  ): unknown;
  off(
    event: UsbHotplugEventNameT,
    listener: (device: TDevice) => void
  ): unknown;
}

/**
 * The parts of the `usb` package the backend uses
 */
export interface UsbBindingT<TDevice extends UsbDeviceLikeT> {
  usb: UsbHotplugEmitterT<TDevice>;
  getDeviceList(): TDevice[];
}

const uint8 = z.number().int().min(0).max(0xff);
const uint16 = z.number().int().min(0).max(0xffff);

/**
 * Device filter accepted by `NodeUsbBackend.configure()`
 */
export const UsbDeviceFilterSchema = z
  .object({
    idVendor: uint16.optional(),
    idProduct: uint16.optional(),
    bDeviceClass: uint8.optional(),
    bDeviceSubClass: uint8.optional(),
    bDeviceProtocol: uint8.optional(),
    bcdDevice: uint16.optional(),
    busNumber: z.number().int().min(0).optional(),
    deviceAddress: z.number().int().min(0).optional(),
  })
  .strict();

export type UsbDeviceFilterT = z.infer<typeof UsbDeviceFilterSchema>;

export type NodeUsbBackendOptionsT = {
  /**
   * Wait for attach/detach notifications instead of polling (default: true)
   */
  hotplug?: boolean;
  /**
   * Polling period when hotplug notifications are off (default: 1000 ms)
   */
  pollIntervalMs?: number;
  /**
   * Quiet period after a notification before the next scan (default: 500 ms)
   */
  settleMs?: number;
};
