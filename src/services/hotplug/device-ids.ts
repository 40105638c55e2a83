import { z } from "zod";
import type { BackendParamsT } from "../../modules/backend-module.js";
import { createInvalidDeviceIdError } from "./hotplug-errors.js";

const MAX_USB_ID = 0xffff;

/**
 * USB vendor/product ID: hexadecimal string ("0402", "0x0402") or integer
 */
export const UsbIdSchema = z.union([
  z
    .string()
    .trim()
    .regex(/^(0x)?[0-9a-f]{1,4}$/i)
    .transform((value) => parseInt(value, 16)),
  z.number().int().min(0).max(MAX_USB_ID),
]);

export type UsbIdInputT = string | number;

/**
 * Normalize a vendor or product ID to its integer value.
 *
 * Strings are always read as hexadecimal; numbers are taken as-is.
 *
 * @param value ID as a hex string or an integer
 * @param field Name used in the error message
 * @throws HotplugError (INVALID_DEVICE_ID) if the value is not a valid ID
 */
export function toUsbId(value: unknown, field = "device ID"): number {
  const parsed = UsbIdSchema.safeParse(value);
  if (!parsed.success) {
    throw createInvalidDeviceIdError(field, value);
  }
  return parsed.data;
}

const PARAM_ALIASES: ReadonlyArray<{
  alias: string;
  name: string;
  field: string;
}> = [
  { alias: "vid", name: "idVendor", field: "vendor ID" },
  { alias: "pid", name: "idProduct", field: "product ID" },
];

/**
 * Rewrite commonly used parameter aliases to the names backends understand:
 * `vid` becomes `idVendor` and `pid` becomes `idProduct`, both converted to
 * integers. An alias is dropped when its canonical name is already set.
 *
 * @returns A new parameter object; the input is left untouched
 */
export function normalizeBackendParams(params: BackendParamsT): BackendParamsT {
  const result: BackendParamsT = { ...params };

  for (const { alias, name, field } of PARAM_ALIASES) {
    if (!(alias in result)) {
      continue;
    }
    const value = result[alias];
    delete result[alias];
    if (!(name in result)) {
      result[name] = toUsbId(value, field);
    }
  }

  return result;
}
