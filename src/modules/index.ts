import { createNoBackendError } from "../services/hotplug/hotplug-errors.js";
import { silentLogger, type LoggerLikeT } from "../services/logger.js";
import type { UsbBusScannerBackendT } from "./backend-module.js";
import { DummyBackend } from "./dummy/dummy-backend.js";
import { createNodeUsbBackend } from "./node-usb/node-usb-backend.js";
import type { NodeUsbBackendOptionsT } from "./node-usb/node-usb-types.js";

export type BackendKindT = "auto" | "usb" | "dummy";

export type ChooseBackendOptionsT = {
  /**
   * Use the dummy backend when no candidate is supported
   */
  allowFallback?: boolean;
  logger?: LoggerLikeT;
  /**
   * Options for the node-usb backend
   */
  usb?: NodeUsbBackendOptionsT;
  /**
   * Candidates to probe, in order of preference (default: node-usb)
   */
  candidates?: UsbBusScannerBackendT<unknown>[];
};

/**
 * Choose a USB bus scanner backend for the current platform.
 *
 * Probes each candidate with `isSupported()` and returns the first that
 * works.
 *
 * @throws HotplugError (NO_BACKEND) when nothing is supported and fallback
 *   is not allowed
 */
export async function chooseBackend(
  options: ChooseBackendOptionsT = {}
): Promise<UsbBusScannerBackendT<unknown>> {
  const logger = options.logger ?? silentLogger;
  const candidates = options.candidates ?? [
    createNodeUsbBackend({ ...options.usb, logger }),
  ];

  for (const candidate of candidates) {
    if (await candidate.isSupported()) {
      logger.debug?.(`[Backends] Using backend ${candidate.name}`);
      return candidate;
    }
    logger.debug?.(`[Backends] Backend ${candidate.name} is not supported`);
  }

  if (options.allowFallback) {
    logger.warn(
      "[Backends] No USB backend is supported, falling back to the dummy backend"
    );
    return new DummyBackend();
  }

  throw createNoBackendError(candidates.map((candidate) => candidate.name));
}

/**
 * Create a backend by kind: "usb" and "dummy" are built directly, "auto"
 * goes through chooseBackend().
 */
export async function createBackend(
  kind: BackendKindT,
  options: ChooseBackendOptionsT = {}
): Promise<UsbBusScannerBackendT<unknown>> {
  switch (kind) {
    case "usb":
      return createNodeUsbBackend({ ...options.usb, logger: options.logger });
    case "dummy":
      return new DummyBackend();
    case "auto":
      return chooseBackend(options);
  }
}

export { DummyBackend } from "./dummy/dummy-backend.js";
export {
  NodeUsbBackend,
  createNodeUsbBackend,
  loadUsbBinding,
} from "./node-usb/node-usb-backend.js";
export type {
  BackendFactoryT,
  BackendParamsT,
  UsbBusScannerBackendT,
} from "./backend-module.js";
