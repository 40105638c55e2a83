/**
 * Hotplug error codes
 */
export enum HotplugErrorCode {
  // Configuration errors
  INVALID_DEVICE_ID = "INVALID_DEVICE_ID",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",

  // Backend errors
  NO_BACKEND = "NO_BACKEND",
  SCAN_FAILED = "SCAN_FAILED",

  // Runtime errors
  TASK_FAILED = "TASK_FAILED",
  NOT_SUSPENDED = "NOT_SUSPENDED",
}

/**
 * Hotplug error class with structured error information
 */
export class HotplugError extends Error {
  public readonly code: HotplugErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: HotplugErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "HotplugError";
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON-serializable object
   */
  toJSON(): {
    code: HotplugErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create invalid vendor/product ID error
 */
export function createInvalidDeviceIdError(
  field: string,
  value: unknown
): HotplugError {
  return new HotplugError(
    HotplugErrorCode.INVALID_DEVICE_ID,
    `Invalid ${field}: ${JSON.stringify(value)}. Expected a hexadecimal string (e.g. "0402" or "0x0402") or an integer between 0 and 0xFFFF.`,
    { field, value }
  );
}

/**
 * Create invalid configuration error
 */
export function createInvalidConfigurationError(
  source: string,
  issues: string[]
): HotplugError {
  return new HotplugError(
    HotplugErrorCode.INVALID_CONFIGURATION,
    `Invalid ${source} configuration: ${issues.join("; ")}`,
    { source, issues }
  );
}

/**
 * Create no backend error
 */
export function createNoBackendError(candidates: string[]): HotplugError {
  return new HotplugError(
    HotplugErrorCode.NO_BACKEND,
    `No USB bus scanner backend is supported on ${process.platform} (tried: ${candidates.join(", ") || "none"}). Install libusb or allow the dummy fallback.`,
    { platform: process.platform, candidates }
  );
}

/**
 * Create scan failed error
 */
export function createScanFailedError(cause: unknown): HotplugError {
  return new HotplugError(
    HotplugErrorCode.SCAN_FAILED,
    `USB bus scan failed: ${describeError(cause)}`,
    undefined,
    cause
  );
}

/**
 * Create task failed error
 */
export function createTaskFailedError(
  key: string,
  cause: unknown
): HotplugError {
  return new HotplugError(
    HotplugErrorCode.TASK_FAILED,
    `Task for device ${key} failed: ${describeError(cause)}`,
    { key },
    cause
  );
}

/**
 * Create not suspended error
 */
export function createNotSuspendedError(): HotplugError {
  return new HotplugError(
    HotplugErrorCode.NOT_SUSPENDED,
    "Cannot resume: the hotplug detector is not suspended. Every resume() must match an earlier suspend()."
  );
}
