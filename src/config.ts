import { z } from "zod";
import { createInvalidConfigurationError } from "./services/hotplug/hotplug-errors.js";
import { UsbIdSchema } from "./services/hotplug/device-ids.js";
import { defaultLogLevel } from "./services/logger.js";

/**
 * Monitor configuration schema
 */
const ConfigSchema = z.object({
  vid: UsbIdSchema.optional(),
  pid: UsbIdSchema.optional(),
  backend: z.enum(["auto", "usb", "dummy"]),
  allowFallback: z.boolean(),
  hotplug: z.boolean(),
  pollIntervalMs: z.number().int().min(10),
  settleMs: z.number().int().min(0),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
});

export type MonitorConfigT = z.infer<typeof ConfigSchema>;

type EnvT = Record<string, string | undefined>;

function parseNumber(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

function isEnabled(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Parse CLI arguments and environment variables into a validated
 * configuration. CLI flags win over environment variables.
 *
 * @throws HotplugError (INVALID_CONFIGURATION) listing every invalid value
 */
export function parseConfig(
  args: string[],
  env: EnvT = process.env
): MonitorConfigT {
  const config: Record<string, unknown> = {
    backend: env.HOTPLUG_BACKEND ?? "auto",
    allowFallback: isEnabled(env.HOTPLUG_ALLOW_FALLBACK),
    hotplug: !isEnabled(env.HOTPLUG_POLL),
    pollIntervalMs: env.HOTPLUG_POLL_INTERVAL_MS
      ? parseNumber(env.HOTPLUG_POLL_INTERVAL_MS)
      : 1000,
    settleMs: env.HOTPLUG_SETTLE_MS ? parseNumber(env.HOTPLUG_SETTLE_MS) : 500,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(),
  };
  if (env.HOTPLUG_VID) {
    config.vid = env.HOTPLUG_VID;
  }
  if (env.HOTPLUG_PID) {
    config.pid = env.HOTPLUG_PID;
  }

  // Parse CLI arguments
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    if (arg === "--allow-fallback") {
      config.allowFallback = true;
    } else if (arg === "--poll") {
      config.hotplug = false;
    } else if (nextArg === undefined) {
      continue;
    } else if (arg === "--vid") {
      config.vid = nextArg;
      i++; // Skip next argument as it's the value
    } else if (arg === "--pid") {
      config.pid = nextArg;
      i++;
    } else if (arg === "--backend") {
      config.backend = nextArg;
      i++;
    } else if (arg === "--poll-interval") {
      config.pollIntervalMs = parseNumber(nextArg);
      i++;
    } else if (arg === "--settle") {
      config.settleMs = parseNumber(nextArg);
      i++;
    } else if (arg === "--log-level") {
      config.logLevel = nextArg;
      i++;
    }
  }

  const parsed = ConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw createInvalidConfigurationError(
      "monitor",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
