import { pino, type Level, type Logger, type LoggerOptions } from "pino";

export type LoggerLikeT = {
  debug?: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type LogLevelT = Level | "silent";

export type CreateLoggerOptionsT = {
  level?: LogLevelT;
  component?: string;
};

/**
 * Default level: info in production, debug otherwise.
 */
export function defaultLogLevel(): LogLevelT {
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Create a pino logger.
 *
 * Outside production the output goes through pino-pretty.
 */
export function createLogger(options: CreateLoggerOptionsT = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? defaultLogLevel(),
    base: { component: options.component ?? "usb-hotplug" },
    transport:
      process.env.NODE_ENV === "production"
        ? undefined
        : {
            target: "pino-pretty",
            options: {
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
            },
          },
  };

  return pino(loggerOptions);
}

/**
 * Logger used by library classes when the caller provides none.
 */
export const silentLogger: Logger = pino({ level: "silent" });
