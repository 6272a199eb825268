import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger };

export type LogLevel = Level | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  destination?: DestinationStream;
}

/** JSON logs, synchronous, no transport; pipe through pino-pretty for humans. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = {
    level: options.level ?? "info",
    base: { service: options.service ?? "driver-bridge", pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime
  };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

export const silentLogger: Logger = pino({ level: "silent" });
