/**
 * Structured logging via pino. Every component takes a `Logger` and
 * defaults to `silentLogger`; the CLI and gateway create a real one.
 */
import pino from "pino";
import type { DestinationStream } from "pino";

export type Logger = pino.Logger;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
  service?: string;
  level?: LogLevel;
}

export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const service = options.service ?? "slotguard";
  const settings = {
    name: service,
    level: options.level ?? "info",
    base: { service },
    serializers: { err: pino.stdSerializers.err },
  };
  return destination ? pino(settings, destination) : pino(settings);
}

export const silentLogger: Logger = pino({ level: "silent" });
