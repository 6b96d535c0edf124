import { pino, type DestinationStream, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Destination stream; defaults to stdout. */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = { name: "linkhold", level: options.level ?? process.env.LOG_LEVEL ?? "info" };
  return options.destination ? pino(config, options.destination) : pino(config);
}
