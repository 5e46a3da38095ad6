import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  verbose?: boolean;
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.verbose ? "debug" : "info";
  if (options.destination) {
    return pino({ level }, options.destination);
  }
  return pino({ level });
}

// stdout carries command output, so the CLI logs to stderr.
export function createCliLogger(verbose: boolean): Logger {
  return createLogger({ verbose, destination: pino.destination({ dest: 2, sync: true }) });
}
