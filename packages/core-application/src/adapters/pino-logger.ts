import pino from "pino";
import type { LogContext, LogFormat, Logger, LogLevel } from "../ports/logger";

export type PinoLoggerOptions = {
  level: LogLevel;
  format: LogFormat;
  source?: string;
};

class PinoLogger implements Logger {
  constructor(private readonly logger: pino.Logger) {}

  error(message: string, context: LogContext = {}): void {
    this.logger.error(context, message);
  }

  warn(message: string, context: LogContext = {}): void {
    this.logger.warn(context, message);
  }

  info(message: string, context: LogContext = {}): void {
    this.logger.info(context, message);
  }

  debug(message: string, context: LogContext = {}): void {
    this.logger.debug(context, message);
  }

  child(bindings: LogContext): Logger {
    return new PinoLogger(this.logger.child(bindings));
  }
}

/**
 * Builds the Logger port on top of pino. `pretty` goes through the
 * pino-pretty transport; an explicit destination is only honoured for
 * `json` output.
 */
export function createPinoLogger(
  options: PinoLoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: options.level,
    base: options.source ? { source: options.source } : undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
  };

  if (options.format === "pretty") {
    config.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
    return new PinoLogger(pino(config));
  }

  return new PinoLogger(destination ? pino(config, destination) : pino(config));
}
