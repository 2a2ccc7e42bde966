import winston from "winston";
import type {Logger as Winston} from "winston";
import {LogData, LoggerChildOpts, LoggerOptions, LoggerWithChild, LogLevel, logLevelNum} from "./interface.js";
import {getFormat} from "./utils/format.js";

// Log level is configured by transport only. Child loggers share the transports of
// their parent and only differ in the `module` default metadata.

interface DefaultMeta {
  module: string;
}

export function createWinstonLogger(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
  return WinstonLogger.fromOpts(options, transports);
}

export class WinstonLogger implements LoggerWithChild {
  constructor(private readonly winston: Winston) {}

  static fromOpts(options: Partial<LoggerOptions> = {}, transports?: winston.transport[]): WinstonLogger {
    const defaultMeta: DefaultMeta = {module: options?.module || ""};

    return new WinstonLogger(
      winston.createLogger({
        level: options.level,
        defaultMeta,
        format: getFormat(options),
        transports,
        exitOnError: false,
        levels: logLevelNum,
      })
    );
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.debug, message, context, error);
  }

  trace(message: string, context?: LogData, error?: Error): void {
    this.createLogEntry(LogLevel.trace, message, context, error);
  }

  child(options: LoggerChildOpts): WinstonLogger {
    const parentMeta = this.winston.defaultMeta as DefaultMeta | undefined;
    const childModule = [parentMeta?.module, options.module].filter(Boolean).join("/");
    const defaultMeta: DefaultMeta = {module: childModule};

    // Same strategy as winston's own `child`, except that the clone gets its
    // defaultMeta replaced so the child can overwrite `module`.
    const childWinston = Object.create(this.winston) as typeof this.winston;

    childWinston.defaultMeta = defaultMeta;

    return new WinstonLogger(childWinston);
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // Pass a single info object, `winston.log(level, message, ...meta)` would take the splat path
    this.winston.log(level, {message, context, error});
  }
}
