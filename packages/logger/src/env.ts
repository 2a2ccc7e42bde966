import {Logger, LogLevel, LogLevels} from "@binlayout/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat, logFormats, LoggerOptions, TimestampFormat, TimestampFormatCode} from "./interface.js";
import {ConsoleTransport} from "./utils/consoleTransport.js";
import {createWinstonLogger} from "./winston.js";

export function getEnvLogLevel(): LogLevel | null {
  if (process == null) return null;
  const level = process.env.LOG_LEVEL;
  if (level) return LogLevels.find((l) => l === level) ?? null;
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

function getEnvLogFormat(): LogFormat | undefined {
  return logFormats.find((f) => f === process.env.LOG_FORMAT);
}

function getEnvTimestampFormat(): TimestampFormat | undefined {
  const format = Object.values(TimestampFormatCode).find((f) => f === process.env.LOG_TIMESTAMP_FORMAT);
  return format !== undefined ? {format} : undefined;
}

/**
 * Logger configured by `LOG_LEVEL` (or `DEBUG` / `VERBOSE`), `LOG_FORMAT` and
 * `LOG_TIMESTAMP_FORMAT`. Logs nothing unless a level is set.
 */
export function getEnvLogger(opts?: Partial<LoggerOptions>): Logger {
  const level = opts?.level ?? getEnvLogLevel();
  const format = opts?.format ?? getEnvLogFormat();
  const timestampFormat = opts?.timestampFormat ?? getEnvTimestampFormat();

  if (level != null) {
    return createWinstonLogger({module: opts?.module ?? "", level, format, timestampFormat}, [
      new ConsoleTransport({level}),
    ]);
  }

  return getEmptyLogger();
}
