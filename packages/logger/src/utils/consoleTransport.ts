import Transport from "winston-transport";
import {LEVEL, LogLevel, logLevelNum, MESSAGE, WinstonLogInfo} from "../interface.js";

type ConsoleMethod = "error" | "warn" | "info" | "log";

const consoleMethods: Record<LogLevel, ConsoleMethod> = {
  [LogLevel.error]: "error",
  [LogLevel.warn]: "warn",
  [LogLevel.info]: "info",
  [LogLevel.verbose]: "log",
  [LogLevel.debug]: "log",
  [LogLevel.trace]: "log",
};

/**
 * Writes each formatted line through the `console` method matching its level
 */
export class ConsoleTransport extends Transport {
  name = "ConsoleTransport";
  private readonly maxLevel: LogLevel;

  constructor(opts: {level: LogLevel}) {
    super({level: opts.level});
    this.maxLevel = opts.level;
  }

  log(info: WinstonLogInfo, callback: () => void): void {
    setImmediate(() => {
      this.emit("logged", info);
    });

    const level = info[LEVEL];
    if (logLevelNum[level] <= logLevelNum[this.maxLevel]) {
      console[consoleMethods[level]](info[MESSAGE]);
    }

    callback();
  }
}
