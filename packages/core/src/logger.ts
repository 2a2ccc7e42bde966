import {getEnvLogger} from "@binlayout/logger";
import {Logger} from "@binlayout/utils";

let defaultLogger: Logger | null = null;

/**
 * Logger used for provider I/O when the caller passes none. Created on first use
 * so the environment can be set up before.
 */
export function getDefaultLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = getEnvLogger({module: "binlayout"});
  }
  return defaultLogger;
}
