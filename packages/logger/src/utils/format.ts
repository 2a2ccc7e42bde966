import winston, {format} from "winston";
import {BinlayoutError, isEmptyObject, logCtxToJson, logCtxToString} from "@binlayout/utils";
import {LEVEL, LoggerOptions, TimestampFormatCode} from "../interface.js";

type Format = ReturnType<typeof winston.format.combine>;
type LogInfo = Parameters<Format["transform"]>[0];

const paddingBetweenInfo = 30;

// npm level colors are registered by winston, trace is ours
winston.addColors({trace: "magenta"});

export function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case "json":
      return jsonLogFormat(opts);
    case "human":
      return humanReadableLogFormat(opts);
    default:
      return humanReadableLogFormat(opts);
  }
}

function humanReadableLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden ? [] : [formatTimestamp()]),
    format.colorize(),
    format.printf(humanReadableTemplateFn)
  );
}

function formatTimestamp(): Format {
  return format.timestamp({format: "MMM-DD HH:mm:ss.SSS"});
}

function jsonLogFormat(opts: LoggerOptions): Format {
  return format.combine(
    ...(opts.timestampFormat?.format === TimestampFormatCode.Hidden ? [] : [format.timestamp()]),
    format((info) => {
      info.context = logCtxToJson(info.context);
      info.error = logCtxToJson(info.error);
      return info;
    })(),
    format.json()
  );
}

/**
 * Winston template function print a human readable string given a log object
 */
function humanReadableTemplateFn(info: LogInfo): string {
  const infoString = typeof info.module === "string" ? info.module : "";
  // Pad on the uncolored level so the column does not depend on color support
  const rawLevel = info[LEVEL];
  const levelLength = typeof rawLevel === "string" ? rawLevel.length : info.level.length;
  const infoPad = Math.max(paddingBetweenInfo - infoString.length - levelLength, 0);

  let str = "";

  if (typeof info.timestamp === "string") str += info.timestamp;

  str += `[${infoString}] ${" ".repeat(infoPad)}${info.level}: ${String(info.message)}`;

  const {context, error} = info;
  if (context !== undefined && !isEmptyObject(context)) str += " " + logCtxToString(context);
  if (error instanceof Error) {
    str +=
      // BinlayoutError metadata reads like context, any other error is set apart with " - "
      (error instanceof BinlayoutError ? (context === undefined || isEmptyObject(context) ? " " : ", ") : " - ") +
      logCtxToString(error);
  }

  return str;
}
