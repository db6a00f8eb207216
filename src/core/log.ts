import { getConfig, type LogLevelT } from "./config";

const rank: Record<LogLevelT, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

const PREFIX = "[arraykit]";

function enabled(level: Exclude<LogLevelT, "silent">): boolean {
  return rank[getConfig().logLevel] >= rank[level];
}

export const log = {
  error: (msg: string, ...rest: unknown[]) => {
    if (enabled("error")) console.error(PREFIX, msg, ...rest);
  },
  warn: (msg: string, ...rest: unknown[]) => {
    if (enabled("warn")) console.warn(PREFIX, msg, ...rest);
  },
  info: (msg: string, ...rest: unknown[]) => {
    if (enabled("info")) console.info(PREFIX, msg, ...rest);
  },
  debug: (msg: string, ...rest: unknown[]) => {
    if (enabled("debug")) console.debug(PREFIX, msg, ...rest);
  }
};
