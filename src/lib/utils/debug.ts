/**
 * Debug logging utility for the comparison pipeline.
 * Only logs when DEBUG_COMPARE=true.
 *
 * Usage:
 *   import { debug } from "@/lib/utils/debug";
 *   debug.table.log("Row recovered from raw markup", { table: 0, row: 2 });
 */

type LogData = Record<string, unknown> | string | number | boolean | unknown | undefined;

function isDebugEnabled(): boolean {
  return process.env.DEBUG_COMPARE === "true";
}

function formatArgs(args: LogData[]): unknown[] {
  return args.map(arg => {
    if (arg === undefined) return "";
    return arg;
  });
}

function createLogger(prefix: string) {
  return {
    log: (...args: LogData[]) => {
      if (isDebugEnabled()) console.log(`[${prefix}]`, ...formatArgs(args));
    },
    warn: (...args: LogData[]) => {
      if (isDebugEnabled()) console.warn(`[${prefix}]`, ...formatArgs(args));
    },
  };
}

/** Namespaced debug loggers */
export const debug = {
  /** Package / XML part loading */
  parse: createLogger("Parse"),

  /** Paragraph and shape text */
  extract: createLogger("Extract"),

  /** Table rows: grid model, fallback, skips */
  table: createLogger("Table"),

  /** Segment splitting */
  segment: createLogger("Segment"),

  /** Review prompt / response */
  review: createLogger("Review"),
};
