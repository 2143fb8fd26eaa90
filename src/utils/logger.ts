/**
 * logger.ts - Operational log for kube-query
 *
 * Every component logs through a pino Logger handed to it at construction:
 * received queries, extracted pod names, degraded collections, and request
 * failures. Lines are JSON, written to the console and appended to
 * <logDir>/kube-query.log.
 *
 * Console stream choice:
 * The MCP server speaks JSON-RPC over stdout, so anything else written there
 * corrupts the protocol. MCP mode passes console: "stderr".
 */

import * as path from "path";
import pino, { type Logger } from "pino";
import type { LogLevel } from "../config";

export type { Logger };

/** File name of the append-only log inside the configured log directory */
export const LOG_FILE_NAME = "kube-query.log";

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for the log file; null disables file output */
  logDir: string | null;
  /** Console stream for human-visible output. Defaults to stdout. */
  console?: "stdout" | "stderr";
}

/**
 * Creates the process-wide logger.
 *
 * pino.multistream fans each line out to the console and (optionally) the log
 * file. Each stream carries the same level so the file and console agree.
 */
export function createLogger(options: LoggerOptions): Logger {
  const consoleStream =
    options.console === "stderr" ? process.stderr : process.stdout;
  const streams: pino.StreamEntry<LogLevel>[] = [
    { level: options.level, stream: consoleStream },
  ];

  if (options.logDir) {
    streams.push({
      level: options.level,
      stream: pino.destination({
        dest: path.join(options.logDir, LOG_FILE_NAME),
        append: true,
        mkdir: true,
        sync: false,
      }),
    });
  }

  return pino(
    {
      name: "kube-query",
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}

/**
 * A logger that discards everything. Used as the default in library
 * functions and in tests that do not assert on log output.
 */
export const silentLogger: Logger = pino({ level: "silent" });
