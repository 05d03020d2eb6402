// Copyright 2018-2024 the oak authors. All rights reserved.

import { getRotatingFileSink } from "@logtape/file";
import {
  configure as configureLogTape,
  getConsoleSink,
  getLogger as gl,
  getStreamSink,
  type Logger,
  type LogLevel,
  type Sink,
  type TextFormatter,
  withFilter,
} from "@logtape/logtape";
import { inspect } from "node:util";

export type { Logger } from "@logtape/logtape";

/**
 * Options which can be set when configuring file logging on the logger.
 */
export interface FileLoggerOptions {
  /**
   * The log level to log at. The default is `"info"`.
   */
  level?: LogLevel;
  /**
   * The maximum number of log files to keep. The default is `5`.
   */
  maxBackupCount?: number;
  /**
   * The maximum size of a log file before it is rotated in bytes. The default
   * is 10MB.
   */
  maxBytes?: number;
  /**
   * The path to the log file.
   */
  filename: string;
}

/**
 * Options which can be set when configuring the logger when creating a new
 * router.
 */
export interface LoggerOptions {
  /**
   * Log events to the console. If `true`, log at the `"info"` level. If an
   * object, the `level` can be specified.
   */
  console?: boolean | { level: LogLevel };
  /**
   * Log events to a rotating log file. The value should be an object with the
   * `filename` of the log file and optionally the `level` to log at. If `level`
   * is not specified, the default is `"info"`.
   */
  file?: FileLoggerOptions;
  /**
   * Log events to a stream. The value should be an object with the `stream` to
   * pipe the log events to and optionally the `level` to log at. If `level` is
   * not specified, the default is `"info"`.
   */
  stream?: { level?: LogLevel; stream: WritableStream };
}

function renderMessage(message: readonly unknown[]): string {
  let msg = "";
  for (let i = 0; i < message.length; i++) {
    const part = message[i];
    msg += typeof part === "string"
      ? part
      : inspect(part, { breakLength: Infinity });
  }
  return msg;
}

export const formatter: TextFormatter = (
  { timestamp, level, category, message },
) =>
  `${new Date(timestamp).toISOString()} [${level.toUpperCase()}] ${
    category.join(".")
  }: ${renderMessage(message)}\n`;

const mods = [
  "context",
  "events",
  "group",
  "matcher",
  "request_server_node",
  "route",
  "router",
  "schema",
] as const;

type Loggers = typeof mods[number];

export function getLogger(mod: Loggers): Logger {
  return gl(["trellis", mod]);
}

/**
 * Configure the sinks of the integrated logger. When no options are provided
 * warnings and above are logged to the console.
 */
export async function configure(options?: LoggerOptions): Promise<void> {
  const sinks: Record<string, Sink> = {};
  if (options) {
    if (options.console) {
      sinks.console = withFilter(
        getConsoleSink({ formatter }),
        typeof options.console === "object" ? options.console.level : "info",
      );
    }
    if (options.file) {
      const {
        filename,
        maxBackupCount = 5,
        maxBytes = 1024 * 1024 * 10,
        level = "info",
      } = options.file;
      sinks.file = withFilter(
        getRotatingFileSink(filename, {
          maxFiles: maxBackupCount,
          maxSize: maxBytes,
          formatter,
        }),
        level,
      );
    }
    if (options.stream) {
      sinks.stream = withFilter(
        getStreamSink(options.stream.stream, { formatter }),
        options.stream.level ?? "info",
      );
    }
  } else {
    sinks.console = withFilter(getConsoleSink({ formatter }), "warning");
  }
  const names = Object.keys(sinks);
  await configureLogTape({
    reset: true,
    sinks,
    loggers: [
      { category: ["trellis"], sinks: names, lowestLevel: "debug" },
      { category: ["logtape", "meta"], sinks: names, lowestLevel: "warning" },
    ],
  });
}
