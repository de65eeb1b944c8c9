/**
 * Leveled, timestamped logging for summary runs
 *
 * Lines look like `2024-05-01 09:30:00,125 - WARNING - message`. Each line
 * goes to standard output and is appended to the run's log file. Pipeline
 * code logs through Effect.logInfo / logWarning / logError and never touches
 * the console directly.
 */

import { PlatformLogger } from "@effect/platform";
import { NodeFileSystem } from "@effect/platform-node";
import { Effect, Layer, Logger, type LogLevel } from "effect";

const pad = (value: number, width: number = 2): string => String(value).padStart(width, "0");

/**
 * Local-time timestamp with millisecond precision, e.g. `2024-05-01 09:30:00,125`
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Level name as written to the log; Effect's WARN is spelled out
 */
export function levelName(level: LogLevel.LogLevel): string {
  return level._tag === "Warning" ? "WARNING" : level.label;
}

function renderMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts.map((part) => (typeof part === "string" ? part : String(part))).join(" ");
}

export function formatLogLine(date: Date, level: LogLevel.LogLevel, message: unknown): string {
  return `${formatTimestamp(date)} - ${levelName(level)} - ${renderMessage(message)}`;
}

/**
 * Formats each log event into one line of text
 */
export const lineLogger = Logger.make(({ date, logLevel, message }) =>
  formatLogLine(date, logLevel, message)
);

export const consoleLogger = Logger.map(lineLogger, (line) => {
  console.log(line);
});

/**
 * Replace the default logger with console + log file output
 *
 * The file is opened in append mode and closed (after flushing buffered
 * lines) when the layer's scope ends.
 */
export function makeLoggerLayer(logFile: string) {
  const fileLogger = PlatformLogger.toFile(lineLogger, logFile, { flag: "a" });

  return Logger.replaceScoped(
    Logger.defaultLogger,
    Effect.map(fileLogger, (toFile) => Logger.zip(consoleLogger, toFile))
  ).pipe(Layer.provide(NodeFileSystem.layer));
}

