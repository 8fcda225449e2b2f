import path from "node:path";
import fs from "fs-extra";
import { consoleLogCallback, type LogCallback } from "@tutorial-md/crawler";

/**
 * Log callback appending `<iso time> [level] message (url)` lines to `filePath`.
 * Writes are chained so records keep their order.
 */
export function fileLogCallback(filePath: string): LogCallback {
  let pending: Promise<void> = fs.ensureDir(path.dirname(filePath));

  return (level, message, url) => {
    const line = `${new Date().toISOString()} [${level}] ${message}${url ? ` (${url})` : ""}\n`;
    pending = pending.then(() => fs.appendFile(filePath, line, "utf8"));
    return pending;
  };
}

/** Sends every record to the console as well as to `callback`. */
export function withConsole(callback: LogCallback, echo: LogCallback = consoleLogCallback): LogCallback {
  return async (level, message, url) => {
    await Promise.all([echo(level, message, url), callback(level, message, url)]);
  };
}
