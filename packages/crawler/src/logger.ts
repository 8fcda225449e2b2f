import type { LogLevel } from "./types.js";

export type LogCallback = (level: LogLevel, message: string, url?: string) => void | Promise<void>;

export interface Logger {
  debug(message: string, url?: string): void;
  info(message: string, url?: string): void;
  warn(message: string, url?: string): void;
  error(message: string, url?: string): void;
}

function forward(callback: LogCallback, level: LogLevel, message: string, url?: string): void {
  const result = callback(level, message, url);
  if (result instanceof Promise) {
    result.catch((error: unknown) => {
      console.error("[error]", `Log callback failed: ${(error as Error).message}`);
    });
  }
}

/** `[level] message` on the console; debug only when DEBUG_CRAWL=1. */
export const consoleLogCallback: LogCallback = (level, message) => {
  switch (level) {
    case "debug":
      if (process.env.DEBUG_CRAWL === "1") console.log("[debug]", message);
      break;
    case "info":
      console.log("[info]", message);
      break;
    case "warn":
      console.warn("[warn]", message);
      break;
    case "error":
      console.error("[error]", message);
      break;
  }
};

/** Records go to `callback` when one is given, otherwise to the console. */
export function createLogger(callback?: LogCallback | null): Logger {
  const sink = callback ?? consoleLogCallback;
  return {
    debug: (message, url) => forward(sink, "debug", message, url),
    info: (message, url) => forward(sink, "info", message, url),
    warn: (message, url) => forward(sink, "warn", message, url),
    error: (message, url) => forward(sink, "error", message, url),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
