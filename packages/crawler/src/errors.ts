import type { CrawlStage } from "./types.js";

export class CrawlError extends Error {
  readonly stage: CrawlStage;

  constructor(stage: CrawlStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class ConfigError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("idle", message, options);
  }
}

/** Recoverable: the page is left out of the document. */
export class FetchError extends CrawlError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super("fetch-all", message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export class EntryPageError extends CrawlError {
  constructor(url: string) {
    super("fetch-entry", `Cannot retrieve entry page ${url}`);
  }
}

export class NoContainerError extends CrawlError {
  constructor(selector: { type: string; value: string }) {
    super("locate-container", `No link container found for ${selector.type}="${selector.value}"`);
  }
}

export class NoLinksError extends CrawlError {
  constructor() {
    super("extract-links", "No links discovered in the link container");
  }
}

/** Recoverable: the page section holds the error and the raw HTML instead. */
export class ConversionError extends CrawlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("convert", message, options);
  }
}

export class PersistError extends CrawlError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super("persist", `Failed to write ${path}${reason}`, options);
    this.path = path;
  }
}

export function isCrawlError(error: unknown): error is CrawlError {
  return error instanceof CrawlError;
}
