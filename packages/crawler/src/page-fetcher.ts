import { FetchError } from "./errors.js";
import { noopLogger, type Logger } from "./logger.js";

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";

export interface FetchPageOptions {
  timeoutMs?: number;
  logger?: Logger;
}

function charsetFromContentType(contentType: string | null): string | null {
  const match = contentType?.match(/charset\s*=\s*["']?([\w.:-]+)/i);
  return match ? match[1] : null;
}

/** Looks for `<meta charset>` or an http-equiv content-type in the document head. */
function sniffCharset(bytes: Uint8Array): string | null {
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 2048));
  const direct = head.match(/<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i);
  return direct ? direct[1] : null;
}

function createDecoder(label: string | null): TextDecoder {
  if (label) {
    try {
      return new TextDecoder(label);
    } catch {
      // Unknown label; fall through to UTF-8.
    }
  }
  return new TextDecoder("utf-8");
}

export function decodeHtml(bytes: Uint8Array, contentType: string | null): string {
  const label = charsetFromContentType(contentType) ?? sniffCharset(bytes);
  return createDecoder(label).decode(bytes);
}

/** Single attempt. Throws FetchError on transport failure, timeout or a non-2xx status. */
export async function requestPage(url: string, timeoutMs: number = DEFAULT_FETCH_TIMEOUT_MS): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      redirect: "follow",
      headers: {
        "user-agent": USER_AGENT,
        accept: "text/html,application/xhtml+xml,*/*",
      },
      signal: controller.signal,
    });

    if (!res.ok) {
      throw new FetchError(url, `HTTP ${res.status} for ${url}`, { status: res.status });
    }

    const bytes = new Uint8Array(await res.arrayBuffer());
    return decodeHtml(bytes, res.headers.get("content-type"));
  } catch (error) {
    if (error instanceof FetchError) throw error;
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : (error as Error).message;
    throw new FetchError(url, `Request for ${url} failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}

/** Returns null when the page is unavailable; the caller skips it. */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string | null> {
  const logger = options.logger ?? noopLogger;
  logger.info(`Fetching ${url}`, url);
  try {
    const html = await requestPage(url, options.timeoutMs);
    logger.debug(`Fetched ${url} (${html.length} characters)`, url);
    return html;
  } catch (error) {
    logger.warn((error as Error).message, url);
    return null;
  }
}
