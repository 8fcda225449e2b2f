import path from "node:path";
import { htmlToMarkdown, type MarkdownConverter } from "./content-converter.js";
import { anchorSlug, assembleDocument, writeDocument } from "./document-assembler.js";
import { applyPreRemoval, extractTitle, locateElements, removeNavigation } from "./element-selector.js";
import { EntryPageError, NoContainerError, NoLinksError } from "./errors.js";
import { extractLinks } from "./link-extractor.js";
import { MarkdownLinkRewriter, type LinkRewriter } from "./link-rewriter.js";
import { createLogger, type Logger } from "./logger.js";
import { DEFAULT_OUTPUT_ROOT, documentDir, PageCache } from "./page-cache.js";
import { DEFAULT_FETCH_TIMEOUT_MS, fetchPage } from "./page-fetcher.js";
import type {
  AnchorTable,
  CrawlConfig,
  CrawlProgress,
  CrawlResult,
  CrawlStage,
  PageRecord,
  PageSection,
  PageTable,
} from "./types.js";
import { dedupePreservingOrder, stripFragment } from "./url-normalizer.js";

export const DEFAULT_FILENAME = "all_in_one.md";

export interface CrawlOptions {
  config: CrawlConfig;
  /** Root for the document and the raw HTML cache. Defaults to `downloads`. */
  outputRoot?: string;
  filename?: string;
  /** Pause between consecutive requests. */
  delayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  converter?: MarkdownConverter;
  linkRewriter?: LinkRewriter;
  onStageChange?: (stage: CrawlStage) => void | Promise<void>;
  onProgress?: (progress: CrawlProgress) => void | Promise<void>;
}

/** The entry page first, then the extracted links, fragment-free and without repeats. */
export function buildCandidateList(baseUrl: string, links: string[]): string[] {
  return dedupePreservingOrder([baseUrl, ...links].map(stripFragment));
}

// Scheme and host with nothing after them, or only a query or fragment.
const BARE_HOST = /^[a-z][a-z\d+.-]*:\/\/[^/?#]*(?:[?#].*)?$/i;

/** Fallback title: the URL path, `index` for a bare host, a trailing `/` mapped to `/index`. */
export function titleFromPath(url: string): string {
  if (BARE_HOST.test(url)) return "index";
  const pathname = new URL(url).pathname;
  return pathname.endsWith("/") ? `${pathname}index` : pathname;
}

export function buildAnchorTable(pages: PageTable): AnchorTable {
  return new Map(Array.from(pages.values(), (page): [string, string] => [page.url, page.anchorSlug]));
}

interface FetchAllResult {
  pages: PageTable;
  failed: string[];
}

async function fetchAll(
  candidates: string[],
  entry: { url: string; html: string },
  options: CrawlOptions,
  logger: Logger,
): Promise<FetchAllResult> {
  const { config } = options;
  const cache = new PageCache(options.outputRoot ?? DEFAULT_OUTPUT_ROOT, config.baseUrl);
  const pages: PageTable = new Map();
  const failed: string[] = [];
  const delayMs = options.delayMs ?? 0;

  for (const url of candidates) {
    let rawHtml: string | null;
    if (url === entry.url) {
      rawHtml = entry.html;
    } else {
      if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
      rawHtml = await fetchPage(url, { timeoutMs: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS, logger });
    }

    if (rawHtml === null) {
      logger.warn(`Skipping ${url}: page unavailable`, url);
      failed.push(url);
    } else {
      let cachePath: string | undefined;
      try {
        cachePath = await cache.put(url, rawHtml);
        logger.debug(`Cached raw HTML at ${cachePath}`, url);
      } catch (error) {
        logger.warn(`Failed to cache HTML for ${url}: ${(error as Error).message}`, url);
      }

      const title = extractTitle(rawHtml) ?? titleFromPath(url);
      const record: PageRecord = {
        url,
        html: applyPreRemoval(rawHtml, config.preRemove),
        title,
        anchorSlug: anchorSlug(title),
        ...(cachePath ? { cachePath } : {}),
      };
      pages.set(url, record);
    }

    await options.onProgress?.({
      total: candidates.length,
      succeeded: pages.size,
      failed: failed.length,
      currentUrl: url,
    });
  }

  return { pages, failed };
}

function convertPages(pages: PageTable, entryUrl: string, options: CrawlOptions, logger: Logger): PageSection[] {
  const rewriter = options.linkRewriter ?? new MarkdownLinkRewriter();
  const anchors = buildAnchorTable(pages);
  const sections: PageSection[] = [];

  for (const page of pages.values()) {
    const html = page.url === entryUrl ? page.html : removeNavigation(page.html, options.config.selector);
    const markdown = htmlToMarkdown(html, { converter: options.converter, logger, url: page.url });
    sections.push({
      title: page.title,
      markdown: rewriter.rewrite(markdown, { anchors, pageUrl: page.url }),
    });
  }

  return sections;
}

/**
 * Fetches the entry page, discovers the tutorial's pages through the link
 * container, converts every page and writes one Markdown document.
 *
 * Throws a CrawlError when the entry page, the container or its links are
 * missing, or when the document cannot be written. Individual pages that fail
 * to fetch are left out; pages that fail to convert keep a degraded section.
 */
export async function crawlTutorial(options: CrawlOptions): Promise<CrawlResult> {
  const startedAt = Date.now();
  const { config } = options;
  const logger = options.logger ?? createLogger();
  let stage: CrawlStage = "idle";

  async function enter(next: CrawlStage): Promise<void> {
    logger.debug(`Stage ${stage} -> ${next}`);
    stage = next;
    await options.onStageChange?.(next);
  }

  try {
    await enter("fetch-entry");
    logger.info(`Starting crawl of ${config.baseUrl}`);
    const entryHtml = await fetchPage(config.baseUrl, {
      timeoutMs: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      logger,
    });
    if (entryHtml === null) {
      throw new EntryPageError(config.baseUrl);
    }

    await enter("locate-container");
    const located = locateElements(entryHtml, config.selector);
    logger.info(`Found ${located.elements.length} link container elements`);
    if (!located.elements.length) {
      throw new NoContainerError(config.selector);
    }

    await enter("extract-links");
    const links = extractLinks(located, config.baseUrl, logger);
    if (!links.length) {
      throw new NoLinksError();
    }

    await enter("fetch-all");
    const candidates = buildCandidateList(config.baseUrl, links);
    const entryUrl = candidates[0];
    logger.info(`Fetching ${candidates.length} pages`);
    const { pages, failed } = await fetchAll(candidates, { url: entryUrl, html: entryHtml }, options, logger);

    await enter("convert");
    const sections = convertPages(pages, entryUrl, options, logger);

    await enter("assemble");
    const document = assembleDocument(config.baseUrl, pages.values(), sections);

    await enter("persist");
    const outputPath = path.join(
      documentDir(options.outputRoot ?? DEFAULT_OUTPUT_ROOT, config.baseUrl),
      options.filename ?? DEFAULT_FILENAME,
    );
    await writeDocument(outputPath, document);
    logger.info(`Wrote ${pages.size} pages to ${outputPath}`);

    await enter("done");
    return {
      outputPath,
      pages: Array.from(pages.keys()),
      failed,
      durationMs: Date.now() - startedAt,
    };
  } catch (error) {
    logger.error(`Crawl failed during ${stage}: ${(error as Error).message}`);
    await enter("failed");
    throw error;
  }
}
