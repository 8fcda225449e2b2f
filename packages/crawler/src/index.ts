// Main exports
export { crawlTutorial, buildCandidateList, DEFAULT_FILENAME } from "./crawler.js";
export { createCrawlConfig, parseTutorialConfig, toCrawlConfig, tutorialConfigSchema, selectorTypeSchema } from "./config.js";

// Types
export type { CrawlOptions } from "./crawler.js";
export type { CrawlConfigInput, TutorialConfig } from "./config.js";
export type {
  AnchorTable,
  CrawlConfig,
  CrawlProgress,
  CrawlResult,
  CrawlStage,
  ElementSelector,
  LogLevel,
  PageRecord,
  PageTable,
  RemovalRule,
  SelectorType,
} from "./types.js";
export type { Logger, LogCallback } from "./logger.js";
export type { LinkRewriter, RewriteContext } from "./link-rewriter.js";
export type { MarkdownConverter } from "./content-converter.js";

// Errors
export {
  CrawlError,
  ConfigError,
  ConversionError,
  EntryPageError,
  FetchError,
  NoContainerError,
  NoLinksError,
  PersistError,
  isCrawlError,
} from "./errors.js";

// Pipeline steps (for advanced usage)
export { consoleLogCallback, createLogger, noopLogger } from "./logger.js";
export { normalizeHref, stripFragment } from "./url-normalizer.js";
export { fetchPage } from "./page-fetcher.js";
export { locateElements, stripElements, applyPreRemoval, removeNavigation } from "./element-selector.js";
export { extractLinks } from "./link-extractor.js";
export { htmlToMarkdown, collapseBlankLines, stripAnchorTags } from "./content-converter.js";
export { MarkdownLinkRewriter, rewriteLinks } from "./link-rewriter.js";
export { anchorSlug, assembleDocument } from "./document-assembler.js";
export { DEFAULT_OUTPUT_ROOT, documentDir } from "./page-cache.js";
