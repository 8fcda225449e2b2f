import { load } from "cheerio";
import TurndownService from "turndown";
import { ConversionError } from "./errors.js";
import { noopLogger, type Logger } from "./logger.js";

const turndownService = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
  bulletListMarker: "-",
});

turndownService.remove(["script", "style", "noscript"]);

/** Black-box HTML to Markdown step; post-processing is applied on top of it. */
export type MarkdownConverter = (html: string) => string;

export interface ConvertOptions {
  converter?: MarkdownConverter;
  logger?: Logger;
  /** Used only to label log records. */
  url?: string;
}

/** Keeps the first blank line of every run of blank (or whitespace-only) lines. */
export function collapseBlankLines(markdown: string): string {
  const kept: string[] = [];
  let previousBlank = false;
  for (const line of markdown.split("\n")) {
    if (line.trim() === "") {
      if (!previousBlank) kept.push(line);
      previousBlank = true;
    } else {
      kept.push(line);
      previousBlank = false;
    }
  }
  return kept.join("\n");
}

/** Unwraps `<a ...>text</a>` left in the output and drops self-closing `<a .../>`. */
export function stripAnchorTags(markdown: string): string {
  return markdown.replace(/<a [^>]*>(.*?)<\/a>/gis, "$1").replace(/<a [^>]*\/>/gis, "");
}

function bodyHtml(html: string): string {
  const $ = load(html);
  return $("body").html() ?? html;
}

export const turndownConverter: MarkdownConverter = (html) => turndownService.turndown(bodyHtml(html));

export function convertToMarkdown(html: string, converter: MarkdownConverter = turndownConverter): string {
  let markdown: string;
  try {
    markdown = converter(html);
  } catch (error) {
    throw new ConversionError(`HTML to Markdown conversion failed: ${(error as Error).message}`, { cause: error });
  }
  return stripAnchorTags(collapseBlankLines(markdown));
}

/**
 * Never throws: a failed conversion yields the error message followed by the
 * untouched HTML so the page still gets a section.
 */
export function htmlToMarkdown(html: string, options: ConvertOptions = {}): string {
  const logger = options.logger ?? noopLogger;
  try {
    return convertToMarkdown(html, options.converter);
  } catch (error) {
    const message = (error as Error).message;
    logger.error(message, options.url);
    return `Conversion failed: ${message}\n\nOriginal content:\n${html}`;
  }
}
