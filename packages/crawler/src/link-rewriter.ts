import type { AnchorTable } from "./types.js";
import { stripTrailingSlashes } from "./url-normalizer.js";

export interface RewriteContext {
  anchors: AnchorTable;
  /** URL of the page the Markdown came from; relative targets resolve against it. */
  pageUrl: string;
}

/**
 * Rewrites link targets in converted page content. The regex implementation
 * works on Markdown text; a DOM-based one can replace it behind this interface.
 */
export interface LinkRewriter {
  rewrite(markdown: string, context: RewriteContext): string;
}

// The lookbehind keeps image syntax out of the link pass.
const LINK_PATTERN = /(?<!!)\[([^\]]+)\]\(([^)]+)\)/g;
const IMAGE_PATTERN = /!\[([^\]]*)\]\(([^)]+)\)/g;

// `url "title"`, as turndown writes links and images that carry a title attribute.
const TITLED_TARGET = /^(\S+)(\s+".*")$/s;

interface LinkTarget {
  url: string;
  /** Title part with its leading whitespace, or "". */
  title: string;
}

export function splitTarget(target: string): LinkTarget {
  const match = TITLED_TARGET.exec(target.trim());
  return match ? { url: match[1], title: match[2] } : { url: target.trim(), title: "" };
}

function resolveAgainst(target: string, pageUrl: string): string {
  try {
    return new URL(target, pageUrl).toString();
  } catch {
    return target;
  }
}

/**
 * First crawled page whose URL equals `href`, ignoring trailing slashes.
 * Slug collisions between pages are not resolved.
 */
export function findAnchor(href: string, anchors: AnchorTable): string | null {
  const exact = anchors.get(href);
  if (exact !== undefined) return exact;

  const wanted = stripTrailingSlashes(href);
  for (const [url, slug] of anchors) {
    if (stripTrailingSlashes(url) === wanted) return slug;
  }
  return null;
}

export class MarkdownLinkRewriter implements LinkRewriter {
  rewrite(markdown: string, context: RewriteContext): string {
    const linked = markdown.replace(LINK_PATTERN, (_match, text: string, href: string) =>
      this.rewriteLink(text, href, context),
    );
    return linked.replace(IMAGE_PATTERN, (_match, alt: string, src: string) => this.rewriteImage(alt, src, context));
  }

  private rewriteLink(text: string, target: string, context: RewriteContext): string {
    const { url, title } = splitTarget(target);
    const anchor = findAnchor(url, context.anchors);
    if (anchor !== null) {
      return `[${text}](#${anchor}${title})`;
    }
    if (!/^(https?:\/\/|#)/.test(url)) {
      return `[${text}](${resolveAgainst(url, context.pageUrl)}${title})`;
    }
    return `[${text}](${target})`;
  }

  private rewriteImage(alt: string, target: string, context: RewriteContext): string {
    const { url, title } = splitTarget(target);
    if (!/^https?:\/\//.test(url)) {
      return `![${alt}](${resolveAgainst(url, context.pageUrl)}${title})`;
    }
    return `![${alt}](${target})`;
  }
}

const defaultRewriter = new MarkdownLinkRewriter();

export function rewriteLinks(markdown: string, anchors: AnchorTable, pageUrl: string): string {
  return defaultRewriter.rewrite(markdown, { anchors, pageUrl });
}
