/**
 * Resolution rules for hrefs found in the link container, applied in order:
 * absolute http(s) passes through, protocol-relative inherits the base scheme,
 * root-relative joins the base origin, anything else resolves against the base.
 */

const ABSOLUTE_HTTP = /^https?:\/\//i;

export function isAbsoluteHttpUrl(value: string): boolean {
  return ABSOLUTE_HTTP.test(value);
}

/** Two URLs that differ only by fragment address the same page. */
export function stripFragment(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

export function stripTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

export function resolveHref(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  try {
    if (isAbsoluteHttpUrl(trimmed)) {
      return trimmed;
    }
    const base = new URL(baseUrl);
    if (trimmed.startsWith("//")) {
      return `${base.protocol}${trimmed}`;
    }
    if (trimmed.startsWith("/")) {
      return `${base.origin}${trimmed}`;
    }
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}

function isRejectedHref(href: string, resolved: string): boolean {
  if (href.startsWith("#")) return true;
  if (href.toLowerCase().startsWith("javascript:")) return true;
  const lastSegment = resolved.split("/").pop() ?? "";
  return lastSegment.startsWith("#");
}

/**
 * Resolves `href` against `baseUrl` and drops its fragment.
 * Returns null for in-page anchors, javascript: links and unresolvable hrefs.
 */
export function normalizeHref(href: string, baseUrl: string): string | null {
  const trimmed = href.trim();
  const resolved = resolveHref(trimmed, baseUrl);
  if (!resolved || isRejectedHref(trimmed, resolved)) {
    return null;
  }
  return stripFragment(resolved);
}

/** First occurrence wins; later repeats are dropped. */
export function dedupePreservingOrder(urls: Iterable<string>): string[] {
  return Array.from(new Set(urls));
}
