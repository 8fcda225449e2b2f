import type { LocatedElements } from "./element-selector.js";
import { noopLogger, type Logger } from "./logger.js";
import { dedupePreservingOrder, normalizeHref } from "./url-normalizer.js";

/**
 * Collects the hrefs of every `<a href>` inside the located elements, in
 * element order, resolved against `baseUrl` and deduplicated by first occurrence.
 * An empty result means the container held no usable links.
 */
export function extractLinks(located: LocatedElements, baseUrl: string, logger: Logger = noopLogger): string[] {
  const { $, elements } = located;
  const links: string[] = [];
  let anchorCount = 0;

  for (const element of elements) {
    const anchors = $(element).find("a[href]").toArray();
    anchorCount += anchors.length;

    for (const anchor of anchors) {
      const href = $(anchor).attr("href") ?? "";
      const normalized = normalizeHref(href, baseUrl);
      if (!normalized) {
        logger.debug(`Skipping link ${href}`);
        continue;
      }
      links.push(normalized);
    }
  }

  const unique = dedupePreservingOrder(links);
  logger.info(`Found ${anchorCount} anchors in ${elements.length} elements, ${unique.length} unique links`);
  return unique;
}
