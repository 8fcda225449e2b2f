import { load, type CheerioAPI } from "cheerio";
import { isComment, isTag, isText, type AnyNode, type Element } from "domhandler";
import type { ElementSelector, RemovalRule, SelectorType } from "./types.js";

export interface LocatedElements {
  $: CheerioAPI;
  elements: Element[];
}

function classList(el: Element): string[] {
  return (el.attribs.class ?? "").split(/\s+/).filter(Boolean);
}

function matches(el: Element, type: SelectorType, value: string): boolean {
  switch (type) {
    case "class":
      return classList(el).includes(value);
    case "id":
      return el.attribs.id === value;
    case "tag":
      return el.tagName === value.toLowerCase();
  }
}

function findMatching($: CheerioAPI, type: SelectorType, value: string): Element[] {
  return $("*")
    .toArray()
    .filter((el): el is Element => isTag(el) && matches(el, type, value));
}

/**
 * Every element in document order that matches the selector family.
 * Parsing is lenient, so malformed markup yields an empty list rather than an error.
 */
export function locateElements(html: string, selector: ElementSelector): LocatedElements {
  const $ = load(html);
  return { $, elements: findMatching($, selector.type, selector.value) };
}

/** Removes every node (with its subtree) matching any of `values`. */
export function stripElements(html: string, type: SelectorType, values: readonly string[]): string {
  const targets = values.map((value) => value.trim()).filter(Boolean);
  if (!targets.length) return html;

  const $ = load(html);
  for (const value of targets) {
    for (const el of findMatching($, type, value)) {
      $(el).remove();
    }
  }
  return $.html();
}

/** Applied once to every fetched page. A missing rule leaves the HTML untouched. */
export function applyPreRemoval(html: string, rule?: Readonly<RemovalRule>): string {
  if (!rule) return html;
  return stripElements(html, rule.type, rule.values);
}

function isRootLevel(el: Element): boolean {
  const parent = el.parent;
  if (!parent) return true;
  if (parent.type === "root") return true;
  return isTag(parent) && (parent.tagName === "body" || parent.tagName === "html");
}

function hasOnlyText(el: Element): boolean {
  return el.children.every((child: AnyNode) => isText(child) || isComment(child));
}

/** Drops `<a>` elements sitting directly under body/html whose content is plain text. */
export function removeRootAnchors(html: string): string {
  const $ = load(html);
  $("a").each((_, el) => {
    if (isRootLevel(el) && hasOnlyText(el)) {
      $(el).remove();
    }
  });
  return $.html();
}

/**
 * Prepares a non-entry page for conversion: the link container is removed,
 * then stray top-level text links.
 */
export function removeNavigation(html: string, selector: ElementSelector): string {
  return removeRootAnchors(stripElements(html, selector.type, [selector.value]));
}

export function extractTitle(html: string): string | null {
  const title = load(html)("title").first().text().trim();
  return title || null;
}
