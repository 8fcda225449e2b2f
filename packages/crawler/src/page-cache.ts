import path from "node:path";
import fs from "fs-extra";

export const DEFAULT_OUTPUT_ROOT = "downloads";

const UNSAFE_CHARACTERS = /[^\w\-.]+/g;

/** Host part of `url` (port included) made safe for a directory name. */
export function hostFolderName(url: string): string {
  return new URL(url).host.replace(UNSAFE_CHARACTERS, "_");
}

/**
 * File name for a URL path: leading slash dropped, a trailing slash mapped to
 * `index`, runs of other characters collapsed to `_`.
 */
export function safeFileName(url: string, ext: string = ".html"): string {
  let pathname = new URL(url).pathname || "index";
  if (pathname.endsWith("/")) pathname += "index";
  const safe = pathname.replace(/^\/+/, "").replace(UNSAFE_CHARACTERS, "_");
  return (safe || "index") + ext;
}

export function documentDir(outputRoot: string, baseUrl: string): string {
  return path.join(outputRoot, hostFolderName(baseUrl));
}

/** Raw fetched HTML, one file per page under `<root>/ori_html/<host>/`. */
export class PageCache {
  private dir: string;

  constructor(outputRoot: string, baseUrl: string) {
    this.dir = path.join(outputRoot, "ori_html", hostFolderName(baseUrl));
  }

  pathFor(url: string): string {
    return path.join(this.dir, safeFileName(url));
  }

  async put(url: string, html: string): Promise<string> {
    const filePath = this.pathFor(url);
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, html, "utf8");
    return filePath;
  }
}
