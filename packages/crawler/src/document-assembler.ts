import { randomUUID } from "node:crypto";
import path from "node:path";
import fs from "fs-extra";
import { PersistError } from "./errors.js";
import type { PageRecord, PageSection } from "./types.js";

export const TOC_HEADING = "# Contents";

/**
 * Lower-cased title with everything but letters, digits, `_` and `-` removed.
 * Distinct titles may produce the same slug; nothing disambiguates them.
 */
export function anchorSlug(title: string): string {
  return title.toLowerCase().replace(/[^\p{L}\p{N}_-]+/gu, "");
}

export function mainLinkBanner(baseUrl: string): string {
  return `> **Main link: [${baseUrl}](${baseUrl})**\n\n`;
}

export function buildTableOfContents(pages: Iterable<Pick<PageRecord, "title" | "anchorSlug">>): string {
  const lines = [`${TOC_HEADING}\n`];
  for (const page of pages) {
    lines.push(`- [${page.title}](#${page.anchorSlug})`);
  }
  return lines.join("\n") + "\n\n---\n\n";
}

export function renderSection(section: PageSection): string {
  return `# ${section.title}\n\n${section.markdown}\n\n---\n\n`;
}

export function assembleDocument(
  baseUrl: string,
  pages: Iterable<Pick<PageRecord, "title" | "anchorSlug">>,
  sections: PageSection[],
): string {
  return mainLinkBanner(baseUrl) + buildTableOfContents(pages) + sections.map(renderSection).join("");
}

/**
 * Writes the finished document in one step: each call writes its own temporary
 * file and renames it over the destination.
 */
export async function writeDocument(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(tempPath, content, "utf8");
    await fs.move(tempPath, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath).catch(() => {});
    throw new PersistError(filePath, { cause: error });
  }
}
