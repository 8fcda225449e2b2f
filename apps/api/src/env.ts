import type { CrawlOptions, CrawlResult, Logger } from "@tutorial-md/crawler";

export type CrawlRunner = (options: CrawlOptions) => Promise<CrawlResult>;

/**
 * Variables set per-request via context middleware.
 * Accessed in route handlers via c.get("crawl"), c.get("outputRoot"), etc.
 */
export type AppVariables = {
  crawl: CrawlRunner;
  outputRoot: string;
  crawlLogger: Logger;
};

export type AppEnv = {
  Variables: AppVariables;
};
