import { createMiddleware } from "hono/factory";
import type { Logger } from "@tutorial-md/crawler";
import type { AppEnv, CrawlRunner } from "../env.js";

/**
 * Dependencies injected into the Hono app.
 * The Node entry passes the real crawler; tests pass a fake.
 */
export interface AppDeps {
  crawl: CrawlRunner;
  outputRoot: string;
  logger: Logger;
}

export function contextMiddleware(deps: AppDeps) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set("crawl", deps.crawl);
    c.set("outputRoot", deps.outputRoot);
    c.set("crawlLogger", deps.logger);
    await next();
  });
}
