import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import fs from "fs-extra";
import {
  ConfigError,
  isCrawlError,
  selectorTypeSchema,
  toCrawlConfig,
  tutorialConfigSchema,
} from "@tutorial-md/crawler";
import type { AppEnv } from "../env.js";
import { contentDisposition, isSafeFilename, resolveFilename } from "./download.utils.js";

const app = new Hono<AppEnv>();

const filenameSchema = z.string().refine(isSafeFilename, "Expected a file name without directory parts");

// Validation schemas
const downloadRequestSchema = z.object({
  url: z.string().url(),
  config: tutorialConfigSchema.extend({ filename: filenameSchema.nullish() }),
  filename: filenameSchema.nullish(),
  pre_remove_type: selectorTypeSchema.nullish(),
  pre_remove_value: z.string().nullish(),
});

// Crawl a tutorial and return it as one Markdown file
app.post("/", zValidator("json", downloadRequestSchema), async (c) => {
  const body = c.req.valid("json");
  const crawl = c.get("crawl");
  const logger = c.get("crawlLogger");
  const filename = resolveFilename(body.filename, body.config.filename);

  try {
    const config = toCrawlConfig(body.url, body.config, {
      preRemoveType: body.pre_remove_type,
      preRemoveValue: body.pre_remove_value,
    });

    const result = await crawl({ config, outputRoot: c.get("outputRoot"), filename, logger });

    if (!(await fs.pathExists(result.outputPath))) {
      return c.json({ error: "Markdown file was not generated", stage: "persist" }, 500);
    }

    const content = await fs.readFile(result.outputPath, "utf8");
    return c.body(content, 200, {
      "Content-Type": "text/markdown; charset=utf-8",
      "Content-Disposition": contentDisposition(filename),
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      return c.json({ error: error.message, stage: error.stage }, 400);
    }
    const stage = isCrawlError(error) ? error.stage : "failed";
    logger.error(`[download] ${body.url} failed during ${stage}: ${(error as Error).message}`);
    return c.json({ error: (error as Error).message, stage }, 500);
  }
});

export const downloadRoutes = app;
