import { serve } from "@hono/node-server";
import { crawlTutorial, createLogger, DEFAULT_OUTPUT_ROOT } from "@tutorial-md/crawler";
import { createApp } from "./app.js";

const app = createApp({
  deps: {
    crawl: crawlTutorial,
    outputRoot: process.env.OUTPUT_ROOT || DEFAULT_OUTPUT_ROOT,
    logger: createLogger(),
  },
});

// Start server
const port = parseInt(process.env.PORT || process.env.API_PORT || "3001");

console.log(`Starting API server on port ${port}...`);

serve({
  fetch: app.fetch,
  port,
});

console.log(`API server running at http://localhost:${port}`);
