import { Hono } from "hono";
import { logger } from "hono/logger";
import type { AppEnv } from "./env.js";
import { contextMiddleware, type AppDeps } from "./middleware/context.js";
import { downloadRoutes } from "./routes/download.js";

export interface AppConfig {
  deps: AppDeps;
  /** Request logging through hono/logger; off in tests. */
  requestLogging?: boolean;
}

export function createApp(config: AppConfig) {
  const app = new Hono<AppEnv>();

  // Inject dependencies into context
  app.use("*", contextMiddleware(config.deps));

  // Logging
  if (config.requestLogging ?? true) {
    app.use("*", logger());
  }

  // Health check
  app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  app.route("/api/download", downloadRoutes);

  return app;
}

export type AppType = ReturnType<typeof createApp>;
