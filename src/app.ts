import { Hono } from "hono";
import type { ErrorHandler } from "hono";
import { createApiRouter, type ApiOptions } from "./api/routes.js";
import { createDashboardRouter } from "./dashboard/routes.js";
import { ConfigError, RewriteError, ValidationError } from "./utils/errors.js";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger({ module: "app" });

export const VERSION = "0.1.0";

export const handleError: ErrorHandler = (err, c) => {
  if (err instanceof ValidationError) {
    return c.json({ error: err.message, reason: err.reason }, 400);
  }
  if (err instanceof RewriteError) {
    log.warn({ err }, "Rewrite failed");
    return c.json({ error: err.message }, 502);
  }
  if (err instanceof ConfigError) {
    log.error({ err }, "Configuration error while handling request");
    return c.json({ error: err.message }, 503);
  }
  log.error({ err, path: c.req.path }, "Unhandled error");
  return c.json({ error: "Internal server error" }, 500);
};

export function createApp(options: ApiOptions): Hono {
  const app = new Hono();

  app.get("/health", (c) =>
    c.json({ status: "ok", version: VERSION, timestamp: new Date().toISOString() })
  );

  app.route("/api", createApiRouter(options));
  app.route("/dashboard", createDashboardRouter());

  app.onError(handleError);
  return app;
}
