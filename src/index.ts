import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { isRewriteEnabled, loadEnv } from "./config/env.js";
import { loadReviewerConfig } from "./config-loader/loader.js";
import { getLogger } from "./utils/logger.js";

async function main() {
  const env = loadEnv();
  const log = getLogger();
  const config = loadReviewerConfig(env.REVIEWER_CONFIG);
  const rewriteEnabled = isRewriteEnabled(env);

  if (!rewriteEnabled) {
    log.warn("ANTHROPIC_API_KEY not set; /api/review is disabled, /api/analyze still works");
  }

  const app = createApp({ config, rewriteEnabled });

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port }, "kindly-review server started");
    log.info({ url: `http://localhost:${info.port}/dashboard` }, "Dashboard available");
  });

  const shutdown = () => {
    log.info("Shutting down...");
    server.close(() => process.exit(0));
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
