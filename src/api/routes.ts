import { Hono } from "hono";
import type { ReviewerConfig } from "../config-loader/schema.js";
import { exampleLanguages, getExample } from "../examples/catalog.js";
import { isPersona, listPersonas } from "../llm/personas.js";
import { supportedLanguages } from "../resources/linker.js";
import { analyzeCode } from "../review/analysis.js";
import type { Persona } from "../review/types.js";
import { generateReviewReport } from "../review/orchestrator.js";
import { validateReviewInput } from "../review/validator.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "api-routes" });

export interface ApiOptions {
  config: ReviewerConfig;
  /** False when no API key is configured; /review then answers 503 */
  rewriteEnabled: boolean;
}

export function createApiRouter(options: ApiOptions): Hono {
  const { config, rewriteEnabled } = options;
  const app = new Hono();

  app.get("/languages", (c) => c.json(supportedLanguages()));

  app.get("/personas", (c) =>
    c.json({ default: config.persona, personas: listPersonas() })
  );

  app.get("/examples", (c) => c.json(exampleLanguages()));

  app.get("/examples/:language", (c) =>
    c.json(getExample(c.req.param("language")))
  );

  app.post("/analyze", async (c) => {
    const request = validateReviewInput(await c.req.text());
    return c.json(analyzeCode(request, config.scoring));
  });

  app.post("/review", async (c) => {
    const personaParam = c.req.query("persona");
    let persona: Persona | undefined;
    if (personaParam !== undefined) {
      if (!isPersona(personaParam)) {
        return c.json({ error: `Unknown persona: ${personaParam}` }, 400);
      }
      persona = personaParam;
    }

    // Validate before the key check so bad input gets a 400 either way
    const request = validateReviewInput(await c.req.text());

    if (!rewriteEnabled) {
      return c.json({ error: "ANTHROPIC_API_KEY is not configured" }, 503);
    }

    log.debug({ persona: persona ?? config.persona }, "Review requested");
    const report = await generateReviewReport(request, { config, persona });
    return c.json(report);
  });

  return app;
}
