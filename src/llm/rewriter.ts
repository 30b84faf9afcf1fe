import type Anthropic from "@anthropic-ai/sdk";
import type { LLMConfig } from "../config-loader/schema.js";
import { dominantSeverity } from "../heuristics/severity.js";
import type {
  DetectedLanguage,
  Persona,
  ReviewRequest,
  SeverityTier,
} from "../review/types.js";
import { RewriteError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { getAnthropicClient, isRetryableError } from "./client.js";
import { buildSystemPrompt, buildUserPrompt } from "./prompts.js";

const log = createChildLogger({ module: "llm-rewriter" });

export interface RewriteInput {
  request: ReviewRequest;
  language: DetectedLanguage;
  severities: readonly SeverityTier[];
  persona: Persona;
  llm: LLMConfig;
}

/**
 * One Messages API call turning the blunt comments into the markdown
 * rewrite. Transient API failures are retried; anything else becomes a
 * RewriteError.
 */
export async function rewriteComments(input: RewriteInput): Promise<string> {
  const { request, language, severities, persona, llm } = input;
  const severity = dominantSeverity(severities);
  const system = buildSystemPrompt({ persona, language, severity });
  const prompt = buildUserPrompt({
    snippet: request.code_snippet,
    comments: request.review_comments,
    language,
  });

  log.info(
    { model: llm.model, persona, language, severity, comments: severities.length },
    "Requesting empathetic rewrite"
  );

  const client = getAnthropicClient();
  let response: Anthropic.Message;
  try {
    response = await withRetry(
      () =>
        client.messages.create({
          model: llm.model,
          max_tokens: llm.maxTokens,
          temperature: llm.temperature,
          system,
          messages: [{ role: "user", content: prompt }],
        }),
      {
        maxAttempts: llm.retryAttempts,
        retryOn: isRetryableError,
        label: "llm-rewrite",
      }
    );
  } catch (err) {
    log.error({ err }, "Rewrite request failed");
    throw new RewriteError("Error generating review", { cause: err });
  }

  const text = response.content
    .filter((b): b is Anthropic.TextBlock => b.type === "text")
    .map((b) => b.text)
    .join("")
    .trim();

  if (!text) {
    log.warn({ stopReason: response.stop_reason }, "LLM returned no text");
    throw new RewriteError("The model returned an empty review");
  }

  log.info(
    {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
    "Rewrite complete"
  );
  return text;
}
