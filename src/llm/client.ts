import Anthropic from "@anthropic-ai/sdk";
import { loadEnv } from "../config/env.js";
import { ConfigError } from "../utils/errors.js";

let _client: Anthropic | null = null;

export function getAnthropicClient(): Anthropic {
  if (_client) return _client;
  const env = loadEnv();
  if (!env.ANTHROPIC_API_KEY) {
    throw new ConfigError("ANTHROPIC_API_KEY is not set");
  }
  _client = new Anthropic({ apiKey: env.ANTHROPIC_API_KEY });
  return _client;
}

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 529]);

/** Rate limits, overload and server-side failures are worth another try. */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Anthropic.APIError)) return false;
  return err.status !== undefined && RETRYABLE_STATUS.has(err.status);
}
