import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const envSchema = z.object({
  // Anthropic (only the /api/review route needs it)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  // Reviewer config file, relative to the working directory
  REVIEWER_CONFIG: z.string().default(".kindly-review.yml"),

  // Server
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(): Env {
  if (_env) return _env;

  const raw = { ...process.env };

  // An exported-but-empty key means "not configured"
  if (raw.ANTHROPIC_API_KEY !== undefined && raw.ANTHROPIC_API_KEY.trim() === "") {
    delete raw.ANTHROPIC_API_KEY;
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid environment variables:\n${invalid}`);
  }

  _env = result.data;
  return _env;
}

export function isRewriteEnabled(env: Env): boolean {
  return !!env.ANTHROPIC_API_KEY;
}
