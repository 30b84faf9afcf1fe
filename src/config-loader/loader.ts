import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import yaml from "js-yaml";
import { safeParseReviewerConfig, type ReviewerConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { ConfigError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

/**
 * Reads the reviewer YAML config. A missing file means defaults; a file that
 * exists but does not parse or validate is fatal.
 */
export function loadReviewerConfig(path: string): ReviewerConfig {
  const configPath = resolve(path);

  if (!existsSync(configPath)) {
    log.debug({ configPath }, "No reviewer config found, using defaults");
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not read ${configPath}`, { cause: err });
  }

  // An empty YAML document loads as undefined
  const result = safeParseReviewerConfig(raw ?? {});
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid reviewer config ${configPath}:\n${invalid}`);
  }

  log.info(
    { configPath, persona: result.data.persona, model: result.data.llm.model },
    "Loaded reviewer config"
  );
  return result.data;
}
