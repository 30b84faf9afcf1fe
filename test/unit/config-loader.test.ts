import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { loadReviewerConfig } from "../../src/config-loader/loader.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";
import { ConfigError } from "../../src/utils/errors.js";

const FIXTURE = fileURLToPath(new URL("../fixtures/reviewer-config.yml", import.meta.url));

describe("loadReviewerConfig", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "reviewer-config-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults when the file does not exist", () => {
    expect(loadReviewerConfig(join(dir, "missing.yml"))).toBe(DEFAULT_CONFIG);
  });

  it("treats an empty file as an empty config", () => {
    const path = join(dir, "empty.yml");
    writeFileSync(path, "");
    expect(loadReviewerConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it("applies values from the file over defaults", () => {
    const config = loadReviewerConfig(FIXTURE);

    expect(config.persona).toBe("mentor");
    expect(config.llm.temperature).toBe(0.2);
    expect(config.llm.model).toBe("claude-sonnet-4-20250514");
    expect(config.scoring.penalties.poorName).toBe(3);
  });

  it("fails on malformed YAML", () => {
    const path = join(dir, "broken.yml");
    writeFileSync(path, "persona: [mentor");
    expect(() => loadReviewerConfig(path)).toThrow(ConfigError);
  });

  it("lists invalid settings", () => {
    const path = join(dir, "invalid.yml");
    writeFileSync(path, "llm:\n  retryAttempts: 9\n");
    expect(() => loadReviewerConfig(path)).toThrow(/llm\.retryAttempts/);
  });
});
