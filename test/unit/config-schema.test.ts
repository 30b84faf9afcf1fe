import { describe, it, expect } from "vitest";
import { parseReviewerConfig } from "../../src/config-loader/schema.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";

describe("reviewer config schema", () => {
  it("fills every default from an empty object", () => {
    expect(parseReviewerConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("merges partial penalty overrides with defaults", () => {
    const config = parseReviewerConfig({ scoring: { penalties: { poorName: 3 } } });

    expect(config.scoring.penalties.poorName).toBe(3);
    expect(config.scoring.penalties.nestedLoop).toBe(2);
    expect(config.scoring.lengthThreshold).toBe(30);
  });

  it("rejects invalid temperature", () => {
    expect(() => parseReviewerConfig({ llm: { temperature: 2 } })).toThrow();
  });

  it("rejects unknown personas", () => {
    expect(() => parseReviewerConfig({ persona: "robot" })).toThrow();
  });

  it("rejects negative penalties", () => {
    expect(() =>
      parseReviewerConfig({ scoring: { penalties: { antiPattern: -1 } } })
    ).toThrow();
  });
});
