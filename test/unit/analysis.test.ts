import { describe, it, expect } from "vitest";
import { analyzeCode } from "../../src/review/analysis.js";
import { validateReviewRequest } from "../../src/review/validator.js";
import { PYTHON_COMMENTS, PYTHON_SNIPPET } from "../fixtures/requests.js";

describe("analyzeCode", () => {
  it("combines language, severities and quality", () => {
    const request = validateReviewRequest({
      code_snippet: PYTHON_SNIPPET,
      review_comments: PYTHON_COMMENTS,
    });
    const analysis = analyzeCode(request);

    expect(analysis.language).toBe("Python");
    expect(analysis.total_issues).toBe(3);
    expect(analysis.severities).toEqual(["Moderate", "Moderate", "Moderate"]);
    expect(analysis.severity_breakdown).toEqual({ Mild: 0, Moderate: 3, Harsh: 0 });
    expect(analysis.quality.overall).toBe(8.6);
  });

  it("keeps severities in comment order", () => {
    const request = validateReviewRequest({
      code_snippet: "",
      review_comments: ["fine", "This is terrible and completely wrong!", "bad"],
    });
    const analysis = analyzeCode(request);

    expect(analysis.language).toBe("Unknown");
    expect(analysis.severities).toEqual(["Mild", "Harsh", "Moderate"]);
    expect(analysis.severity_breakdown).toEqual({ Mild: 1, Moderate: 1, Harsh: 1 });
  });
});
