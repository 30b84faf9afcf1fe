import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../src/review/orchestrator.js", () => ({
  generateReviewReport: vi.fn(),
}));

import { createApp } from "../../src/app.js";
import { generateReviewReport } from "../../src/review/orchestrator.js";
import { analyzeCode } from "../../src/review/analysis.js";
import { getExample } from "../../src/examples/catalog.js";
import { validateReviewRequest } from "../../src/review/validator.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";
import { RewriteError } from "../../src/utils/errors.js";
import type { ReviewReport } from "../../src/review/types.js";
import { BOOL_COMPARISON_COMMENT, BOOL_COMPARISON_SNIPPET } from "../fixtures/requests.js";

const body = JSON.stringify({
  code_snippet: BOOL_COMPARISON_SNIPPET,
  review_comments: [BOOL_COMPARISON_COMMENT],
});

function post(app: ReturnType<typeof createApp>, path: string, payload: string) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: payload,
  });
}

describe("read-only routes", () => {
  const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: false });

  it("reports health", async () => {
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", version: "0.1.0" });
  });

  it("lists languages with resources", async () => {
    const res = await app.request("/api/languages");
    expect(await res.json()).toEqual(["Python", "JavaScript", "Java", "C++", "Go"]);
  });

  it("lists personas with the configured default", async () => {
    const res = await app.request("/api/personas");
    expect(await res.json()).toEqual({
      default: "senior_developer",
      personas: [
        { id: "senior_developer", title: "Senior Developer" },
        { id: "tech_lead", title: "Tech Lead" },
        { id: "pair_programming", title: "Pair Programming" },
        { id: "mentor", title: "Mentor" },
      ],
    });
  });

  it("serves examples", async () => {
    expect(await (await app.request("/api/examples")).json()).toEqual([
      "python",
      "javascript",
      "java",
    ]);
    const java = await app.request("/api/examples/java");
    expect(await java.json()).toEqual(getExample("java"));

    const inherited = await app.request("/api/examples/constructor");
    expect(inherited.status).toBe(200);
    expect(await inherited.json()).toEqual(getExample("python"));
  });

  it("renders the dashboard", async () => {
    const res = await app.request("/dashboard");
    expect(res.status).toBe(200);
    const html = await res.text();
    expect(html).toContain('<option value="mentor">Mentor</option>');
    expect(html).toContain('<option value="javascript">javascript</option>');
  });
});

describe("POST /api/analyze", () => {
  const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: false });

  it("returns the heuristic analysis", async () => {
    const res = await post(app, "/api/analyze", body);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      language: "Python",
      quality: { overall: 9, improvement_potential: 1 },
      total_issues: 1,
      severity_breakdown: { Mild: 0, Moderate: 1, Harsh: 0 },
    });
  });

  it("maps validation failures to 400 with a reason", async () => {
    const res = await post(app, "/api/analyze", "nope");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ reason: "NotParseable" });

    const empty = await post(app, "/api/analyze", '{"code_snippet":"x","review_comments":[]}');
    expect(await empty.json()).toMatchObject({ reason: "EmptyComments" });
  });
});

describe("POST /api/review", () => {
  const request = validateReviewRequest(JSON.parse(body));
  const report: ReviewReport = {
    markdown: "# Report",
    enhanced_markdown: "# Enhanced",
    analysis: analyzeCode(request),
    persona: "mentor",
    resources: [],
    generated_at: "2024-01-02T03:04:05.000Z",
    duration_ms: 5,
  };

  beforeEach(() => {
    vi.mocked(generateReviewReport).mockReset();
  });

  it("answers 503 without an API key", async () => {
    const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: false });
    const res = await post(app, "/api/review", body);
    expect(res.status).toBe(503);
    expect(generateReviewReport).not.toHaveBeenCalled();
  });

  it("validates input before checking the key", async () => {
    const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: false });
    const res = await post(app, "/api/review", '{"code_snippet":"x"}');
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ reason: "MissingField" });
  });

  it("rejects an unknown persona", async () => {
    const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: true });
    const res = await post(app, "/api/review?persona=robot", body);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Unknown persona: robot" });
  });

  it("returns the generated report", async () => {
    vi.mocked(generateReviewReport).mockResolvedValue(report);
    const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: true });

    const res = await post(app, "/api/review?persona=mentor", body);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ markdown: "# Report", persona: "mentor" });
    expect(generateReviewReport).toHaveBeenCalledWith(request, {
      config: DEFAULT_CONFIG,
      persona: "mentor",
    });
  });

  it("maps rewrite failures to 502", async () => {
    vi.mocked(generateReviewReport).mockRejectedValue(
      new RewriteError("Error generating review")
    );
    const app = createApp({ config: DEFAULT_CONFIG, rewriteEnabled: true });

    const res = await post(app, "/api/review", body);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Error generating review" });
  });
});
