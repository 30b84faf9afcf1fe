import type { ReviewerConfig } from "../config-loader/schema.js";
import { rewriteComments } from "../llm/rewriter.js";
import { collectResources } from "../resources/linker.js";
import { createChildLogger } from "../utils/logger.js";
import { analyzeCode } from "./analysis.js";
import { buildEnhancedReport, buildReviewReport } from "./report-builder.js";
import type { Persona, ReviewReport, ReviewRequest } from "./types.js";

const log = createChildLogger({ module: "orchestrator" });

export interface ReportOptions {
  config: ReviewerConfig;
  /** Falls back to the configured persona */
  persona?: Persona;
  now?: () => Date;
}

export async function generateReviewReport(
  request: ReviewRequest,
  options: ReportOptions
): Promise<ReviewReport> {
  const { config, persona = config.persona, now = () => new Date() } = options;
  const startTime = Date.now();

  // 1. Heuristics
  const analysis = analyzeCode(request, config.scoring);

  // 2. LLM rewrite
  const reviewMarkdown = await rewriteComments({
    request,
    language: analysis.language,
    severities: analysis.severities,
    persona,
    llm: config.llm,
  });

  // 3. Learning resources
  const resources = collectResources(
    request.review_comments,
    request.code_snippet,
    analysis.language
  );

  // 4. Render
  const markdown = buildReviewReport({
    language: analysis.language,
    persona,
    quality: analysis.quality,
    reviewMarkdown,
    resources,
  });
  const generatedAt = now();
  const enhanced_markdown = buildEnhancedReport({
    report: markdown,
    persona,
    quality: analysis.quality,
    generatedAt,
  });

  const duration_ms = Date.now() - startTime;
  log.info(
    {
      language: analysis.language,
      persona,
      overall: analysis.quality.overall,
      comments: analysis.total_issues,
      resources: resources.length,
      durationMs: duration_ms,
    },
    "Review report generated"
  );

  return {
    markdown,
    enhanced_markdown,
    analysis,
    persona,
    resources,
    generated_at: generatedAt.toISOString(),
    duration_ms,
  };
}
