import type { ScoringConfig } from "../config-loader/schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import { detectLanguage } from "../heuristics/language.js";
import { classifySeverity } from "../heuristics/severity.js";
import { scoreQuality } from "../quality/scorer.js";
import { createChildLogger } from "../utils/logger.js";
import type { CodeAnalysis, ReviewRequest, SeverityTier } from "./types.js";

const log = createChildLogger({ module: "analysis" });

/** Language, per-comment severity and quality score for a validated request. */
export function analyzeCode(
  request: ReviewRequest,
  scoring: ScoringConfig = DEFAULT_CONFIG.scoring
): CodeAnalysis {
  const language = detectLanguage(request.code_snippet);
  const severities = request.review_comments.map((c) => classifySeverity(c));
  const quality = scoreQuality(
    request.code_snippet,
    request.review_comments,
    language,
    scoring
  );

  const severity_breakdown: Record<SeverityTier, number> = {
    Mild: 0,
    Moderate: 0,
    Harsh: 0,
  };
  for (const tier of severities) severity_breakdown[tier]++;

  log.debug(
    { language, overall: quality.overall, comments: severities.length },
    "Analyzed snippet"
  );

  return {
    language,
    quality,
    total_issues: request.review_comments.length,
    severities,
    severity_breakdown,
  };
}
