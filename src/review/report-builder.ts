import { personaTitle } from "../llm/personas.js";
import type { DetectedLanguage, Persona, QualityScore } from "./types.js";

interface ReportOptions {
  language: DetectedLanguage;
  persona: Persona;
  quality: QualityScore;
  reviewMarkdown: string;
  resources: readonly string[];
}

export function formatScore(score: number): string {
  return `${score.toFixed(1)}/10`;
}

/**
 * Markdown report: a header line with language, persona and overall score,
 * the LLM rewrite, then an Additional Resources list when there are links.
 */
export function buildReviewReport(options: ReportOptions): string {
  const { language, persona, quality, reviewMarkdown, resources } = options;
  const parts: string[] = [];

  parts.push("# Empathetic Code Review Report\n");
  parts.push(
    `**Language:** ${language} | **Reviewer Persona:** ${personaTitle(persona)} | **Overall Quality Score:** ${formatScore(quality.overall)}\n`
  );
  parts.push(reviewMarkdown.trim());

  if (resources.length > 0) {
    parts.push("");
    parts.push("## Additional Resources\n");
    parts.push("For further learning, consider reviewing these resources:\n");
    parts.push(...resources.map((r) => `- ${r}`));
  }

  return parts.join("\n");
}

/** `YYYY-MM-DD HH:MM:SS` in UTC */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/** Download variant: generation metadata on top, a footer line below. */
export function buildEnhancedReport(options: {
  report: string;
  persona: Persona;
  quality: QualityScore;
  generatedAt: Date;
}): string {
  const { report, persona, quality, generatedAt } = options;
  return [
    "# Code Review Report",
    `Generated: ${formatTimestamp(generatedAt)}`,
    `Persona: ${personaTitle(persona)}`,
    `Overall Quality: ${formatScore(quality.overall)}`,
    "",
    report,
    "",
    "---",
    "Generated with kindly-review",
  ].join("\n");
}
