import { z } from "zod";
import { PERSONA_IDS } from "../review/types.js";

const penalty = (fallback: number) => z.number().min(0).default(fallback);

const penaltiesSchema = z.object({
  // Readability
  poorName: penalty(1),
  crampedOperator: penalty(0.5),
  // Performance
  nestedLoop: penalty(2),
  repeatedIteration: penalty(1.5),
  inefficientPattern: penalty(1),
  // Maintainability
  perExcessLine: penalty(0.1),
  harshComment: penalty(1),
  moderateComment: penalty(0.5),
  // Best practices
  antiPattern: penalty(1.5),
});

const scoringSchema = z.object({
  /** Non-blank lines a snippet may have before maintainability deductions start */
  lengthThreshold: z.number().int().min(0).default(30),
  penalties: penaltiesSchema.default({}),
});

export type ScoringConfig = z.infer<typeof scoringSchema>;

const reviewerConfigSchema = z.object({
  persona: z.enum(PERSONA_IDS).default("senior_developer"),
  llm: z
    .object({
      model: z.string().min(1).default("claude-sonnet-4-20250514"),
      temperature: z.number().min(0).max(1).default(0.7),
      maxTokens: z.number().int().positive().default(2500),
      retryAttempts: z.number().int().min(1).max(5).default(3),
    })
    .default({}),
  scoring: scoringSchema.default({}),
});

export type ReviewerConfig = z.infer<typeof reviewerConfigSchema>;
export type LLMConfig = ReviewerConfig["llm"];

export function parseReviewerConfig(raw: unknown): ReviewerConfig {
  return reviewerConfigSchema.parse(raw);
}

export function safeParseReviewerConfig(raw: unknown) {
  return reviewerConfigSchema.safeParse(raw);
}
