import type { ReviewerConfig } from "../config-loader/schema.js";

export const DEFAULT_CONFIG: ReviewerConfig = {
  persona: "senior_developer",
  llm: {
    model: "claude-sonnet-4-20250514",
    temperature: 0.7,
    maxTokens: 2500,
    retryAttempts: 3,
  },
  scoring: {
    lengthThreshold: 30,
    penalties: {
      poorName: 1,
      crampedOperator: 0.5,
      nestedLoop: 2,
      repeatedIteration: 1.5,
      inefficientPattern: 1,
      perExcessLine: 0.1,
      harshComment: 1,
      moderateComment: 0.5,
      antiPattern: 1.5,
    },
  },
};
