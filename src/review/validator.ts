import { z } from "zod";
import { ValidationError, type ValidationReason } from "../utils/errors.js";
import type { ReviewRequest } from "./types.js";

const reviewRequestSchema = z.object({
  code_snippet: z.string(),
  review_comments: z
    .array(
      z.string().refine((c) => c.trim().length > 0, {
        message: "review comments must not be blank",
      })
    )
    .min(1, { message: "review_comments must contain at least one comment" }),
});

// Lower index wins when several issues are reported at once
const REASON_PRIORITY: readonly ValidationReason[] = [
  "NotParseable",
  "MissingField",
  "WrongType",
  "EmptyComments",
];

function reasonFor(issue: z.ZodIssue): ValidationReason {
  if (issue.path.length === 0) return "NotParseable";
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === "undefined" ? "MissingField" : "WrongType";
  }
  return "EmptyComments";
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Checks an already-decoded value against the request shape. Extra fields
 * are dropped; the result is frozen.
 */
export function validateReviewRequest(value: unknown): ReviewRequest {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ValidationError("NotParseable", "Input must be a JSON object");
  }

  const result = reviewRequestSchema.safeParse(value);
  if (!result.success) {
    const ranked = result.error.issues
      .map((issue) => ({ issue, reason: reasonFor(issue) }))
      .sort(
        (a, b) =>
          REASON_PRIORITY.indexOf(a.reason) - REASON_PRIORITY.indexOf(b.reason)
      );
    const [first] = ranked;
    if (!first) {
      throw new ValidationError("NotParseable", "Input could not be validated");
    }
    throw new ValidationError(first.reason, describeIssue(first.issue));
  }

  return Object.freeze({
    code_snippet: result.data.code_snippet,
    review_comments: Object.freeze([...result.data.review_comments]),
  });
}

/** Parses raw JSON text and validates it. The single gate before analysis. */
export function validateReviewInput(raw: string): ReviewRequest {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ValidationError("NotParseable", `Invalid JSON: ${detail}`);
  }
  return validateReviewRequest(value);
}
