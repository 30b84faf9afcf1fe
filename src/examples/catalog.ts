import { z } from "zod";
import { readDataFile } from "../utils/data.js";
import { validateReviewRequest } from "../review/validator.js";
import type { ReviewRequest } from "../review/types.js";

const catalogSchema = z.record(z.string(), z.unknown());

const FALLBACK = "python";

let _catalog: Record<string, unknown> | null = null;

function catalog(): Record<string, unknown> {
  if (_catalog) return _catalog;
  _catalog = readDataFile("examples.json", catalogSchema);
  return _catalog;
}

export function exampleLanguages(): string[] {
  return Object.keys(catalog());
}

/** Sample request for a language key, python when the key is unknown. */
export function getExample(language: string): ReviewRequest {
  const entries = catalog();
  const key = language.toLowerCase();
  const entry = Object.hasOwn(entries, key) ? entries[key] : entries[FALLBACK];
  return validateReviewRequest(entry);
}
