import { z } from "zod";
import type { DetectedLanguage, KnownLanguage } from "../review/types.js";
import { readDataFile } from "../utils/data.js";

const resourceTableSchema = z.record(z.string(), z.record(z.string(), z.string()));

interface Topic {
  topic: string;
  /** Lower-case substrings looked for in the comment */
  keywords: readonly string[];
  /** Tested against the lower-cased snippet */
  codeSignal?: RegExp;
}

const GENERIC_TOPICS: readonly Topic[] = [
  { topic: "naming", keywords: ["variable", "naming"] },
  { topic: "performance", keywords: ["efficient", "performance", "loop"] },
  { topic: "style", keywords: ["style", "formatting"] },
];

const LANGUAGE_TOPICS: Readonly<Record<KnownLanguage, readonly Topic[]>> = {
  Python: [
    { topic: "comprehension", keywords: ["comprehension"] },
    { topic: "style", keywords: [], codeSignal: /[=!]=\s*(?:true|false)\b/ },
    { topic: "docstrings", keywords: ["function", "docstring"] },
  ],
  JavaScript: [
    { topic: "async", keywords: ["async", "promise"] },
    { topic: "es6", keywords: ["es6", "arrow", "const"] },
  ],
  Java: [{ topic: "concurrency", keywords: ["thread", "concurrent"] }],
  "C++": [{ topic: "modern", keywords: ["modern", "c++11", "c++14", "c++17"] }],
  Go: [{ topic: "fmt", keywords: ["format", "gofmt"] }],
};

let _table: Record<string, Record<string, string>> | null = null;

function resourceTable(): Record<string, Record<string, string>> {
  if (_table) return _table;
  _table = readDataFile("resources.json", resourceTableSchema);
  return _table;
}

/** Languages that have a resource table. */
export function supportedLanguages(): string[] {
  return Object.keys(resourceTable());
}

function matches(topic: Topic, comment: string, code: string): boolean {
  if (topic.keywords.some((k) => comment.includes(k))) return true;
  return topic.codeSignal?.test(code) ?? false;
}

/**
 * Documentation links relevant to one comment, generic topics first.
 * Unknown snippets get nothing.
 */
export function findResources(
  comment: string,
  snippet: string,
  language: DetectedLanguage
): string[] {
  if (language === "Unknown") return [];
  const links = resourceTable()[language];
  if (!links) return [];

  const text = comment.toLowerCase();
  const code = snippet.toLowerCase();
  const topics = [...GENERIC_TOPICS, ...LANGUAGE_TOPICS[language]];

  return topics
    .filter((t) => matches(t, text, code))
    .map((t) => links[t.topic])
    .filter((link): link is string => !!link);
}

/** Per-comment links concatenated, duplicates removed in first-seen order. */
export function collectResources(
  comments: readonly string[],
  snippet: string,
  language: DetectedLanguage
): string[] {
  const all = comments.flatMap((c) => findResources(c, snippet, language));
  return [...new Set(all)];
}
