import type { DetectedLanguage, Persona, SeverityTier } from "../review/types.js";
import { PERSONAS } from "./personas.js";

const FENCE_TAGS: Record<DetectedLanguage, string> = {
  Python: "python",
  JavaScript: "javascript",
  Java: "java",
  "C++": "cpp",
  Go: "go",
  Unknown: "",
};

export function fenceTag(language: DetectedLanguage): string {
  return FENCE_TAGS[language];
}

const TONE_ADJUSTMENTS: Record<SeverityTier, string> = {
  Harsh:
    "The original feedback was blunt or discouraging. Soften it deliberately and build the developer's confidence while still conveying the technical improvement.",
  Moderate:
    "Keep a balanced, professional tone that is supportive and educational.",
  Mild:
    "The original feedback was already fairly neutral. Concentrate on making it more educational and on explaining the 'why' behind each suggestion.",
};

export function buildSystemPrompt(options: {
  persona: Persona;
  language: DetectedLanguage;
  severity: SeverityTier;
}): string {
  const { persona, language, severity } = options;
  const languageContext =
    language === "Unknown"
      ? "The language of the code could not be determined. Keep explanations language-neutral."
      : `You are reviewing ${language} code. Use ${language} terminology, conventions and best practices in your explanations.`;

  return `You are an empathetic and educational code reviewer. Your goal is to turn critical feedback into constructive, encouraging guidance that helps developers learn.

## Persona
${PERSONAS[persona].voice}

## Code Language Context
${languageContext}

## Principles
1. Start with something positive or encouraging
2. Explain the 'why' behind every suggestion with clear technical reasoning
3. Give concrete, improved code examples in the correct language syntax
4. Use inclusive language that builds confidence
5. Frame issues as learning opportunities rather than mistakes
6. Reference language-specific style guides where relevant

## Tone
${TONE_ADJUSTMENTS[severity]}`;
}

export function buildUserPrompt(options: {
  snippet: string;
  comments: readonly string[];
  language: DetectedLanguage;
}): string {
  const { snippet, comments, language } = options;
  const tag = fenceTag(language);
  const languageName = language === "Unknown" ? "" : `${language} `;

  return `Please transform the following ${languageName}code review comments into empathetic, educational feedback. For each comment, provide:

1. **Positive Rephrasing**: a gentle, encouraging version that keeps the technical point
2. **The 'Why'**: the underlying software principle (performance, readability, maintainability, ...)
3. **Suggested Improvement**: a concrete code example demonstrating the fix

Code Snippet:
\`\`\`${tag}
${snippet}
\`\`\`

Original Comments:
${JSON.stringify(comments, null, 2)}

Format your response as markdown with one section per comment:

---
### Analysis of Comment: "[original comment]"

**Positive Rephrasing:** [encouraging version]

**The 'Why':** [technical explanation]

**Suggested Improvement:**
\`\`\`${tag}
[improved code]
\`\`\`

---

After all comments, add a "Summary" section with an encouraging overall assessment of the code.`;
}
