import { describe, it, expect } from "vitest";
import { detectLanguage, languageScores } from "../../src/heuristics/language.js";
import {
  BOOL_COMPARISON_SNIPPET,
  CPP_SNIPPET,
  GO_SNIPPET,
  JAVASCRIPT_SNIPPET,
  JAVA_SNIPPET,
  PYTHON_SNIPPET,
} from "../fixtures/requests.js";

describe("detectLanguage", () => {
  it("recognises each supported language", () => {
    expect(detectLanguage(PYTHON_SNIPPET)).toBe("Python");
    expect(detectLanguage(BOOL_COMPARISON_SNIPPET)).toBe("Python");
    expect(detectLanguage(JAVASCRIPT_SNIPPET)).toBe("JavaScript");
    expect(detectLanguage(JAVA_SNIPPET)).toBe("Java");
    expect(detectLanguage(CPP_SNIPPET)).toBe("C++");
    expect(detectLanguage(GO_SNIPPET)).toBe("Go");
  });

  it("returns Unknown when no signature token occurs", () => {
    expect(detectLanguage("")).toBe("Unknown");
    expect(detectLanguage("hello world")).toBe("Unknown");
  });

  it("matches case-sensitively", () => {
    expect(detectLanguage("DEF CONST")).toBe("Unknown");
  });

  it("breaks ties in favour of the earlier language", () => {
    expect(languageScores("def const")).toEqual({
      Python: 1,
      JavaScript: 1,
      Java: 0,
      "C++": 0,
      Go: 0,
    });
    expect(detectLanguage("def const")).toBe("Python");
  });

  it("does not count a keyword inside a longer identifier", () => {
    // `def` inside `undefined` is not a Python hit
    expect(languageScores("undefined").Python).toBe(0);
    expect(detectLanguage("undefined")).toBe("JavaScript");
  });

  it("counts every occurrence of a token", () => {
    expect(languageScores(JAVASCRIPT_SNIPPET).JavaScript).toBe(3);
    expect(languageScores(JAVA_SNIPPET).Java).toBe(5);
    expect(languageScores(GO_SNIPPET).Go).toBe(4);
  });
});
