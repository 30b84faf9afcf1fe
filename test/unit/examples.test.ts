import { describe, it, expect } from "vitest";
import { exampleLanguages, getExample } from "../../src/examples/catalog.js";
import { detectLanguage } from "../../src/heuristics/language.js";

describe("example catalog", () => {
  it("lists the bundled samples", () => {
    expect(exampleLanguages()).toEqual(["python", "javascript", "java"]);
  });

  it("looks up a sample case-insensitively", () => {
    const example = getExample("JavaScript");
    expect(example.code_snippet.startsWith("function getUserData(users)")).toBe(true);
    expect(example.review_comments).toHaveLength(4);
  });

  it("falls back to the python sample", () => {
    expect(getExample("rust")).toEqual(getExample("python"));
    expect(getExample("constructor")).toEqual(getExample("python"));
    expect(getExample("toString")).toEqual(getExample("python"));
  });

  it("ships samples the detector recognises", () => {
    expect(detectLanguage(getExample("python").code_snippet)).toBe("Python");
    expect(detectLanguage(getExample("javascript").code_snippet)).toBe("JavaScript");
    expect(detectLanguage(getExample("java").code_snippet)).toBe("Java");
  });
});
