import { describe, test, expect } from "vitest";
import { createMessage } from "../core/models";
import {
  excludeFilter,
  findMatchedMessageIds,
  keywordsAllPresent,
  keywordsAnyPresent,
  phraseMatches,
} from "./matchers";

describe("matchers", () => {
  describe("keywordsAllPresent", () => {
    test("requires every keyword", () => {
      expect(keywordsAllPresent("Python and Django", ["python", "django"])).toBe(true);
      expect(keywordsAllPresent("Python and Django", ["python", "flask"])).toBe(false);
    });

    test("accepts a multi-word keyword when any of its tokens occurs", () => {
      expect(keywordsAllPresent("Machine learning rocks", ["machine learning"])).toBe(true);
      expect(keywordsAllPresent("machine vision", ["machine learning"])).toBe(true);
      expect(keywordsAllPresent("computer vision", ["machine learning"])).toBe(false);
    });

    test("never matches a keyword without tokens", () => {
      expect(keywordsAllPresent("anything", ["!!!"])).toBe(false);
      expect(keywordsAllPresent("anything", ["anything", "..."])).toBe(false);
    });

    test("is satisfied by an empty keyword list", () => {
      expect(keywordsAllPresent("anything", [])).toBe(true);
    });

    test("matches whole tokens only", () => {
      expect(keywordsAllPresent("pythonic code", ["python"])).toBe(false);
    });
  });

  describe("keywordsAnyPresent", () => {
    test("requires at least one keyword token", () => {
      expect(keywordsAnyPresent("Java streams", ["python", "java"])).toBe(true);
      expect(keywordsAnyPresent("Java streams", ["python"])).toBe(false);
    });

    test("is false for empty text or no keywords", () => {
      expect(keywordsAnyPresent("", ["java"])).toBe(false);
      expect(keywordsAnyPresent("java", [])).toBe(false);
    });
  });

  describe("phraseMatches", () => {
    test("matches case-insensitive substrings", () => {
      expect(phraseMatches("See the Algo-Insights report", ["algo-insights"])).toBe(true);
    });

    test("does not tokenize phrases", () => {
      expect(phraseMatches("algorithm insights", ["algo-insights"])).toBe(false);
    });

    test("ORs across phrases", () => {
      expect(phraseMatches("tomato basil pasta", ["risotto", "basil pasta"])).toBe(true);
    });

    test("never matches empty phrases or empty text", () => {
      expect(phraseMatches("text", [""])).toBe(false);
      expect(phraseMatches("", ["text"])).toBe(false);
    });
  });

  describe("excludeFilter", () => {
    test("drops text containing any exclude keyword", () => {
      expect(excludeFilter("Django tutorial", ["flask", "django"])).toBe(true);
      expect(excludeFilter("Django tutorial", ["flask"])).toBe(false);
      expect(excludeFilter("Django tutorial", [])).toBe(false);
    });
  });

  describe("findMatchedMessageIds", () => {
    const timestamp = new Date("2024-01-01T00:00:00Z");
    const messages = [
      createMessage({ id: "m1", content: "Python basics", role: "user", timestamp }),
      createMessage({ id: "m2", content: "Nothing relevant", role: "assistant", timestamp }),
      createMessage({ id: "m3", content: "Use a list comprehension", role: "assistant", timestamp }),
    ];

    test("returns ids in message order for keywords and phrases", () => {
      expect(findMatchedMessageIds(messages, ["python"], ["list comprehension"])).toEqual(["m1", "m3"]);
    });

    test("returns nothing without terms", () => {
      expect(findMatchedMessageIds(messages, [], [])).toEqual([]);
    });
  });
});
