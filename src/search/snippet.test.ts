import { describe, test, expect } from "vitest";
import { createMessage } from "../core/models";
import { FALLBACK_EMPTY, FALLBACK_NO_MATCH, extractSnippet, extractSnippetFromMessages } from "./snippet";

describe("snippet", () => {
  describe("extractSnippet", () => {
    test("returns short text unchanged", () => {
      expect(extractSnippet("short text with python", ["python"])).toBe("short text with python");
    });

    test("returns the fallback for blank text", () => {
      expect(extractSnippet("   ", ["python"])).toBe(FALLBACK_EMPTY);
    });

    test("starts the window before the first match and trims the partial word", () => {
      const text = "x ".repeat(50) + "python " + "y ".repeat(60);
      expect(extractSnippet(text, ["python"])).toBe("..." + "x ".repeat(9) + "python " + "y ".repeat(36) + "y...");
    });

    test("keeps the leading context when no space is close to the cut", () => {
      const text = "a".repeat(50) + "python";
      expect(extractSnippet(text, ["python"])).toBe("..." + "a".repeat(20) + "python");
    });

    test("starts at the top when the match is at the start", () => {
      const text = "python " + "z".repeat(200);
      expect(extractSnippet(text, ["PYTHON"])).toBe("python " + "z".repeat(93) + "...");
    });

    test("uses the earliest occurrence across keywords", () => {
      expect(extractSnippet("java then python", ["python", "java"])).toBe("java then python");
    });

    test("starts at the top when no keyword occurs", () => {
      expect(extractSnippet("hello world", ["zzz"])).toBe("hello world");
    });

    test("previews from the top for metadata-only matches", () => {
      const text = "x ".repeat(50) + "python";
      expect(extractSnippet(text, ["python"], 0)).toBe("x ".repeat(49) + "x...");
    });

    test("appends the number of additional matches", () => {
      expect(extractSnippet("python is great", ["python"], 3)).toBe("python is great (+2 more matches)");
    });

    test("counts grapheme clusters, not code units", () => {
      const thumbs = "👍🏽";
      expect(extractSnippet(thumbs.repeat(120), [])).toBe(thumbs.repeat(100) + "...");
    });

    test("matches non-ASCII keywords case-insensitively", () => {
      expect(extractSnippet("Über alles", ["über"])).toBe("Über alles");
    });
  });

  describe("extractSnippetFromMessages", () => {
    const timestamp = new Date("2024-01-01T00:00:00Z");
    const messages = [
      createMessage({ id: "m1", content: "Hello there", role: "user", timestamp }),
      createMessage({ id: "m2", content: "Django is great", role: "assistant", timestamp }),
      createMessage({ id: "m3", content: "More about Django", role: "user", timestamp }),
    ];

    test("uses the first matched message and reports the match count", () => {
      expect(extractSnippetFromMessages(messages, ["django"], ["m2", "m3"])).toEqual({
        snippet: "Django is great (+1 more matches)",
        matchCount: 2,
      });
    });

    test("returns fallbacks when nothing matched", () => {
      expect(extractSnippetFromMessages([], ["django"], [])).toEqual({ snippet: FALLBACK_EMPTY, matchCount: 0 });
      expect(extractSnippetFromMessages(messages, ["django"], [])).toEqual({
        snippet: FALLBACK_NO_MATCH,
        matchCount: 0,
      });
      expect(extractSnippetFromMessages(messages, ["django"], ["unknown"])).toEqual({
        snippet: FALLBACK_NO_MATCH,
        matchCount: 0,
      });
    });
  });
});
