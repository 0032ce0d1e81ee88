import { describe, test, expect } from "vitest";
import { createConversation, createMessage, type Conversation, type MessageRole } from "../core/models";
import { compareCodePoints, searchConversations, type PipelineOptions } from "./pipeline";
import { createSearchQuery, type SearchQueryInput, type SearchResult } from "./query";

function conversation(
  id: string,
  title: string,
  created: string,
  turns: Array<[MessageRole, string]>
): Conversation {
  const createdAt = new Date(created);
  return createConversation({
    id,
    title,
    createdAt,
    messages: turns.map(([role, content], i) =>
      createMessage({
        id: `${id}-m${i}`,
        content,
        role,
        timestamp: new Date(createdAt.getTime() + i * 60_000),
      })
    ),
  });
}

const corpus = [
  conversation("conv-a", "Python web frameworks", "2024-01-10T08:00:00Z", [
    ["user", "Should I learn Django or Flask for Python web development?"],
    ["assistant", "Django is a batteries-included Python framework."],
  ]),
  conversation("conv-b", "Java streams", "2024-02-10T08:00:00Z", [
    ["user", "How do Java streams work?"],
    ["assistant", "Streams process collections lazily in Java."],
  ]),
  conversation("conv-c", "Weekend recipes", "2024-03-10T08:00:00Z", [
    ["system", "You are a helpful cook."],
    ["user", "Suggest a pasta recipe"],
    ["assistant", "Try a simple tomato basil pasta."],
  ]),
];

async function* stream(conversations: Conversation[]): AsyncGenerator<Conversation> {
  yield* conversations;
}

async function search(
  input: SearchQueryInput,
  conversations: Conversation[] = corpus,
  options?: PipelineOptions
): Promise<SearchResult[]> {
  const results: SearchResult[] = [];
  for await (const result of searchConversations(stream(conversations), createSearchQuery(input), options)) {
    results.push(result);
  }
  return results;
}

function ids(results: SearchResult[]): string[] {
  return results.map((r) => r.conversation.id);
}

describe("pipeline", () => {
  describe("keywords", () => {
    test("finds conversations containing a keyword", async () => {
      const results = await search({ keywords: ["python"] });
      expect(ids(results)).toEqual(["conv-a"]);
      expect(results[0].score).toBeGreaterThan(0);
      expect(results[0].score).toBeLessThan(1);
      expect(results[0].matchedMessageIds).toEqual(["conv-a-m0", "conv-a-m1"]);
      expect(results[0].snippet).toBe("...or Flask for Python web development? (+1 more matches)");
    });

    test("ORs keywords in any mode", async () => {
      const results = await search({ keywords: ["python", "java"] });
      expect(ids(results).sort()).toEqual(["conv-a", "conv-b"]);
    });

    test("requires every keyword in all mode", async () => {
      expect(await search({ keywords: ["python", "java"], matchMode: "all" })).toEqual([]);
      expect(ids(await search({ keywords: ["django", "flask"], matchMode: "all" }))).toEqual(["conv-a"]);
    });

    test("accepts a multi-word keyword in all mode when one of its tokens occurs", async () => {
      expect(ids(await search({ keywords: ["django rails"], matchMode: "all" }))).toEqual(["conv-a"]);
    });

    test("never matches a keyword without tokens", async () => {
      expect(await search({ keywords: ["!!!"], matchMode: "all" })).toEqual([]);
      expect(await search({ keywords: ["!!!"], matchMode: "any" })).toEqual([]);
    });

    test("returns nothing for keywords absent from the corpus", async () => {
      expect(await search({ keywords: ["kubernetes"] })).toEqual([]);
    });

    test("ranks more relevant conversations first", async () => {
      const results = await search({ keywords: ["java", "streams"] });
      expect(ids(results)).toEqual(["conv-b"]);
      const mixed = await search({ keywords: ["python", "pasta"] });
      for (let i = 1; i < mixed.length; i++) {
        expect(mixed[i - 1].score).toBeGreaterThanOrEqual(mixed[i].score);
      }
    });
  });

  describe("phrases", () => {
    test("scores a phrase-only match at 0.5", async () => {
      const results = await search({ phrases: ["tomato basil"] });
      expect(ids(results)).toEqual(["conv-c"]);
      expect(results[0].score).toBe(0.5);
      expect(results[0].matchedMessageIds).toEqual(["conv-c-m2"]);
      expect(results[0].snippet).toBe("Try a simple tomato basil pasta.");
    });

    test("does not match across punctuation", async () => {
      expect(await search({ phrases: ["batteries included"] })).toEqual([]);
    });
  });

  describe("filters", () => {
    test("returns every conversation with score 1 when no criteria are set", async () => {
      const results = await search({});
      expect(ids(results)).toEqual(["conv-a", "conv-b", "conv-c"]);
      expect(results.map((r) => r.score)).toEqual([1, 1, 1]);
      expect(results[0].matchedMessageIds).toEqual([]);
      expect(results[0].snippet).toBe("Should I learn Django or Flask for Python web development?");
      expect(results[2].snippet).toBe("You are a helpful cook.");
    });

    test("drops conversations containing exclude keywords", async () => {
      expect(ids(await search({ excludeKeywords: ["django"] }))).toEqual(["conv-b", "conv-c"]);
      expect(ids(await search({ keywords: ["python", "java"], excludeKeywords: ["flask"] }))).toEqual(["conv-b"]);
    });

    test("returns nothing when every matching term is excluded", async () => {
      const results = await search({
        keywords: ["python", "java", "pasta"],
        excludeKeywords: ["python", "java", "pasta"],
      });
      expect(results).toEqual([]);
    });

    test("filters titles case-insensitively", async () => {
      expect(ids(await search({ titleFilter: "JAVA" }))).toEqual(["conv-b"]);
    });

    test("filters by inclusive UTC creation dates", async () => {
      expect(ids(await search({ fromDate: "2024-02-01" }))).toEqual(["conv-b", "conv-c"]);
      expect(ids(await search({ toDate: "2024-02-10" }))).toEqual(["conv-a", "conv-b"]);
    });

    test("filters by message count", async () => {
      expect(ids(await search({ minMessages: 3 }))).toEqual(["conv-c"]);
      expect(ids(await search({ maxMessages: 2 }))).toEqual(["conv-a", "conv-b"]);
    });

    test("scopes the corpus to one role", async () => {
      const results = await search({ roleFilter: "system" });
      expect(ids(results)).toEqual(["conv-c"]);
      expect(results[0].snippet).toBe("You are a helpful cook.");
      expect(await search({ roleFilter: "user", keywords: ["cook"] })).toEqual([]);
    });

    test("searches titles only without a role filter", async () => {
      expect(await search({ roleFilter: "user", keywords: ["weekend"] })).toEqual([]);
      const results = await search({ keywords: ["weekend"] });
      expect(ids(results)).toEqual(["conv-c"]);
      expect(results[0].matchedMessageIds).toEqual([]);
      expect(results[0].snippet).toBe("You are a helpful cook.");
    });
  });

  describe("sorting and limits", () => {
    test("sorts by title", async () => {
      expect(ids(await search({ sortBy: "title", sortOrder: "asc" }))).toEqual(["conv-b", "conv-a", "conv-c"]);
    });

    test("sorts by date", async () => {
      expect(ids(await search({ sortBy: "date", sortOrder: "desc" }))).toEqual(["conv-c", "conv-b", "conv-a"]);
    });

    test("breaks ties by id ascending in both orders", async () => {
      expect(ids(await search({ sortBy: "messages", sortOrder: "asc" }))).toEqual(["conv-a", "conv-b", "conv-c"]);
      expect(ids(await search({ sortBy: "messages", sortOrder: "desc" }))).toEqual(["conv-c", "conv-a", "conv-b"]);
    });

    test("breaks ties by code point rather than UTF-16 code unit", async () => {
      const astral = conversation("id-\u{1F600}", "Same", "2024-01-10T08:00:00Z", [["user", "hello"]]);
      const highBmp = conversation("id-\uFF01", "Same", "2024-01-10T08:00:00Z", [["user", "hello"]]);
      expect(ids(await search({}, [astral, highBmp]))).toEqual(["id-\uFF01", "id-\u{1F600}"]);
    });

    test("limits the number of results", async () => {
      expect(ids(await search({ limit: 2 }))).toEqual(["conv-a", "conv-b"]);
    });
  });

  describe("streaming", () => {
    test("reports progress at the interval and once at the end", async () => {
      const calls: number[] = [];
      await search({}, corpus, { progressInterval: 2, onProgress: (count) => calls.push(count) });
      expect(calls).toEqual([2, 3]);
    });

    test("handles an empty stream", async () => {
      const calls: number[] = [];
      expect(await search({ keywords: ["python"] }, [], { onProgress: (count) => calls.push(count) })).toEqual([]);
      expect(calls).toEqual([0]);
    });

    test("yields frozen results", async () => {
      const [result] = await search({ keywords: ["java"] });
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.matchedMessageIds)).toBe(true);
    });
  });

  describe("compareCodePoints", () => {
    test("orders by code point", () => {
      expect(compareCodePoints("a", "b")).toBe(-1);
      expect(compareCodePoints("b", "a")).toBe(1);
      expect(compareCodePoints("same", "same")).toBe(0);
      expect(compareCodePoints("ab", "abc")).toBe(-1);
      expect(compareCodePoints("\uFF01", "\u{1F600}")).toBe(-1);
      expect(compareCodePoints("\u{1F600}", "\uFF01")).toBe(1);
    });
  });
});
