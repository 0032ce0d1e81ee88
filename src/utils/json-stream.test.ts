import { describe, test, expect } from "vitest";
import { join } from "path";
import {
  FileNotFoundError,
  ParseError,
  PermissionDeniedError,
  SchemaVersionError,
} from "../core/errors";
import { streamJsonArray, toExportError } from "./json-stream";

const FIXTURES_DIR = join(__dirname, "../test-fixtures/exports");

async function collect(filePath: string): Promise<unknown[]> {
  const elements: unknown[] = [];
  for await (const element of streamJsonArray(filePath)) {
    elements.push(element);
  }
  return elements;
}

describe("json-stream", () => {
  describe("streamJsonArray", () => {
    test("yields each element of the root array", async () => {
      const elements = await collect(join(FIXTURES_DIR, "unknown-format.json"));
      expect(elements).toEqual([{ foo: 1 }]);
    });

    test("yields nothing for an empty array", async () => {
      expect(await collect(join(FIXTURES_DIR, "empty.json"))).toEqual([]);
    });

    test("fails on the first pull for a missing file", async () => {
      const iterator = streamJsonArray(join(FIXTURES_DIR, "missing.json"));
      await expect(iterator.next()).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });

  describe("toExportError", () => {
    test("maps fs error codes", () => {
      expect(toExportError({ code: "ENOENT" }, "a.json")).toBeInstanceOf(FileNotFoundError);
      expect(toExportError({ code: "EACCES" }, "a.json")).toBeInstanceOf(PermissionDeniedError);
      expect(toExportError({ code: "EPERM" }, "a.json").message).toBe("Permission denied reading export file: a.json");
      expect(toExportError({ code: "EISDIR" }, "a.json").message).toBe("Export path is not a file: a.json");
    });

    test("maps a non-array root to SchemaVersionError", () => {
      const error = toExportError(new Error("Top-level object should be an array."), "a.json");
      expect(error).toBeInstanceOf(SchemaVersionError);
    });

    test("wraps other failures in ParseError", () => {
      const cause = new Error("Parser cannot parse input");
      const error = toExportError(cause, "a.json");
      expect(error).toBeInstanceOf(ParseError);
      expect(error.message).toBe("JSON parsing failed for a.json: Parser cannot parse input");
      expect(error instanceof ParseError && error.cause).toBe(cause);
    });

    test("passes library errors through", () => {
      const error = new FileNotFoundError("a.json");
      expect(toExportError(error, "b.json")).toBe(error);
    });
  });
});
