import { createReadStream } from "fs";
import { stat } from "fs/promises";
import { pipeline } from "stream";
import Parser from "stream-json/Parser";
import StreamArray from "stream-json/streamers/StreamArray";
import {
  ChatdigError,
  FileNotFoundError,
  ParseError,
  PermissionDeniedError,
  SchemaVersionError,
  formatError,
  getErrorCode,
} from "../core/errors";
import { logger } from "./logger";

/** Message stream-json uses when the root value is not an array */
const NOT_AN_ARRAY = "Top-level object should be an array";

/**
 * Check the export path before opening it, so that a missing or unreadable
 * file fails on the first pull rather than midway through.
 */
export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new FileNotFoundError(filePath, `Export path is not a file: ${filePath}`);
    }
  } catch (error) {
    throw toExportError(error, filePath);
  }
}

/**
 * Translate fs and parser failures into the library's error types.
 */
export function toExportError(error: unknown, filePath: string): ChatdigError {
  if (error instanceof ChatdigError) {
    return error;
  }

  const code = getErrorCode(error);
  if (code === "ENOENT") {
    return new FileNotFoundError(filePath);
  }
  if (code === "EACCES" || code === "EPERM") {
    return new PermissionDeniedError(filePath);
  }
  if (code === "EISDIR") {
    return new FileNotFoundError(filePath, `Export path is not a file: ${filePath}`);
  }

  const message = formatError(error);
  if (message.includes(NOT_AN_ARRAY)) {
    return new SchemaVersionError(`Unsupported export format in ${filePath}: the root JSON value must be an array`);
  }
  return new ParseError(
    `JSON parsing failed for ${filePath}: ${message}`,
    error instanceof Error ? error : undefined
  );
}

function hasArrayValue(chunk: unknown): chunk is { key: number; value: unknown } {
  return chunk !== null && typeof chunk === "object" && "key" in chunk && "value" in chunk;
}

/**
 * Stream the elements of a file whose root is a JSON array, one element at a
 * time. Only the element being assembled is held in memory.
 *
 * The file handle is released when the consumer finishes, stops early
 * (`break`/`return`) or an error is thrown.
 */
export async function* streamJsonArray(filePath: string): AsyncGenerator<unknown> {
  await assertReadableFile(filePath);

  const source = createReadStream(filePath);
  const elements = new StreamArray();

  pipeline(source, new Parser(), elements, (error) => {
    // Failures also reach the iterator below, which rethrows them
    if (error) {
      logger.debug(`Export stream closed for ${filePath}: ${formatError(error)}`);
    }
  });

  try {
    for await (const chunk of elements) {
      const element: unknown = chunk;
      if (hasArrayValue(element)) {
        yield element.value;
      }
    }
  } catch (error) {
    throw toExportError(error, filePath);
  } finally {
    elements.destroy();
    source.destroy();
  }
}
