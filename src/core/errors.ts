import type { ZodError } from "zod";

/**
 * Error types raised while reading exports and running searches.
 *
 * File-level and syntax errors propagate to the caller immediately.
 * Record-level ValidationErrors are caught by the adapters and turned into skips.
 */

export class ChatdigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChatdigError";
  }
}

export class FileNotFoundError extends ChatdigError {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message || `Export file not found: ${filePath}`);
    this.name = "FileNotFoundError";
  }
}

export class PermissionDeniedError extends ChatdigError {
  constructor(public readonly filePath: string) {
    super(`Permission denied reading export file: ${filePath}`);
    this.name = "PermissionDeniedError";
  }
}

export class ParseError extends ChatdigError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export class SchemaVersionError extends ChatdigError {
  constructor(message: string) {
    super(message);
    this.name = "SchemaVersionError";
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends ChatdigError {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = "ValidationError";
  }

  /**
   * Build a ValidationError from a failed zod parse, flattening issue paths
   * to dotted strings ("messages.0.id").
   */
  static fromZod(subject: string, error: ZodError): ValidationError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    return new ValidationError(`Invalid ${subject}: ${summary}`, issues);
  }
}

/**
 * Node fs errors carry a string `code` (ENOENT, EACCES, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Format an unknown thrown value into a one-line message.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
