/**
 * Zod request validation.
 *
 * Handlers call parseBody/parseQuery and get typed data back; failures
 * throw RequestValidationError, which the error handler turns into 400
 * with the issue list.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

export async function parseBody<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError("Request body validation failed", formatZodErrors(result.error));
  }
  return result.data;
}

export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError("Invalid query parameters", formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
