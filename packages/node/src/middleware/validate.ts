/**
 * Zod validation middleware for request bodies and query strings.
 *
 * Handlers read the parsed value from `validatedBody` / `validatedQuery`,
 * typed by the schema. Failures answer 400 VALIDATION_ERROR with the zod
 * issues.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { validationEnvelope } from "../types/error.js";
import type { ValidationIssue } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

function toIssues(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

export function validateBody<T>(
  schema: Schema<T>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(validationEnvelope("Invalid JSON in request body"), 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        validationEnvelope("Request body validation failed", toIssues(result.error)),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

export function validateQuery<T>(
  schema: Schema<T>,
): MiddlewareHandler<{ Variables: { validatedQuery: T } }> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(
        validationEnvelope("Invalid query parameters", toIssues(result.error)),
        400,
      );
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}
