/**
 * Zod Validation Middleware for Express
 *
 * Returns a 400 with structured error details on validation failure.
 *
 * ```ts
 * router.post("/", validateBody(MySchema), handler);
 * ```
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { ZodError, ZodTypeAny } from "zod";

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatZodIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function rejectInvalid(res: Response, message: string, error: ZodError): void {
  res.status(400).json({
    success: false,
    error: {
      code: "VALIDATION_ERROR",
      message,
      details: formatZodIssues(error),
    },
  });
}

/**
 * Validates `req.body`, replacing it with the parsed (and possibly transformed) data
 */
export function validateBody(schema: ZodTypeAny): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      rejectInvalid(res, "Invalid request body", result.error);
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validates `req.query`. Express query objects are not reassignable, so
 * handlers re-read typed values with `schema.parse(req.query)`.
 */
export function validateQuery(schema: ZodTypeAny): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      rejectInvalid(res, "Invalid query parameters", result.error);
      return;
    }
    next();
  };
}
