import type { z } from "zod";
import { formatZodIssues } from "../../../src/utils/validate.js";
import { ConfigValidationError } from "./errors.js";

/**
 * Parse `value`, throwing a ConfigValidationError that names `source`
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, source: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(source, formatZodIssues(result.error));
  }
  return result.data;
}
