import type { z } from "zod";
import { ValidationError } from "../errors.js";

/**
 * Parse `input` with a zod schema, turning failures into a ValidationError
 * whose message names the first offending path.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: string,
  code?: string,
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const first = issues[0];
    throw new ValidationError(
      first ? `Invalid ${what}: ${first.path ? `${first.path}: ` : ""}${first.message}` : `Invalid ${what}`,
      { issues, code },
    );
  }
  return result.data;
}
