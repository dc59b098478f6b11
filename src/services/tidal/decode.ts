import type { ZodType, ZodTypeDef } from "zod";
import { ParseJsonError } from "./errors";

export type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Parse a response body and validate it against `schema`. Unknown fields are
 * dropped, absent optional fields stay absent.
 */
export function convertResult<T>(text: string, schema: Schema<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseJsonError(message, { cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message
      )
      .join("; ");
    throw new ParseJsonError(detail, { cause: result.error });
  }
  return result.data;
}
