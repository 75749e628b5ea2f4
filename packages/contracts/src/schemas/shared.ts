import { z } from "zod";
import { GenerationError } from "../types/error";

export function dimension(label: string, fallback: number) {
  return z
    .number()
    .int({ error: `${label} must be an integer` })
    .positive({ error: `${label} must be positive` })
    .default(fallback);
}

/**
 * Flattened zod issue, as carried in `GenerationError.details.issues`.
 */
export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Parse a generator configuration, throwing `CONFIG_INVALID` on failure.
 *
 * Runs before any grid is allocated, so a rejected configuration leaves
 * nothing half-built behind.
 */
export function parseConfig<S extends z.ZodType>(
  schema: S,
  input: unknown,
  subject: string,
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issues: ConfigIssue[] = parsed.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  const first = issues[0];
  const summary = first
    ? `${first.path || "config"}: ${first.message}`
    : "unknown issue";

  throw GenerationError.configInvalid(
    `Invalid ${subject} configuration (${summary})`,
    { issues },
  );
}
