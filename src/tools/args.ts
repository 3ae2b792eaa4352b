import type { z } from "zod";

export type ParsedArgs<T> = { ok: true; data: T } | { ok: false; error: string };

export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): ParsedArgs<z.infer<S>> {
  const result = schema.safeParse(args ?? {});
  if (result.success) {
    return { ok: true, data: result.data };
  }
  const error = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  return { ok: false, error: `Invalid arguments: ${error}` };
}
