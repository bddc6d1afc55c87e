/**
 * Best-effort payload recovery for schema-invalid stage output.
 * Keeps whatever items still parse; drops the rest.
 */

import { z, type ZodIssue } from "zod";

const RecordSchema = z.record(z.unknown());
const NonEmptyString = z.string().trim().min(1);

/**
 * Object view of a candidate, or null when it is not an object at all
 */
export function asRecord(value: unknown): Record<string, unknown> | null {
  if (Array.isArray(value)) return null;
  const result = RecordSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function salvageItems<T>(value: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((item: unknown) => {
    const parsed = schema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}

export function salvageStrings(value: unknown): string[] {
  return salvageItems(value, NonEmptyString);
}

export function salvageString(value: unknown, fallback = ""): string {
  return typeof value === "string" ? value : fallback;
}

export function salvageNumber(value: unknown, min: number, max: number, fallback: number): number {
  const parsed = z.coerce.number().min(min).max(max).safeParse(value);
  return parsed.success ? parsed.data : fallback;
}

/**
 * "opportunities: Required" style defect lines
 */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
