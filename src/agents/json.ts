/**
 * Pull a JSON value out of a model response. Models wrap JSON in ```json
 * fences, or surround it with prose; both are accepted.
 */

export type JsonExtraction = { ok: true; value: unknown } | { ok: false; error: string };

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

export function extractJson(text: string): JsonExtraction {
  const candidates: string[] = [];

  const fenced = FENCE.exec(text);
  if (fenced?.[1]) {
    candidates.push(fenced[1].trim());
  }

  const trimmed = text.trim();
  candidates.push(trimmed);

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start !== -1 && end > start) {
    candidates.push(trimmed.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    try {
      return { ok: true, value: JSON.parse(candidate) };
    } catch {
      // next candidate
    }
  }

  return { ok: false, error: "Response did not contain a valid JSON object" };
}
