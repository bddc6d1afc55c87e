/**
 * Fixed-size character windows with overlap. Same input, same chunks.
 */
export function chunkText(text: string, chunkSize: number, overlap: number): string[] {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length === 0) return [];
  if (chunkSize <= 0) throw new RangeError("chunkSize must be positive");

  const step = Math.max(1, chunkSize - Math.max(0, overlap));
  const chunks: string[] = [];

  for (let start = 0; start < normalized.length; start += step) {
    chunks.push(normalized.slice(start, start + chunkSize));
    if (start + chunkSize >= normalized.length) break;
  }

  return chunks;
}
