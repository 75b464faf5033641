/**
 * Pull a single JSON object out of model output. Tolerates code fences and
 * prose around the object; returns null when nothing parses to an object.
 */
export function extractJsonObject(content: string): Record<string, unknown> | null {
  if (!content) return null;
  let s = content.trim();
  s = s.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/i, '').trim();
  const direct = tryParse(s);
  if (direct) return direct;
  const start = s.indexOf('{');
  const end = s.lastIndexOf('}');
  if (start >= 0 && end > start) return tryParse(s.slice(start, end + 1));
  return null;
}

function tryParse(s: string): Record<string, unknown> | null {
  let value: unknown;
  try { value = JSON.parse(s); } catch { return null; }
  return isRecord(value) ? value : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
