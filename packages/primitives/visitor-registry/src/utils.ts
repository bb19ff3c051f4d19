export const now = () => Date.now();

/** Length in code points, so an astral character counts once. */
export const charLength = (value: string): number => Array.from(value).length;

/** Cuts on code point boundaries; never leaves half a surrogate pair. */
export const truncateValue = (value: string, maxLength: number): string => {
  if (value.length <= maxLength) return value;
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, Math.max(0, maxLength)).join("") : value;
};

export const cleanControlChars = (value: string): string =>
  value.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, "");

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

/**
 * Escapes then truncates. The limit counts escaped characters in code points,
 * so `"&"` costs five; stored data depends on this order.
 */
export const sanitizeText = (value: string | null | undefined, maxLength: number): string => {
  if (!value) return "";
  return truncateValue(escapeHtml(cleanControlChars(value)), maxLength);
};

/** Like {@link sanitizeText}, but empty results collapse to null. */
export const sanitizeOptional = (value: string | null | undefined, maxLength: number): string | null => {
  const sanitized = sanitizeText(value, maxLength);
  return sanitized === "" ? null : sanitized;
};

const asciiJsonLength = (value: unknown): number => {
  const json = JSON.stringify(value);
  let length = 0;
  for (let i = 0; i < json.length; i++) {
    length += json.charCodeAt(i) > 0x7f ? 6 : 1;
  }
  return length;
};

/**
 * Size of `answers` serialized with `", "` and `": "` separators and every
 * non-ASCII UTF-16 unit escaped as `\uXXXX`. Size limits on answers are
 * measured in this form.
 */
export const answersSize = (answers: Record<string, unknown>): number => {
  const entries = Object.entries(answers);
  if (entries.length === 0) return 2;
  const body = entries.reduce((sum, [key, value]) => sum + asciiJsonLength(key) + 2 + asciiJsonLength(value), 0);
  return 2 + body + 2 * (entries.length - 1);
};

/**
 * Equality key for a visitor identity. Exact match on both parts, with a
 * null agent type kept apart from every string, the empty one included.
 */
export const identityKey = (name: string, agentType: string | null): string =>
  JSON.stringify([name, agentType]);

export const clampLimit = (limit: number | undefined, fallback: number, max: number): number => {
  const value = limit === undefined || !Number.isFinite(limit) ? fallback : Math.floor(limit);
  return Math.max(1, Math.min(value, max));
};

/** Newest first; ties fall back to id so one call always yields one order. */
export const byTimeDesc =
  <T extends { id: string }>(timeOf: (item: T) => number) =>
  (a: T, b: T): number => {
    const diff = timeOf(b) - timeOf(a);
    if (diff !== 0) return diff;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  };

/**
 * Drops the oldest items beyond `maxItems`, keeping the survivors in their
 * original order.
 */
export const evictOldest = <T extends { id: string }>(
  items: T[],
  maxItems: number,
  timeOf: (item: T) => number
): { kept: T[]; removed: number } => {
  const ceiling = Math.max(0, maxItems);
  if (items.length <= ceiling) return { kept: items, removed: 0 };
  const evicted = new Set(
    [...items]
      .sort(byTimeDesc(timeOf))
      .slice(ceiling)
      .map((item) => item.id)
  );
  const kept = items.filter((item) => !evicted.has(item.id));
  return { kept, removed: items.length - kept.length };
};
