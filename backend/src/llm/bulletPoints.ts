// A marker ends at whitespace or at the end of a marker-only line
const LEADING_MARKER = /^(?:•\s*|[-*–](?:\s+|$)|\d+[.)](?:\s+|$))/;

export const BULLET = '•';

/**
 * Normalizes raw model output into one bullet point per line.
 * Existing markers (•, -, *, –, "1.", "1)") are replaced by "• ";
 * lines without a marker get one. Blank lines are dropped.
 */
export function normalizeBulletPoints(raw: string): string {
  return splitPoints(raw)
    .map((point) => `${BULLET} ${point}`)
    .join('\n');
}

/**
 * Splits model output into plain points with their markers removed
 */
export function splitPoints(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim().replace(LEADING_MARKER, '').trim())
    .filter((line) => line.length > 0);
}
