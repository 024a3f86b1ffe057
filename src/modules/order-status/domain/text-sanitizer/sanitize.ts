/** Longest inbound text the assistant will classify. */
export const MAX_INBOUND_TEXT_CHARS = 1000;

/**
 * Strips HTML tags and control characters, collapses whitespace and trims.
 * Non-string input yields an empty string.
 */
export function sanitizeText(rawText: unknown): string {
  if (typeof rawText !== 'string') {
    return '';
  }

  return rawText
    .replace(/<[^>]*>/g, ' ')
    .replace(/[\u0000-\u001F\u007F]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_INBOUND_TEXT_CHARS);
}
