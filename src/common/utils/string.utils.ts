/**
 * Resolves a value to an optional non-empty string.
 * Returns undefined if value is not a string or is empty after trim.
 */
export function resolveOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function removeWhitespace(value: string): string {
  return value.replace(/\s+/g, '');
}

/** Lowercases and strips diacritics ("Cabrón" -> "cabron"). */
export function foldDiacritics(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}
