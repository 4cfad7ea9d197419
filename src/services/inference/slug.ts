// Slug normalization for check identifiers

/**
 * Converts text into a lowercase, hyphen-separated token.
 * Returns an empty string when the text has no ASCII letters or digits.
 */
export function slugify(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Capitalizes each non-empty part and joins them with spaces
 * @example titleCase('security', 'redis', 'auth') // 'Security Redis Auth'
 */
export function titleCase(...parts: string[]): string {
  return parts
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}
