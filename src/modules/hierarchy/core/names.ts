/**
 * Comparison form of a display name: case-insensitive, `&` read as `and`,
 * apostrophes dropped, other punctuation stripped, whitespace collapsed.
 */
export const normalizeName = (name: string): string =>
  name
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/['’]/g, '')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();

export const nameSlug = (name: string): string => normalizeName(name).replace(/ /g, '-');
