export const STANDARD_CATEGORIES = [
  'food',
  'transport',
  'entertainment',
  'shopping',
  'utilities',
  'housing',
  'healthcare',
  'education',
  'other',
] as const;

export type StandardCategory = (typeof STANDARD_CATEGORIES)[number];

/** A standard category or a user-defined one (lower-cased). */
export type Category = string;

export const DEFAULT_CATEGORY: StandardCategory = 'other';

export function isStandardCategory(value: string): value is StandardCategory {
  return (STANDARD_CATEGORIES as readonly string[]).includes(value);
}

export function titleCase(value: string): string {
  return value.replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}
