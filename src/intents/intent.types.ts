export type IntentResponses = string[] | Record<string, string[]>;

export interface Intent {
  tag: string;
  patterns: string[];
  responses: IntentResponses;
}

export interface IntentCatalog {
  intents: Intent[];
}

export interface IntentMatch {
  tag: string;
  /** Best pattern overlap, 0..1. */
  confidence: number;
}

export const FALLBACK_TAG = 'fallback';

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

function isResponses(value: unknown): value is IntentResponses {
  if (isStringArray(value)) return true;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(isStringArray);
}

function isIntent(value: unknown): value is Intent {
  if (typeof value !== 'object' || value === null) return false;
  if (!('tag' in value) || !('patterns' in value) || !('responses' in value)) return false;
  return typeof value.tag === 'string' && isStringArray(value.patterns) && isResponses(value.responses);
}

export function isIntentCatalog(value: unknown): value is IntentCatalog {
  if (typeof value !== 'object' || value === null || !('intents' in value)) return false;
  return Array.isArray(value.intents) && value.intents.every(isIntent);
}
