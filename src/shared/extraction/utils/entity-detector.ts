import type { EntityBreakdown, JsonValue } from '../interfaces/extraction-result.interface';
import { isPlainObject } from '@/shared/lib/util';

const MAX_PER_CATEGORY = 20;

const PATTERNS: Record<string, RegExp> = {
  emails: /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi,
  phones: /(?:\+\d{1,3}[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}\b/g,
  prices:
    /[$€£¥₹]\s?\d[\d,]*(?:\.\d{1,2})?|\b\d[\d,]*(?:\.\d{1,2})?\s?(?:USD|EUR|GBP|INR)\b/g,
  urls: /https?:\/\/[^\s"'<>]+/g,
};

function unique(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))].slice(
    0,
    MAX_PER_CATEGORY,
  );
}

export function detectEntities(text: string): EntityBreakdown {
  const breakdown: EntityBreakdown = {};

  for (const [category, pattern] of Object.entries(PATTERNS)) {
    const found = unique(text.match(pattern) ?? []);
    if (found.length > 0) {
      breakdown[category] = found;
    }
  }

  return breakdown;
}

/** Normalizes a model-supplied `entities` value into category → strings. */
export function entitiesFromModel(value: JsonValue | undefined): EntityBreakdown {
  const breakdown: EntityBreakdown = {};
  if (value === undefined || !isPlainObject(value)) {
    return breakdown;
  }

  for (const [category, entries] of Object.entries(value)) {
    const list = Array.isArray(entries) ? entries : [entries];
    const strings = unique(
      list
        .filter((entry) => entry !== null && typeof entry !== 'object')
        .map((entry) => String(entry)),
    );
    if (strings.length > 0) {
      breakdown[category] = strings;
    }
  }

  return breakdown;
}

export function mergeEntities(
  ...breakdowns: EntityBreakdown[]
): EntityBreakdown {
  const merged: EntityBreakdown = {};
  for (const breakdown of breakdowns) {
    for (const [category, values] of Object.entries(breakdown)) {
      merged[category] = unique([...(merged[category] ?? []), ...values]);
    }
  }
  return merged;
}
