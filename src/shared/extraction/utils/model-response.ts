import type {
  ExtractionPayload,
  JsonObject,
  JsonValue,
} from '../interfaces/extraction-result.interface';
import { isPlainObject } from '@/shared/lib/util';

export function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return isPlainObject(value);
}

function tryParse(candidate: string): JsonValue | undefined {
  try {
    const value: unknown = JSON.parse(candidate);
    return isJsonValue(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

function span(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

/**
 * Pulls a JSON value out of a model response: a fenced block first, then
 * the whole response, then the outermost object or array span.
 */
export function parseModelJson(text: string): JsonValue | undefined {
  const candidates: string[] = [];

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced) {
    candidates.push(fenced[1].trim());
  }
  candidates.push(text.trim());

  for (const [open, close] of [
    ['{', '}'],
    ['[', ']'],
  ]) {
    const candidate = span(text, open, close);
    if (candidate) {
      candidates.push(candidate);
    }
  }

  for (const candidate of candidates) {
    if (!candidate) continue;
    const value = tryParse(candidate);
    if (value !== undefined) {
      return value;
    }
  }

  return undefined;
}

/** Keys of `data` whose values are non-empty lists of records. */
export function recordListKeys(data: JsonObject): string[] {
  return Object.entries(data)
    .filter(
      ([, value]) =>
        Array.isArray(value) && value.length > 0 && value.every(isPlainObject),
    )
    .map(([key]) => key);
}

export function classifyPayload(value: JsonValue): ExtractionPayload {
  if (Array.isArray(value)) {
    return { kind: 'entity-list', items: value };
  }
  if (isJsonObject(value)) {
    const tableKeys = recordListKeys(value);
    return tableKeys.length > 0
      ? { kind: 'tabular', data: value, tableKeys }
      : { kind: 'key-value', data: value };
  }
  return {
    kind: 'free-text',
    text: typeof value === 'string' ? value : String(value),
  };
}
