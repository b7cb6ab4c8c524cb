import type { JsonValue, PaperRecord } from '../../shared/types';
import { firstPresent, isJsonObject, isPresent, stringify, toText } from './fields';

const NAME_KEYS = ['name', 'author', 'text'] as const;
const SEPARATORS = /[,;]/;

/**
 * Normalize an authors/categories value into trimmed, non-empty strings.
 *
 * Accepts a delimited string (`"A, B; C"`), a list of strings, a list of
 * `{ name | author | text }` mappings, or a lone scalar.
 */
export function normalizeList(value: JsonValue | undefined): string[] {
  if (!isPresent(value)) return [];

  if (typeof value === 'string') {
    return value
      .replace(/\uff1b/g, ';')
      .split(SEPARATORS)
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
  }

  const entries = Array.isArray(value) ? value : [value];
  const out: string[] = [];
  for (const entry of entries) {
    if (entry === null) continue;
    const text = isJsonObject(entry) ? toText(firstPresent(entry, NAME_KEYS)) : stringify(entry);
    const trimmed = text.trim();
    if (trimmed) out.push(trimmed);
  }
  return out;
}

export function normalizeAuthors(record: PaperRecord): string[] {
  return normalizeList(firstPresent(record, ['authors', 'author']));
}

export function normalizeCategories(record: PaperRecord): string[] {
  return normalizeList(firstPresent(record, ['categories', 'category']));
}
