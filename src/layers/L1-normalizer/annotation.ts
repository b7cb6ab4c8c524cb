import type { AnnotationBlock, JsonObject, JsonValue, PaperRecord } from '../../shared/types';
import { firstPresent, getField, isJsonObject, isPresent, stringify, toText, truncateCodePoints } from './fields';

export const DEFAULT_TLDR_MAX_CHARS = 140;

// CRLF plus every single-character Unicode line boundary.
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;
const BULLET_EDGES = /^[\s\u2022-]+|[\s\u2022-]+$/g;
const FULLWIDTH_SEMICOLON = /\uff1b/g;

export interface AnnotationOptions {
  tldrMaxChars?: number;
}

/** The raw "AI" (or "ai") sub-mapping, or {} when absent or not a mapping. */
export function selectAnnotation(record: PaperRecord): JsonObject {
  const block = firstPresent(record, ['AI', 'ai']);
  return isJsonObject(block) ? block : {};
}

function ownOr(annotation: JsonObject, key: string, fallback: () => string): string {
  if (Object.prototype.hasOwnProperty.call(annotation, key)) {
    return toText(annotation[key]);
  }
  return fallback();
}

export function normalizeAnnotation(record: PaperRecord, options: AnnotationOptions = {}): AnnotationBlock {
  const annotation = selectAnnotation(record);
  const maxChars = options.tldrMaxChars ?? DEFAULT_TLDR_MAX_CHARS;

  return {
    title_zh: ownOr(annotation, 'title_zh', () => toText(firstPresent(record, ['title_zh', 'title']))),
    summary_zh: ownOr(annotation, 'summary_zh', () =>
      toText(firstPresent(record, ['summary_zh', 'abstract', 'summary'])),
    ),
    tldr: ownOr(annotation, 'tldr', () => {
      const tldr = getField(record, 'tldr');
      if (isPresent(tldr)) return stringify(tldr);
      return truncateCodePoints(toText(getField(record, 'abstract')), maxChars);
    }),
    highlights: normalizeHighlights(annotation.highlights),
  };
}

/**
 * Highlights arrive either as a list or as one string with bullets, line
 * breaks or semicolons between points.
 */
export function normalizeHighlights(value: JsonValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((entry) => entry !== null)
      .map((entry) => stringify(entry).trim())
      .filter((entry) => entry.length > 0);
  }

  if (typeof value === 'string') {
    const parts = value
      .replace(FULLWIDTH_SEMICOLON, ';')
      .split(LINE_BREAK)
      .map((piece) => piece.replace(BULLET_EDGES, ''))
      .filter((piece) => piece.length > 0);

    if (parts.length === 1 && parts[0].includes(';')) {
      return parts[0]
        .split(';')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
    }
    return parts;
  }

  return [];
}
