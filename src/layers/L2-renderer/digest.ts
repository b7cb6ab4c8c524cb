import type { DigestDocument, PaperRecord } from '../../shared/types';
import { formatItem, normalizeItem } from './item-formatter';

export interface DigestOptions {
  layout?: string;
  tags?: string[];
  tldrMaxChars?: number;
}

export const DEFAULT_LAYOUT = 'post';
export const DEFAULT_TAGS: readonly string[] = ['arxiv', 'daily'];

export function digestTitle(date: string, count: number): string {
  return `arXiv Daily · ${date} · ${count} papers`;
}

/** Normalize every record in input order. No filtering or deduplication. */
export function buildDigest(date: string, records: readonly PaperRecord[], options: DigestOptions = {}): DigestDocument {
  const items = records.map((record, i) => normalizeItem(record, i + 1, { tldrMaxChars: options.tldrMaxChars }));
  return { date, count: items.length, items };
}

export function formatDigest(digest: DigestDocument, options: DigestOptions = {}): string {
  const title = digestTitle(digest.date, digest.count);
  const tags = options.tags ?? DEFAULT_TAGS;

  // Jekyll front matter; key order is fixed
  const header = [
    '---',
    `title: "${title}"`,
    `date: ${digest.date}`,
    `layout: ${options.layout ?? DEFAULT_LAYOUT}`,
    `tags: [${tags.join(', ')}]`,
    '---',
    '',
    `# ${title}`,
    '',
  ];

  return [...header, ...digest.items.map(formatItem)].join('\n');
}

export function renderDigest(date: string, records: readonly PaperRecord[], options: DigestOptions = {}): string {
  return formatDigest(buildDigest(date, records, options), options);
}
