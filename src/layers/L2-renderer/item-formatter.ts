import type { NormalizedItem, PaperRecord } from '../../shared/types';
import {
  normalizeAnnotation,
  normalizeAuthors,
  normalizeCategories,
  resolveIdentity,
  getField,
  toText,
} from '../L1-normalizer';
import type { AnnotationOptions } from '../L1-normalizer';
import { escapeMarkdown } from './escape';

const LINK_SEPARATOR = '  ·  ';

/**
 * Build the render-ready view of one record.
 * `index` is the 1-based position in the input, used for the fallback title.
 */
export function normalizeItem(record: PaperRecord, index: number, options: AnnotationOptions = {}): NormalizedItem {
  const annotation = normalizeAnnotation(record, options);
  const identity = resolveIdentity(record);

  const titleEn = toText(getField(record, 'title')).trim();
  const titleZh = annotation.title_zh.trim();

  return {
    ...identity,
    index,
    displayTitle: titleZh || titleEn || identity.id || `Item #${index}`,
    titleZh,
    titleEn,
    tldr: annotation.tldr.trim(),
    summary: annotation.summary_zh.trim(),
    authors: normalizeAuthors(record),
    categories: normalizeCategories(record),
    highlights: annotation.highlights,
  };
}

/** Markdown block for one item, ending with a blank separator line. */
export function formatItem(item: NormalizedItem): string {
  const lines: string[] = [];
  lines.push(`### ${escapeMarkdown(item.displayTitle)}`);

  if (item.absUrl) {
    const pdf = item.pdfUrl ? `${LINK_SEPARATOR}[PDF](${item.pdfUrl})` : '';
    lines.push(`- **arXiv**: [${item.id || 'link'}](${item.absUrl})${pdf}`);
  }
  if (item.titleEn && item.titleZh) {
    lines.push(`- **Title (EN)**: ${escapeMarkdown(item.titleEn)}`);
  }
  if (item.authors.length > 0) {
    lines.push(`- **Authors**: ${item.authors.map(escapeMarkdown).join(', ')}`);
  }
  if (item.categories.length > 0) {
    lines.push(`- **Categories**: ${item.categories.map(escapeMarkdown).join(', ')}`);
  }
  if (item.tldr) {
    lines.push(`- **TL;DR**: ${escapeMarkdown(item.tldr)}`);
  }

  if (item.highlights.length > 0) {
    lines.push('- **Highlights:**');
    for (const highlight of item.highlights) {
      const text = highlight.trim();
      if (!text) continue;
      lines.push(`  - ${escapeMarkdown(text)}`);
    }
  }

  if (item.summary) {
    lines.push('');
    lines.push(escapeMarkdown(item.summary));
  }

  lines.push('');
  return lines.join('\n');
}

export function renderItem(record: PaperRecord, index: number, options: AnnotationOptions = {}): string {
  return formatItem(normalizeItem(record, index, options));
}
