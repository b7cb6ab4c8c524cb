import type { PaperIdentity, PaperRecord } from '../../shared/types';
import { firstPresent, toText } from './fields';

const ID_KEYS = ['arxiv_id', 'id', 'arxivId', 'identifier'] as const;

export const ARXIV_ABS_BASE = 'https://arxiv.org/abs/';
export const ARXIV_PDF_BASE = 'https://arxiv.org/pdf/';

/**
 * Paper identifier plus abstract/PDF links. Links missing from the record
 * are built from the identifier; without one they stay empty.
 */
export function resolveIdentity(record: PaperRecord): PaperIdentity {
  const id = toText(firstPresent(record, ID_KEYS)).trim();
  let absUrl = toText(firstPresent(record, ['url', 'link'])).trim();
  let pdfUrl = toText(firstPresent(record, ['pdf_url'])).trim();

  if (id) {
    if (!absUrl) absUrl = `${ARXIV_ABS_BASE}${id}`;
    if (!pdfUrl) pdfUrl = `${ARXIV_PDF_BASE}${id}.pdf`;
  }

  return { id, absUrl, pdfUrl };
}
