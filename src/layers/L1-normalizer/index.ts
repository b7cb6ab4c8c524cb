export { normalizeAnnotation, normalizeHighlights, selectAnnotation, DEFAULT_TLDR_MAX_CHARS } from './annotation';
export type { AnnotationOptions } from './annotation';
export { normalizeList, normalizeAuthors, normalizeCategories } from './list-field';
export { resolveIdentity, ARXIV_ABS_BASE, ARXIV_PDF_BASE } from './identity';
export { asObject, firstPresent, getField, isJsonObject, isPresent, stringify, toText, truncateCodePoints } from './fields';
