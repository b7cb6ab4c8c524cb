export { escapeMarkdown } from './escape';
export { normalizeItem, formatItem, renderItem } from './item-formatter';
export { buildDigest, formatDigest, renderDigest, digestTitle, DEFAULT_LAYOUT, DEFAULT_TAGS } from './digest';
export type { DigestOptions } from './digest';
