export { readJsonLines, readJsonLinesSummary } from './layers/L0-reader';
export type { InvalidLine, ReadJsonLinesOptions, JsonLinesSummary } from './layers/L0-reader';
export {
  normalizeAnnotation,
  normalizeHighlights,
  normalizeList,
  normalizeAuthors,
  normalizeCategories,
  resolveIdentity,
} from './layers/L1-normalizer';
export { escapeMarkdown, normalizeItem, renderItem, buildDigest, formatDigest, renderDigest } from './layers/L2-renderer';
export type { DigestOptions } from './layers/L2-renderer';
export { detectOutputDir, deriveDateFromFilename, outputFileName, writeDigest } from './layers/L3-publisher';
export { convertFile } from './cli/commands/convert';
export type { ConvertOptions, ConvertResult } from './cli/commands/convert';
export { loadDigestConfig, CONFIG_DEFAULTS } from './config';
export { resolveProjectRoot } from './lib/project-root';
export { DigestError } from './shared/types';
export type {
  AnnotationBlock,
  DigestConfig,
  DigestDocument,
  JsonValue,
  NormalizedItem,
  PaperIdentity,
  PaperRecord,
} from './shared/types';
