export {
  detectOutputDir,
  deriveDateFromFilename,
  outputFileName,
  writeDigest,
  isIsoDate,
  formatUtcDate,
  POSTS_DIR,
} from './output';
export type { OutputDirResult } from './output';
