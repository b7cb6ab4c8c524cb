import fs from 'fs';
import path from 'path';
import { CONFIG_DEFAULTS } from '../../config/loader';
import type { ResolvedDigestConfig } from '../../shared/types';

export const POSTS_DIR = '_posts';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface OutputDirResult {
  dir: string;
  created: boolean;
}

/**
 * Pick where the digest goes: the first configured candidate that exists
 * under the project root (`_posts/`, then `docs/`), else a freshly created
 * fallback directory (`md/`). With `create` false nothing is created.
 */
export function detectOutputDir(
  projectRoot: string,
  output: ResolvedDigestConfig['output'] = CONFIG_DEFAULTS.output,
  create = true,
): OutputDirResult {
  for (const candidate of output.candidates) {
    const dir = path.join(projectRoot, candidate);
    if (isDirectory(dir)) {
      return { dir, created: false };
    }
  }
  const dir = path.join(projectRoot, output.fallback_dir);
  if (!create || isDirectory(dir)) {
    return { dir, created: false };
  }
  fs.mkdirSync(dir, { recursive: true });
  return { dir, created: true };
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  const date = new Date(Date.UTC(2000, month - 1, day));
  date.setUTCFullYear(year);
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function formatUtcDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/**
 * Date for the digest: the leading `YYYY-MM-DD` of the input's base name
 * (e.g. `2025-08-15_AI_enhanced_Chinese.jsonl`), else today's UTC date.
 */
export function deriveDateFromFilename(dataPath: string, now: Date = new Date()): string {
  const stem = path.parse(dataPath).name;
  const candidate = Array.from(stem).slice(0, 10).join('');
  return isIsoDate(candidate) ? candidate : formatUtcDate(now);
}

export function outputFileName(outDir: string, date: string): string {
  const name = path.basename(path.resolve(outDir)) === POSTS_DIR ? `${date}-arxiv-daily.md` : `${date}.md`;
  return path.join(outDir, name);
}

/** Write the fully rendered document in one call. */
export function writeDigest(filePath: string, markdown: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, markdown, 'utf-8');
}
