import fs from 'fs';
import path from 'path';
import { DigestError } from '../shared/types';

export type ResolveSource = 'env' | 'cwd-walk' | 'cwd';

export interface ResolveResult {
  root: string;
  source: ResolveSource;
}

export const PROJECT_ROOT_ENV = 'ARXIV_DIGEST_ROOT';

// Strongest sentinel first: a Jekyll site, then any checkout, then any package.
const SENTINELS = ['_config.yml', '.git', 'package.json'];

function exists(p: string): boolean {
  try {
    fs.accessSync(p, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function* parentsFrom(start: string): Generator<string> {
  let current = path.resolve(start);
  while (true) {
    yield current;
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
}

/**
 * Locate the site root that holds `_posts/` or `docs/`.
 *
 * An explicit override wins; otherwise each sentinel is searched for from
 * `cwd` upwards, and the nearest directory holding the strongest sentinel
 * found is used. Falls back to `cwd` itself.
 */
export function resolveProjectRoot(opts?: { cwd?: string; override?: string }): ResolveResult {
  const cwd = path.resolve(opts?.cwd ?? process.cwd());

  const override = opts?.override?.trim();
  if (override) {
    const resolved = path.resolve(cwd, override);
    if (!isDirectory(resolved)) {
      throw new DigestError({
        code: 'E103',
        severity: 'high',
        message: `Project root override is not a directory: ${resolved}`,
        userMessage: `${PROJECT_ROOT_ENV} must point to an existing directory (got ${resolved}).`,
      });
    }
    return { root: resolved, source: 'env' };
  }

  for (const sentinel of SENTINELS) {
    for (const dir of parentsFrom(cwd)) {
      if (exists(path.join(dir, sentinel))) {
        return { root: dir, source: 'cwd-walk' };
      }
    }
  }

  return { root: cwd, source: 'cwd' };
}
