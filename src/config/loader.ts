import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { digestConfigSchema } from './schema';
import type { DigestConfig, ResolvedDigestConfig } from '../shared/types';

export const CONFIG_FILE_NAME = '.arxiv-digest.yml';

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: ResolvedDigestConfig;
  warnings: ConfigWarning[];
}

/** Default config values used when the file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: ResolvedDigestConfig = {
  output: {
    candidates: ['_posts', 'docs'],
    fallback_dir: 'md',
  },
  front_matter: {
    layout: 'post',
    tags: ['arxiv', 'daily'],
  },
  tldr_max_chars: 140,
};

/** Known keys per object path, for "did you mean?" suggestions. */
const KNOWN_KEYS: Record<string, string[]> = {
  '': ['output', 'front_matter', 'tldr_max_chars'],
  output: ['candidates', 'fallback_dir'],
  front_matter: ['layout', 'tags'],
};

/**
 * Load and validate a .arxiv-digest.yml configuration file.
 * Returns fully-populated config with defaults applied.
 *
 * - Missing file → defaults
 * - Empty file → defaults
 * - Invalid YAML → E501 warning + defaults
 * - Invalid values → E502 warning + field defaults
 * - Unknown keys → E502 warning with "did you mean?"
 */
export function loadDigestConfig(filePath: string = CONFIG_FILE_NAME): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(filePath, 'utf-8');
  } catch {
    // No config file: zero-config run
    return { config: mergeConfig(CONFIG_DEFAULTS, {}), warnings };
  }

  if (!rawContent || rawContent.trim() === '') {
    return { config: mergeConfig(CONFIG_DEFAULTS, {}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: mergeConfig(CONFIG_DEFAULTS, {}), warnings };
  }

  // Comments-only documents parse to null
  if (parsed === null || parsed === undefined) {
    return { config: mergeConfig(CONFIG_DEFAULTS, {}), warnings };
  }

  if (!isPlainObject(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: mergeConfig(CONFIG_DEFAULTS, {}), warnings };
  }

  const result = digestConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: mergeConfig(CONFIG_DEFAULTS, result.data), warnings };
  }

  for (const issue of result.error.issues) {
    warnings.push(...describeIssue(issue));
  }

  // Drop every offending field and re-parse; dropped fields fall back to defaults.
  const stripped = dropInvalidFields(parsed, result.error.issues);
  const retryResult = digestConfigSchema.safeParse(stripped);
  if (retryResult.success) {
    return { config: mergeConfig(CONFIG_DEFAULTS, retryResult.data), warnings };
  }

  return { config: mergeConfig(CONFIG_DEFAULTS, {}), warnings };
}

function describeIssue(issue: ZodIssue): ConfigWarning[] {
  const fieldPath = issue.path.join('.');
  if (issue.code === 'unrecognized_keys') {
    const known = KNOWN_KEYS[fieldPath] ?? [];
    return issue.keys.map((key) => {
      const suggestion = findSimilarKey(key, known);
      const field = fieldPath ? `${fieldPath}.${key}` : key;
      const message = suggestion
        ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
        : `E502: Unknown key "${key}".`;
      return { field, message };
    });
  }
  return [
    {
      field: fieldPath || '_unknown',
      message: `E502: ${issue.message}. Using default for this field.`,
    },
  ];
}

function dropInvalidFields(input: Record<string, unknown>, issues: ZodIssue[]): Record<string, unknown> {
  const copy = cloneObject(input);
  for (const issue of issues) {
    const keyPath: string[] = [];
    for (const segment of issue.path) {
      if (typeof segment === 'number') break;
      keyPath.push(segment);
    }

    const parent = walk(copy, keyPath.slice(0, -1));
    if (!parent) continue;

    if (issue.code === 'unrecognized_keys') {
      const target = walk(copy, keyPath);
      if (target) {
        for (const key of issue.keys) delete target[key];
      }
    } else if (keyPath.length > 0) {
      delete parent[keyPath[keyPath.length - 1]];
    }
  }
  return copy;
}

function walk(obj: Record<string, unknown>, keyPath: string[]): Record<string, unknown> | null {
  let current: Record<string, unknown> = obj;
  for (const key of keyPath) {
    const next = current[key];
    if (!isPlainObject(next)) return null;
    current = next;
  }
  return current;
}

function cloneObject(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = isPlainObject(value) ? cloneObject(value) : value;
  }
  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findSimilarKey(key: string, known: string[]): string | null {
  const lower = key.toLowerCase();
  for (const candidate of known) {
    if (levenshtein(lower, candidate) <= 3) {
      return candidate;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

/** User values take precedence; lists replace rather than append. */
function mergeConfig(defaults: ResolvedDigestConfig, overrides: DigestConfig): ResolvedDigestConfig {
  return {
    output: {
      candidates: [...(overrides.output?.candidates ?? defaults.output.candidates)],
      fallback_dir: overrides.output?.fallback_dir ?? defaults.output.fallback_dir,
    },
    front_matter: {
      layout: overrides.front_matter?.layout ?? defaults.front_matter.layout,
      tags: [...(overrides.front_matter?.tags ?? defaults.front_matter.tags)],
    },
    tldr_max_chars: overrides.tldr_max_chars ?? defaults.tldr_max_chars,
  };
}
