/**
 * `arxiv-digest convert`: render one JSONL batch into a Markdown digest.
 *
 * Reads the batch line by line, normalizes each record, renders the whole
 * document in memory and writes it once into the detected (or given)
 * output directory.
 */

import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import { loadConfig } from '../../config/defaults';
import { loadDigestConfig, CONFIG_FILE_NAME } from '../../config/loader';
import { resolveProjectRoot } from '../../lib/project-root';
import { readJsonLinesSummary } from '../../layers/L0-reader';
import { renderDigest } from '../../layers/L2-renderer';
import { detectOutputDir, deriveDateFromFilename, isIsoDate, outputFileName, writeDigest } from '../../layers/L3-publisher';
import { createLogger } from '../../shared/logger';
import { DigestError } from '../../shared/types';
import { color } from '../output';

export interface ConvertOptions {
  data: string;
  out?: string;
  date?: string;
  config?: string;
  dryRun?: boolean;
  json?: boolean;
}

export interface ConvertDeps {
  logger?: Logger;
  cwd?: string;
  env?: Record<string, string | undefined>;
  now?: () => Date;
}

export interface ConvertResult {
  output: string;
  date: string;
  items: number;
  invalid_lines: number;
  written: boolean;
}

/**
 * Run the pipeline without printing anything.
 * Throws DigestError E101 when the input file does not exist.
 */
export function convertFile(options: ConvertOptions, deps: ConvertDeps = {}): { result: ConvertResult; markdown: string } {
  const cwd = deps.cwd ?? process.cwd();
  const log = createLogger({ component: 'convert' }, deps.logger);

  const dataPath = path.resolve(cwd, options.data);
  if (!fs.existsSync(dataPath)) {
    throw new DigestError({
      code: 'E101',
      severity: 'critical',
      message: `Data file not found: ${dataPath}`,
      context: { file: dataPath },
    });
  }

  if (options.date !== undefined && !isIsoDate(options.date)) {
    throw new DigestError({
      code: 'E104',
      severity: 'medium',
      message: `Invalid --date value: ${options.date}`,
      userMessage: `--date must be a calendar date in YYYY-MM-DD form (got "${options.date}").`,
    });
  }

  const env = loadConfig(deps.env ?? process.env);
  const { root } = resolveProjectRoot({ cwd, override: env.project_root });

  const configPath = options.config ? path.resolve(cwd, options.config) : path.join(root, CONFIG_FILE_NAME);
  const { config, warnings } = loadDigestConfig(configPath);
  for (const warning of warnings) {
    log.warn({ field: warning.field, file: configPath }, warning.message);
  }

  const date = options.date ?? deriveDateFromFilename(dataPath, deps.now ? deps.now() : new Date());

  const { records, invalidLines } = readJsonLinesSummary(dataPath, {
    onInvalidLine: ({ line, error }) => {
      log.warn({ code: 'E201', line, error }, 'Skipping malformed JSON line');
    },
  });

  if (records.length === 0) {
    log.warn({ code: 'E202', file: dataPath }, 'No items found; writing an empty stub document');
  }

  const markdown = renderDigest(date, records, {
    layout: config.front_matter.layout,
    tags: config.front_matter.tags,
    tldrMaxChars: config.tldr_max_chars,
  });

  let outDir: string;
  if (options.out) {
    outDir = path.resolve(cwd, options.out);
  } else {
    outDir = detectOutputDir(root, config.output, !options.dryRun).dir;
  }
  const outFile = outputFileName(outDir, date);

  if (!options.dryRun) {
    writeDigest(outFile, markdown);
    log.info({ file: outFile, items: records.length }, 'Digest written');
  }

  return {
    result: {
      output: outFile,
      date,
      items: records.length,
      invalid_lines: invalidLines.length,
      written: !options.dryRun,
    },
    markdown,
  };
}

export function runConvert(
  options: ConvertOptions,
  write: (msg: string) => void = console.log,
  deps: ConvertDeps = {},
): number {
  const { result, markdown } = convertFile(options, deps);

  if (options.json) {
    write(JSON.stringify(result, null, 2));
  } else if (options.dryRun) {
    write(markdown);
  } else {
    write(`${color.green('Wrote Markdown')} → ${result.output}`);
  }
  return 0;
}
