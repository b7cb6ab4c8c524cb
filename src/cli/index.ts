/**
 * arxiv-digest CLI router.
 *
 * Usage:
 *   arxiv-digest --data <file.jsonl> [--out <dir>]
 *   arxiv-digest convert --data <file.jsonl> [--out <dir>]
 */

import pino from 'pino';
import { runConvert, type ConvertDeps } from './commands/convert';
import { getGlobalHelp, getCommandHelp } from './help';
import { color } from './output';
import { loadConfig } from '../config/defaults';
import { createRootLogger } from '../shared/logger';
import { DigestError } from '../shared/types';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json', 'dry-run'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        // --key value, unless the key is a known boolean flag
        const key = arg.slice(2);
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

export async function run(
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
  writeError: (msg: string) => void = console.error,
  deps: ConvertDeps = {},
): Promise<number> {
  const { command, flags, options } = parseArgs(argv);

  if (flags.help || flags.h) {
    const cmdHelp = command ? getCommandHelp(command) : null;
    write(cmdHelp ?? getGlobalHelp());
    return 0;
  }

  switch (command) {
    case 'help':
      write(getGlobalHelp());
      return 0;

    case '':
    case 'convert': {
      if (!options.data) {
        if (command === '' && Object.keys(options).length === 0 && Object.keys(flags).length === 0) {
          write(getGlobalHelp());
          return 0;
        }
        writeError(`${color.red('Error:')} --data <path> is required.`);
        writeError(getCommandHelp('convert') ?? '');
        return 2;
      }
      try {
        const env = loadConfig(deps.env ?? process.env);
        const logger = deps.logger ?? createRootLogger(pino.destination(2), env.log_level);
        return runConvert(
          {
            data: options.data,
            out: options.out,
            date: options.date,
            config: options.config,
            dryRun: !!flags['dry-run'],
            json: !!flags.json,
          },
          write,
          { ...deps, logger },
        );
      } catch (err) {
        if (err instanceof DigestError) {
          writeError(`${color.red(`Error [${err.code}]:`)} ${err.userMessage ?? err.message}`);
          return err.code === 'E104' ? 2 : 1;
        }
        throw err;
      }
    }

    default:
      writeError(`Unknown command: ${command}. Run \`arxiv-digest help\` for usage.`);
      return 2;
  }
}
