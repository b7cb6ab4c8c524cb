/**
 * CLI help text for global and per-command --help output.
 */

const COMMAND_HELP: Record<string, string> = {
  convert: `
SYNOPSIS
  arxiv-digest [convert] --data <path> [--out <dir>] [--date YYYY-MM-DD]
                         [--config <file>] [--dry-run] [--json]

DESCRIPTION
  Render one JSONL batch of AI-annotated arXiv papers into a single
  Markdown digest with Jekyll front matter. Malformed lines are skipped
  with a warning; an empty batch still produces a stub document.

  Without --out the digest goes to _posts/ (as YYYY-MM-DD-arxiv-daily.md)
  or docs/ (as YYYY-MM-DD.md) under the project root, whichever exists
  first; otherwise md/ is created.

FLAGS
  --data <path>       Input JSONL file (required)
  --out <dir>         Output directory; skips auto-detection
  --date YYYY-MM-DD   Digest date; default is taken from the file name,
                      else today's UTC date
  --config <file>     Config file (default: .arxiv-digest.yml in the project root)
  --dry-run           Print the document instead of writing it
  --json              Print a JSON run summary

EXAMPLES
  arxiv-digest --data data/2025-08-15_AI_enhanced_Chinese.jsonl
  arxiv-digest convert --data dump.jsonl --out site/_posts
  arxiv-digest --data dump.jsonl --date 2025-08-15 --dry-run
`.trim(),
};

export function getGlobalHelp(): string {
  return `
Usage: arxiv-digest <command> [options]

Commands:
  convert     Render a JSONL batch into a Markdown digest (default)
  help        Show this help

Run \`arxiv-digest <command> --help\` for command details.

Environment:
  LOG_LEVEL           debug | info | warn | error (default: info)
  ARXIV_DIGEST_ROOT   Project root holding _posts/ or docs/
`.trim();
}

export function getCommandHelp(command: string): string | null {
  return COMMAND_HELP[command] ?? null;
}
