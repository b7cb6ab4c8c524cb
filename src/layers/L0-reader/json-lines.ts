import fs from 'fs';
import { StringDecoder } from 'string_decoder';
import type { PaperRecord } from '../../shared/types';

const CHUNK_SIZE = 64 * 1024;
const LINE_BREAK = /\r\n|\r|\n/;

export interface InvalidLine {
  /** 1-based line number in the input file. */
  line: number;
  error: string;
  text: string;
}

export interface ReadJsonLinesOptions {
  onInvalidLine?: (invalid: InvalidLine) => void;
  chunkSize?: number;
}

export interface JsonLinesSummary {
  records: PaperRecord[];
  invalidLines: InvalidLine[];
}

/**
 * Lazily yield one parsed value per non-blank line of a JSONL file.
 *
 * Lines that fail to parse are reported through `onInvalidLine` and skipped.
 * Values that are not objects are yielded unchanged. The file descriptor is
 * closed when the generator finishes, throws, or is returned early.
 */
export function* readJsonLines(
  filePath: string,
  options: ReadJsonLinesOptions = {},
): Generator<PaperRecord, void, undefined> {
  const fd = fs.openSync(filePath, 'r');
  const decoder = new StringDecoder('utf8');
  const buffer = Buffer.alloc(options.chunkSize ?? CHUNK_SIZE);
  let pending = '';
  let lineNumber = 0;

  function* emit(raw: string): Generator<PaperRecord, void, undefined> {
    lineNumber++;
    // trim() also drops a leading byte-order mark
    const text = raw.trim();
    if (!text) return;
    let value: PaperRecord;
    try {
      value = JSON.parse(text);
    } catch (err) {
      options.onInvalidLine?.({
        line: lineNumber,
        error: err instanceof Error ? err.message : String(err),
        text,
      });
      return;
    }
    yield value;
  }

  // A trailing \r is held back until more input shows whether it starts a \r\n pair.
  function* drain(final: boolean): Generator<PaperRecord, void, undefined> {
    let match = LINE_BREAK.exec(pending);
    while (match) {
      if (!final && match[0] === '\r' && match.index === pending.length - 1) return;
      yield* emit(pending.slice(0, match.index));
      pending = pending.slice(match.index + match[0].length);
      match = LINE_BREAK.exec(pending);
    }
  }

  try {
    let bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
    while (bytesRead > 0) {
      pending += decoder.write(buffer.subarray(0, bytesRead));
      yield* drain(false);
      bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null);
    }
    pending += decoder.end();
    yield* drain(true);
    if (pending) {
      yield* emit(pending);
    }
  } finally {
    fs.closeSync(fd);
  }
}

/** Drain `readJsonLines` and collect the skipped lines alongside the records. */
export function readJsonLinesSummary(
  filePath: string,
  options: ReadJsonLinesOptions = {},
): JsonLinesSummary {
  const invalidLines: InvalidLine[] = [];
  const records = [
    ...readJsonLines(filePath, {
      ...options,
      onInvalidLine: (invalid) => {
        invalidLines.push(invalid);
        options.onInvalidLine?.(invalid);
      },
    }),
  ];
  return { records, invalidLines };
}
