import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { readJsonLines, readJsonLinesSummary } from '../../../src/layers/L0-reader';
import type { InvalidLine } from '../../../src/layers/L0-reader';

describe('readJsonLines', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'arxiv-digest-reader-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writeFile(name: string, content: string | Buffer): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('yields one parsed object per line in order', () => {
    const file = writeFile('a.jsonl', '{"id":"1"}\n{"id":"2"}\n{"id":"3"}\n');
    expect([...readJsonLines(file)]).toEqual([{ id: '1' }, { id: '2' }, { id: '3' }]);
  });

  it('skips blank and whitespace-only lines silently', () => {
    const file = writeFile('blank.jsonl', '\n{"id":"1"}\n   \n\t\n{"id":"2"}');
    const onInvalidLine = vi.fn();
    expect([...readJsonLines(file, { onInvalidLine })]).toEqual([{ id: '1' }, { id: '2' }]);
    expect(onInvalidLine).not.toHaveBeenCalled();
  });

  it('reports malformed lines with their 1-based line number and keeps going', () => {
    const file = writeFile('bad.jsonl', '{"id":"1"}\n{not json}\n\n{"id":"3"\n{"id":"4"}\n');
    const invalid: InvalidLine[] = [];
    const records = [...readJsonLines(file, { onInvalidLine: (entry) => invalid.push(entry) })];

    expect(records).toEqual([{ id: '1' }, { id: '4' }]);
    expect(invalid.map((entry) => entry.line)).toEqual([2, 4]);
    expect(invalid[0].text).toBe('{not json}');
    expect(invalid[0].error.length).toBeGreaterThan(0);
  });

  it('passes non-object JSON values through unchanged', () => {
    const file = writeFile('scalars.jsonl', '42\n"text"\n[1,2]\nnull\ntrue\n');
    expect([...readJsonLines(file)]).toEqual([42, 'text', [1, 2], null, true]);
  });

  it('handles CRLF line endings and a leading byte-order mark', () => {
    const file = writeFile('crlf.jsonl', '\uFEFF{"id":"1"}\r\n{"id":"2"}\r\n');
    expect([...readJsonLines(file)]).toEqual([{ id: '1' }, { id: '2' }]);
  });

  it('splits on bare carriage returns', () => {
    const file = writeFile('cr.jsonl', '{"id":"1"}\r{"id":"2"}\r');
    const onInvalidLine = vi.fn();
    expect([...readJsonLines(file, { onInvalidLine })]).toEqual([{ id: '1' }, { id: '2' }]);
    expect(onInvalidLine).not.toHaveBeenCalled();
  });

  it('accepts mixed line endings in one file', () => {
    const file = writeFile('mixed.jsonl', '{"id":"1"}\r{"id":"2"}\r\n{"id":"3"}\n{"id":"4"}');
    expect([...readJsonLines(file)]).toEqual([{ id: '1' }, { id: '2' }, { id: '3' }, { id: '4' }]);
  });

  it('treats a CRLF pair split across chunks as one line break', () => {
    // the first 11-byte chunk ends right after the \r
    const file = writeFile('split.jsonl', '{"id":"1"}\r\n{bad\r\n{"id":"3"}');
    const invalid: InvalidLine[] = [];
    const records = [...readJsonLines(file, { chunkSize: 11, onInvalidLine: (entry) => invalid.push(entry) })];
    expect(records).toEqual([{ id: '1' }, { id: '3' }]);
    expect(invalid.map((entry) => entry.line)).toEqual([2]);
  });

  it('decodes multi-byte characters split across chunk boundaries', () => {
    const line = JSON.stringify({ title_zh: '大语言模型的推理能力' });
    const file = writeFile('cjk.jsonl', `${line}\n${line}\n`);
    const records = [...readJsonLines(file, { chunkSize: 5 })];
    expect(records).toEqual([{ title_zh: '大语言模型的推理能力' }, { title_zh: '大语言模型的推理能力' }]);
  });

  it('is lazy and reopens the file on each call', () => {
    const file = writeFile('lazy.jsonl', '{"id":"1"}\n{"id":"2"}\n');
    const openSpy = vi.spyOn(fs, 'openSync');

    const first = readJsonLines(file);
    expect(openSpy).not.toHaveBeenCalled();
    expect(first.next().value).toEqual({ id: '1' });
    expect(openSpy).toHaveBeenCalledTimes(1);

    expect([...readJsonLines(file)]).toHaveLength(2);
    expect(openSpy).toHaveBeenCalledTimes(2);
  });

  it('closes the file descriptor when the consumer stops early', () => {
    const file = writeFile('early.jsonl', '{"id":"1"}\n{"id":"2"}\n{"id":"3"}\n');
    const closeSpy = vi.spyOn(fs, 'closeSync');

    for (const record of readJsonLines(file)) {
      expect(record).toEqual({ id: '1' });
      break;
    }

    expect(closeSpy).toHaveBeenCalledTimes(1);
  });

  it('throws when the file does not exist', () => {
    const missing = path.join(tmpDir, 'missing.jsonl');
    expect(() => [...readJsonLines(missing)]).toThrow(/ENOENT/);
  });
});

describe('readJsonLinesSummary', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'arxiv-digest-summary-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('collects records and skipped lines together', () => {
    const file = path.join(tmpDir, 'mixed.jsonl');
    fs.writeFileSync(file, '{"id":"1"}\noops\n{"id":"2"}\n');
    const onInvalidLine = vi.fn();

    const summary = readJsonLinesSummary(file, { onInvalidLine });

    expect(summary.records).toEqual([{ id: '1' }, { id: '2' }]);
    expect(summary.invalidLines).toHaveLength(1);
    expect(summary.invalidLines[0].line).toBe(2);
    expect(onInvalidLine).toHaveBeenCalledTimes(1);
  });

  it('returns empty lists for an empty file', () => {
    const file = path.join(tmpDir, 'empty.jsonl');
    fs.writeFileSync(file, '');
    expect(readJsonLinesSummary(file)).toEqual({ records: [], invalidLines: [] });
  });
});
