import { describe, it, expect } from 'vitest';
import { buildDigest, digestTitle, renderDigest } from '../../../src/layers/L2-renderer';

describe('digestTitle', () => {
  it('formats date and count', () => {
    expect(digestTitle('2025-08-15', 12)).toBe('arXiv Daily · 2025-08-15 · 12 papers');
  });
});

describe('buildDigest', () => {
  it('keeps input order and numbers items from 1', () => {
    const digest = buildDigest('2025-08-15', [{ AI: { title_zh: '甲' } }, {}, 'garbage']);

    expect(digest.date).toBe('2025-08-15');
    expect(digest.count).toBe(3);
    expect(digest.items.map((item) => item.index)).toEqual([1, 2, 3]);
    expect(digest.items.map((item) => item.displayTitle)).toEqual(['甲', 'Item #2', 'Item #3']);
  });

  it('does not deduplicate repeated records', () => {
    const record = { arxiv_id: '2501.00001' };
    expect(buildDigest('2025-01-01', [record, record]).count).toBe(2);
  });
});

describe('renderDigest', () => {
  it('renders front matter and heading for zero items', () => {
    expect(renderDigest('2025-08-15', [])).toBe(
      [
        '---',
        'title: "arXiv Daily · 2025-08-15 · 0 papers"',
        'date: 2025-08-15',
        'layout: post',
        'tags: [arxiv, daily]',
        '---',
        '',
        '# arXiv Daily · 2025-08-15 · 0 papers',
        '',
      ].join('\n'),
    );
  });

  it('appends item blocks separated by blank lines', () => {
    const out = renderDigest('2025-08-15', [{ AI: { title_zh: '甲' } }, { AI: { title_zh: '乙' } }]);
    expect(out).toBe(
      [
        '---',
        'title: "arXiv Daily · 2025-08-15 · 2 papers"',
        'date: 2025-08-15',
        'layout: post',
        'tags: [arxiv, daily]',
        '---',
        '',
        '# arXiv Daily · 2025-08-15 · 2 papers',
        '',
        '### 甲',
        '',
        '### 乙',
        '',
      ].join('\n'),
    );
  });

  it('takes layout and tags from options', () => {
    const lines = renderDigest('2025-01-02', [], { layout: 'digest', tags: ['papers'] }).split('\n');
    expect(lines[3]).toBe('layout: digest');
    expect(lines[4]).toBe('tags: [papers]');
  });
});
