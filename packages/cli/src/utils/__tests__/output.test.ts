import { describe, it, expect } from 'vitest';
import { DocumentError, parseDocument } from '@postmatter/parser';
import { CollectionError, DocumentCollection, type CollectionLoadReport } from '@postmatter/loader';
import {
  formatCheckReportAsText,
  formatDocumentAsText,
  formatDocumentListAsText,
  formatLoadError,
  summarizeCheck,
} from '../output.js';

describe('formatLoadError', () => {
  it('行番号があれば末尾に付ける', () => {
    const error = new DocumentError('MalformedDocument', 'bad value', 'a.md', 3);

    expect(formatLoadError(error)).toBe('a.md: MalformedDocument: bad value (line 3)');
  });

  it('CollectionErrorは行番号なし', () => {
    const error = new CollectionError('DuplicatePath', 'duplicate document path "a.md"', 'a.md');

    expect(formatLoadError(error)).toBe('a.md: DuplicatePath: duplicate document path "a.md"');
  });
});

describe('check report', () => {
  const document = parseDocument('+++\ntitle = "A"\n+++\n', 'a.md');
  const collection = new DocumentCollection();
  collection.add(document);
  const failure = new DocumentError('MissingMetadata', 'no front matter block found', 'b.md', 1);

  const report: CollectionLoadReport = {
    collection,
    results: [
      { ok: true, path: 'a.md', document, warnings: [] },
      { ok: false, path: 'b.md', error: failure },
    ],
    failures: [{ ok: false, path: 'b.md', error: failure }],
  };

  it('失敗を列挙して集計行を出す', () => {
    expect(formatCheckReportAsText(report)).toBe(
      '✗ b.md: MissingMetadata: no front matter block found (line 1)\n\n検査結果: 2件中 1件OK、1件失敗、警告0件'
    );
  });

  it('集計に失敗の行番号を含める', () => {
    expect(summarizeCheck(report)).toEqual({
      total: 2,
      loaded: 1,
      failures: [{ path: 'b.md', kind: 'MissingMetadata', message: 'no front matter block found', line: 1 }],
      warnings: [],
    });
  });
});

describe('formatDocumentListAsText', () => {
  it('空の一覧', () => {
    expect(formatDocumentListAsText([])).toBe('文書: 0件');
  });

  it('タイトルなしと下書きを表示する', () => {
    const document = parseDocument('+++\ndraft = true\ndate = "2024-05-06"\n+++\n', 'x.md');

    expect(formatDocumentListAsText([document])).toBe('文書: 1件\n\n2024-05-06  (no title)  [x.md]  (下書き)');
  });
});

describe('formatDocumentAsText', () => {
  it('指定されたキーのみ表示する', () => {
    const document = parseDocument('---\ndescription: short\ncategories: [notes, misc]\n---\nhi', 'y.md');

    expect(formatDocumentAsText(document)).toBe(
      [
        '文書: y.md',
        '形式: yaml',
        '概要: short',
        'カテゴリ: notes, misc',
        '',
        `本文:\n${'='.repeat(60)}`,
        'hi',
        '='.repeat(60),
      ].join('\n')
    );
  });
});
