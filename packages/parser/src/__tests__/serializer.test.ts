import { describe, it, expect } from 'vitest';
import type { DocumentMetadata } from '@postmatter/types';
import { detectTextStyle, serializeMetadata, stringifyDocument } from '../serializer.js';
import { DocumentParser, parseDocument } from '../document-parser.js';

const metadata: DocumentMetadata = {
  title: 'Borrowing, "briefly"',
  date: '2021-04-12T09:00:00+09:00',
  draft: true,
  description: "It's about references",
  tags: ['zeta', 'alpha', 'mid'],
  categories: ['articles', 'memory'],
};

describe('serializeMetadata', () => {
  it('TOMLで出力したメタデータを再パースすると元に戻る', () => {
    const block = serializeMetadata(metadata);

    expect(parseDocument(block, 'a.md').metadata).toEqual(metadata);
  });

  it('YAMLで出力したメタデータを再パースすると元に戻る', () => {
    const block = serializeMetadata(metadata, { format: 'yaml' });

    const document = parseDocument(block, 'a.md');
    expect(document.format).toBe('yaml');
    expect(document.metadata).toEqual(metadata);
  });

  it('tagsとcategoriesの順序を保持する', () => {
    const block = serializeMetadata({ tags: ['c', 'a', 'b'], categories: ['y', 'x'] });

    const parsed = parseDocument(block, 'a.md').metadata;
    expect(parsed.tags).toEqual(['c', 'a', 'b']);
    expect(parsed.categories).toEqual(['y', 'x']);
  });

  it('デリミタで囲み、titleを先頭に出力する', () => {
    const block = serializeMetadata({ tags: ['a'], title: 'T' });

    expect(block.startsWith('+++\ntitle = "T"\n')).toBe(true);
    expect(block.endsWith('\n+++\n')).toBe(true);
  });

  it('空のメタデータはデリミタのみ', () => {
    expect(serializeMetadata({})).toBe('+++\n+++\n');
    expect(serializeMetadata({}, { format: 'yaml' })).toBe('---\n---\n');
  });

  it('extraのキーを出力し、認識キーはmetadataを優先する', () => {
    const block = serializeMetadata(
      { title: 'T' },
      { extra: { author: 'someone', title: 'ignored' } }
    );

    const preserving = new DocumentParser({ unknownKeys: 'preserve' });
    const { document } = preserving.parse(block, 'a.md');
    expect(document.metadata).toEqual({ title: 'T' });
    expect(document.extra).toEqual({ author: 'someone' });
  });
});

describe('detectTextStyle', () => {
  it('LFでBOMなし', () => {
    expect(detectTextStyle('+++\nx')).toEqual({ bom: false, lineEnding: '\n' });
  });

  it('改行のないテキストはLF', () => {
    expect(detectTextStyle('+++')).toEqual({ bom: false, lineEnding: '\n' });
  });
});

describe('stringifyDocument', () => {
  it('BOMとCRLFを指定すると元のテキストを再現する', () => {
    const text = '\uFEFF+++\r\ntitle = "X"\r\n+++\r\nbody\r\n';

    const style = detectTextStyle(text);

    expect(style).toEqual({ bom: true, lineEnding: '\r\n' });
    expect(stringifyDocument(parseDocument(text, 'a.md'), style)).toBe(text);
  });

  it('extraの__proto__キーを出力する', () => {
    const preserving = new DocumentParser({ unknownKeys: 'preserve' });
    const { document } = preserving.parse("+++\n__proto__ = 'x'\n+++\n", 'a.md');

    const reparsed = preserving.parse(stringifyDocument(document), 'a.md').document;

    expect(Object.keys(reparsed.extra ?? {})).toEqual(['__proto__']);
  });

  it('正規形の文書はそのまま再現される', () => {
    const text = '+++\ntitle = "X"\n+++\nBody text.';

    expect(stringifyDocument(parseDocument(text, 'a.md'))).toBe(text);
  });

  it('本文をそのまま連結する', () => {
    const document = parseDocument("+++\ntitle = 'X'\n+++\n\n# Heading\n", 'a.md');

    const text = stringifyDocument(document);

    expect(text.endsWith('+++\n\n# Heading\n')).toBe(true);
    expect(parseDocument(text, 'a.md')).toEqual(document);
  });

  it('メタデータなしの文書はTOMLで出力する', () => {
    const parser = new DocumentParser({ missingMetadata: 'empty' });
    const { document } = parser.parse('Just prose.', 'a.md');

    expect(stringifyDocument(document)).toBe('+++\n+++\nJust prose.');
  });

  it('形式を指定して変換できる', () => {
    const document = parseDocument("+++\ntitle = 'X'\n+++\nbody", 'a.md');

    const converted = parseDocument(stringifyDocument(document, { format: 'yaml' }), 'a.md');

    expect(converted.format).toBe('yaml');
    expect(converted.metadata).toEqual({ title: 'X' });
    expect(converted.body).toBe('body');
  });
});
