import { METADATA_KEYS } from '@postmatter/types';
import type { Document, DocumentMetadata, FrontMatterFormat, FrontMatterValue } from '@postmatter/types';
import { defineEntry, encodeBlock } from './codecs.js';
import { BOM, FORMAT_DELIMITERS } from './front-matter.js';

export type LineEnding = '\n' | '\r\n';

export interface SerializeOptions {
  /** 出力形式（デフォルト: toml） */
  format?: FrontMatterFormat;
  /** 認識キーの後に出力する未知のキー */
  extra?: Record<string, FrontMatterValue>;
  /** ブロックの改行（デフォルト: \n） */
  lineEnding?: LineEnding;
}

export interface StringifyOptions {
  /** 出力形式（デフォルト: 文書の形式、メタデータなしの文書はtoml） */
  format?: FrontMatterFormat;
  /** ブロックの改行（デフォルト: \n） */
  lineEnding?: LineEnding;
  /** 先頭にBOMを付ける */
  bom?: boolean;
}

const RECOGNIZED_KEYS: ReadonlySet<string> = new Set<string>(METADATA_KEYS);

/**
 * メタデータをデリミタ付きブロックにシリアライズ
 * キーは title, date, draft, description, tags, categories の順、続いてextra
 */
export function serializeMetadata(metadata: DocumentMetadata, options: SerializeOptions = {}): string {
  const format = options.format ?? 'toml';
  const table: Record<string, FrontMatterValue> = {};

  for (const key of METADATA_KEYS) {
    const value = metadata[key];
    if (value !== undefined) {
      table[key] = Array.isArray(value) ? [...value] : value;
    }
  }

  for (const [key, value] of Object.entries(options.extra ?? {})) {
    // 認識キーはmetadata側を優先
    if (!RECOGNIZED_KEYS.has(key)) {
      defineEntry(table, key, value);
    }
  }

  const delimiter = FORMAT_DELIMITERS[format];
  const block = `${delimiter}\n${encodeBlock(format, table)}${delimiter}\n`;
  return options.lineEnding === '\r\n' ? block.replace(/\n/g, '\r\n') : block;
}

/**
 * 元のテキストのBOMと改行（1行目の改行）を調べる
 */
export function detectTextStyle(text: string): { bom: boolean; lineEnding: LineEnding } {
  const bom = text.startsWith(BOM);
  const firstBreak = text.indexOf('\n');
  const lineEnding = firstBreak > 0 && text[firstBreak - 1] === '\r' ? '\r\n' : '\n';
  return { bom, lineEnding };
}

/**
 * Documentをテキストに戻す（ブロック + 本文）
 * メタデータなしで読み込んだ文書は、形式の指定がなければtomlで出力
 */
export function stringifyDocument(document: Document, options: StringifyOptions = {}): string {
  const format = options.format ?? (document.format === 'none' ? 'toml' : document.format);
  const block = serializeMetadata(document.metadata, {
    format,
    extra: document.extra,
    lineEnding: options.lineEnding,
  });
  return (options.bom ? BOM : '') + block + document.body;
}
