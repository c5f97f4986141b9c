import type { Delimiter, FrontMatterFormat } from '@postmatter/types';

/** デリミタと形式の対応 */
export const DELIMITER_FORMATS: Record<Delimiter, FrontMatterFormat> = {
  '+++': 'toml',
  '---': 'yaml',
};

export const FORMAT_DELIMITERS: Record<FrontMatterFormat, Delimiter> = {
  toml: '+++',
  yaml: '---',
};

export type FrontMatterSplit =
  | { kind: 'none' }
  | { kind: 'unclosed'; delimiter: Delimiter }
  | {
      kind: 'block';
      delimiter: Delimiter;
      format: FrontMatterFormat;
      /** デリミタ行に挟まれたテキスト */
      block: string;
      /** 終了デリミタ行より後のテキスト（そのまま） */
      body: string;
    };

export const BOM = '\uFEFF';

/**
 * 行末の空白と\rを除去（デリミタ行の比較用）
 */
function stripLineEnd(line: string): string {
  return line.replace(/[ \t\r]+$/, '');
}

/**
 * テキストをフロントマターブロックと本文に分割
 *
 * 1行目が開始デリミタでなければ'none'、同じデリミタ行で閉じられていなければ'unclosed'
 */
export function splitFrontMatter(text: string, delimiters: readonly Delimiter[]): FrontMatterSplit {
  const source = text.startsWith(BOM) ? text.slice(BOM.length) : text;

  const firstBreak = source.indexOf('\n');
  const firstLine = firstBreak === -1 ? source : source.slice(0, firstBreak);
  const delimiter = delimiters.find((d) => stripLineEnd(firstLine) === d);

  if (!delimiter) {
    return { kind: 'none' };
  }
  if (firstBreak === -1) {
    return { kind: 'unclosed', delimiter };
  }

  const blockStart = firstBreak + 1;
  let offset = blockStart;

  while (offset < source.length) {
    const next = source.indexOf('\n', offset);
    const end = next === -1 ? source.length : next;

    if (stripLineEnd(source.slice(offset, end)) === delimiter) {
      return {
        kind: 'block',
        delimiter,
        format: DELIMITER_FORMATS[delimiter],
        block: source.slice(blockStart, offset),
        body: next === -1 ? '' : source.slice(next + 1),
      };
    }

    if (next === -1) {
      break;
    }
    offset = next + 1;
  }

  return { kind: 'unclosed', delimiter };
}
