/**
 * フロントマターブロックのデコード・エンコード
 * TOML（+++）はsmol-toml、YAML（---）はyamlを使用
 */

import { parse as parseToml, stringify as stringifyToml, TomlError } from 'smol-toml';
import { parseDocument as parseYamlDocument, stringify as stringifyYaml } from 'yaml';
import type { FrontMatterFormat, FrontMatterValue } from '@postmatter/types';

/**
 * ブロックのデコード失敗
 */
export class BlockDecodeError extends Error {
  constructor(
    message: string,
    /** ブロック内の行番号（1-indexed） */
    public readonly line?: number
  ) {
    super(message);
    this.name = 'BlockDecodeError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * ブロックをキー/値のテーブルにデコード
 */
export function decodeBlock(format: FrontMatterFormat, block: string): Record<string, unknown> {
  const decoded = format === 'toml' ? decodeToml(block) : decodeYaml(block);

  // 空のYAMLブロックはnullになる
  if (decoded === null || decoded === undefined) {
    return {};
  }
  if (!isRecord(decoded)) {
    throw new BlockDecodeError('front matter must be a table of key/value pairs');
  }
  return decoded;
}

function decodeToml(block: string): unknown {
  try {
    return parseToml(block);
  } catch (error) {
    if (error instanceof TomlError) {
      throw new BlockDecodeError(firstLine(error.message), error.line);
    }
    throw error;
  }
}

function decodeYaml(block: string): unknown {
  const document = parseYamlDocument(block);

  const [error] = document.errors;
  if (error) {
    throw new BlockDecodeError(firstLine(error.message), error.linePos?.[0].line);
  }

  // 未解決のエイリアスやエイリアス数の上限はtoJSで例外になる
  try {
    const value: unknown = document.toJS();
    return value;
  } catch (cause) {
    if (cause instanceof Error) {
      throw new BlockDecodeError(firstLine(cause.message));
    }
    throw cause;
  }
}

// TOMLの日付・時刻トークン（オフセット日時、ローカル日時、日付、時刻）
const TOML_DATE_TOKEN =
  String.raw`\d{4}-\d{2}-\d{2}(?:[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})?)?|\d{2}:\d{2}:\d{2}(?:\.\d+)?`;

/**
 * TOMLブロックから引用符なしの日時の表記をそのまま取り出す
 * 該当する行がなければnull
 */
export function readTomlDateText(block: string, key: string): string | null {
  const escapedKey = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(
    String.raw`^[ \t]*(?:${escapedKey}|"${escapedKey}"|'${escapedKey}')[ \t]*=[ \t]*(${TOML_DATE_TOKEN})[ \t]*(?:#.*)?\r?$`,
    'm'
  );
  const match = pattern.exec(block);
  return match ? match[1] : null;
}

/**
 * キーを自身のプロパティとして設定する（"__proto__"も通常のキーとして扱う）
 */
export function defineEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * デコーダのメッセージはコード抜粋を含むので1行目のみ使う
 */
function firstLine(message: string): string {
  const index = message.indexOf('\n');
  return index === -1 ? message : message.slice(0, index);
}

/**
 * テーブルをブロックのテキストにエンコード（末尾改行付き、空なら空文字列）
 */
export function encodeBlock(format: FrontMatterFormat, table: Record<string, FrontMatterValue>): string {
  if (Object.keys(table).length === 0) {
    return '';
  }
  const text = format === 'toml' ? stringifyToml(table) : stringifyYaml(table);
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * デコーダが返した値をFrontMatterValueに変換
 */
export function toFrontMatterValue(value: unknown): FrontMatterValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toFrontMatterValue(item));
  }
  if (isRecord(value)) {
    const table: { [key: string]: FrontMatterValue } = {};
    for (const [key, item] of Object.entries(value)) {
      defineEntry(table, key, toFrontMatterValue(item));
    }
    return table;
  }
  return String(value);
}
