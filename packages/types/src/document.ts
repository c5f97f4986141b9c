/**
 * 文書データの型定義
 */

/** フロントマターの形式（開始デリミタで決まる） */
export type FrontMatterFormat = 'toml' | 'yaml';

/**
 * フロントマターの値
 * 未知のキーは形式のデコーダが返した値をそのまま保持する
 */
export type FrontMatterValue =
  | string
  | number
  | boolean
  | Date
  | null
  | FrontMatterValue[]
  | { [key: string]: FrontMatterValue };

export interface Document {
  /** 文書のパス（コレクション内で一意） */
  path: string;
  /** 認識されたメタデータ */
  metadata: DocumentMetadata;
  /** 本文（デリミタ行以降をそのまま保持） */
  body: string;
  /** フロントマターの形式。メタデータなしで読み込んだ場合は'none' */
  format: FrontMatterFormat | 'none';
  /** 未知のキー（unknownKeys: 'preserve'の場合のみ） */
  extra?: Record<string, FrontMatterValue>;
}

export interface DocumentMetadata {
  /** 日時（タイムスタンプ文字列） */
  date?: string;
  /** 下書きフラグ */
  draft?: boolean;
  /** タイトル */
  title?: string;
  /** タグ（順序を保持） */
  tags?: string[];
  /** カテゴリ（順序を保持） */
  categories?: string[];
  /** 概要 */
  description?: string;
}

/** 認識するメタデータキー（シリアライズ時の順序） */
export const METADATA_KEYS = [
  'title',
  'date',
  'draft',
  'description',
  'tags',
  'categories',
] as const satisfies ReadonlyArray<keyof DocumentMetadata>;

export type MetadataKey = (typeof METADATA_KEYS)[number];
