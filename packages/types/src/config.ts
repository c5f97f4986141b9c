/**
 * 設定ファイルの型定義
 */

export interface PostmatterConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  parser: ParserConfig;
  loader: LoaderConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

/** 開始・終了デリミタ行 */
export type Delimiter = '+++' | '---';

/** 未知のキーの扱い */
export type UnknownKeyPolicy = 'ignore' | 'preserve';

/** デリミタブロックがない文書の扱い */
export type MissingMetadataPolicy = 'error' | 'empty';

export interface ParserConfig {
  /** 受け付けるデリミタ */
  delimiters: Delimiter[];
  /** 未知のキーを無視するか保持するか */
  unknownKeys: UnknownKeyPolicy;
  /** メタデータなしの文書をエラーにするか、本文のみの文書として扱うか */
  missingMetadata: MissingMetadataPolicy;
}

export interface LoaderConfig {
  /** 同時に読み込むファイル数 */
  concurrency: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: PostmatterConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    include: ['**/*.md'],
    exclude: ['**/node_modules/**', '**/.git/**', '**/public/**', '**/dist/**'],
    ignoreGitignore: true,
  },
  parser: {
    delimiters: ['+++', '---'],
    unknownKeys: 'ignore',
    missingMetadata: 'error',
  },
  loader: {
    concurrency: 8,
  },
};
