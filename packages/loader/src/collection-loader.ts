/**
 * コンテンツディレクトリから文書コレクションを読み込む
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Document, FilesConfig } from '@postmatter/types';
import { DEFAULT_CONFIG } from '@postmatter/types';
import { DocumentError, DocumentParser, type ParserOptions, type ParseWarning } from '@postmatter/parser';
import { DocumentCollection } from './collection.js';
import { FileDiscovery } from './discovery/file-discovery.js';
import { CollectionError, type LoadError } from './errors.js';

export interface CollectionLoaderOptions {
  /** コンテンツのルートディレクトリ */
  rootDir: string;
  /** ファイル検索設定（デフォルト: DEFAULT_CONFIG.files） */
  files?: FilesConfig;
  /** パーサ設定 */
  parser?: ParserOptions;
  /** 同時に読み込むファイル数（デフォルト: DEFAULT_CONFIG.loader.concurrency） */
  concurrency?: number;
}

/** 1文書の読み込み結果 */
export type LoadResult =
  | { ok: true; path: string; document: Document; warnings: ParseWarning[] }
  | { ok: false; path: string; error: LoadError };

export type LoadFailure = Extract<LoadResult, { ok: false }>;

export interface CollectionLoadReport {
  /** 読み込みに成功した文書 */
  collection: DocumentCollection;
  /** すべての結果（パス順） */
  results: LoadResult[];
  /** 失敗した結果のみ */
  failures: LoadFailure[];
}

/**
 * パスを正規化（区切り文字を/に統一）
 */
export function normalizeDocumentPath(filePath: string): string {
  return path.posix.normalize(filePath.replace(/\\/g, '/'));
}

/**
 * 文書コレクションのローダ
 * 1文書の失敗は他の文書の読み込みを止めず、文書ごとの結果として報告する
 */
export class CollectionLoader {
  private rootDir: string;
  private discovery: FileDiscovery;
  private parser: DocumentParser;
  private concurrency: number;

  constructor(options: CollectionLoaderOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.discovery = new FileDiscovery({
      rootDir: this.rootDir,
      config: options.files ?? DEFAULT_CONFIG.files,
    });
    this.parser = new DocumentParser(options.parser);
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONFIG.loader.concurrency);
  }

  /**
   * 1文書を読み込む
   * @param filePath ルートからの相対パス
   */
  async loadFile(filePath: string): Promise<LoadResult> {
    const documentPath = normalizeDocumentPath(filePath);

    let text: string;
    try {
      text = await fs.readFile(path.join(this.rootDir, documentPath), 'utf-8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code ?? 'UNKNOWN';
      return {
        ok: false,
        path: documentPath,
        error: new CollectionError('ReadError', `cannot read file (${code})`, documentPath),
      };
    }

    try {
      const { document, warnings } = this.parser.parse(text, documentPath);
      return { ok: true, path: documentPath, document, warnings };
    } catch (error) {
      if (error instanceof DocumentError) {
        return { ok: false, path: documentPath, error };
      }
      throw error;
    }
  }

  /**
   * 文書をまとめて読み込む
   * @param paths 読み込むパス（省略時はファイル検索の結果すべて）
   */
  async loadAll(paths?: string[]): Promise<CollectionLoadReport> {
    const targets = paths && paths.length > 0 ? paths : await this.discovery.findFiles();

    const loaded = await this.runWithLimit(targets, (target) => this.loadFile(target));
    loaded.sort((a, b) => (a.path === b.path ? 0 : a.path < b.path ? -1 : 1));

    const collection = new DocumentCollection();
    const results = loaded.map((result): LoadResult => {
      if (!result.ok) {
        return result;
      }
      try {
        collection.add(result.document);
        return result;
      } catch (error) {
        if (error instanceof CollectionError) {
          return { ok: false, path: result.path, error };
        }
        throw error;
      }
    });

    const failures = results.filter((result): result is LoadFailure => !result.ok);

    return { collection, results, failures };
  }

  /**
   * 同時実行数を制限して処理する（結果は入力順）
   */
  private async runWithLimit<T, R>(items: T[], task: (item: T) => Promise<R>): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        results[index] = await task(items[index]);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, items.length) }, () => worker());
    await Promise.all(workers);

    return results;
  }
}
