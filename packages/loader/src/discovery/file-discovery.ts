import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { FilesConfig } from '@postmatter/types';

// ignoreパッケージの型定義（手動）
interface Ignore {
  add(pattern: string | string[]): this;
  ignores(pathname: string): boolean;
}

// ignoreパッケージのファクトリ関数をdynamic importで使用
let ignoreFactory: (() => Ignore) | null = null;

export interface FileDiscoveryOptions {
  /** コンテンツのルートディレクトリ */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * globパターンの一致判定
 * minimatchは**\/patternがルートレベルにマッチしないため、fast-globに合わせて両方をチェック
 */
function matchesGlob(filePath: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
  }
  return minimatch(filePath, pattern);
}

/**
 * コンテンツファイル検索クラス
 * Globパターンと.gitignoreを使用して文書ファイルを検索
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;
  private ignoreFilter: Ignore | null = null;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（ルートからの相対パス、ソート済み）
   */
  async findFiles(): Promise<string[]> {
    if (this.config.ignoreGitignore) {
      await this.loadGitignore();
    }

    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false,
      onlyFiles: true,
      dot: false,
    });

    const filter = this.ignoreFilter;
    const visible = filter ? files.filter((file) => !filter.ignores(file)) : files;

    return visible.sort();
  }

  /**
   * パスがinclude/excludeパターンにマッチするか判定
   * @param filePath ファイルパス（相対パス）
   */
  matchesPattern(filePath: string): boolean {
    const matchesInclude = this.config.include.some((pattern) => matchesGlob(filePath, pattern));

    if (!matchesInclude) {
      return false;
    }

    return !this.config.exclude.some((pattern) => matchesGlob(filePath, pattern));
  }

  /**
   * パスを除外すべきか判定
   * @param filePath ファイルパス（相対パス）
   */
  shouldIgnore(filePath: string): boolean {
    if (this.config.ignoreGitignore && this.ignoreFilter?.ignores(filePath)) {
      return true;
    }

    return !this.matchesPattern(filePath);
  }

  /**
   * .gitignoreを読み込む
   */
  private async loadGitignore(): Promise<void> {
    try {
      if (!ignoreFactory) {
        const ignoreModule = await import('ignore');
        ignoreFactory = ignoreModule.default as unknown as () => Ignore;
      }

      const gitignorePath = path.join(this.rootDir, '.gitignore');
      const content = await fs.readFile(gitignorePath, 'utf-8');
      this.ignoreFilter = ignoreFactory().add(content);
    } catch (error) {
      // .gitignoreが存在しない場合は無視
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
}
