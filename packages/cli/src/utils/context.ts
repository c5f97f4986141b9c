/**
 * コマンド共通の設定解決
 */

import * as path from 'path';
import { ConfigLoader, type PostmatterConfig } from '@postmatter/types';
import { CollectionLoader, normalizeDocumentPath } from '@postmatter/loader';
import type { ParserOptions } from '@postmatter/parser';

export interface ContextOptions {
  /** 設定ファイルのパス */
  config?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

export interface CommandContext {
  config: PostmatterConfig;
  configPath: string | null;
  projectRoot: string;
  cwd: string;
}

export async function resolveContext(options: ContextOptions = {}): Promise<CommandContext> {
  const cwd = options.cwd ?? process.cwd();
  const { config, configPath, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd,
  });
  return { config, configPath, projectRoot, cwd };
}

/**
 * 設定からCollectionLoaderを作成
 */
export function createLoader(context: CommandContext, parser: ParserOptions = {}): CollectionLoader {
  return new CollectionLoader({
    rootDir: context.projectRoot,
    files: context.config.files,
    parser: { ...context.config.parser, ...parser },
    concurrency: context.config.loader.concurrency,
  });
}

/**
 * コマンドラインで指定されたパス（cwd基準）をプロジェクトルート基準に変換
 */
export function toProjectPath(context: CommandContext, filePath: string): string {
  const absolute = path.resolve(context.cwd, filePath);
  return normalizeDocumentPath(path.relative(context.projectRoot, absolute));
}
