/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, type PostmatterConfig } from '@postmatter/types';

export interface ConfigInitOptions {
  /** プロジェクトルート（デフォルト: cwd） */
  projectRoot?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * デフォルト設定オブジェクトを生成
 */
function createDefaultConfig(projectRoot: string): PostmatterConfig {
  const config = ConfigLoader.getDefaultConfig();
  config.project.name = path.basename(projectRoot);
  return config;
}

/**
 * config init コマンドを実行
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<void> {
  const cwd = options.cwd || process.cwd();
  const projectRoot = options.projectRoot || cwd;
  const configPath = path.join(cwd, '.postmatter.json');

  console.log('Initializing postmatter configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }

  const config = createDefaultConfig(projectRoot);

  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🚀 Project: ${config.project.name}`);
  console.log(`📁 Root: ${projectRoot}\n`);
  console.log('Next steps:');
  console.log('  1. Review and customize .postmatter.json');
  console.log('  2. Check documents: postmatter check');
  console.log('  3. List documents: postmatter list\n');
}
