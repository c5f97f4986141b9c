#!/usr/bin/env node
/**
 * postmatter CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { executeCheck, type CheckCommandOptions } from './commands/check.js';
import { executeShow, type ShowCommandOptions } from './commands/show.js';
import { executeList, type ListCommandOptions } from './commands/list.js';
import { executeFmt, type FmtCommandOptions } from './commands/fmt.js';
import { initConfig, type ConfigInitOptions } from './commands/config/init.js';
import { reportCommandError } from './utils/errors.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const formatOption = () =>
  new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text');

const program = new Command();

program
  .name('postmatter')
  .description('フロントマター付き文書のコマンドラインツール')
  .version(packageJson.version)
  .addOption(
    new Option('-c, --config <path>', '設定ファイルのパス')
      .env('POSTMATTER_CONFIG')
  )
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// check コマンド
program
  .command('check')
  .description('文書を読み込み、エラーと警告を報告')
  .argument('[paths...]', '検査するファイルのパス（省略時はすべて）')
  .addOption(formatOption())
  .option('--strict', '警告も失敗として扱う')
  .action(async (paths: string[], options: CheckCommandOptions) => {
    process.exitCode = await executeCheck(paths, { ...options, config: globalConfigPath });
  });

// show コマンド
program
  .command('show')
  .description('文書のメタデータと本文を表示')
  .argument('<path>', '文書のパス')
  .addOption(formatOption())
  .action(async (filePath: string, options: ShowCommandOptions) => {
    process.exitCode = await executeShow(filePath, { ...options, config: globalConfigPath });
  });

// list コマンド
program
  .command('list')
  .description('文書を日付の新しい順に一覧表示')
  .option('--tag <tag>', 'タグで絞り込む')
  .option('--category <category>', 'カテゴリで絞り込む')
  .option('--drafts', '下書きを含める')
  .addOption(formatOption())
  .action(async (options: ListCommandOptions) => {
    process.exitCode = await executeList({ ...options, config: globalConfigPath });
  });

// fmt コマンド
program
  .command('fmt')
  .description('フロントマターを正規形に整形')
  .argument('[paths...]', '整形するファイルのパス（省略時はすべて）')
  .option('--check', '書き換えずに整形が必要なファイルを報告')
  .action(async (paths: string[], options: FmtCommandOptions) => {
    process.exitCode = await executeFmt(paths, { ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program
  .command('config')
  .description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: ConfigInitOptions) => {
    try {
      await initConfig(options);
    } catch (error) {
      process.exitCode = reportCommandError(error);
    }
  });

// コマンドラインを解析
await program.parseAsync(process.argv);
