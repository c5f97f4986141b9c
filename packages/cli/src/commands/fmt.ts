/**
 * fmt コマンド
 * フロントマターを正規形に書き換える（本文はそのまま）
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DocumentError, DocumentParser, detectTextStyle, stringifyDocument } from '@postmatter/parser';
import { CollectionError, FileDiscovery } from '@postmatter/loader';
import { resolveContext, toProjectPath, type ContextOptions } from '../utils/context.js';
import { formatLoadError } from '../utils/output.js';
import { reportCommandError } from '../utils/errors.js';

export interface FmtCommandOptions extends ContextOptions {
  /** 書き換えずに、変更が必要なファイルを報告するだけ */
  check?: boolean;
}

/**
 * fmt コマンドを実行
 * @returns 終了コード（エラー、または--checkで変更が必要なファイルがあれば1）
 */
export async function executeFmt(paths: string[], options: FmtCommandOptions = {}): Promise<number> {
  try {
    const context = await resolveContext(options);
    // 未知のキーを落とさないようにpreserveで読む
    const parser = new DocumentParser({ ...context.config.parser, unknownKeys: 'preserve' });

    const targets = paths.length > 0
      ? paths.map((p) => toProjectPath(context, p))
      : await new FileDiscovery({ rootDir: context.projectRoot, config: context.config.files }).findFiles();

    let changed = 0;
    let errors = 0;

    for (const target of targets) {
      const filePath = path.join(context.projectRoot, target);

      let text: string;
      try {
        text = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code ?? 'UNKNOWN';
        const readError = new CollectionError('ReadError', `cannot read file (${code})`, target);
        console.error(`✗ ${formatLoadError(readError)}`);
        errors++;
        continue;
      }

      let formatted: string;
      try {
        const { document } = parser.parse(text, target);
        // ブロックのない文書は対象外
        if (document.format === 'none') {
          continue;
        }
        // BOMと改行は元のテキストに合わせる
        formatted = stringifyDocument(document, detectTextStyle(text));
      } catch (error) {
        if (error instanceof DocumentError) {
          console.error(`✗ ${formatLoadError(error)}`);
          errors++;
          continue;
        }
        throw error;
      }

      if (formatted === text) {
        continue;
      }

      changed++;
      if (options.check) {
        console.log(`would reformat: ${target}`);
      } else {
        await fs.writeFile(filePath, formatted, 'utf-8');
        console.log(`reformatted: ${target}`);
      }
    }

    console.log(
      options.check
        ? `${targets.length}件中 ${changed}件が要整形`
        : `${targets.length}件中 ${changed}件を整形しました`
    );

    if (errors > 0) {
      return 1;
    }
    return options.check && changed > 0 ? 1 : 0;
  } catch (error) {
    return reportCommandError(error);
  }
}
