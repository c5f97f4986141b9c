/**
 * check コマンド
 * 文書コレクションを読み込み、読み込めない文書を報告する
 */

import { createLoader, resolveContext, toProjectPath, type ContextOptions } from '../utils/context.js';
import { collectWarnings, formatCheckReportAsJson, formatCheckReportAsText } from '../utils/output.js';
import { reportCommandError } from '../utils/errors.js';

export interface CheckCommandOptions extends ContextOptions {
  format?: 'text' | 'json';
  /** 警告も失敗として扱う */
  strict?: boolean;
}

/**
 * check コマンドを実行
 * @returns 終了コード
 */
export async function executeCheck(paths: string[], options: CheckCommandOptions = {}): Promise<number> {
  try {
    const context = await resolveContext(options);
    const loader = createLoader(context);

    const report = await loader.loadAll(paths.map((p) => toProjectPath(context, p)));

    const output = options.format === 'json'
      ? formatCheckReportAsJson(report)
      : formatCheckReportAsText(report);
    console.log(output);

    const warningCount = collectWarnings(report).length;
    const failed = report.failures.length > 0 || (options.strict === true && warningCount > 0);
    return failed ? 1 : 0;
  } catch (error) {
    return reportCommandError(error);
  }
}
