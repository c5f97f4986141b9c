/**
 * list コマンド
 * 文書を新しい順に一覧表示する
 */

import { createLoader, resolveContext, type ContextOptions } from '../utils/context.js';
import { formatDocumentListAsJson, formatDocumentListAsText } from '../utils/output.js';
import { reportCommandError } from '../utils/errors.js';

export interface ListCommandOptions extends ContextOptions {
  tag?: string;
  category?: string;
  /** 下書きを含める */
  drafts?: boolean;
  format?: 'text' | 'json';
}

/**
 * list コマンドを実行
 * @returns 終了コード
 */
export async function executeList(options: ListCommandOptions = {}): Promise<number> {
  try {
    const context = await resolveContext(options);
    const report = await createLoader(context).loadAll();

    const { collection } = report;
    const documents = collection.sortedByDate(
      'desc',
      collection.filter({
        tag: options.tag,
        category: options.category,
        includeDrafts: options.drafts === true,
      })
    );

    const output = options.format === 'json'
      ? formatDocumentListAsJson(documents)
      : formatDocumentListAsText(documents);
    console.log(output);

    if (report.failures.length > 0) {
      console.warn(
        `⚠️  ${report.failures.length}件の文書を読み込めませんでした（postmatter check で詳細を確認してください）`
      );
    }
    return 0;
  } catch (error) {
    return reportCommandError(error);
  }
}
