/**
 * show コマンド
 * 1文書のメタデータと本文を表示する
 */

import { createLoader, resolveContext, toProjectPath, type ContextOptions } from '../utils/context.js';
import { formatDocumentAsJson, formatDocumentAsText } from '../utils/output.js';
import { reportCommandError } from '../utils/errors.js';

export interface ShowCommandOptions extends ContextOptions {
  format?: 'text' | 'json';
}

/**
 * show コマンドを実行
 * @returns 終了コード
 */
export async function executeShow(filePath: string, options: ShowCommandOptions = {}): Promise<number> {
  try {
    const context = await resolveContext(options);
    // 表示用なので未知のキーも保持する
    const loader = createLoader(context, { unknownKeys: 'preserve' });

    const result = await loader.loadFile(toProjectPath(context, filePath));
    if (!result.ok) {
      return reportCommandError(result.error);
    }

    const output = options.format === 'json'
      ? formatDocumentAsJson(result.document)
      : formatDocumentAsText(result.document);
    console.log(output);
    return 0;
  } catch (error) {
    return reportCommandError(error);
  }
}
