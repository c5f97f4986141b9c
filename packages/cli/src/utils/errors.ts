import { DocumentError } from '@postmatter/parser';
import { CollectionError } from '@postmatter/loader';
import { formatLoadError } from './output.js';

/**
 * コマンドの例外を表示して終了コードを返す
 */
export function reportCommandError(error: unknown): number {
  if (error instanceof DocumentError || error instanceof CollectionError) {
    console.error(`エラー: ${formatLoadError(error)}`);
  } else if (error instanceof Error) {
    console.error(`エラー: ${error.message}`);
  } else {
    console.error('エラー: 不明なエラーが発生しました。');
  }
  return 1;
}
