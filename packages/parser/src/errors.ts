/**
 * 文書パースのエラーと警告
 */

export type DocumentErrorKind = 'MalformedDocument' | 'MissingMetadata';

/**
 * 文書の読み込みに失敗したことを表すエラー
 */
export class DocumentError extends Error {
  constructor(
    public readonly kind: DocumentErrorKind,
    message: string,
    public readonly path: string,
    /** 問題のある行（1-indexed、文書全体での行番号） */
    public readonly line?: number
  ) {
    super(message);
    this.name = 'DocumentError';
  }
}

export type ParseWarningKind = 'UnrecognizedKey' | 'MissingMetadata';

/**
 * 読み込みは成功したが報告すべき事項
 */
export interface ParseWarning {
  kind: ParseWarningKind;
  path: string;
  message: string;
  /** UnrecognizedKeyの場合のキー名 */
  key?: string;
}
