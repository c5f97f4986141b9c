import type { DocumentError } from '@postmatter/parser';

export type CollectionErrorKind = 'DuplicatePath' | 'ReadError';

/**
 * コレクションの読み込みに関するエラー
 */
export class CollectionError extends Error {
  constructor(
    public readonly kind: CollectionErrorKind,
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'CollectionError';
  }
}

/** 1文書の読み込み失敗 */
export type LoadError = DocumentError | CollectionError;
