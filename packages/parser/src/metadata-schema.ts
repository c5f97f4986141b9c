import { z } from 'zod';
import type { DocumentMetadata } from '@postmatter/types';

const stringList = z.array(z.string());

// 元の表記が取れなかったDateはISO形式の文字列にする
const timestamp = z.preprocess(
  (value) => (value instanceof Date ? value.toISOString() : value),
  z.string()
);

/**
 * 認識するメタデータキーのスキーマ
 */
export const metadataSchema = z.object({
  title: z.string().optional(),
  date: timestamp.optional(),
  draft: z.boolean().optional(),
  description: z.string().optional(),
  tags: stringList.optional(),
  categories: stringList.optional(),
});

export type MetadataIssue = {
  /** 問題のあるキー（例: "tags[1]"） */
  key: string;
  message: string;
};

export type MetadataParseResult =
  | { success: true; metadata: DocumentMetadata }
  | { success: false; issue: MetadataIssue };

/**
 * 認識キーのみのテーブルを検証してDocumentMetadataにする
 */
export function parseMetadata(table: Record<string, unknown>): MetadataParseResult {
  const result = metadataSchema.safeParse(table);

  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      success: false,
      issue: {
        key: formatIssuePath(issue?.path ?? []),
        message: issue?.message ?? 'invalid value',
      },
    };
  }

  // 未定義のキーは含めない
  const metadata: DocumentMetadata = {};
  const { title, date, draft, description, tags, categories } = result.data;
  if (title !== undefined) metadata.title = title;
  if (date !== undefined) metadata.date = date;
  if (draft !== undefined) metadata.draft = draft;
  if (description !== undefined) metadata.description = description;
  if (tags !== undefined) metadata.tags = tags;
  if (categories !== undefined) metadata.categories = categories;

  return { success: true, metadata };
}

function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path
    .map((segment, index) => {
      if (typeof segment === 'number') return `[${segment}]`;
      return index === 0 ? segment : `.${segment}`;
    })
    .join('');
}
