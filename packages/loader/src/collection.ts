/**
 * パスをキーとする文書コレクション
 */

import type { Document } from '@postmatter/types';
import { CollectionError } from './errors.js';

export interface DocumentQuery {
  /** このタグを持つ文書のみ */
  tag?: string;
  /** このカテゴリを持つ文書のみ */
  category?: string;
  /** 下書きを含めるか（デフォルト: false） */
  includeDrafts?: boolean;
}

export interface TermCount {
  name: string;
  count: number;
}

export type SortOrder = 'asc' | 'desc';

export class DocumentCollection implements Iterable<Document> {
  private documents = new Map<string, Document>();

  constructor(documents: Iterable<Document> = []) {
    for (const document of documents) {
      this.add(document);
    }
  }

  /**
   * 文書を追加
   * @throws CollectionError 同じパスの文書が既にある場合
   */
  add(document: Document): void {
    if (this.documents.has(document.path)) {
      throw new CollectionError(
        'DuplicatePath',
        `duplicate document path "${document.path}"`,
        document.path
      );
    }
    this.documents.set(document.path, document);
  }

  get(path: string): Document | null {
    return this.documents.get(path) ?? null;
  }

  has(path: string): boolean {
    return this.documents.has(path);
  }

  get size(): number {
    return this.documents.size;
  }

  /**
   * すべての文書パス（ソート済み）
   */
  paths(): string[] {
    return [...this.documents.keys()].sort();
  }

  [Symbol.iterator](): Iterator<Document> {
    return this.documents.values();
  }

  /**
   * 条件に合う文書をパス順で返す
   */
  filter(query: DocumentQuery = {}): Document[] {
    const { tag, category, includeDrafts = false } = query;

    return this.paths()
      .map((path) => this.documents.get(path))
      .filter((document): document is Document => {
        if (!document) return false;
        if (!includeDrafts && document.metadata.draft === true) return false;
        if (tag !== undefined && !document.metadata.tags?.includes(tag)) return false;
        if (category !== undefined && !document.metadata.categories?.includes(category)) return false;
        return true;
      });
  }

  /**
   * タグごとの文書数（名前順）
   */
  tags(): TermCount[] {
    return this.countTerms((document) => document.metadata.tags);
  }

  /**
   * カテゴリごとの文書数（名前順）
   */
  categories(): TermCount[] {
    return this.countTerms((document) => document.metadata.categories);
  }

  /**
   * 日付順に並べる。日付がない・解釈できない文書は最後（パス順）
   */
  sortedByDate(order: SortOrder = 'desc', documents: Iterable<Document> = this): Document[] {
    const direction = order === 'desc' ? -1 : 1;

    return [...documents].sort((a, b) => {
      const timeA = toTime(a.metadata.date);
      const timeB = toTime(b.metadata.date);

      if (timeA === null && timeB === null) return compareStrings(a.path, b.path);
      if (timeA === null) return 1;
      if (timeB === null) return -1;
      if (timeA !== timeB) return (timeA - timeB) * direction;
      return compareStrings(a.path, b.path);
    });
  }

  private countTerms(select: (document: Document) => readonly string[] | undefined): TermCount[] {
    const counts = new Map<string, number>();

    for (const document of this.documents.values()) {
      // 同じ文書内の重複は1回として数える
      for (const term of new Set(select(document) ?? [])) {
        counts.set(term, (counts.get(term) ?? 0) + 1);
      }
    }

    return [...counts.entries()]
      .map(([name, count]) => ({ name, count }))
      .sort((a, b) => compareStrings(a.name, b.name));
  }
}

function toTime(date: string | undefined): number | null {
  if (date === undefined) return null;
  const time = Date.parse(date);
  return Number.isNaN(time) ? null : time;
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
