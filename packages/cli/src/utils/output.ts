/**
 * 出力フォーマットユーティリティ
 */

import type { Document } from '@postmatter/types';
import { DocumentError, type ParseWarning } from '@postmatter/parser';
import type { CollectionLoadReport, LoadError, LoadFailure } from '@postmatter/loader';

export interface CheckSummary {
  total: number;
  loaded: number;
  failures: Array<{ path: string; kind: string; message: string; line?: number }>;
  warnings: Array<{ path: string; kind: string; message: string; key?: string }>;
}

/**
 * 読み込みレポートから警告をすべて取り出す
 */
export function collectWarnings(report: CollectionLoadReport): ParseWarning[] {
  return report.results.flatMap((result) => (result.ok ? result.warnings : []));
}

/**
 * エラーを1行で表す（path: Kind: message (line n)）
 */
export function formatLoadError(error: LoadError): string {
  const line = error instanceof DocumentError && error.line !== undefined ? ` (line ${error.line})` : '';
  return `${error.path}: ${error.kind}: ${error.message}${line}`;
}

export function summarizeCheck(report: CollectionLoadReport): CheckSummary {
  return {
    total: report.results.length,
    loaded: report.collection.size,
    failures: report.failures.map(({ error }: LoadFailure) => ({
      path: error.path,
      kind: error.kind,
      message: error.message,
      ...(error instanceof DocumentError && error.line !== undefined ? { line: error.line } : {}),
    })),
    warnings: collectWarnings(report).map((warning) => ({ ...warning })),
  };
}

/**
 * checkの結果をテキスト形式で出力
 */
export function formatCheckReportAsText(report: CollectionLoadReport): string {
  const lines: string[] = [];

  for (const failure of report.failures) {
    lines.push(`✗ ${formatLoadError(failure.error)}`);
  }

  const warnings = collectWarnings(report);
  for (const warning of warnings) {
    lines.push(`⚠ ${warning.path}: ${warning.kind}: ${warning.message}`);
  }

  if (lines.length > 0) {
    lines.push('');
  }
  lines.push(
    `検査結果: ${report.results.length}件中 ${report.collection.size}件OK、` +
      `${report.failures.length}件失敗、警告${warnings.length}件`
  );

  return lines.join('\n');
}

export function formatCheckReportAsJson(report: CollectionLoadReport): string {
  return JSON.stringify(summarizeCheck(report), null, 2);
}

/**
 * 日付を一覧表示用に整形（先頭10文字、なければダッシュ）
 */
function formatDateLabel(date: string | undefined): string {
  return date ? date.slice(0, 10).padEnd(10) : '-'.repeat(10);
}

/**
 * 文書一覧をテキスト形式で出力
 */
export function formatDocumentListAsText(documents: Document[]): string {
  if (documents.length === 0) {
    return '文書: 0件';
  }

  const lines = [`文書: ${documents.length}件`, ''];
  for (const document of documents) {
    const { title, date, draft, tags } = document.metadata;
    const parts = [formatDateLabel(date), title ?? '(no title)', `[${document.path}]`];
    if (draft) {
      parts.push('(下書き)');
    }
    lines.push(parts.join('  '));
    if (tags && tags.length > 0) {
      lines.push(`            tags: ${tags.join(', ')}`);
    }
  }

  return lines.join('\n');
}

export function formatDocumentListAsJson(documents: Document[]): string {
  return JSON.stringify(
    documents.map((document) => ({ path: document.path, metadata: document.metadata })),
    null,
    2
  );
}

/**
 * 1文書をテキスト形式で出力
 */
export function formatDocumentAsText(document: Document): string {
  const { title, date, draft, description, tags, categories } = document.metadata;
  const lines = [`文書: ${document.path}`, `形式: ${document.format}`];

  if (title !== undefined) lines.push(`タイトル: ${title}`);
  if (date !== undefined) lines.push(`日付: ${date}`);
  if (draft !== undefined) lines.push(`下書き: ${draft ? 'はい' : 'いいえ'}`);
  if (description !== undefined) lines.push(`概要: ${description}`);
  if (tags !== undefined) lines.push(`タグ: ${tags.join(', ')}`);
  if (categories !== undefined) lines.push(`カテゴリ: ${categories.join(', ')}`);

  const extraKeys = Object.keys(document.extra ?? {});
  if (extraKeys.length > 0) {
    lines.push(`その他のキー: ${extraKeys.join(', ')}`);
  }

  lines.push('', `本文:\n${'='.repeat(60)}`, document.body, '='.repeat(60));

  return lines.join('\n');
}

export function formatDocumentAsJson(document: Document): string {
  return JSON.stringify(document, null, 2);
}
