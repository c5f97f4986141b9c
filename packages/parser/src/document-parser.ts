import { DEFAULT_CONFIG, METADATA_KEYS } from '@postmatter/types';
import type { Document, FrontMatterFormat, FrontMatterValue, ParserConfig } from '@postmatter/types';
import { splitFrontMatter } from './front-matter.js';
import { BlockDecodeError, decodeBlock, defineEntry, readTomlDateText, toFrontMatterValue } from './codecs.js';
import { parseMetadata } from './metadata-schema.js';
import { DocumentError, type ParseWarning } from './errors.js';

export type ParserOptions = Partial<ParserConfig>;

export interface ParseResult {
  document: Document;
  warnings: ParseWarning[];
}

// ブロックは2行目から始まる
const BLOCK_START_LINE = 2;

const RECOGNIZED_KEYS: ReadonlySet<string> = new Set<string>(METADATA_KEYS);

/**
 * テキストをDocumentにパースするクラス
 * 副作用はなく、同じ入力には構造的に等しいDocumentを返す
 */
export class DocumentParser {
  private config: ParserConfig;

  constructor(options: ParserOptions = {}) {
    this.config = {
      delimiters: options.delimiters ?? DEFAULT_CONFIG.parser.delimiters,
      unknownKeys: options.unknownKeys ?? DEFAULT_CONFIG.parser.unknownKeys,
      missingMetadata: options.missingMetadata ?? DEFAULT_CONFIG.parser.missingMetadata,
    };
  }

  /**
   * 文書をパース
   * @param text 文書全体のテキスト
   * @param path 文書パス
   * @throws DocumentError
   */
  parse(text: string, path: string): ParseResult {
    const split = splitFrontMatter(text, this.config.delimiters);

    if (split.kind === 'unclosed') {
      throw new DocumentError(
        'MalformedDocument',
        `opening delimiter "${split.delimiter}" has no matching closing delimiter`,
        path,
        1
      );
    }

    if (split.kind === 'none') {
      if (this.config.missingMetadata === 'error') {
        throw new DocumentError(
          'MissingMetadata',
          `no front matter block found (expected ${this.describeDelimiters()} on the first line)`,
          path,
          1
        );
      }
      return {
        document: freezeDocument({ path, metadata: {}, body: text, format: 'none' }),
        warnings: [
          {
            kind: 'MissingMetadata',
            path,
            message: 'no front matter block found; whole text is used as body',
          },
        ],
      };
    }

    const table = this.decode(split.format, split.block, path);

    const recognized: Record<string, unknown> = {};
    const extra: Record<string, FrontMatterValue> = {};
    const warnings: ParseWarning[] = [];

    for (const [key, value] of Object.entries(table)) {
      if (RECOGNIZED_KEYS.has(key)) {
        recognized[key] = value;
        continue;
      }
      warnings.push({
        kind: 'UnrecognizedKey',
        path,
        key,
        message: `unrecognized front matter key "${key}"`,
      });
      if (this.config.unknownKeys === 'preserve') {
        defineEntry(extra, key, toFrontMatterValue(value));
      }
    }

    // 引用符なしのTOML日時は元の表記を使う
    if (split.format === 'toml' && recognized.date instanceof Date) {
      recognized.date = readTomlDateText(split.block, 'date') ?? recognized.date;
    }

    const parsed = parseMetadata(recognized);
    if (!parsed.success) {
      throw new DocumentError(
        'MalformedDocument',
        `invalid value for "${parsed.issue.key}": ${parsed.issue.message}`,
        path
      );
    }

    const document: Document = {
      path,
      metadata: parsed.metadata,
      body: split.body,
      format: split.format,
    };
    if (this.config.unknownKeys === 'preserve') {
      document.extra = extra;
    }

    return { document: freezeDocument(document), warnings };
  }

  private decode(format: FrontMatterFormat, block: string, path: string): Record<string, unknown> {
    try {
      return decodeBlock(format, block);
    } catch (error) {
      if (error instanceof BlockDecodeError) {
        const line = error.line === undefined ? undefined : BLOCK_START_LINE + error.line - 1;
        throw new DocumentError('MalformedDocument', error.message, path, line);
      }
      throw error;
    }
  }

  private describeDelimiters(): string {
    return this.config.delimiters.map((d) => `"${d}"`).join(' or ');
  }
}

/**
 * 読み込み後は変更されないようにする
 */
function freezeDocument(document: Document): Document {
  if (document.metadata.tags) Object.freeze(document.metadata.tags);
  if (document.metadata.categories) Object.freeze(document.metadata.categories);
  Object.freeze(document.metadata);
  if (document.extra) Object.freeze(document.extra);
  return Object.freeze(document);
}

/**
 * 文書をパースしてDocumentのみを返す
 * @throws DocumentError
 */
export function parseDocument(text: string, path: string, options: ParserOptions = {}): Document {
  return new DocumentParser(options).parse(text, path).document;
}
