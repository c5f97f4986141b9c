/**
 * @postmatter/parser
 *
 * フロントマター付き文書のパーサとシリアライザ
 */

export { DocumentParser, parseDocument, type ParserOptions, type ParseResult } from './document-parser.js';
export {
  serializeMetadata,
  stringifyDocument,
  detectTextStyle,
  type SerializeOptions,
  type StringifyOptions,
  type LineEnding,
} from './serializer.js';
export { splitFrontMatter, DELIMITER_FORMATS, FORMAT_DELIMITERS, type FrontMatterSplit } from './front-matter.js';
export { metadataSchema } from './metadata-schema.js';
export {
  DocumentError,
  type DocumentErrorKind,
  type ParseWarning,
  type ParseWarningKind,
} from './errors.js';
