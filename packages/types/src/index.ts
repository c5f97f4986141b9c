/**
 * @postmatter/types
 * postmatterの共通型定義
 */

// Document
export type {
  Document,
  DocumentMetadata,
  FrontMatterFormat,
  FrontMatterValue,
  MetadataKey,
} from './document.js';
export { METADATA_KEYS } from './document.js';

// Config
export type {
  PostmatterConfig,
  ProjectConfig,
  FilesConfig,
  ParserConfig,
  LoaderConfig,
  Delimiter,
  UnknownKeyPolicy,
  MissingMetadataPolicy,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';
