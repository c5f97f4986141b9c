/**
 * @postmatter/loader
 *
 * コンテンツファイルの検索と文書コレクションの読み込み
 */

export {
  CollectionLoader,
  normalizeDocumentPath,
  type CollectionLoaderOptions,
  type CollectionLoadReport,
  type LoadResult,
  type LoadFailure,
} from './collection-loader.js';
export {
  DocumentCollection,
  type DocumentQuery,
  type TermCount,
  type SortOrder,
} from './collection.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export { CollectionError, type CollectionErrorKind, type LoadError } from './errors.js';
