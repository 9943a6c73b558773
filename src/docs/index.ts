/**
 * Documentation System Entry Point
 */

// Core modules
export * from './api.js';
export * from './cache.js';
export * from './converter.js';
export * from './extractor.js';
export * from './indexer.js';
export * from './loader.js';
export * from './lru.js';
export * from './paginate.js';
export * from './resolver.js';
export * from './scanner.js';
export * from './search.js';
export * from './store.js';

// Re-export types
export type {
  CanonicalLocator,
  ConvertedDocument,
  OutboundLink,
  HeadingAnchor,
  PageSlice,
  PaginationMetadata,
  SearchResult,
  IndexMetadata,
  BuildSummary,
  WarmSummary,
  CacheStats,
  DiskStats,
  ScanResult,
  ReadDocumentRequest,
  ReadDocumentResponse,
  SearchDocumentsResponse,
} from '../types/docs.js';
