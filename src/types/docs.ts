/**
 * Type definitions for the documentation pipeline and search subsystem
 */

/**
 * Resolved address of a corpus page
 */
export interface CanonicalLocator {
  /** Absolute canonical URL, without fragment or query */
  readonly url: string;
  /** Corpus-relative POSIX path, e.g. `qstring.html` */
  readonly path: string;
  /** Decoded fragment id without the leading `#` */
  readonly fragment?: string;
}

/**
 * Outbound hyperlink collected from a page's content region
 */
export interface OutboundLink {
  text: string;
  url: string;
}

/**
 * Heading position inside a converted body
 */
export interface HeadingAnchor {
  level: number;
  text: string;
  /** Character offset of the heading line in `body` */
  offset: number;
  /** Fragment ids that select this heading's section */
  anchors: string[];
}

/**
 * One appearance of a link; `heading` is the index of the nearest
 * preceding heading, -1 before the first one
 */
export interface LinkOccurrence {
  link: number;
  heading: number;
}

export interface DocumentOutline {
  headings: HeadingAnchor[];
  occurrences: LinkOccurrence[];
}

/**
 * Markdown rendition of a page (or of one of its sections)
 */
export interface ConvertedDocument {
  title: string;
  body: string;
  links: OutboundLink[];
  /** SHA-256 of the source HTML */
  fingerprint: string;
  outline: DocumentOutline;
  /** Set when the body is a fragment view rather than the whole page */
  fragment?: string;
}

/**
 * Window of a converted body returned to callers
 */
export interface PageSlice {
  text: string;
  totalLength: number;
  returnedLength: number;
  startIndex: number;
  truncated: boolean;
  nextIndex?: number;
}

export type PaginationMetadata = Omit<PageSlice, 'text'>;

/**
 * Per-page text fields written to the search index
 */
export interface SearchFields {
  title: string;
  headings: string;
  body: string;
}

export interface SearchDocumentRecord extends SearchFields {
  url: string;
  path: string;
}

/**
 * Ranked search hit
 */
export interface SearchResult {
  title: string;
  url: string;
  score: number;
  context: string;
}

/**
 * Provenance stored beside the index
 */
export interface IndexMetadata {
  schemaVersion: string;
  pageCount: number;
  corpusFingerprint: string;
  builtAt: string;
  baseUrl: string;
}

export interface BuildSummary {
  pageCount: number;
  durationMs: number;
  fingerprint: string;
  builtAt: string;
  indexPath: string;
  /** True when an up-to-date index was kept instead of rebuilt */
  skipped: boolean;
}

export type BuildProgressCallback = (current: number, total: number, path: string) => void;

export interface BuildOptions {
  force?: boolean;
  onProgress?: BuildProgressCallback;
}

export interface WarmSummary {
  warmed: number;
  failed: number;
  durationMs: number;
}

export interface WarmOptions {
  /** Stop after this many pages (0 = no limit) */
  limit?: number;
}

export interface CacheStats {
  memoryEntries: number;
  capacity: number;
  hits: number;
  diskHits: number;
  misses: number;
  conversions: number;
}

/**
 * Records held by the disk tier
 */
export interface DiskStats {
  records: number;
  totalSize: number;
}

/**
 * Corpus enumeration result
 */
export interface ScanResult {
  /** Corpus-relative POSIX paths in lexical order */
  pages: string[];
  totalSize: number;
  scanDuration: number;
}

export interface ReadDocumentRequest {
  url: string;
  fragment?: string;
  sectionOnly?: boolean;
  startIndex?: number;
  maxLength?: number;
}

export interface ReadDocumentResponse {
  title: string;
  url: string;
  canonicalUrl: string;
  body: string;
  links: OutboundLink[];
  pagination: PaginationMetadata;
}

export interface SearchDocumentsResponse {
  query: string;
  count: number;
  results: SearchResult[];
}
