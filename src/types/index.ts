/**
 * Cache-Control visibility directive
 */
export enum CacheVisibility {
  Public = 'public',
  Private = 'private',
}

/**
 * Logging verbosity
 *
 * quiet   - warnings, errors and the final report only
 * verbose - per-object detail
 * debug   - verbose plus store and transform traces
 */
export type Verbosity = 'quiet' | 'verbose' | 'debug';

/**
 * Standard response headers the analysers look after
 */
export type HeaderName =
  | 'contentType'
  | 'cacheControl'
  | 'contentEncoding'
  | 'contentDisposition'
  | 'contentLanguage';

/**
 * Full header set of a stored object
 */
export interface HeaderSet {
  contentType?: string;
  cacheControl?: string;
  contentEncoding?: string;
  contentDisposition?: string;
  contentLanguage?: string;
  metadata: Record<string, string>;
}

/**
 * A transient view of one stored object.
 * Stale as soon as any mutating store call has been made for the same key.
 */
export interface ObjectHandle {
  bucket: string;
  key: string;
  headers: HeaderSet;
  size?: number;
  version?: string;
  redirectLocation?: string;
}

/**
 * One entry of a bucket listing
 */
export interface ObjectSummary {
  key: string;
  size?: number;
}

/**
 * Gateway to the object store
 */
export interface ObjectStore {
  list(bucket: string, prefix: string): AsyncIterable<ObjectSummary>;
  fetch(bucket: string, key: string): Promise<ObjectHandle>;
  /** Content bytes, inflated when the object is stored gzip-encoded */
  readContent(handle: ObjectHandle): Promise<Buffer>;
  /** Replaces content, keeping headers and ACL; gzips on the way out when the handle says gzip */
  writeContent(handle: ObjectHandle, content: Buffer): Promise<ObjectHandle>;
  /** Copy-with-metadata keeping the ACL; yields a new version */
  rewriteHeaders(handle: ObjectHandle, headers: HeaderSet): Promise<ObjectHandle>;
  isRedirect(handle: ObjectHandle): boolean;
}

export type StoreFactory = () => ObjectStore;

/**
 * Command line of an external optimiser. The temp file path is appended to `args`.
 */
export interface ToolInvocation {
  command: string;
  args: string[];
  suffix: string;
}

export type TransformResult = { ok: true; output: Buffer } | { ok: false; reason: string };

/**
 * Content optimiser run outside the process. Never rejects.
 */
export interface ContentTransform {
  invoke(input: Buffer, tool: ToolInvocation): Promise<TransformResult>;
}

/**
 * Per-analyser counters
 */
export interface StatsSnapshot {
  total: number;
  problematic: number;
  changed: number;
  bytesExamined?: number;
  bytesSaved?: number;
}

export type AnalyserKind = 'header' | 'content' | 'function';

export type VerdictStatus = 'ok' | 'changed' | 'problem';

/**
 * Outcome of an analyser's run, produced by finish()
 */
export interface Verdict {
  status: VerdictStatus;
  message: string;
}

export interface AnalyserSummary {
  name: string;
  kind: AnalyserKind;
  stats: StatsSnapshot;
  verdict: Verdict;
}

/**
 * Result of scanning one bucket/prefix target
 */
export interface ScanReport {
  id: string;
  bucket: string;
  prefix: string;
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  keysScanned: number;
  keysFailed: number;
  aborted?: string;
  analysers: AnalyserSummary[];
}

/**
 * Live state of the pipeline, served by the status API
 */
export interface ScanStatus {
  running: boolean;
  target?: { bucket: string; prefix: string };
  startedAt?: Date;
  keysScanned: number;
  keysFailed: number;
  analysers: Array<{ name: string; kind: AnalyserKind; stats: StatsSnapshot }>;
  reportsCompleted: number;
}

export interface ScanTarget {
  bucket: string;
  prefix: string;
}

/**
 * Connection settings for the S3 gateway
 */
export interface StoreConfig {
  region?: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
  preserveAcl: boolean;
}

export interface ChecksConfig {
  contentType: boolean;
  cacheControl: boolean;
  imageOptimisation: boolean;
  gzip: boolean;
}

export interface CacheConfig {
  visibility: CacheVisibility;
  imageMaxAge: number;
  textMaxAge: number;
}

export interface ThresholdsConfig {
  minSavedBytes: number;
  minSavedPercent: number;
}

export interface ToolsConfig {
  jpegoptim: string;
  optipng: string;
}

/**
 * s3-tidy configuration
 */
export interface TidyConfig {
  dryRun: boolean;
  concurrency: number;
  verbosity: Verbosity;
  store: StoreConfig;
  checks: ChecksConfig;
  cache: CacheConfig;
  images: { maxJpegQuality: number };
  thresholds: ThresholdsConfig;
  tools: ToolsConfig;
}

/**
 * Shape of a YAML config file: every section optional, every field optional
 */
export interface TidyConfigFile {
  dryRun?: boolean;
  concurrency?: number;
  verbosity?: Verbosity;
  store?: Partial<StoreConfig>;
  checks?: Partial<ChecksConfig>;
  cache?: Partial<CacheConfig>;
  images?: { maxJpegQuality?: number };
  thresholds?: Partial<ThresholdsConfig>;
  tools?: Partial<ToolsConfig>;
}
