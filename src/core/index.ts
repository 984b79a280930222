export { Analyser, AnalyserStats, HeaderAnalyser, FunctionAnalyser } from './analyser';
export type { AnalysisContext, AnalyserCallback } from './analyser';
export { ContentTypeAnalyser, CacheControlAnalyser, inferContentType, buildCacheControl } from './analysers/headers';
export {
  ContentSizeAnalyser,
  ExternalToolAnalyser,
  JpegAnalyser,
  PngAnalyser,
  GzipAnalyser,
  shouldAccept,
} from './analysers/content';
export { Router } from './router';
export { ScanPipeline } from './pipeline';
export type { ScanProgress, PipelineOptions } from './pipeline';
export { createPipeline, PATTERNS } from './factory';
export { S3ObjectStore, createS3Client } from './s3-store';
export { MemoryObjectStore } from './memory-store';
export { StorePool } from './store-pool';
export { ExternalTransform } from './transform';
export { StoreError, ConfigurationError } from './errors';
export { ConsoleLogger, defaultLogger } from './logger';
export type { Logger } from './logger';
