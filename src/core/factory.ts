import { ContentTransform, StoreFactory, TidyConfig } from '../types';
import { CacheControlAnalyser, ContentTypeAnalyser } from './analysers/headers';
import { GzipAnalyser, JpegAnalyser, PngAnalyser } from './analysers/content';
import { Logger, defaultLogger } from './logger';
import { ScanPipeline, ScanProgress } from './pipeline';
import { S3ObjectStore } from './s3-store';
import { ExternalTransform } from './transform';

export const PATTERNS = {
  any: '.*',
  images: '.*\\.(jpe?g|png|gif)$',
  text: '.*\\.(html?|css|js|json)$',
  jpeg: '.*\\.jpe?g$',
  png: '.*\\.png$',
  compressible: '.*\\.(html?|css|js|json|svg|xml|txt)$',
} as const;

export interface PipelineDependencies {
  storeFactory?: StoreFactory;
  transform?: ContentTransform;
  logger?: Logger;
  onProgress?: (progress: ScanProgress) => void;
}

/**
 * Build the scan pipeline and its rule table from a validated configuration
 */
export function createPipeline(config: TidyConfig, deps: PipelineDependencies = {}): ScanPipeline {
  const logger = deps.logger ?? defaultLogger;
  const transform = deps.transform ?? new ExternalTransform(logger);
  const storeFactory = deps.storeFactory ?? (() => new S3ObjectStore({ config: config.store, logger }));
  const contentOptions = { thresholds: config.thresholds, logger };

  const pipeline = new ScanPipeline({
    storeFactory,
    dryRun: config.dryRun,
    concurrency: config.concurrency,
    logger,
    onProgress: deps.onProgress,
  });

  if (config.checks.contentType) {
    pipeline.append(new ContentTypeAnalyser('Content Type', logger), PATTERNS.any);
  }

  if (config.checks.cacheControl) {
    const { visibility, imageMaxAge, textMaxAge } = config.cache;
    pipeline.append(new CacheControlAnalyser('Images Caching', imageMaxAge, visibility, logger), PATTERNS.images);
    pipeline.append(new CacheControlAnalyser('Text Caching', textMaxAge, visibility, logger), PATTERNS.text);
  }

  if (config.checks.imageOptimisation) {
    pipeline.append(
      new JpegAnalyser('JPEG optimise', transform, {
        ...contentOptions,
        maxQuality: config.images.maxJpegQuality,
        binary: config.tools.jpegoptim,
      }),
      PATTERNS.jpeg
    );
    pipeline.append(
      new PngAnalyser('PNG optimise', transform, { ...contentOptions, binary: config.tools.optipng }),
      PATTERNS.png
    );
  }

  if (config.checks.gzip) {
    pipeline.append(new GzipAnalyser('Gzip', contentOptions), PATTERNS.compressible);
  }

  return pipeline;
}
