import { promisify } from 'util';
import * as zlib from 'zlib';
import {
  ContentTransform,
  ObjectHandle,
  StatsSnapshot,
  ThresholdsConfig,
  ToolInvocation,
  TransformResult,
  Verdict,
} from '../../types';
import { AnalyserStats, AnalysisContext, Analyser } from '../analyser';
import { describeError } from '../errors';
import { formatBytes, formatPercent } from '../format';
import { Logger, defaultLogger } from '../logger';

const gzip = promisify(zlib.gzip);

export const DEFAULT_THRESHOLDS: ThresholdsConfig = {
  minSavedBytes: 1000,
  minSavedPercent: 10,
};

/**
 * Size-reduction policy. A candidate is rejected only when it misses BOTH thresholds.
 */
export function shouldAccept(
  originalSize: number,
  candidateSize: number,
  thresholds: ThresholdsConfig = DEFAULT_THRESHOLDS
): boolean {
  if (originalSize === 0) return false;
  const saved = originalSize - candidateSize;
  const savedPercent = (saved / originalSize) * 100;
  return !(saved <= thresholds.minSavedBytes && savedPercent <= thresholds.minSavedPercent);
}

export class ContentStats extends AnalyserStats {
  bytesExamined = 0;
  bytesSaved = 0;

  reset(): void {
    super.reset();
    this.bytesExamined = 0;
    this.bytesSaved = 0;
  }

  snapshot(): StatsSnapshot {
    return { ...super.snapshot(), bytesExamined: this.bytesExamined, bytesSaved: this.bytesSaved };
  }
}

export interface ContentAnalyserOptions {
  thresholds?: ThresholdsConfig;
  logger?: Logger;
}

/**
 * Content analyser that rewrites an object when a smaller candidate is worth it.
 *
 * Correctness cannot be decided before the candidate exists, so verification and
 * optimisation are fused into {@link analyse}.
 */
export abstract class ContentSizeAnalyser extends Analyser {
  readonly kind = 'content' as const;
  declare protected readonly stats: ContentStats;
  private readonly thresholds: ThresholdsConfig;

  constructor(name: string, options: ContentAnalyserOptions = {}) {
    const stats = new ContentStats();
    super(name, options.logger ?? defaultLogger, stats);
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  }

  /**
   * Produce the candidate bytes for an object's current content
   */
  protected abstract optimiseContent(handle: ObjectHandle, content: Buffer): Promise<TransformResult>;

  /**
   * Persist an accepted candidate
   */
  protected abstract persist(
    handle: ObjectHandle,
    original: Buffer,
    candidate: Buffer,
    context: AnalysisContext
  ): Promise<void>;

  /**
   * Objects the analyser counts but never reads
   */
  protected skip(_handle: ObjectHandle): boolean {
    return false;
  }

  async analyse(handle: ObjectHandle, context: AnalysisContext): Promise<void> {
    this.stats.increment('total');
    if (this.skip(handle)) return;

    const original = await context.store.readContent(handle);
    if (original.length === 0) {
      this.warn(`Empty object: "${handle.key}"`);
      return;
    }

    const candidate = await this.optimiseContent(handle, original);
    if (!candidate.ok) {
      this.warn(`Could not optimise "${handle.key}": ${candidate.reason}`);
      return;
    }

    if (this.verifyContent(handle, original, candidate.output)) return;

    this.stats.increment('problematic');
    if (context.dryRun) return;

    await this.persist(handle, original, candidate.output, context);
    this.stats.increment('changed');
  }

  /**
   * True when the object is already as small as it is worth making it
   */
  verifyContent(handle: ObjectHandle, original: Buffer, candidate: Buffer): boolean {
    this.stats.bytesExamined += original.length;
    if (!shouldAccept(original.length, candidate.length, this.thresholds)) {
      return true;
    }
    const saved = original.length - candidate.length;
    this.stats.bytesSaved += saved;
    this.info(
      `Optimising "${handle.key}" could save ${formatBytes(saved)} (${formatPercent(saved, original.length)}% reduction)`
    );
    return false;
  }

  finish(): Verdict {
    const { total, problematic, changed, bytesSaved, bytesExamined } = this.stats;
    if (problematic === 0) {
      return { status: 'ok', message: `GOOD: all ${total} objects ok.` };
    }
    const reduction = `${formatPercent(bytesSaved, bytesExamined)}% reduction`;
    if (changed > 0) {
      return {
        status: 'changed',
        message: `CHANGED: ${changed} out of ${total} objects changed, saved ${formatBytes(bytesSaved)} (${reduction}).`,
      };
    }
    return {
      status: 'problem',
      message: `PROBLEM: ${problematic} out of ${total} objects can be optimised to save ${formatBytes(bytesSaved)} (${reduction}).`,
    };
  }
}

/**
 * Content analyser whose candidate comes from an external optimiser binary
 */
export abstract class ExternalToolAnalyser extends ContentSizeAnalyser {
  private readonly transform: ContentTransform;

  constructor(name: string, transform: ContentTransform, options: ContentAnalyserOptions = {}) {
    super(name, options);
    this.transform = transform;
  }

  abstract tool(): ToolInvocation;

  protected optimiseContent(_handle: ObjectHandle, content: Buffer): Promise<TransformResult> {
    return this.transform.invoke(content, this.tool());
  }

  protected async persist(handle: ObjectHandle, _original: Buffer, candidate: Buffer, context: AnalysisContext): Promise<void> {
    this.warn(`Changing content of "${handle.key}" to optimised version`);
    await context.store.writeContent(handle, candidate);
  }
}

/**
 * Lossless JPEG re-encode with metadata stripped; lossy below quality 100
 */
export class JpegAnalyser extends ExternalToolAnalyser {
  private readonly maxQuality: number;
  private readonly binary: string;

  constructor(
    name: string,
    transform: ContentTransform,
    options: ContentAnalyserOptions & { maxQuality?: number; binary?: string } = {}
  ) {
    super(name, transform, options);
    this.maxQuality = options.maxQuality ?? 100;
    this.binary = options.binary ?? 'jpegoptim';
  }

  tool(): ToolInvocation {
    const args = ['--quiet', '--strip-all', '--all-progressive'];
    if (this.maxQuality < 100) {
      args.push(`--max=${this.maxQuality}`);
    }
    return { command: this.binary, args, suffix: '.jpg' };
  }
}

/**
 * Lossless PNG re-encode with metadata stripped
 */
export class PngAnalyser extends ExternalToolAnalyser {
  private readonly binary: string;

  constructor(name: string, transform: ContentTransform, options: ContentAnalyserOptions & { binary?: string } = {}) {
    super(name, transform, options);
    this.binary = options.binary ?? 'optipng';
  }

  tool(): ToolInvocation {
    return { command: this.binary, args: ['-quiet', '-strip', 'all'], suffix: '.png' };
  }
}

/**
 * Stores text content gzip-encoded when that saves enough
 */
export class GzipAnalyser extends ContentSizeAnalyser {
  protected skip(handle: ObjectHandle): boolean {
    return handle.headers.contentEncoding === 'gzip';
  }

  // Trial compression, only measured. The store gzips the original on write.
  protected async optimiseContent(_handle: ObjectHandle, content: Buffer): Promise<TransformResult> {
    try {
      return { ok: true, output: await gzip(content) };
    } catch (error) {
      return { ok: false, reason: `gzip failed: ${describeError(error)}` };
    }
  }

  protected async persist(handle: ObjectHandle, original: Buffer, _candidate: Buffer, context: AnalysisContext): Promise<void> {
    this.warn(`Gzip content of "${handle.key}"`);
    const encoded: ObjectHandle = { ...handle, headers: { ...handle.headers, contentEncoding: 'gzip' } };
    await context.store.writeContent(encoded, original);
  }
}
