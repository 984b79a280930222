import * as os from 'os';
import { v4 as uuidv4 } from 'uuid';
import {
  AnalyserSummary,
  ObjectStore,
  ObjectSummary,
  ScanReport,
  ScanStatus,
  ScanTarget,
  StoreFactory,
} from '../types';
import { Analyser, AnalyserCallback, FunctionAnalyser } from './analyser';
import { ConfigurationError, describeError } from './errors';
import { Logger, defaultLogger } from './logger';
import { Router } from './router';
import { StorePool } from './store-pool';

export interface ScanProgress {
  key: string;
  keysScanned: number;
  failed: boolean;
}

export interface PipelineOptions {
  storeFactory: StoreFactory;
  dryRun?: boolean;
  /** Worker count, defaults to the host's parallelism */
  concurrency?: number;
  logger?: Logger;
  onProgress?: (progress: ScanProgress) => void;
}

// Workers are numbered from 1; the listing gets its own store.
const LISTING_WORKER = 0;

/**
 * Scans bucket prefixes and runs every matching analyser over each object.
 *
 * Keys are spread over a fixed number of workers. The analysers matching one key
 * run one after the other, each on a freshly fetched handle, since the previous
 * one may have written a new version of the object.
 */
export class ScanPipeline {
  readonly router = new Router();
  readonly dryRun: boolean;
  readonly concurrency: number;
  private pool: StorePool;
  private logger: Logger;
  private onProgress?: (progress: ScanProgress) => void;
  private reports: ScanReport[] = [];
  private current?: { target: ScanTarget; startedAt: Date };
  private keysScanned = 0;
  private keysFailed = 0;

  constructor(options: PipelineOptions) {
    this.pool = new StorePool(options.storeFactory);
    this.dryRun = options.dryRun ?? false;
    this.concurrency = options.concurrency ?? os.availableParallelism();
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ConfigurationError([`Invalid concurrency: ${this.concurrency}. Must be a positive integer.`]);
    }
    this.logger = options.logger ?? defaultLogger;
    this.onProgress = options.onProgress;
  }

  append(analyser: Analyser, pattern: string, ignoreCase = true): this {
    this.router.register(analyser, pattern, ignoreCase);
    return this;
  }

  /**
   * Register a callback as an analyser. It runs only outside dry run.
   */
  analyse(name: string, pattern: string, callback: AnalyserCallback, ignoreCase = true): this {
    return this.append(new FunctionAnalyser(name, callback, this.logger), pattern, ignoreCase);
  }

  async run(target: ScanTarget): Promise<ScanReport> {
    if (this.current) {
      throw new Error(`A scan of "${this.current.target.bucket}" is already running`);
    }

    const analysers = this.router.analysers();
    const startedAt = new Date();
    this.current = { target, startedAt };
    this.keysScanned = 0;
    this.keysFailed = 0;
    for (const analyser of analysers) {
      analyser.start();
    }

    this.logger.log(`Analysing "${target.bucket}/${target.prefix}" with ${this.concurrency} workers`);

    const listingState: { error?: string } = {};
    try {
      const listing = this.pool.acquire(LISTING_WORKER).list(target.bucket, target.prefix);
      const iterator = listing[Symbol.asyncIterator]();

      const next = async (): Promise<ObjectSummary | undefined> => {
        if (listingState.error !== undefined) return undefined;
        try {
          const result = await iterator.next();
          return result.done ? undefined : result.value;
        } catch (error) {
          if (listingState.error === undefined) {
            listingState.error = describeError(error);
            this.logger.error(`Listing "${target.bucket}/${target.prefix}" failed: ${listingState.error}`);
          }
          return undefined;
        }
      };

      const worker = async (workerId: number): Promise<void> => {
        const store = this.pool.acquire(workerId);
        for (let item = await next(); item !== undefined; item = await next()) {
          await this.analyseKey(target.bucket, item.key, store);
        }
      };

      await Promise.all(Array.from({ length: this.concurrency }, (_, i) => worker(i + 1)));

      const summaries: AnalyserSummary[] = analysers.map((analyser) => ({
        name: analyser.name,
        kind: analyser.kind,
        stats: analyser.getStats(),
        verdict: analyser.finish(),
      }));

      const finishedAt = new Date();
      const report: ScanReport = {
        id: uuidv4(),
        bucket: target.bucket,
        prefix: target.prefix,
        dryRun: this.dryRun,
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        keysScanned: this.keysScanned,
        keysFailed: this.keysFailed,
        analysers: summaries,
      };
      if (listingState.error !== undefined) {
        report.aborted = listingState.error;
      }
      this.reports.push(report);
      return report;
    } finally {
      this.current = undefined;
    }
  }

  getStatus(): ScanStatus {
    return {
      running: this.current !== undefined,
      target: this.current?.target,
      startedAt: this.current?.startedAt,
      keysScanned: this.keysScanned,
      keysFailed: this.keysFailed,
      analysers: this.router.analysers().map((analyser) => ({
        name: analyser.name,
        kind: analyser.kind,
        stats: analyser.getStats(),
      })),
      reportsCompleted: this.reports.length,
    };
  }

  getReports(): ScanReport[] {
    return [...this.reports];
  }

  getReport(id: string): ScanReport | undefined {
    return this.reports.find((report) => report.id === id);
  }

  private async analyseKey(bucket: string, key: string, store: ObjectStore): Promise<void> {
    let failed = false;
    try {
      for (const analyser of this.router.resolve(key)) {
        const handle = await store.fetch(bucket, key);
        await analyser.analyse(handle, { store, dryRun: this.dryRun });
      }
    } catch (error) {
      failed = true;
      this.keysFailed++;
      this.logger.error(`Failed to analyse "${bucket}/${key}": ${describeError(error)}`);
    }
    this.keysScanned++;
    this.onProgress?.({ key, keysScanned: this.keysScanned, failed });
  }
}
