import {
  AnalyserKind,
  HeaderName,
  HeaderSet,
  ObjectHandle,
  ObjectStore,
  StatsSnapshot,
  Verdict,
} from '../types';
import { formatPercent } from './format';
import { Logger, defaultLogger } from './logger';

/**
 * What an analyser gets alongside the object it examines
 */
export interface AnalysisContext {
  store: ObjectStore;
  dryRun: boolean;
}

export type Counter = 'total' | 'problematic' | 'changed';

/**
 * Counters of one analyser, shared by every worker that hits a matching key.
 * Updates are synchronous, so no increment is lost between awaits.
 */
export class AnalyserStats {
  total = 0;
  problematic = 0;
  changed = 0;

  increment(counter: Counter): void {
    this[counter] += 1;
  }

  reset(): void {
    this.total = 0;
    this.problematic = 0;
    this.changed = 0;
  }

  snapshot(): StatsSnapshot {
    return { total: this.total, problematic: this.problematic, changed: this.changed };
  }
}

/**
 * Base class of every analyser
 */
export abstract class Analyser {
  abstract readonly kind: AnalyserKind;
  readonly name: string;
  protected readonly logger: Logger;
  protected readonly stats: AnalyserStats;

  constructor(name: string, logger: Logger = defaultLogger, stats: AnalyserStats = new AnalyserStats()) {
    this.name = name;
    this.logger = logger;
    this.stats = stats;
  }

  /**
   * Examine one object and, unless in dry run, repair it
   */
  abstract analyse(handle: ObjectHandle, context: AnalysisContext): Promise<void>;

  start(): void {
    this.stats.reset();
  }

  finish(): Verdict {
    const { total, problematic, changed } = this.stats;
    if (problematic === 0) {
      return { status: 'ok', message: `GOOD: all ${total} objects ok.` };
    }
    if (changed > 0) {
      return {
        status: 'changed',
        message: `CHANGED: ${changed} out of ${total} objects changed (${formatPercent(changed, total)}%).`,
      };
    }
    return {
      status: 'problem',
      message: `PROBLEM: ${problematic} out of ${total} objects are problematic (${formatPercent(problematic, total)}%).`,
    };
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  protected info(message: string): void {
    this.logger.log(`[${this.name}] ${message}`);
  }

  protected warn(message: string): void {
    this.logger.warn(`[${this.name}] ${message}`);
  }
}

/**
 * Analyser that checks one response header against a desired value
 */
export abstract class HeaderAnalyser extends Analyser {
  readonly kind = 'header' as const;
  abstract readonly header: HeaderName;

  /**
   * Desired header value, or undefined when nothing can be said about the object
   */
  abstract desiredValue(handle: ObjectHandle): string | undefined;

  async analyse(handle: ObjectHandle, context: AnalysisContext): Promise<void> {
    this.stats.increment('total');
    if (this.verify(handle)) return;

    this.stats.increment('problematic');
    if (context.dryRun) return;

    if (await this.optimise(handle, context.store)) {
      this.stats.increment('changed');
    }
  }

  verify(handle: ObjectHandle): boolean {
    const desired = this.desiredValue(handle);
    const actual = handle.headers[this.header];
    if (desired !== undefined && desired !== actual) {
      this.info(`${this.header} of "${handle.key}" should be "${desired}" instead of "${actual ?? ''}"`);
      return false;
    }
    return true;
  }

  /**
   * Rewrite the header in place. Returns false when the object was left alone.
   */
  async optimise(handle: ObjectHandle, store: ObjectStore): Promise<boolean> {
    const desired = this.desiredValue(handle);
    if (desired === undefined) return false;

    if (store.isRedirect(handle)) {
      this.info(`Skipping redirect "${handle.key}" -> "${handle.redirectLocation ?? ''}"`);
      return false;
    }

    this.warn(`Changing ${this.header} of "${handle.key}" to "${desired}"`);
    const headers: HeaderSet = { ...handle.headers };
    headers[this.header] = desired;
    await store.rewriteHeaders(handle, headers);
    return true;
  }
}

export type AnalyserCallback = (handle: ObjectHandle, context: AnalysisContext) => Promise<void>;

/**
 * Wraps a plain callback registered programmatically.
 * The callback only runs outside dry run.
 */
export class FunctionAnalyser extends Analyser {
  readonly kind = 'function' as const;
  private readonly callback: AnalyserCallback;

  constructor(name: string, callback: AnalyserCallback, logger: Logger = defaultLogger) {
    super(name, logger);
    this.callback = callback;
  }

  async analyse(handle: ObjectHandle, context: AnalysisContext): Promise<void> {
    this.stats.increment('total');
    if (context.dryRun) return;
    await this.callback(handle, context);
  }

  finish(): Verdict {
    return { status: 'ok', message: `DONE: ${this.stats.total} objects passed to ${this.name}.` };
  }
}
