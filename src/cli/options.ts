import { CacheVisibility, ScanTarget, TidyConfig } from '../types';
import { ConfigurationError } from '../core/errors';

/**
 * Options as commander hands them over. Negated flags default to true.
 */
export interface CliOptions {
  accessKey?: string;
  secretKey?: string;
  region?: string;
  endpoint?: string;
  pathStyle?: boolean;
  dryRun?: boolean;
  imageMaxAge?: string;
  textMaxAge?: string;
  cachePrivate?: boolean;
  cacheControlCheck?: boolean;
  contentTypeCheck?: boolean;
  imageOptimise?: boolean;
  gzip?: boolean;
  maxJpegQuality?: string;
  concurrency?: string;
  config?: string;
  statusPort?: string;
  verbose?: boolean;
  debug?: boolean;
}

export interface CliSettings {
  config: TidyConfig;
  statusPort?: number;
}

/**
 * "bucket/some/prefix" -> { bucket: "bucket", prefix: "some/prefix" }
 */
export function parseTarget(target: string): ScanTarget {
  const slash = target.indexOf('/');
  const bucket = slash === -1 ? target : target.slice(0, slash);
  const prefix = slash === -1 ? '' : target.slice(slash + 1);
  if (!bucket) {
    throw new ConfigurationError([`Invalid target "${target}": missing bucket name`]);
  }
  return { bucket, prefix };
}

function parseInteger(value: string | undefined, flag: string, problems: string[]): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    problems.push(`${flag} expects an integer, got "${value}"`);
    return undefined;
  }
  return parseInt(value, 10);
}

/**
 * Apply command line flags over a loaded configuration.
 *
 * Flags can only switch checks off (`--no-*`), switch gzip, dry run and private
 * caching on, and replace numbers and credentials.
 *
 * @throws ConfigurationError when a numeric flag is not a number
 */
export function applyCliOptions(base: TidyConfig, options: CliOptions): CliSettings {
  const problems: string[] = [];
  const imageMaxAge = parseInteger(options.imageMaxAge, '--image-max-age', problems);
  const textMaxAge = parseInteger(options.textMaxAge, '--text-max-age', problems);
  const maxJpegQuality = parseInteger(options.maxJpegQuality, '--max-jpeg-quality', problems);
  const concurrency = parseInteger(options.concurrency, '--concurrency', problems);
  const statusPort = parseInteger(options.statusPort, '--status-port', problems);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  let verbosity = base.verbosity;
  if (options.debug) verbosity = 'debug';
  else if (options.verbose) verbosity = 'verbose';

  const config: TidyConfig = {
    dryRun: base.dryRun || options.dryRun === true,
    concurrency: concurrency ?? base.concurrency,
    verbosity,
    store: {
      ...base.store,
      accessKeyId: options.accessKey ?? base.store.accessKeyId,
      secretAccessKey: options.secretKey ?? base.store.secretAccessKey,
      region: options.region ?? base.store.region,
      endpoint: options.endpoint ?? base.store.endpoint,
      forcePathStyle: base.store.forcePathStyle || options.pathStyle === true,
    },
    checks: {
      contentType: base.checks.contentType && options.contentTypeCheck !== false,
      cacheControl: base.checks.cacheControl && options.cacheControlCheck !== false,
      imageOptimisation: base.checks.imageOptimisation && options.imageOptimise !== false,
      gzip: base.checks.gzip || options.gzip === true,
    },
    cache: {
      visibility: options.cachePrivate ? CacheVisibility.Private : base.cache.visibility,
      imageMaxAge: imageMaxAge ?? base.cache.imageMaxAge,
      textMaxAge: textMaxAge ?? base.cache.textMaxAge,
    },
    images: { maxJpegQuality: maxJpegQuality ?? base.images.maxJpegQuality },
    thresholds: { ...base.thresholds },
    tools: { ...base.tools },
  };

  return { config, statusPort };
}
