import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { CacheVisibility, TidyConfig, TidyConfigFile } from '../types';
import { ConfigurationError, describeError } from '../core/errors';
import { ConfigFileSchema } from './schema';

/**
 * Default configuration for s3-tidy
 */
const DEFAULT_CONFIG: TidyConfig = {
  dryRun: false,
  concurrency: os.availableParallelism(),
  verbosity: 'quiet',
  store: {
    forcePathStyle: false,
    preserveAcl: true,
  },
  checks: {
    contentType: true,
    cacheControl: true,
    imageOptimisation: true,
    gzip: false,
  },
  cache: {
    visibility: CacheVisibility.Public,
    imageMaxAge: 604800, // one week
    textMaxAge: 86400, // one day
  },
  images: {
    maxJpegQuality: 100,
  },
  thresholds: {
    minSavedBytes: 1000,
    minSavedPercent: 10,
  },
  tools: {
    jpegoptim: 'jpegoptim',
    optipng: 'optipng',
  },
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = ['.s3tidy/config.yml', '.s3tidy/config.yaml', 's3tidy.yml', 's3tidy.yaml'];

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);
const validateConfigFile = ajv.compile<TidyConfigFile>(ConfigFileSchema);

export interface LoadConfigOptions {
  /** Explicit file; wins over S3TIDY_CONFIG and the search paths */
  configPath?: string;
  basePath?: string;
}

/**
 * Load configuration from a YAML file merged over the defaults.
 *
 * The file is `configPath`, else `S3TIDY_CONFIG`, else the first of CONFIG_PATHS
 * found under `basePath` (default: the working directory). Without any file the
 * defaults are returned.
 *
 * @throws ConfigurationError when a file is missing, unparsable or does not match the schema
 */
export function loadConfig(options: LoadConfigOptions = {}): TidyConfig {
  const explicit = options.configPath ?? process.env.S3TIDY_CONFIG;
  let configPath: string | undefined;

  if (explicit) {
    configPath = path.resolve(options.basePath || process.cwd(), explicit);
    if (!fs.existsSync(configPath)) {
      throw new ConfigurationError([`Config file not found: ${configPath}`]);
    }
  } else {
    configPath = CONFIG_PATHS.map((p) => path.resolve(options.basePath || process.cwd(), p)).find((p) =>
      fs.existsSync(p)
    );
  }

  if (!configPath) {
    return getDefaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError([`Failed to parse ${configPath}: ${describeError(error)}`]);
  }

  // An empty file parses to null
  const content = parsed ?? {};
  if (!validateConfigFile(content)) {
    const problems = (validateConfigFile.errors ?? []).map(
      (e) => `${configPath}: ${e.instancePath || '/'} ${e.message ?? 'is invalid'}`
    );
    throw new ConfigurationError(problems);
  }

  return mergeConfig(getDefaultConfig(), content);
}

/**
 * Merge a config file over a base configuration, section by section
 */
export function mergeConfig(base: TidyConfig, override: TidyConfigFile): TidyConfig {
  return {
    dryRun: override.dryRun ?? base.dryRun,
    concurrency: override.concurrency ?? base.concurrency,
    verbosity: override.verbosity ?? base.verbosity,
    store: { ...base.store, ...override.store },
    checks: { ...base.checks, ...override.checks },
    cache: { ...base.cache, ...override.cache },
    images: { ...base.images, ...override.images },
    thresholds: { ...base.thresholds, ...override.thresholds },
    tools: { ...base.tools, ...override.tools },
  };
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): TidyConfig {
  return {
    ...DEFAULT_CONFIG,
    store: { ...DEFAULT_CONFIG.store },
    checks: { ...DEFAULT_CONFIG.checks },
    cache: { ...DEFAULT_CONFIG.cache },
    images: { ...DEFAULT_CONFIG.images },
    thresholds: { ...DEFAULT_CONFIG.thresholds },
    tools: { ...DEFAULT_CONFIG.tools },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: TidyConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push(`Invalid concurrency: ${config.concurrency}. Must be a positive integer.`);
  }

  const quality = config.images.maxJpegQuality;
  if (!Number.isInteger(quality) || quality < 0 || quality > 100) {
    errors.push(`Invalid max JPEG quality: ${quality}. Must be an integer between 0 and 100.`);
  }

  if (!Number.isInteger(config.cache.imageMaxAge)) {
    errors.push(`Invalid image max-age: ${config.cache.imageMaxAge}. Must be an integer.`);
  }
  if (!Number.isInteger(config.cache.textMaxAge)) {
    errors.push(`Invalid text max-age: ${config.cache.textMaxAge}. Must be an integer.`);
  }

  if (!Object.values(CacheVisibility).includes(config.cache.visibility)) {
    errors.push(`Invalid cache visibility: ${config.cache.visibility}. Must be public or private.`);
  }

  const { minSavedBytes, minSavedPercent } = config.thresholds;
  if (!(minSavedBytes >= 0) || !(minSavedPercent >= 0)) {
    errors.push('Size thresholds must be non-negative numbers.');
  }

  if (!Object.values(config.checks).some(Boolean)) {
    errors.push('Every check is disabled; there is nothing to do.');
  }

  return errors;
}

/**
 * Throw a ConfigurationError if the configuration is not usable
 */
export function assertValidConfig(config: TidyConfig): TidyConfig {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }
  return config;
}
