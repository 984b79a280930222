import * as fs from 'fs';
import * as os from 'os';
import { loadConfig, getDefaultConfig, validateConfig, assertValidConfig, mergeConfig } from './index';
import { ConfigurationError } from '../core/errors';
import { CacheVisibility } from '../types';

// Mock fs module
jest.mock('fs');

describe('config', () => {
  beforeEach(() => {
    jest.resetAllMocks();
    delete process.env.S3TIDY_CONFIG;
  });

  describe('getDefaultConfig', () => {
    it('should return default configuration', () => {
      const config = getDefaultConfig();

      expect(config.dryRun).toBe(false);
      expect(config.concurrency).toBe(os.availableParallelism());
      expect(config.checks).toEqual({ contentType: true, cacheControl: true, imageOptimisation: true, gzip: false });
      expect(config.cache).toEqual({ visibility: CacheVisibility.Public, imageMaxAge: 604800, textMaxAge: 86400 });
      expect(config.thresholds).toEqual({ minSavedBytes: 1000, minSavedPercent: 10 });
    });

    it('should return independent copies', () => {
      const config = getDefaultConfig();
      config.checks.gzip = true;

      expect(getDefaultConfig().checks.gzip).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no file exists', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);

      const config = loadConfig({ basePath: '/some/path' });

      expect(config).toEqual(getDefaultConfig());
    });

    it('should load and merge config from file', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p.endsWith('.s3tidy/config.yml'));
      (fs.readFileSync as jest.Mock).mockReturnValue(`
dryRun: true
cache:
  imageMaxAge: 3600
checks:
  gzip: true
`);

      const config = loadConfig({ basePath: '/some/path' });

      expect(fs.readFileSync).toHaveBeenCalledWith('/some/path/.s3tidy/config.yml', 'utf-8');
      expect(config.dryRun).toBe(true);
      expect(config.cache).toEqual({ visibility: CacheVisibility.Public, imageMaxAge: 3600, textMaxAge: 86400 });
      expect(config.checks.gzip).toBe(true);
      expect(config.checks.contentType).toBe(true);
    });

    it('should treat an empty file as no settings', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue('');

      expect(loadConfig({ basePath: '/some/path' })).toEqual(getDefaultConfig());
    });

    it('should read the file named by S3TIDY_CONFIG', () => {
      process.env.S3TIDY_CONFIG = 'ci/tidy.yml';
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue('concurrency: 2\n');

      const config = loadConfig({ basePath: '/some/path' });

      expect(fs.readFileSync).toHaveBeenCalledWith('/some/path/ci/tidy.yml', 'utf-8');
      expect(config.concurrency).toBe(2);
    });

    it('should fail on a missing explicit file', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(false);

      expect(() => loadConfig({ configPath: 'custom.yml', basePath: '/some/path' })).toThrow(
        'Config file not found: /some/path/custom.yml'
      );
    });

    it('should fail on a parse error', () => {
      (fs.existsSync as jest.Mock).mockReturnValue(true);
      (fs.readFileSync as jest.Mock).mockReturnValue('invalid: yaml: content: [');

      expect(() => loadConfig({ basePath: '/some/path' })).toThrow(ConfigurationError);
    });

    it('should list every schema violation', () => {
      (fs.existsSync as jest.Mock).mockImplementation((p: string) => p.endsWith('.s3tidy/config.yml'));
      (fs.readFileSync as jest.Mock).mockReturnValue('concurrency: many\ncache:\n  visibility: shared\n');

      let problems: string[] = [];
      try {
        loadConfig({ basePath: '/some/path' });
      } catch (error) {
        if (error instanceof ConfigurationError) problems = error.problems;
      }

      expect(problems).toEqual([
        '/some/path/.s3tidy/config.yml: /concurrency must be integer',
        '/some/path/.s3tidy/config.yml: /cache/visibility must be equal to one of the allowed values',
      ]);
    });
  });

  describe('mergeConfig', () => {
    it('should merge section by section', () => {
      const merged = mergeConfig(getDefaultConfig(), { store: { region: 'eu-west-1' }, tools: { optipng: '/usr/bin/optipng' } });

      expect(merged.store).toEqual({ forcePathStyle: false, preserveAcl: true, region: 'eu-west-1' });
      expect(merged.tools).toEqual({ jpegoptim: 'jpegoptim', optipng: '/usr/bin/optipng' });
    });
  });

  describe('validateConfig', () => {
    it('should validate correct config', () => {
      expect(validateConfig(getDefaultConfig())).toHaveLength(0);
    });

    it('should detect out-of-range values', () => {
      const config = getDefaultConfig();
      config.concurrency = 0;
      config.images.maxJpegQuality = 101;
      config.thresholds.minSavedBytes = -1;

      expect(validateConfig(config)).toEqual([
        'Invalid concurrency: 0. Must be a positive integer.',
        'Invalid max JPEG quality: 101. Must be an integer between 0 and 100.',
        'Size thresholds must be non-negative numbers.',
      ]);
    });

    it('should refuse a run with every check disabled', () => {
      const config = getDefaultConfig();
      config.checks = { contentType: false, cacheControl: false, imageOptimisation: false, gzip: false };

      expect(() => assertValidConfig(config)).toThrow('Every check is disabled; there is nothing to do.');
    });
  });
});
