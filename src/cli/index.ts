#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { assertValidConfig, loadConfig } from '../config';
import { startServer } from '../api';
import { ConfigurationError, ConsoleLogger, createPipeline } from '../core';
import { ScanProgress } from '../core/pipeline';
import { ScanTarget } from '../types';
import { CliOptions, CliSettings, applyCliOptions, parseTarget } from './options';
import { renderReport } from './report';

const PROGRESS_EVERY = 100;

const program = new Command();

program
  .name('s3-tidy')
  .description('Check and fix Content-Type, Cache-Control and compression of objects in S3 buckets')
  .version('1.0.0')
  .argument('<targets...>', 'bucket or bucket/prefix to scan')
  .option('--access-key <key>', 'access key id (default: AWS credential chain)')
  .option('--secret-key <key>', 'secret access key')
  .option('--region <region>', 'bucket region')
  .option('--endpoint <url>', 'endpoint of an S3-compatible store')
  .option('--path-style', 'use path-style bucket addressing')
  .option('-d, --dry-run', 'report problems without changing anything')
  .option('-i, --image-max-age <seconds>', 'Cache-Control max-age for images (jpg/png/gif), negative for no-cache')
  .option('-t, --text-max-age <seconds>', 'Cache-Control max-age for text (html/css/js/json), negative for no-cache')
  .option('-p, --cache-private', 'set Cache-Control: private instead of public')
  .option('--no-cache-control-check', 'disable Cache-Control check and optimisation')
  .option('--no-content-type-check', 'disable Content-Type check and optimisation')
  .option('--no-image-optimise', 'disable JPEG and PNG optimisation')
  .option('--gzip', 'store text content gzip-encoded when it saves enough')
  .option('-q, --max-jpeg-quality <quality>', 'lossy JPEG compression down to this quality (0-100)')
  .option('-c, --concurrency <workers>', 'number of objects processed in parallel')
  .option('--config <path>', 'YAML config file')
  .option('--status-port <port>', 'serve live scan status over HTTP on this port')
  .option('-v, --verbose', 'verbose logging')
  .option('--debug', 'debug logging')
  .action(async (targets: string[], options: CliOptions) => {
    let settings: CliSettings;
    let scanTargets: ScanTarget[];
    try {
      settings = applyCliOptions(loadConfig({ configPath: options.config }), options);
      assertValidConfig(settings.config);
      scanTargets = targets.map(parseTarget);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.error(chalk.red(error.message));
        process.exitCode = 1;
        return;
      }
      throw error;
    }

    await scan(scanTargets, settings);
  });

async function scan(targets: ScanTarget[], settings: CliSettings): Promise<void> {
  const { config, statusPort } = settings;
  const logger = new ConsoleLogger(config.verbosity);
  const showProgress = config.verbosity === 'quiet';

  const onProgress = (progress: ScanProgress): void => {
    if (progress.keysScanned % PROGRESS_EVERY === 0) {
      process.stderr.write('.');
    }
  };

  const pipeline = createPipeline(config, {
    logger,
    onProgress: showProgress ? onProgress : undefined,
  });

  const server = statusPort !== undefined ? await startServer(statusPort, pipeline, logger) : undefined;

  try {
    for (const target of targets) {
      if (showProgress) {
        process.stderr.write(`Analysing bucket "${target.bucket}" `);
      }
      const report = await pipeline.run(target);
      if (showProgress) {
        process.stderr.write('\n');
      }
      console.log('');
      renderReport(report).forEach((line) => console.log(line));
      console.log('');
    }
  } finally {
    server?.close();
  }
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`s3-tidy failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`));
  process.exitCode = 1;
});
