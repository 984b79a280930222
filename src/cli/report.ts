import chalk from 'chalk';
import { ScanReport, VerdictStatus } from '../types';

/**
 * Lines printed after a target has been scanned
 */
export function renderReport(report: ScanReport, paint: chalk.Chalk = chalk): string[] {
  const colour: Record<VerdictStatus, chalk.Chalk> = {
    ok: paint.green,
    changed: paint.yellow,
    problem: paint.red,
  };
  const target = report.prefix ? `${report.bucket}/${report.prefix}` : report.bucket;
  const lines = [`=== ${target}${report.dryRun ? ' (dry run)' : ''} ===`];

  lines.push(
    `Keys scanned: ${report.keysScanned}${report.keysFailed > 0 ? ` (${report.keysFailed} failed)` : ''}`
  );
  lines.push(`Duration:     ${(report.durationMs / 1000).toFixed(1)}s`);
  if (report.aborted) {
    lines.push(paint.red(`Listing aborted: ${report.aborted}`));
  }

  for (const summary of report.analysers) {
    lines.push(colour[summary.verdict.status](`[${summary.name}] ${summary.verdict.message}`));
  }
  return lines;
}
