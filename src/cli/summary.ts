/**
 * Transfer Summary Display
 *
 * Formats the final report of a transfer or dry run.
 */

import chalk from 'chalk';
import type { EntityKind, TransferSummary, ValidationCheck } from '../transfer/index.js';

// ─── Types ───────────────────────────────────────────────────

export interface SummaryOptions {
  /** Where lines are written (defaults to console.log) */
  write?: (line: string) => void;
}

const KIND_NAMES: Array<[EntityKind, string]> = [
  ['label', 'Labels'],
  ['milestone', 'Milestones'],
  ['issue', 'Issues'],
  ['comment', 'Comments'],
  ['issue-state', 'Closed issues'],
];

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';

// ─── Summary Functions ───────────────────────────────────────

export function formatCheck(check: ValidationCheck): string {
  const symbol = check.status === 'pass' ? chalk.green('✓') : check.status === 'warn' ? chalk.yellow('⚠') : chalk.red('✗');
  return `${symbol} ${check.detail}`;
}

/**
 * Lines of the final report, without trailing blank line.
 */
export function summaryLines(summary: TransferSummary): string[] {
  const lines: string[] = [];
  const title = summary.dryRun ? '  📋 Dry Run Complete' : '  ✓ Transfer Complete';
  const color = summary.dryRun ? chalk.cyan.bold : chalk.green.bold;

  lines.push('', color(RULE), color(title), color(RULE), '');
  lines.push(`  ${chalk.white('From:')} ${chalk.cyan(summary.source.webUrl)}`);
  lines.push(`  ${chalk.white('To:')}   ${chalk.cyan(summary.destination.htmlUrl)}`);
  lines.push('');

  lines.push(chalk.white.bold('  Validation:'));
  for (const check of summary.validation.checks) {
    lines.push(`    ${formatCheck(check)}`);
  }
  lines.push('');

  const { exported } = summary;
  lines.push(chalk.white.bold(summary.snapshotReused ? '  Snapshot (reused):' : '  Exported:'));
  lines.push(`    ${exported.issues} issues, ${exported.comments} comments`);
  lines.push(`    ${exported.labels} labels, ${exported.milestones} milestones`);
  lines.push(`    ${exported.mergeRequests} closed/merged merge requests (reference only)`);
  lines.push(
    `    ${summary.identities.total} users: ${summary.identities.mapped} mapped, ${summary.identities.unmapped} unmapped`,
  );
  lines.push('');

  if (summary.imported) {
    lines.push(chalk.white.bold('  Imported:'));
    for (const [kind, name] of KIND_NAMES) {
      const counts = summary.imported.counts[kind];
      const failed = counts.failed > 0 ? chalk.red(`${counts.failed} failed`) : `${counts.failed} failed`;
      lines.push(`    ${name}: ${counts.created} created, ${counts.skipped} skipped, ${failed}`);
    }
    lines.push('');
  }

  if (summary.warnings.length > 0) {
    lines.push(chalk.yellow.bold('  Warnings:'));
    for (const message of summary.warnings) {
      lines.push(`    ${chalk.yellow('⚠')} ${message}`);
    }
    lines.push('');
  }

  lines.push(chalk.white.bold('  Files:'));
  lines.push(`    ${summary.files.snapshot}`);
  lines.push(`    ${summary.files.mapping}`);
  lines.push(`    ${summary.files.mergeRequests}`);
  lines.push(`    ${summary.files.exportSummary}`);
  if (summary.files.importSummary) {
    lines.push(`    ${summary.files.importSummary}`);
  }

  if (summary.dryRun) {
    lines.push('');
    lines.push(chalk.cyan('  This was a dry run. Nothing was written to GitHub.'));
    lines.push(chalk.cyan(`  Edit ${summary.files.mapping} to map users, then run again without --dry-run.`));
  } else if (summary.identities.unmapped > 0) {
    lines.push('');
    lines.push(chalk.dim(`  Unmapped users are credited by name; map them in ${summary.files.mapping}.`));
  }

  return lines;
}

export function showTransferSummary(summary: TransferSummary, options: SummaryOptions = {}): void {
  const write = options.write ?? ((line: string) => console.log(line));
  for (const line of summaryLines(summary)) {
    write(line);
  }
  write('');
}

export function showFailedTransfer(message: string, exportDir: string, options: SummaryOptions = {}): void {
  const write = options.write ?? ((line: string) => console.log(line));
  write('');
  write(chalk.red.bold(RULE));
  write(chalk.red.bold('  ✗ Transfer Failed'));
  write(chalk.red.bold(RULE));
  write('');
  write(chalk.red(`  ${message}`));
  write('');
  write(chalk.dim(`  Progress is kept in ${exportDir}; run the same command again to resume.`));
  write('');
}
