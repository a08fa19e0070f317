/**
 * forgeport transfer: GitLab → GitHub metadata transfer
 *
 * Moves issues, comments, labels and milestones from a GitLab project into
 * a GitHub repository that already holds the pushed code.
 *
 * Features:
 * - Prompts for anything not given by flags, config file or environment
 * - --dry-run (validate, export and map users without writing to GitHub)
 * - Resume: re-running the same command continues where it stopped
 * - Confirmation before writing (unless --yes)
 * - Graceful Ctrl+C handling
 * - Colorized output with --no-color fallback
 */

import chalk from 'chalk';
import { loadConfig, type TransferConfig, type TransferConfigInput } from '../config.js';
import { TransferOrchestrator, TransferCancelledError, errorMessage, type AutoResolveMode } from '../transfer/index.js';
import { askRequired, confirm } from '../cli/prompts.js';
import { ProgressDisplay, error, info } from '../cli/progress.js';
import { showFailedTransfer, showTransferSummary } from '../cli/summary.js';
import { setupSignalHandler, cleanupSignalHandler } from '../cli/signal-handler.js';

// ─── Types ───────────────────────────────────────────────────

export interface TransferCommandOptions {
  gitlabUrl?: string;
  project?: string;
  repo?: string;
  exportDir?: string;
  config?: string;
  dryRun?: boolean;
  fresh?: boolean;
  allowNameMismatch?: boolean;
  autoResolve?: string;
  yes?: boolean;
  /** commander sets false for --no-color */
  color?: boolean;
  verbose?: boolean;
}

const AUTO_RESOLVE_MODES: readonly AutoResolveMode[] = ['off', 'email', 'email+username'];

export function parseAutoResolve(value: string | undefined): AutoResolveMode | undefined {
  if (value === undefined) return undefined;
  const mode = AUTO_RESOLVE_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new Error(`Unknown --auto-resolve mode: ${value} (expected ${AUTO_RESOLVE_MODES.join(', ')})`);
  }
  return mode;
}

// ─── Main Command ────────────────────────────────────────────

export async function transferCommand(options: TransferCommandOptions): Promise<void> {
  if (options.color === false) {
    chalk.level = 0;
  }

  showHeader();

  let config: TransferConfig;
  try {
    const overrides: TransferConfigInput = {
      gitlab: { url: options.gitlabUrl },
      exportDir: options.exportDir,
      autoResolve: parseAutoResolve(options.autoResolve),
      allowNameMismatch: options.allowNameMismatch ? true : undefined,
    };
    config = await loadConfig({ file: options.config, overrides });
  } catch (err) {
    error(errorMessage(err));
    process.exitCode = 1;
    return;
  }

  const project = options.project ?? (await askRequired('GitLab project (URL or group/project): '));
  const repo = options.repo ?? (await askRequired('GitHub repository (owner/repo): '));
  if (!config.gitlab.token) {
    config.gitlab.token = await askRequired('GitLab personal access token: ');
  }
  if (!config.github.token) {
    config.github.token = await askRequired('GitHub personal access token: ');
  }

  const dryRun = options.dryRun ?? false;
  showPlan(project, repo, config, dryRun);

  if (!dryRun && !options.yes) {
    const proceed = await confirm('Proceed with the transfer?', true);
    if (!proceed) {
      console.log(chalk.yellow('\nTransfer cancelled.'));
      return;
    }
  }
  console.log();

  await runTransfer(project, repo, config, { ...options, dryRun });
}

// ─── Transfer ────────────────────────────────────────────────

async function runTransfer(
  project: string,
  repo: string,
  config: TransferConfig,
  options: TransferCommandOptions & { dryRun: boolean },
): Promise<void> {
  const progress = new ProgressDisplay({ noColor: options.color === false, verbose: options.verbose });
  const controller = new AbortController();
  const orchestrator = TransferOrchestrator.fromConfig(config, { signal: controller.signal });
  const handler = setupSignalHandler({ controller, orchestrator, exportDir: config.exportDir });
  orchestrator.on(progress.handleEvent);

  try {
    const summary = await orchestrator.transfer({
      sourceProject: project,
      destinationRepo: repo,
      dryRun: options.dryRun,
      fresh: options.fresh,
      confirmReuse: options.yes
        ? undefined
        : (snapshot) => confirm(`Reuse the snapshot exported ${snapshot.exportedAt}?`, true),
    });
    progress.stop();
    showTransferSummary(summary);

    const failed = summary.imported
      ? Object.values(summary.imported.counts).reduce((sum, counts) => sum + counts.failed, 0)
      : 0;
    if (failed > 0) {
      error(`${failed} entities failed; see the import summary, fix the cause and run again to retry them.`);
      process.exitCode = 1;
    }
  } catch (err) {
    progress.stop();
    if (err instanceof TransferCancelledError || handler.interrupted) {
      info(`Transfer stopped. Run the same command again to resume from ${config.exportDir}.`);
      process.exitCode = 130;
    } else {
      showFailedTransfer(errorMessage(err), config.exportDir);
      process.exitCode = 1;
    }
  } finally {
    cleanupSignalHandler();
  }
}

// ─── Display ─────────────────────────────────────────────────

function showHeader(): void {
  console.log();
  console.log(chalk.bold('forgeport') + chalk.dim(' · GitLab → GitHub metadata transfer'));
  console.log();
}

function showPlan(project: string, repo: string, config: TransferConfig, dryRun: boolean): void {
  console.log(chalk.white.bold('Transfer Plan:'));
  console.log();
  console.log(`  ${chalk.cyan('From:')} ${project} ${chalk.dim(`(${config.gitlab.url})`)}`);
  console.log(`  ${chalk.cyan('To:')}   ${repo}`);
  console.log(`  ${chalk.cyan('Data:')} ${config.exportDir}`);
  console.log();
  console.log(`  ${chalk.green('✓')} Labels and milestones`);
  console.log(`  ${chalk.green('✓')} Issues with comments, original authors credited in the text`);
  console.log(`  ${chalk.yellow('⚠')} Merge requests ${chalk.dim('(archived to merge_requests.md, not recreated)')}`);
  if (dryRun) {
    console.log();
    console.log(chalk.cyan('  Dry run: nothing will be written to GitHub.'));
  }
}
