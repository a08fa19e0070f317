/**
 * Progress Display
 *
 * Renders transfer events: one ora spinner per stage, entity lines in
 * verbose mode, failures and warnings always.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { ImportEntry, TransferEvent, TransferStage } from '../transfer/index.js';

// ─── Types ───────────────────────────────────────────────────

export interface ProgressDisplayOptions {
  /** Disable colors */
  noColor?: boolean;
  /** Show every entity, not only failures */
  verbose?: boolean;
  /** Where lines are written (defaults to console.log) */
  write?: (line: string) => void;
}

// ─── Stage Icons & Labels ────────────────────────────────────

const STAGE_CONFIG: Record<TransferStage, { icon: string; label: string }> = {
  validating: { icon: '🔎', label: 'Validating' },
  exporting: { icon: '📤', label: 'Exporting from GitLab' },
  reconciling: { icon: '👥', label: 'Reconciling users' },
  importing: { icon: '📥', label: 'Importing to GitHub' },
};

// ─── Progress Display Class ──────────────────────────────────

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private stageStartTime = 0;
  private readonly verbose: boolean;
  private readonly noColor: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ProgressDisplayOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.noColor = options.noColor ?? false;
    this.write = options.write ?? ((line) => console.log(line));
  }

  /**
   * Handle transfer events
   */
  handleEvent = (event: TransferEvent): void => {
    switch (event.type) {
      case 'stage:start':
        if (event.stage) this.startStage(event.stage, event.message);
        break;
      case 'stage:complete':
        if (event.stage) this.completeStage(event.stage, event.message);
        break;
      case 'progress':
        if (event.message) this.updateText(event.message);
        break;
      case 'entity':
        if (event.entry) this.showEntry(event.entry);
        break;
      case 'warning':
        if (event.message) this.log(`${chalk.yellow('⚠')} ${event.message}`);
        break;
      case 'checkpoint':
        if (this.verbose && event.message) this.log(chalk.dim(`  ⟳ ${event.message}`));
        break;
      case 'complete':
        this.stop();
        break;
      case 'error':
        this.failStage(event.error?.message ?? event.message ?? 'Unknown error');
        break;
    }
  };

  startStage(stage: TransferStage, message?: string): void {
    this.spinner?.stop();
    this.stageStartTime = Date.now();

    const config = STAGE_CONFIG[stage];
    this.spinner = ora({
      text: `${config.icon} ${message ?? `${config.label}...`}`,
      color: this.noColor ? undefined : 'cyan',
    }).start();
  }

  completeStage(stage: TransferStage, message?: string): void {
    const elapsed = formatElapsed(Date.now() - this.stageStartTime);
    const config = STAGE_CONFIG[stage];

    if (this.spinner) {
      this.spinner.succeed(`${config.icon} ${message ?? config.label} ${chalk.dim(`(${elapsed})`)}`);
      this.spinner = null;
    }
  }

  failStage(errorMessage: string): void {
    if (this.spinner) {
      this.spinner.fail(`Failed: ${errorMessage}`);
      this.spinner = null;
    }
  }

  updateText(message: string): void {
    if (this.spinner) {
      this.spinner.text = message;
    }
  }

  showEntry(entry: ImportEntry): void {
    if (entry.outcome === 'failed') {
      this.log(`${chalk.red('✗')} ${formatEntry(entry)}`);
    } else if (this.verbose) {
      const symbol = entry.outcome === 'created' ? chalk.green('✓') : chalk.dim('–');
      this.log(`${symbol} ${formatEntry(entry)}`);
    } else {
      this.updateText(`${entry.kind} ${entry.key}`);
    }
  }

  /**
   * Log a message (preserving spinner)
   */
  log(message: string): void {
    if (this.spinner) {
      this.spinner.stop();
      this.write(message);
      this.spinner.start();
    } else {
      this.write(message);
    }
  }

  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────

export function formatEntry(entry: ImportEntry): string {
  const target = entry.destinationId !== undefined ? ` → ${entry.destinationId}` : '';
  const reason = entry.reason ? chalk.dim(` (${entry.reason})`) : '';
  return `${entry.kind} ${entry.key}${target}${reason}`;
}

export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Show a success message with checkmark
 */
export function success(message: string): void {
  console.log(chalk.green('✓') + ' ' + message);
}

export function warning(message: string): void {
  console.log(chalk.yellow('⚠') + ' ' + message);
}

export function error(message: string): void {
  console.log(chalk.red('✗') + ' ' + message);
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ') + ' ' + message);
}
