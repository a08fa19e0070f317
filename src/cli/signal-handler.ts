/**
 * Signal Handler
 *
 * Ctrl+C (SIGINT) and SIGTERM abort the running transfer. The pipeline stops
 * at the next entity boundary with the snapshot and Transfer Record intact,
 * so the same command resumes. A second interrupt force-quits.
 */

import chalk from 'chalk';
import type { TransferOrchestrator } from '../transfer/index.js';

// ─── Types ───────────────────────────────────────────────────

export interface SignalHandlerOptions {
  /** Aborted on the first interrupt */
  controller: AbortController;
  /** Orchestrator whose phase is reported on interrupt */
  orchestrator?: TransferOrchestrator;
  /** Export directory named in the resume hint */
  exportDir?: string;
  /** Where lines are written (defaults to console.log) */
  write?: (line: string) => void;
  /** Called on the second interrupt (defaults to process.exit) */
  exit?: (code: number) => void;
}

// ─── Signal Handler Class ────────────────────────────────────

export class SignalHandler {
  private readonly controller: AbortController;
  private readonly orchestrator?: TransferOrchestrator;
  private readonly exportDir?: string;
  private readonly write: (line: string) => void;
  private readonly exit: (code: number) => void;
  private interruptCount = 0;

  constructor(options: SignalHandlerOptions) {
    this.controller = options.controller;
    this.orchestrator = options.orchestrator;
    this.exportDir = options.exportDir;
    this.write = options.write ?? ((line) => console.log(line));
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  get interrupted(): boolean {
    return this.interruptCount > 0;
  }

  register(): void {
    process.on('SIGINT', this.handleInterrupt);
    process.on('SIGTERM', this.handleInterrupt);
  }

  unregister(): void {
    process.off('SIGINT', this.handleInterrupt);
    process.off('SIGTERM', this.handleInterrupt);
  }

  /**
   * Handle SIGINT/SIGTERM
   */
  handleInterrupt = (): void => {
    this.interruptCount++;

    // Force exit on second interrupt
    if (this.interruptCount > 1) {
      this.write('');
      this.write(chalk.red('Force quit.'));
      this.exit(130); // 128 + SIGINT(2)
      return;
    }

    this.write('');
    this.write(chalk.yellow.bold('  ⏸ Transfer interrupted, stopping after the current request...'));
    if (this.orchestrator) {
      this.write(chalk.white(`  Phase: ${this.orchestrator.getState().phase}`));
    }
    if (this.exportDir) {
      this.write(chalk.dim(`  Progress is saved in ${this.exportDir}; run the same command again to resume.`));
    }
    this.write(chalk.dim('  Press Ctrl+C again to force quit.'));

    this.controller.abort();
  };
}

// ─── Convenience Functions ───────────────────────────────────

let globalHandler: SignalHandler | null = null;

/**
 * Setup global signal handling
 */
export function setupSignalHandler(options: SignalHandlerOptions): SignalHandler {
  globalHandler?.unregister();
  globalHandler = new SignalHandler(options);
  globalHandler.register();
  return globalHandler;
}

export function cleanupSignalHandler(): void {
  globalHandler?.unregister();
  globalHandler = null;
}
