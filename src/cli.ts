#!/usr/bin/env node

/**
 * forgeport CLI
 *
 * Transfer GitLab project metadata into a GitHub repository.
 *
 * Usage:
 *   forgeport transfer --project group/app --repo owner/app          Full transfer
 *   forgeport transfer --project group/app --repo owner/app --dry-run Validate, export, map users
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { transferCommand } from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command();

program
  .name('forgeport')
  .description('Transfer issues, comments, labels and milestones from GitLab to GitHub.')
  .version(version);

// ─── forgeport transfer ──────────────────────────────────────

program
  .command('transfer')
  .description('Transfer metadata from a GitLab project to a GitHub repository')
  .option('--gitlab-url <url>', 'GitLab instance URL (default: https://gitlab.com)')
  .option('-p, --project <project>', 'GitLab project URL or group/project path')
  .option('-r, --repo <repo>', 'GitHub repository (owner/repo)')
  .option('-o, --export-dir <dir>', 'Directory for the snapshot, user mapping and reports')
  .option('-c, --config <file>', 'Config file (default: ./forgeport.config.json)')
  .option('--dry-run', 'Validate, export and map users without writing to GitHub')
  .option('--fresh', 'Re-export even when a snapshot for this project pair exists')
  .option('--allow-name-mismatch', 'Continue when the project and repository names look unrelated')
  .option('--auto-resolve <mode>', 'Find GitHub users automatically: off, email, email+username')
  .option('-y, --yes', 'Skip confirmation prompts')
  .option('--no-color', 'Disable colorized output')
  .option('-v, --verbose', 'Show every transferred entity')
  .action(transferCommand);

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
