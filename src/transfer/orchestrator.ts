/**
 * Transfer Orchestrator
 *
 * Coordinates one metadata transfer:
 * Validate → Export → Reconcile users → Import
 *
 * Features:
 * - Snapshot reuse across runs for the same project pair
 * - Resume through the Transfer Record
 * - Dry run (everything but Import)
 * - Cancellation between entities
 */

import type { TransferConfig } from '../config.js';
import type {
  DestinationRepository,
  MetadataSink,
  MetadataSource,
  Snapshot,
  SourceProject,
  TransferEvent,
  TransferEventHandler,
  TransferFiles,
  TransferPhase,
  TransferStage,
  TransferSummary,
} from './types.js';
import { systemClock, type Clock, type RateLimitWait, type RateLimiter } from './rate-limiter.js';
import { NotFoundError, SnapshotIntegrityError, TransferCancelledError, ValidationMismatchError } from './errors.js';
import { TransferStore } from './store.js';
import { Validator } from './validator.js';
import { ExportStage } from './export.js';
import { reconcile } from './users.js';
import { ImportStage } from './import.js';
import { formatImportSummary } from './reports.js';
import { getSource } from './sources/registry.js';
import { getSink } from './sinks/registry.js';

// ─── Types ───────────────────────────────────────────────────

export interface TransferOrchestratorDeps {
  source: MetadataSource;
  sink: MetadataSink;
  clock?: Clock;
  signal?: AbortSignal;
}

export interface TransferRequest {
  /** GitLab project URL or path */
  sourceProject: string;
  /** GitHub owner/repo */
  destinationRepo: string;
  /** Overrides the configured export directory */
  exportDir?: string;
  dryRun?: boolean;
  /** Re-export even when a snapshot for this pair exists */
  fresh?: boolean;
  /** Asked before an existing snapshot is reused; reuse when omitted */
  confirmReuse?: (snapshot: Snapshot) => boolean | Promise<boolean>;
}

export interface TransferState {
  phase: TransferPhase;
  startedAt?: string;
  completedAt?: string;
  error?: string;
}

const PLATFORM_NAMES = { gitlab: 'GitLab', github: 'GitHub' } as const;

// ─── Orchestrator ────────────────────────────────────────────

export class TransferOrchestrator {
  private readonly config: TransferConfig;
  private readonly source: MetadataSource;
  private readonly sink: MetadataSink;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;
  private eventHandlers: TransferEventHandler[] = [];
  private state: TransferState = { phase: 'pending' };

  constructor(config: TransferConfig, deps: TransferOrchestratorDeps) {
    this.config = config;
    this.source = deps.source;
    this.sink = deps.sink;
    this.clock = deps.clock ?? systemClock;
    this.signal = deps.signal;
  }

  /**
   * Build the GitLab source and GitHub sink from configuration.
   */
  static fromConfig(config: TransferConfig, options: { clock?: Clock; signal?: AbortSignal } = {}): TransferOrchestrator {
    const source = getSource('gitlab', {
      url: config.gitlab.url,
      token: config.gitlab.token,
      rateLimit: config.rateLimit,
      clock: options.clock,
      signal: options.signal,
    });
    const sink = getSink('github', {
      apiUrl: config.github.apiUrl,
      token: config.github.token,
      rateLimit: config.rateLimit,
      clock: options.clock,
      signal: options.signal,
    });
    if (!source || !sink) {
      throw new Error('No GitLab source or GitHub sink registered');
    }
    return new TransferOrchestrator(config, { source, sink, ...options });
  }

  // ─── Public API ────────────────────────────────────────────

  /**
   * Subscribe to transfer events. Returns an unsubscribe function.
   */
  on(handler: TransferEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
    };
  }

  getState(): TransferState {
    return { ...this.state };
  }

  async transfer(request: TransferRequest): Promise<TransferSummary> {
    const dryRun = request.dryRun ?? false;
    const store = new TransferStore(request.exportDir ?? this.config.exportDir);
    const warnings: string[] = [];
    const report = (event: TransferEvent): void => {
      if (event.type === 'warning' && event.message) warnings.push(event.message);
      this.emit(event);
    };

    this.state = { phase: 'pending', startedAt: this.timestamp() };
    const unwatch = this.watchLimiters();

    try {
      // Stage 1: Validate
      this.startStage('validating');
      const validator = new Validator(this.source, this.sink, { allowNameMismatch: this.config.allowNameMismatch });
      const validation = await validator.validate(request.sourceProject, request.destinationRepo);
      for (const check of validation.checks) {
        if (check.status === 'warn') report({ type: 'warning', stage: 'validating', message: check.detail });
      }
      const { source, destination } = validation;
      if (!source || !destination) {
        throw new NotFoundError(validation.reasons.join('; '));
      }
      if (!validation.passed) {
        throw new ValidationMismatchError(validation.reasons);
      }
      this.completeStage('validating', `${source.pathWithNamespace} → ${destination.fullName}`);

      // Stage 2: Export (or reuse)
      this.startStage('exporting');
      let snapshot = request.fresh ? null : await this.reusableSnapshot(store, source, destination, request, report);
      const snapshotReused = snapshot !== null;
      if (snapshot) {
        this.completeStage('exporting', `Reusing snapshot exported ${snapshot.exportedAt}`);
      } else {
        snapshot = await new ExportStage(this.source, store, { clock: this.clock, report, signal: this.signal }).run(
          source,
          destination,
        );
        this.completeStage('exporting', `Exported ${snapshot.issues.length} issues`);
      }

      // Stage 3: Reconcile users
      this.startStage('reconciling');
      const users = await reconcile(store, snapshot.identities, {
        sink: this.sink,
        mode: this.config.autoResolve,
        signal: this.signal,
        report,
      });
      this.completeStage('reconciling', `${users.counts.mapped}/${users.counts.total} users mapped`);

      const files: TransferFiles = {
        snapshot: store.path('snapshot'),
        mapping: users.path,
        record: store.path('record'),
        exportSummary: store.path('exportSummary'),
        mergeRequests: store.path('mergeRequests'),
      };
      const summary: TransferSummary = {
        phase: 'dry-run',
        dryRun,
        source,
        destination,
        exportDir: store.dir,
        snapshotReused,
        validation,
        exported: {
          issues: snapshot.issues.length,
          comments: snapshot.issues.reduce((sum, issue) => sum + issue.comments.length, 0),
          mergeRequests: snapshot.mergeRequests.length,
          labels: snapshot.labels.length,
          milestones: snapshot.milestones.length,
          identities: snapshot.identities.length,
        },
        identities: users.counts,
        files,
        warnings,
      };

      if (dryRun) {
        return this.finish('dry-run', summary);
      }

      // Stage 4: Import
      this.startStage('importing');
      await this.sink.refreshQuota();
      const record = await store.loadRecord(source, destination, this.timestamp());
      const imported = await new ImportStage(this.sink, store, {
        clock: this.clock,
        report,
        signal: this.signal,
      }).run(snapshot, users.identities, record, destination);

      files.importSummary = await store.writeText(
        'importSummary',
        formatImportSummary(destination, imported, this.timestamp()),
      );
      const failed = Object.values(imported.counts).reduce((sum, counts) => sum + counts.failed, 0);
      this.completeStage('importing', `${imported.entries.length} entities processed, ${failed} failed`);

      return this.finish('complete', { ...summary, phase: 'complete', imported });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.state = {
        ...this.state,
        phase: error instanceof TransferCancelledError ? 'cancelled' : 'failed',
        error: err.message,
      };
      this.emit({ type: 'error', error: err, message: err.message });
      throw error;
    } finally {
      unwatch();
    }
  }

  // ─── Internals ─────────────────────────────────────────────

  private async reusableSnapshot(
    store: TransferStore,
    source: SourceProject,
    destination: DestinationRepository,
    request: TransferRequest,
    report: TransferEventHandler,
  ): Promise<Snapshot | null> {
    let existing: Snapshot | null;
    try {
      existing = await store.readSnapshot();
    } catch (err) {
      if (!(err instanceof SnapshotIntegrityError)) throw err;
      report({
        type: 'warning',
        stage: 'exporting',
        message: `Existing snapshot rejected, exporting again: ${err.message}`,
      });
      return null;
    }
    if (!existing || existing.source.id !== source.id || existing.destination.fullName !== destination.fullName) {
      return null;
    }
    const reuse = request.confirmReuse ? await request.confirmReuse(existing) : true;
    return reuse ? existing : null;
  }

  private finish(phase: 'complete' | 'dry-run', summary: TransferSummary): TransferSummary {
    this.state = { ...this.state, phase, completedAt: this.timestamp() };
    this.emit({
      type: 'complete',
      message: phase === 'dry-run' ? 'Dry run complete; nothing was written to GitHub' : 'Transfer complete',
    });
    return summary;
  }

  /**
   * Surface rate-limit waits as warnings.
   */
  private watchLimiters(): () => void {
    const watched: Array<[string, RateLimiter | undefined]> = [
      [PLATFORM_NAMES[this.source.platform], this.source.limiter],
      [PLATFORM_NAMES[this.sink.platform], this.sink.limiter],
    ];
    const unsubscribers = watched.map(([platform, limiter]) => {
      if (!limiter) return () => undefined;
      return limiter.onWait((wait) => {
        this.emit({ type: 'warning', stage: this.currentStage(), message: describeWait(platform, wait) });
      });
    });
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  private currentStage(): TransferStage | undefined {
    const { phase } = this.state;
    return phase === 'validating' || phase === 'exporting' || phase === 'reconciling' || phase === 'importing'
      ? phase
      : undefined;
  }

  private startStage(stage: TransferStage): void {
    this.state = { ...this.state, phase: stage };
    this.emit({ type: 'stage:start', stage });
  }

  private completeStage(stage: TransferStage, message: string): void {
    this.emit({ type: 'stage:complete', stage, message });
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }

  private emit(event: TransferEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch {
        // Handler errors must not break the transfer
      }
    }
  }
}

function describeWait(platform: string, wait: RateLimitWait): string {
  const seconds = Math.ceil(wait.waitMs / 1000);
  if (wait.reason === 'quota') {
    return `${platform} rate limit low (${wait.remaining ?? 0} requests left), waiting ${seconds}s for reset`;
  }
  const cause = wait.error ? `: ${wait.error.message}` : '';
  return `${platform} request failed (attempt ${wait.attempt ?? 0})${cause}; retrying in ${seconds}s`;
}
