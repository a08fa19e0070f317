/**
 * Transfer Orchestrator Tests
 *
 * End-to-end runs over in-memory doubles.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';

import { TransferOrchestrator } from '../orchestrator.js';
import { RateLimiter } from '../rate-limiter.js';
import { FakeClock, MemorySink, MemorySource } from '../testing/index.js';
import { NotFoundError, TransferCancelledError, ValidationMismatchError } from '../errors.js';
import { TransferStore } from '../store.js';
import type { TransferEvent } from '../types.js';
import { defaultConfig, type TransferConfig } from '../../config.js';
import { ALICE, BOB, PROJECT, bobRef, makeTempDir, sourceComment, sourceIssue } from './fixtures.js';

/** A sink whose quota is nearly spent when refreshed */
class ThrottledSink extends MemorySink {
  readonly limiter: RateLimiter;
  private readonly clock: FakeClock;

  constructor(clock: FakeClock) {
    super();
    this.clock = clock;
    this.limiter = new RateLimiter({}, clock);
  }

  async refreshQuota(): Promise<void> {
    await super.refreshQuota();
    this.limiter.update({ remaining: 1, resetAt: this.clock.now() + 1000 });
    await this.limiter.acquire();
  }
}

describe('TransferOrchestrator', () => {
  let dir: string;
  let config: TransferConfig;
  let source: MemorySource;
  let sink: MemorySink;
  let clock: FakeClock;

  beforeEach(async () => {
    dir = await makeTempDir('orchestrator');
    config = { ...defaultConfig(), exportDir: dir };
    clock = new FakeClock();
    source = new MemorySource({
      project: PROJECT,
      labels: [{ name: 'bug', color: 'd73a4a', description: '' }],
      issues: [sourceIssue(1, { state: 'closed', labels: ['bug'], comments: [sourceComment(1, 0, bobRef)] })],
      users: [ALICE, BOB],
    });
    sink = new MemorySink();
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  function orchestrator(signal?: AbortSignal) {
    return new TransferOrchestrator(config, { source, sink, clock, signal });
  }

  const request = { sourceProject: 'acme/widget', destinationRepo: 'acme/widget' };

  it('runs every stage and imports the snapshot', async () => {
    const events: TransferEvent[] = [];
    const transfer = orchestrator();
    transfer.on((event) => events.push(event));

    const summary = await transfer.transfer(request);

    expect(summary.phase).toBe('complete');
    expect(events.filter((event) => event.type === 'stage:start').map((event) => event.stage)).toEqual([
      'validating',
      'exporting',
      'reconciling',
      'importing',
    ]);
    expect(summary.exported).toEqual({ issues: 1, comments: 1, mergeRequests: 0, labels: 1, milestones: 0, identities: 2 });
    expect(summary.imported?.counts.issue).toEqual({ created: 1, skipped: 0, failed: 0 });
    expect(summary.imported?.counts['issue-state']).toEqual({ created: 1, skipped: 0, failed: 0 });
    expect(sink.issues[0]?.state).toBe('closed');
    expect(summary.files.importSummary).toBe(new TransferStore(dir).path('importSummary'));
    expect(transfer.getState().phase).toBe('complete');
  });

  it('refreshes the destination quota before importing', async () => {
    await orchestrator().transfer(request);

    const methods = sink.calls.map((call) => call.method);
    expect(methods.indexOf('refreshQuota')).toBeLessThan(methods.indexOf('ensureLabel'));
  });

  it('never writes to the destination on a dry run', async () => {
    const transfer = orchestrator();

    const summary = await transfer.transfer({ ...request, dryRun: true });

    expect(summary.phase).toBe('dry-run');
    expect(summary.imported).toBeUndefined();
    expect(sink.writes).toEqual([]);
    expect(new TransferStore(dir).exists('mapping')).toBe(true);
    expect(transfer.getState().phase).toBe('dry-run');
  });

  it('reuses the snapshot for the same project pair', async () => {
    await orchestrator().transfer({ ...request, dryRun: true });

    const summary = await orchestrator().transfer(request);

    expect(summary.snapshotReused).toBe(true);
    expect(source.calls.filter((call) => call === 'listLabels')).toHaveLength(1);
  });

  it('re-exports when reuse is declined or a fresh export is requested', async () => {
    await orchestrator().transfer({ ...request, dryRun: true });
    const confirmReuse = vi.fn().mockResolvedValue(false);

    const declined = await orchestrator().transfer({ ...request, dryRun: true, confirmReuse });
    const fresh = await orchestrator().transfer({ ...request, dryRun: true, fresh: true, confirmReuse });

    expect(declined.snapshotReused).toBe(false);
    expect(fresh.snapshotReused).toBe(false);
    expect(confirmReuse).toHaveBeenCalledTimes(1);
    expect(source.calls.filter((call) => call === 'listLabels')).toHaveLength(3);
  });

  it('makes no writes when the transfer is repeated', async () => {
    await orchestrator().transfer(request);
    const writes = sink.writes.length;

    const summary = await orchestrator().transfer(request);

    expect(sink.writes).toHaveLength(writes);
    expect(summary.imported?.counts.issue).toEqual({ created: 0, skipped: 1, failed: 0 });
  });

  it('stops before exporting when the names do not match', async () => {
    sink = new MemorySink({ fullName: 'acme/billing-service' });
    const transfer = orchestrator();

    await expect(transfer.transfer({ ...request, destinationRepo: 'acme/billing-service' })).rejects.toBeInstanceOf(
      ValidationMismatchError,
    );
    expect(transfer.getState().phase).toBe('failed');
    expect(source.calls).not.toContain('listLabels');
    expect(new TransferStore(dir).exists('snapshot')).toBe(false);
  });

  it('carries a tolerated name mismatch as a warning', async () => {
    config = { ...config, allowNameMismatch: true };
    sink = new MemorySink({ fullName: 'acme/billing-service' });

    const summary = await orchestrator().transfer({ ...request, destinationRepo: 'acme/billing-service', dryRun: true });

    expect(summary.warnings).toEqual(['Project names differ: "Widget" (GitLab) vs "billing-service" (GitHub)']);
  });

  it('fails with not found when the repository is missing', async () => {
    const failure = orchestrator().transfer({ ...request, destinationRepo: 'acme/nope' });

    await expect(failure).rejects.toBeInstanceOf(NotFoundError);
    await expect(failure).rejects.toThrow('GitHub repository acme/nope not found: GET /repos/acme/nope → 404: Not Found');
  });

  it('reports cancellation as its own phase', async () => {
    const controller = new AbortController();
    controller.abort();
    const transfer = orchestrator(controller.signal);
    const events: TransferEvent[] = [];
    transfer.on((event) => events.push(event));

    await expect(transfer.transfer(request)).rejects.toBeInstanceOf(TransferCancelledError);

    expect(transfer.getState()).toMatchObject({ phase: 'cancelled', error: 'Transfer cancelled' });
    expect(events.at(-1)?.type).toBe('error');
  });

  it('hands the cancellation signal to the platform clients it builds', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();
    controller.abort();
    const platforms = {
      gitlab: { url: 'https://gitlab.example.com', token: 'test-token' },
      github: { apiUrl: 'https://api.github.com', token: 'test-token' },
    };
    const transfer = TransferOrchestrator.fromConfig({ ...config, ...platforms }, { clock, signal: controller.signal });

    await expect(transfer.transfer(request)).rejects.toBeInstanceOf(TransferCancelledError);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(transfer.getState().phase).toBe('cancelled');
  });

  it('exports again when the stored snapshot is unreadable', async () => {
    const store = new TransferStore(dir);
    await writeFile(store.path('snapshot'), '{"schemaVersion": 1, "labels": [', 'utf-8');

    const summary = await orchestrator().transfer(request);

    expect(summary.snapshotReused).toBe(false);
    expect(source.calls.filter((call) => call === 'listLabels')).toHaveLength(1);
    expect(summary.warnings).toHaveLength(1);
    expect(summary.warnings[0]).toMatch(/^Existing snapshot rejected, exporting again: .+ is not valid JSON: /);
    await expect(store.readSnapshot()).resolves.toMatchObject({ source: PROJECT });
  });

  it('keeps going when an event handler throws', async () => {
    const transfer = orchestrator();
    transfer.on(() => {
      throw new Error('handler broke');
    });

    await expect(transfer.transfer(request)).resolves.toMatchObject({ phase: 'complete' });
  });

  it('stops delivering events after unsubscribe', async () => {
    const transfer = orchestrator();
    const handler = vi.fn();
    const off = transfer.on(handler);
    off();

    await transfer.transfer({ ...request, dryRun: true });

    expect(handler).not.toHaveBeenCalled();
  });

  it('surfaces rate-limit waits as warning events', async () => {
    sink = new ThrottledSink(clock);
    const events: TransferEvent[] = [];
    const transfer = orchestrator();
    transfer.on((event) => events.push(event));

    const summary = await transfer.transfer(request);

    expect(events).toContainEqual({
      type: 'warning',
      stage: 'importing',
      message: 'GitHub rate limit low (1 requests left), waiting 11s for reset',
    });
    expect(summary.warnings).toEqual([]);
  });
});
