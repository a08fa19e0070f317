/**
 * User Reconciler Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile, rm } from 'node:fs/promises';

import { applyMapping, autoResolve, countIdentities, mergeMapping, reconcile } from '../users.js';
import { TransferStore } from '../store.js';
import { MemorySink } from '../testing/index.js';
import { NotFoundError, TransientApiError } from '../errors.js';
import type { MappingFile, TransferEventHandler } from '../types.js';
import { ALICE, BOB, makeTempDir } from './fixtures.js';

describe('mergeMapping', () => {
  it('creates an empty entry for every identity', () => {
    expect(mergeMapping([ALICE, BOB])).toEqual({
      alice: {
        gitlab_id: 1,
        gitlab_username: 'alice',
        fallback_name: 'Alice Smith',
        email: 'alice@example.com',
        github_username: '',
        github_id: null,
      },
      bob: {
        gitlab_id: 2,
        gitlab_username: 'bob',
        fallback_name: 'Bob Jones',
        email: null,
        github_username: '',
        github_id: null,
      },
    });
  });

  it('keeps manual usernames, matching by username or id', () => {
    const prior: MappingFile = {
      alice: {
        gitlab_id: 1,
        gitlab_username: 'alice',
        fallback_name: 'Alice',
        email: null,
        github_username: ' asmith ',
        github_id: 55,
      },
      robert: {
        gitlab_id: 2,
        gitlab_username: 'robert',
        fallback_name: 'Bob Jones',
        email: 'bob@example.com',
        github_username: 'bobby',
        github_id: null,
      },
    };

    const merged = mergeMapping([ALICE, BOB], prior);

    expect(Object.keys(merged)).toEqual(['alice', 'bob']);
    expect(merged.alice?.github_username).toBe('asmith');
    expect(merged.alice?.github_id).toBe(55);
    expect(merged.bob?.github_username).toBe('bobby');
    expect(merged.bob?.email).toBe('bob@example.com');
  });

  it('keeps entries for users no longer referenced', () => {
    const prior: MappingFile = {
      olduser: {
        gitlab_id: 9,
        gitlab_username: 'olduser',
        fallback_name: 'Old User',
        email: null,
        github_username: 'old-gh',
        github_id: 90,
      },
    };

    expect(mergeMapping([ALICE], prior).olduser).toEqual(prior.olduser);
  });
});

describe('autoResolve', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = new MemorySink();
    sink.users.push({ username: 'alice-gh', id: 501, email: 'alice@example.com' }, { username: 'bob', id: 502 });
  });

  it('does nothing when turned off', async () => {
    const mapping = mergeMapping([ALICE, BOB]);

    const result = await autoResolve(mapping, sink, 'off');

    expect(result.mapping).toEqual(mapping);
    expect(result.resolved).toBe(0);
    expect(sink.calls).toEqual([]);
  });

  it('matches by email', async () => {
    const result = await autoResolve(mergeMapping([ALICE, BOB]), sink, 'email');

    expect(result.mapping.alice?.github_username).toBe('alice-gh');
    expect(result.mapping.alice?.github_id).toBe(501);
    expect(result.mapping.bob?.github_username).toBe('');
    expect(result.resolved).toBe(1);
    expect(sink.calls).toEqual([{ method: 'findUser', key: 'alice@example.com' }]);
  });

  it('falls back to the same username when asked to', async () => {
    const result = await autoResolve(mergeMapping([ALICE, BOB]), sink, 'email+username');

    expect(result.mapping.bob?.github_username).toBe('bob');
    expect(result.mapping.bob?.github_id).toBe(502);
    expect(result.resolved).toBe(2);
  });

  it('never overwrites a manual username but fills its id', async () => {
    sink.users.push({ username: 'asmith', id: 77 });
    const mapping = mergeMapping([ALICE]);
    mapping.alice = { ...mapping.alice, github_username: 'asmith' };

    const result = await autoResolve(mapping, sink, 'email+username');

    expect(result.mapping.alice?.github_username).toBe('asmith');
    expect(result.mapping.alice?.github_id).toBe(77);
    expect(result.resolved).toBe(0);
  });

  it('turns lookup failures into warnings', async () => {
    sink.fail('findUser', new TransientApiError('GET /search/users → 503: unavailable'));
    const report = vi.fn<TransferEventHandler>();

    const result = await autoResolve(mergeMapping([ALICE, BOB]), sink, 'email', { report });

    expect(result.warnings).toEqual(['Could not resolve alice on GitHub: GET /search/users → 503: unavailable']);
    expect(result.mapping.alice?.github_username).toBe('');
    expect(report).toHaveBeenCalledTimes(1);
  });

  it('treats not found as no match', async () => {
    sink.fail('findUser', new NotFoundError('GET /users/bob → 404: Not Found'));

    const result = await autoResolve(mergeMapping([BOB]), sink, 'email+username');

    expect(result.warnings).toEqual([]);
    expect(result.resolved).toBe(0);
  });
});

describe('applyMapping', () => {
  it('sets destination fields only for mapped users', () => {
    const mapping = mergeMapping([ALICE, BOB]);
    mapping.bob = { ...mapping.bob, github_username: 'bobby', github_id: 9 };

    const applied = applyMapping([ALICE, BOB], mapping);

    expect(applied.get(2)).toEqual({ ...BOB, destinationUsername: 'bobby', destinationId: 9 });
    expect(applied.get(1)?.destinationUsername).toBeUndefined();
    expect(countIdentities(applied.values())).toEqual({ total: 2, mapped: 1, unmapped: 1 });
  });
});

describe('reconcile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('users');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('merges with the mapping on disk and writes it back', async () => {
    const store = new TransferStore(dir);
    const prior = mergeMapping([BOB]);
    prior.bob = { ...prior.bob, github_username: 'bobby' };
    await store.writeMapping(prior);
    const report = vi.fn<TransferEventHandler>();

    const result = await reconcile(store, [ALICE, BOB], { sink: new MemorySink(), mode: 'off', report });

    expect(result.path).toBe(store.path('mapping'));
    expect(result.counts).toEqual({ total: 2, mapped: 1, unmapped: 1 });
    expect(JSON.parse(await readFile(result.path, 'utf-8'))).toEqual(result.mapping);
    expect(report).toHaveBeenCalledWith({
      type: 'progress',
      stage: 'reconciling',
      message: '1/2 users mapped (0 auto-resolved)',
    });
  });
});
