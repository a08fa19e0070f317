/**
 * Transfer Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { TransferStore, checkSnapshotIntegrity, createRecord } from '../store.js';
import { SnapshotIntegrityError } from '../errors.js';
import { ALICE, NOW, PROJECT, REPO, makeComment, makeIssue, makeSnapshot, makeTempDir } from './fixtures.js';

describe('checkSnapshotIntegrity', () => {
  it('accepts a snapshot whose references all resolve', () => {
    const snapshot = makeSnapshot({
      issues: [makeIssue(1, { assigneeIds: [2], comments: [makeComment(1, 0, { authorId: 2 })] })],
    });

    expect(() => checkSnapshotIntegrity(snapshot)).not.toThrow();
  });

  it('rejects an issue comment by an unknown identity', () => {
    const snapshot = makeSnapshot({
      issues: [makeIssue(3, { comments: [makeComment(3, 0, { authorId: 99 })] })],
    });

    expect(() => checkSnapshotIntegrity(snapshot)).toThrow('Issue #3 references unknown identity 99');
  });

  it('rejects a merge request with an unknown assignee', () => {
    const snapshot = makeSnapshot({
      identities: [ALICE],
      mergeRequests: [
        {
          ...makeIssue(5, { assigneeIds: [2] }),
          state: 'merged',
          sourceBranch: 'feature',
          targetBranch: 'main',
        },
      ],
    });

    expect(() => checkSnapshotIntegrity(snapshot)).toThrow('Merge request #5 references unknown identity 2');
  });
});

describe('TransferStore', () => {
  let dir: string;
  let store: TransferStore;

  beforeEach(async () => {
    dir = await makeTempDir('store');
    store = new TransferStore(join(dir, 'export'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for files that do not exist yet', async () => {
    expect(await store.readSnapshot()).toBeNull();
    expect(await store.readMapping()).toBeNull();
    expect(store.exists('snapshot')).toBe(false);
  });

  it('writes the snapshot as indented JSON and reads it back', async () => {
    const snapshot = makeSnapshot({ issues: [makeIssue(1)] });

    const path = await store.writeSnapshot(snapshot);

    expect(path).toBe(join(dir, 'export', 'metadata_export.json'));
    expect(await readFile(path, 'utf-8')).toBe(`${JSON.stringify(snapshot, null, 2)}\n`);
    expect(await store.readSnapshot()).toEqual(snapshot);
  });

  it('leaves no temp files behind', async () => {
    await store.writeSnapshot(makeSnapshot());
    await store.writeText('exportSummary', 'summary\n');

    expect((await readdir(store.dir)).sort()).toEqual(['export_summary.txt', 'metadata_export.json']);
  });

  it('refuses to write a snapshot that fails integrity', async () => {
    const snapshot = makeSnapshot({ identities: [], issues: [makeIssue(1)] });

    await expect(store.writeSnapshot(snapshot)).rejects.toBeInstanceOf(SnapshotIntegrityError);
    expect(store.exists('snapshot')).toBe(false);
  });

  it('reports unparseable JSON as a snapshot integrity error', async () => {
    await store.writeText('snapshot', '{ not json');

    await expect(store.readSnapshot()).rejects.toBeInstanceOf(SnapshotIntegrityError);
  });

  it('reports schema violations with their location', async () => {
    await store.writeText('snapshot', JSON.stringify({ ...makeSnapshot(), labels: [{ name: 7 }] }));

    await expect(store.readSnapshot()).rejects.toThrow(/is malformed at labels\.0\.name/);
  });

  it('fills in defaults for a hand-edited mapping file', async () => {
    await store.writeText('mapping', JSON.stringify({ alice: { gitlab_id: 1, gitlab_username: 'alice' } }));

    expect(await store.readMapping()).toEqual({
      alice: {
        gitlab_id: 1,
        gitlab_username: 'alice',
        fallback_name: '',
        email: null,
        github_username: '',
        github_id: null,
      },
    });
  });

  describe('loadRecord', () => {
    it('starts a fresh record when none exists', async () => {
      expect(await store.loadRecord(PROJECT, REPO, NOW)).toEqual(createRecord(PROJECT, REPO, NOW));
    });

    it('returns the stored record for the same project pair', async () => {
      const record = createRecord(PROJECT, REPO, NOW);
      record.labels.bug = 12;
      await store.saveRecord(record);

      expect(await store.loadRecord(PROJECT, REPO, '2025-02-01T00:00:00.000Z')).toEqual(record);
    });

    it('ignores a record that belongs to another destination', async () => {
      const record = createRecord(PROJECT, REPO, NOW);
      record.labels.bug = 12;
      await store.saveRecord(record);

      const other = { ...REPO, fullName: 'acme/other', name: 'other' };
      const loaded = await store.loadRecord(PROJECT, other, NOW);

      expect(loaded.destinationRepo).toBe('acme/other');
      expect(loaded.labels).toEqual({});
    });

    it('rejects a corrupt record instead of starting over', async () => {
      await store.writeText('record', JSON.stringify({ schemaVersion: 2 }));

      await expect(store.loadRecord(PROJECT, REPO, NOW)).rejects.toBeInstanceOf(SnapshotIntegrityError);
    });
  });
});
