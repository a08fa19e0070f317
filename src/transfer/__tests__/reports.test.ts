/**
 * Report Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatExportSummary,
  formatImportEntry,
  formatImportSummary,
  formatMergeRequestReference,
} from '../reports.js';
import { emptyCounts } from '../import.js';
import { ALICE, NOW, REPO, identityMap, makeComment, makeIssue, makeSnapshot } from './fixtures.js';

describe('formatExportSummary', () => {
  it('counts every exported entity', () => {
    const snapshot = makeSnapshot({
      labels: [{ name: 'bug', color: 'd73a4a', description: '' }],
      issues: [makeIssue(1, { comments: [makeComment(1, 0), makeComment(1, 1)] }), makeIssue(2)],
    });

    const lines = formatExportSummary(snapshot, NOW).split('\n');

    expect(lines[0]).toBe('GitLab Metadata Export Summary');
    expect(lines).toContain('Source: https://gitlab.example.com/acme/widget');
    expect(lines).toContain('Target: https://github.com/acme/widget');
    expect(lines).toContain('- Issues: 2');
    expect(lines).toContain('- Comments: 2');
    expect(lines).toContain('- Labels: 1');
    expect(lines).toContain('- Unique Users: 2');
  });
});

describe('formatImportEntry', () => {
  it('shows the destination id and reason', () => {
    expect(
      formatImportEntry({
        kind: 'comment',
        key: '#1 comment 2',
        outcome: 'skipped',
        destinationId: 102,
        reason: 'already transferred',
      }),
    ).toBe('- [skipped] comment #1 comment 2 → 102 (already transferred)');
  });

  it('omits the id for failures', () => {
    expect(formatImportEntry({ kind: 'issue', key: '#3', outcome: 'failed', reason: 'boom' })).toBe(
      '- [failed] issue #3 (boom)',
    );
  });
});

describe('formatImportSummary', () => {
  it('lists per-kind totals and entries', () => {
    const counts = emptyCounts();
    counts.label.created = 2;
    counts.label.skipped = 1;

    const text = formatImportSummary(
      REPO,
      { entries: [{ kind: 'label', key: 'bug', outcome: 'created', destinationId: 100 }], counts },
      NOW,
    );
    const lines = text.split('\n');

    expect(lines).toContain('- Labels: 2 created, 1 skipped, 0 failed');
    expect(lines).toContain('- Issue states: 0 created, 0 skipped, 0 failed');
    expect(lines).toContain('- [created] label bug → 100');
    expect(lines).toContain('- Check https://github.com/acme/widget/issues for imported issues');
  });

  it('says so when there was nothing to import', () => {
    const lines = formatImportSummary(REPO, { entries: [], counts: emptyCounts() }, NOW).split('\n');

    expect(lines).toContain('- (nothing to import)');
  });
});

describe('formatMergeRequestReference', () => {
  it('archives each merge request', () => {
    const snapshot = makeSnapshot({
      mergeRequests: [
        {
          ...makeIssue(7, { title: 'Add caching', body: ' Fixes things ' }),
          state: 'merged',
          mergedAt: '2024-04-01T00:00:00Z',
          sourceBranch: 'feature/cache',
          targetBranch: 'main',
          sha: 'abc123',
          sourceUrl: 'https://gitlab.example.com/acme/widget/-/merge_requests/7',
        },
      ],
    });

    expect(formatMergeRequestReference(snapshot, identityMap(snapshot)).split('\n').slice(3)).toEqual([
      '',
      '## !7 Add caching',
      '',
      '- State: merged (2024-04-01T00:00:00Z)',
      '- Branches: `feature/cache` → `main`',
      `- Author: ${ALICE.fallbackName}`,
      '- Created: 2024-03-01T10:00:00Z',
      '- Commit: abc123',
      '- Comments: 0',
      '- Source: [GitLab](https://gitlab.example.com/acme/widget/-/merge_requests/7)',
      '',
      'Fixes things',
      '',
    ]);
  });

  it('notes when there are no merge requests', () => {
    const text = formatMergeRequestReference(makeSnapshot(), new Map());

    expect(text.split('\n')).toEqual([
      '# Merge Requests from acme/widget',
      '',
      `Exported ${NOW}. Closed and merged merge requests are kept here for reference; they are not recreated on GitHub.`,
      '',
      '_No closed or merged merge requests._',
      '',
    ]);
  });
});
