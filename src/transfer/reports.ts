/**
 * Reports
 *
 * Text artifacts written next to the snapshot for the operator.
 */

import type {
  DestinationRepository,
  EntityKind,
  ImportEntry,
  ImportResult,
  Snapshot,
} from './types.js';
import { attributionFor, type IdentityLookup } from './attribution.js';
import { EXPORT_FILES } from './store.js';

const KIND_LABELS: Record<EntityKind, string> = {
  label: 'Labels',
  milestone: 'Milestones',
  issue: 'Issues',
  comment: 'Comments',
  'issue-state': 'Issue states',
};

const KIND_ORDER: EntityKind[] = ['label', 'milestone', 'issue', 'comment', 'issue-state'];

export function formatExportSummary(snapshot: Snapshot, generatedAt: string): string {
  const comments = snapshot.issues.reduce((sum, issue) => sum + issue.comments.length, 0);

  return `GitLab Metadata Export Summary
Generated: ${generatedAt}

Source: ${snapshot.source.webUrl}
Target: ${snapshot.destination.htmlUrl}

Exported Items:
- Issues: ${snapshot.issues.length}
- Comments: ${comments}
- Merge Requests (closed/merged): ${snapshot.mergeRequests.length}
- Labels: ${snapshot.labels.length}
- Milestones: ${snapshot.milestones.length}
- Unique Users: ${snapshot.identities.length}

Next Steps:
1. Review ${EXPORT_FILES.mapping} and fill in github_username for each GitLab user
2. Run the transfer again without --dry-run to import the metadata
3. Verify the results on GitHub

Files Created:
- ${EXPORT_FILES.snapshot} (main export data)
- ${EXPORT_FILES.mapping} (user mappings, edit this)
- ${EXPORT_FILES.mergeRequests} (merge request reference)
- ${EXPORT_FILES.exportSummary} (this file)
`;
}

export function formatImportEntry(entry: ImportEntry): string {
  const target = entry.destinationId !== undefined ? ` → ${entry.destinationId}` : '';
  const reason = entry.reason ? ` (${entry.reason})` : '';
  return `- [${entry.outcome}] ${entry.kind} ${entry.key}${target}${reason}`;
}

export function formatImportSummary(
  destination: DestinationRepository,
  result: ImportResult,
  generatedAt: string,
): string {
  const totals = KIND_ORDER.map((kind) => {
    const counts = result.counts[kind];
    return `- ${KIND_LABELS[kind]}: ${counts.created} created, ${counts.skipped} skipped, ${counts.failed} failed`;
  });
  const entries = result.entries.length > 0 ? result.entries.map(formatImportEntry) : ['- (nothing to import)'];

  return `GitHub Metadata Import Summary
Generated: ${generatedAt}

Target: ${destination.htmlUrl}

Results:
${totals.join('\n')}

Entries:
${entries.join('\n')}

Notes:
- Merge requests are not imported as pull requests; see ${EXPORT_FILES.mergeRequests}
- Original GitLab URLs and authors are preserved in issue and comment bodies

Verification:
- Check ${destination.htmlUrl}/issues for imported issues
- Check ${destination.htmlUrl}/labels for imported labels
- Check ${destination.htmlUrl}/milestones for imported milestones
`;
}

/**
 * Markdown archive of closed and merged merge requests, which have no
 * destination counterpart.
 */
export function formatMergeRequestReference(snapshot: Snapshot, identities: IdentityLookup): string {
  const lines = [
    `# Merge Requests from ${snapshot.source.pathWithNamespace}`,
    '',
    `Exported ${snapshot.exportedAt}. Closed and merged merge requests are kept here for reference; they are not recreated on GitHub.`,
  ];

  if (snapshot.mergeRequests.length === 0) {
    lines.push('', '_No closed or merged merge requests._');
  }

  for (const mr of snapshot.mergeRequests) {
    const author = identities.get(mr.authorId);
    const state = mr.state === 'merged' && mr.mergedAt ? `merged (${mr.mergedAt})` : mr.state;
    lines.push(
      '',
      `## !${mr.iid} ${mr.title}`,
      '',
      `- State: ${state}`,
      `- Branches: \`${mr.sourceBranch}\` → \`${mr.targetBranch}\``,
      `- Author: ${author ? attributionFor(author) : `user ${mr.authorId}`}`,
      `- Created: ${mr.createdAt}`,
    );
    if (mr.sha) {
      lines.push(`- Commit: ${mr.sha}`);
    }
    lines.push(`- Comments: ${mr.comments.length}`, `- Source: [GitLab](${mr.sourceUrl})`);
    if (mr.body.trim()) {
      lines.push('', mr.body.trim());
    }
  }

  return `${lines.join('\n')}\n`;
}
