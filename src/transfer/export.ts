/**
 * Export Stage
 *
 * Reads all transferable metadata from the source into a Snapshot, resolving
 * every referenced user exactly once, and persists it with the export
 * reports before returning.
 */

import {
  SNAPSHOT_SCHEMA_VERSION,
  type Comment,
  type DestinationRepository,
  type Identity,
  type Issue,
  type Label,
  type MergeRequest,
  type MetadataSource,
  type Milestone,
  type Snapshot,
  type SourceComment,
  type SourceProject,
  type TransferEventHandler,
  type UserRef,
} from './types.js';
import type { Clock } from './rate-limiter.js';
import { NotFoundError, throwIfCancelled } from './errors.js';
import { TransferStore } from './store.js';
import { formatExportSummary, formatMergeRequestReference } from './reports.js';

export interface ExportStageOptions {
  clock: Clock;
  report?: TransferEventHandler;
  signal?: AbortSignal;
}

export class ExportStage {
  private readonly source: MetadataSource;
  private readonly store: TransferStore;
  private readonly options: ExportStageOptions;
  /** First embedded reference seen per user id, used when lookup fails */
  private readonly references = new Map<number, UserRef>();

  constructor(source: MetadataSource, store: TransferStore, options: ExportStageOptions) {
    this.source = source;
    this.store = store;
    this.options = options;
  }

  async run(project: SourceProject, destination: DestinationRepository): Promise<Snapshot> {
    this.references.clear();

    const labels: Label[] = [];
    for await (const label of this.source.listLabels(project)) {
      throwIfCancelled(this.options.signal);
      labels.push(label);
    }
    this.progress(`Exported ${labels.length} labels`);

    const milestones: Milestone[] = [];
    for await (const milestone of this.source.listMilestones(project)) {
      throwIfCancelled(this.options.signal);
      milestones.push(milestone);
    }
    this.progress(`Exported ${milestones.length} milestones`);

    const issues: Issue[] = [];
    for await (const { author, assignees, comments, ...issue } of this.source.listIssues(project)) {
      throwIfCancelled(this.options.signal);
      issues.push({
        ...issue,
        authorId: this.reference(author),
        assigneeIds: assignees.map((user) => this.reference(user)),
        comments: this.toComments(comments),
      });
      this.progress(`Exported issue #${issue.iid} (${comments.length} comments)`);
    }
    this.progress(`Exported ${issues.length} issues`);

    const mergeRequests: MergeRequest[] = [];
    for await (const { author, assignees, comments, ...mr } of this.source.listMergeRequests(project)) {
      throwIfCancelled(this.options.signal);
      mergeRequests.push({
        ...mr,
        authorId: this.reference(author),
        assigneeIds: assignees.map((user) => this.reference(user)),
        comments: this.toComments(comments),
      });
    }
    this.progress(`Exported ${mergeRequests.length} closed/merged merge requests`);

    const identities = await this.resolveIdentities();
    this.progress(`Resolved ${identities.length} users`);

    const generatedAt = new Date(this.options.clock.now()).toISOString();
    const snapshot: Snapshot = {
      schemaVersion: SNAPSHOT_SCHEMA_VERSION,
      exportedAt: generatedAt,
      source: project,
      destination,
      labels,
      milestones,
      issues,
      mergeRequests,
      identities,
    };

    const snapshotPath = await this.store.writeSnapshot(snapshot);
    this.options.report?.({ type: 'checkpoint', stage: 'exporting', message: `Snapshot saved: ${snapshotPath}` });

    const byId = new Map(identities.map((identity) => [identity.sourceId, identity]));
    await this.store.writeText('exportSummary', formatExportSummary(snapshot, generatedAt));
    await this.store.writeText('mergeRequests', formatMergeRequestReference(snapshot, byId));

    return snapshot;
  }

  // ─── Internals ─────────────────────────────────────────────

  private reference(user: UserRef): number {
    if (!this.references.has(user.id)) {
      this.references.set(user.id, user);
    }
    return user.id;
  }

  private toComments(comments: SourceComment[]): Comment[] {
    return [...comments]
      .sort((a, b) => a.position - b.position)
      .map(({ author, ...comment }) => ({ ...comment, authorId: this.reference(author) }));
  }

  /**
   * One lookup per distinct user, in order of first reference.
   */
  private async resolveIdentities(): Promise<Identity[]> {
    const identities: Identity[] = [];

    for (const [id, ref] of this.references) {
      throwIfCancelled(this.options.signal);

      let resolved: Identity | null;
      try {
        resolved = await this.source.resolveUser(id);
      } catch (err) {
        if (!(err instanceof NotFoundError)) {
          throw err;
        }
        resolved = null;
      }

      if (resolved) {
        identities.push({ ...resolved, sourceId: id });
      } else {
        this.options.report?.({
          type: 'warning',
          stage: 'exporting',
          message: `Could not resolve GitLab user ${ref.username ?? id}; using the name from the payload`,
        });
        identities.push({
          sourceId: id,
          sourceUsername: ref.username ?? `user_${id}`,
          fallbackName: ref.name ?? `Unknown User ${id}`,
        });
      }
    }

    return identities;
  }

  private progress(message: string): void {
    this.options.report?.({ type: 'progress', stage: 'exporting', message });
  }
}
