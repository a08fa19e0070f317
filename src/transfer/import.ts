/**
 * Import Stage
 *
 * Writes the snapshot into the destination in a fixed order:
 * Labels → Milestones → Issues (each followed by its comments) → close pass.
 *
 * Every successful write is recorded in the Transfer Record and persisted
 * before the next one, so an interrupted run resumes at the first entity
 * without a record entry.
 */

import type {
  DestinationRepository,
  EntityKind,
  EntityOutcome,
  ImportEntry,
  ImportResult,
  Issue,
  IssueRecord,
  MetadataSink,
  OutcomeCounts,
  Snapshot,
  TransferEventHandler,
  TransferRecord,
} from './types.js';
import type { Clock } from './rate-limiter.js';
import { errorMessage, isFatal, throwIfCancelled } from './errors.js';
import type { TransferStore } from './store.js';
import { formatCommentBody, formatIssueBody, type IdentityLookup } from './attribution.js';

export const ALREADY_TRANSFERRED = 'already transferred';
export const ALREADY_AT_DESTINATION = 'already exists at destination';

export interface ImportStageOptions {
  clock: Clock;
  report?: TransferEventHandler;
  signal?: AbortSignal;
}

interface Committed {
  id: number;
  created: boolean;
}

export function emptyCounts(): Record<EntityKind, OutcomeCounts> {
  const zero = (): OutcomeCounts => ({ created: 0, skipped: 0, failed: 0 });
  return { label: zero(), milestone: zero(), issue: zero(), comment: zero(), 'issue-state': zero() };
}

export class ImportStage {
  private readonly sink: MetadataSink;
  private readonly store: TransferStore;
  private readonly options: ImportStageOptions;

  private entries: ImportEntry[] = [];
  private counts = emptyCounts();

  constructor(sink: MetadataSink, store: TransferStore, options: ImportStageOptions) {
    this.sink = sink;
    this.store = store;
    this.options = options;
  }

  async run(
    snapshot: Snapshot,
    identities: IdentityLookup,
    record: TransferRecord,
    destination: DestinationRepository,
  ): Promise<ImportResult> {
    this.entries = [];
    this.counts = emptyCounts();

    try {
      await this.importLabels(snapshot, record, destination);
      await this.importMilestones(snapshot, record, destination);
      for (const issue of snapshot.issues) {
        await this.importIssue(issue, identities, record, destination);
      }
      await this.closeIssues(snapshot, record, destination);
    } catch (err) {
      await this.save(record);
      throw err;
    }

    return { entries: this.entries, counts: this.counts };
  }

  // ─── Phases ────────────────────────────────────────────────

  private async importLabels(snapshot: Snapshot, record: TransferRecord, destination: DestinationRepository) {
    for (const label of snapshot.labels) {
      this.checkpoint();
      const recorded = record.labels[label.name];
      if (recorded !== undefined) {
        this.push({ kind: 'label', key: label.name, outcome: 'skipped', destinationId: recorded, reason: ALREADY_TRANSFERRED });
        continue;
      }

      await this.write(
        'label',
        label.name,
        record,
        () => this.sink.ensureLabel(destination, label),
        (result) => {
          record.labels[label.name] = result.id;
          return result;
        },
      );
    }
  }

  private async importMilestones(snapshot: Snapshot, record: TransferRecord, destination: DestinationRepository) {
    for (const milestone of snapshot.milestones) {
      this.checkpoint();
      const recorded = record.milestones[milestone.title];
      if (recorded !== undefined) {
        this.push({
          kind: 'milestone',
          key: milestone.title,
          outcome: 'skipped',
          destinationId: recorded,
          reason: ALREADY_TRANSFERRED,
        });
        continue;
      }

      await this.write(
        'milestone',
        milestone.title,
        record,
        () => this.sink.ensureMilestone(destination, milestone),
        (result) => {
          record.milestones[milestone.title] = result.id;
          return result;
        },
      );
    }
  }

  private async importIssue(
    issue: Issue,
    identities: IdentityLookup,
    record: TransferRecord,
    destination: DestinationRepository,
  ) {
    this.checkpoint();
    const key = `#${issue.iid}`;
    let issueRecord: IssueRecord | undefined = record.issues[String(issue.sourceId)];

    if (issueRecord) {
      this.push({ kind: 'issue', key, outcome: 'skipped', destinationId: issueRecord.number, reason: ALREADY_TRANSFERRED });
    } else {
      // Only labels and milestones that made it across can be referenced
      const labels = issue.labels.filter((name) => record.labels[name] !== undefined);
      const milestone = issue.milestone !== undefined ? record.milestones[issue.milestone] : undefined;

      issueRecord = await this.write(
        'issue',
        key,
        record,
        () =>
          this.sink.createIssue(destination, {
            title: issue.title,
            body: formatIssueBody(issue, identities),
            labels,
            milestone,
          }),
        (created) => {
          const entry: IssueRecord = { number: created.number, url: created.url, comments: {}, closed: false };
          record.issues[String(issue.sourceId)] = entry;
          return { id: created.number, created: true, value: entry };
        },
      );
    }

    // A failed issue takes its comments with it
    if (!issueRecord) return;

    const comments = [...issue.comments].sort((a, b) => a.position - b.position);
    for (const comment of comments) {
      this.checkpoint();
      const commentKey = `${key} comment ${comment.position + 1}`;
      const position = String(comment.position);
      const recorded = issueRecord.comments[position];
      if (recorded !== undefined) {
        this.push({ kind: 'comment', key: commentKey, outcome: 'skipped', destinationId: recorded, reason: ALREADY_TRANSFERRED });
        continue;
      }

      const target = issueRecord;
      await this.write(
        'comment',
        commentKey,
        record,
        () => this.sink.addComment(destination, target.number, formatCommentBody(comment, identities)),
        (created) => {
          target.comments[position] = created.id;
          return { id: created.id, created: true };
        },
      );
    }
  }

  /**
   * Closing runs last so every comment lands on an open issue.
   */
  private async closeIssues(snapshot: Snapshot, record: TransferRecord, destination: DestinationRepository) {
    for (const issue of snapshot.issues) {
      if (issue.state !== 'closed') continue;
      const issueRecord = record.issues[String(issue.sourceId)];
      if (!issueRecord) continue;

      this.checkpoint();
      const key = `#${issue.iid}`;
      if (issueRecord.closed) {
        this.push({
          kind: 'issue-state',
          key,
          outcome: 'skipped',
          destinationId: issueRecord.number,
          reason: ALREADY_TRANSFERRED,
        });
        continue;
      }

      await this.write(
        'issue-state',
        key,
        record,
        () => this.sink.setIssueState(destination, issueRecord.number, 'closed'),
        () => {
          issueRecord.closed = true;
          return { id: issueRecord.number, created: true };
        },
      );
    }
  }

  // ─── Internals ─────────────────────────────────────────────

  /**
   * Perform one write, record it and persist the record. Non-fatal errors
   * fail only this entity; returns the committed value, or undefined on failure.
   */
  private async write<T, V = undefined>(
    kind: EntityKind,
    key: string,
    record: TransferRecord,
    call: () => Promise<T>,
    commit: (result: T) => Committed & { value?: V },
  ): Promise<V | undefined> {
    let committed: Committed & { value?: V };
    try {
      committed = commit(await call());
    } catch (err) {
      if (isFatal(err)) {
        throw err;
      }
      this.push({ kind, key, outcome: 'failed', reason: errorMessage(err) });
      return undefined;
    }

    await this.save(record);
    const outcome: EntityOutcome = committed.created ? 'created' : 'skipped';
    this.push({
      kind,
      key,
      outcome,
      destinationId: committed.id,
      reason: committed.created ? undefined : ALREADY_AT_DESTINATION,
    });
    return committed.value;
  }

  private async save(record: TransferRecord): Promise<void> {
    record.updatedAt = new Date(this.options.clock.now()).toISOString();
    await this.store.saveRecord(record);
  }

  private checkpoint(): void {
    throwIfCancelled(this.options.signal);
  }

  private push(entry: ImportEntry): void {
    this.entries.push(entry);
    this.counts[entry.kind][entry.outcome]++;
    this.options.report?.({ type: 'entity', stage: 'importing', entry });
  }
}
