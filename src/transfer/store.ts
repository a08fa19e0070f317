/**
 * Transfer Store
 *
 * Owns the export directory: the snapshot, the user mapping, the Transfer
 * Record and the text reports. JSON files are written atomically (temp file
 * + rename) and validated with zod when read back.
 */

import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';

import {
  SNAPSHOT_SCHEMA_VERSION,
  type DestinationRepository,
  type MappingFile,
  type Snapshot,
  type SourceProject,
  type TransferRecord,
} from './types.js';
import { SnapshotIntegrityError, errorMessage } from './errors.js';

// ─── Layout ──────────────────────────────────────────────────

export const EXPORT_FILES = {
  snapshot: 'metadata_export.json',
  mapping: 'user_mapping.json',
  record: 'transfer_state.json',
  exportSummary: 'export_summary.txt',
  importSummary: 'import_summary.txt',
  mergeRequests: 'merge_requests.md',
} as const;

export type ExportFile = keyof typeof EXPORT_FILES;

// ─── Schemas ─────────────────────────────────────────────────

const IdentitySchema = z.object({
  sourceId: z.number(),
  sourceUsername: z.string(),
  fallbackName: z.string(),
  email: z.string().optional(),
  destinationUsername: z.string().optional(),
  destinationId: z.number().optional(),
});

const LabelSchema = z.object({
  name: z.string(),
  color: z.string(),
  description: z.string(),
});

const MilestoneSchema = z.object({
  title: z.string(),
  description: z.string(),
  dueDate: z.string().optional(),
  state: z.enum(['open', 'closed']),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

const CommentSchema = z.object({
  position: z.number().int().nonnegative(),
  sourceId: z.number(),
  authorId: z.number(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  body: z.string(),
  sourceUrl: z.string(),
});

const IssueFields = {
  sourceId: z.number(),
  iid: z.number(),
  title: z.string(),
  body: z.string(),
  authorId: z.number(),
  assigneeIds: z.array(z.number()),
  labels: z.array(z.string()),
  milestone: z.string().optional(),
  comments: z.array(CommentSchema),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  closedAt: z.string().optional(),
  sourceUrl: z.string(),
};

const IssueSchema = z.object({ ...IssueFields, state: z.enum(['open', 'closed']) });

const MergeRequestSchema = z.object({
  ...IssueFields,
  state: z.enum(['closed', 'merged']),
  mergedAt: z.string().optional(),
  sourceBranch: z.string(),
  targetBranch: z.string(),
  sha: z.string().optional(),
});

export const SnapshotSchema: z.ZodType<Snapshot, z.ZodTypeDef, unknown> = z.object({
  schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
  exportedAt: z.string(),
  source: z.object({
    id: z.number(),
    name: z.string(),
    pathWithNamespace: z.string(),
    webUrl: z.string(),
  }),
  destination: z.object({
    fullName: z.string(),
    name: z.string(),
    htmlUrl: z.string(),
    defaultBranch: z.string().optional(),
  }),
  labels: z.array(LabelSchema),
  milestones: z.array(MilestoneSchema),
  issues: z.array(IssueSchema),
  mergeRequests: z.array(MergeRequestSchema),
  identities: z.array(IdentitySchema),
});

// Hand-edited: tolerate missing destination fields
export const MappingFileSchema: z.ZodType<MappingFile, z.ZodTypeDef, unknown> = z.record(
  z.string(),
  z.object({
    gitlab_id: z.number(),
    gitlab_username: z.string(),
    fallback_name: z.string().default(''),
    email: z.string().nullable().default(null),
    github_username: z.string().default(''),
    github_id: z.number().nullable().default(null),
  }),
);

export const TransferRecordSchema: z.ZodType<TransferRecord, z.ZodTypeDef, unknown> = z.object({
  schemaVersion: z.literal(1),
  sourceProjectId: z.number(),
  destinationRepo: z.string(),
  startedAt: z.string(),
  updatedAt: z.string(),
  labels: z.record(z.string(), z.number()),
  milestones: z.record(z.string(), z.number()),
  issues: z.record(
    z.string(),
    z.object({
      number: z.number(),
      url: z.string(),
      comments: z.record(z.string(), z.number()),
      closed: z.boolean(),
    }),
  ),
});

// ─── Integrity ───────────────────────────────────────────────

/**
 * Every author and assignee referenced by an entity must be one of the
 * snapshot's identities.
 */
export function checkSnapshotIntegrity(snapshot: Snapshot): void {
  const known = new Set(snapshot.identities.map((identity) => identity.sourceId));
  const entities = [
    ...snapshot.issues.map((issue) => ({ kind: 'Issue', entity: issue })),
    ...snapshot.mergeRequests.map((mr) => ({ kind: 'Merge request', entity: mr })),
  ];

  for (const { kind, entity } of entities) {
    const referenced = [
      entity.authorId,
      ...entity.assigneeIds,
      ...entity.comments.map((comment) => comment.authorId),
    ];
    const missing = referenced.find((id) => !known.has(id));
    if (missing !== undefined) {
      throw new SnapshotIntegrityError(`${kind} #${entity.iid} references unknown identity ${missing}`);
    }
  }
}

export function createRecord(source: SourceProject, destination: DestinationRepository, now: string): TransferRecord {
  return {
    schemaVersion: 1,
    sourceProjectId: source.id,
    destinationRepo: destination.fullName,
    startedAt: now,
    updatedAt: now,
    labels: {},
    milestones: {},
    issues: {},
  };
}

// ─── Store ───────────────────────────────────────────────────

export class TransferStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  path(file: ExportFile): string {
    return join(this.dir, EXPORT_FILES[file]);
  }

  exists(file: ExportFile): boolean {
    return existsSync(this.path(file));
  }

  // ─── Snapshot ──────────────────────────────────────────────

  async readSnapshot(): Promise<Snapshot | null> {
    const snapshot = await this.readJson('snapshot', SnapshotSchema);
    if (snapshot) {
      checkSnapshotIntegrity(snapshot);
    }
    return snapshot;
  }

  async writeSnapshot(snapshot: Snapshot): Promise<string> {
    checkSnapshotIntegrity(snapshot);
    return this.writeJson('snapshot', snapshot);
  }

  // ─── Mapping ───────────────────────────────────────────────

  async readMapping(): Promise<MappingFile | null> {
    return this.readJson('mapping', MappingFileSchema);
  }

  async writeMapping(mapping: MappingFile): Promise<string> {
    return this.writeJson('mapping', mapping);
  }

  // ─── Transfer Record ───────────────────────────────────────

  /**
   * The record for this project pair; a fresh one when none exists or the
   * stored record belongs to another pair.
   */
  async loadRecord(source: SourceProject, destination: DestinationRepository, now: string): Promise<TransferRecord> {
    const stored = await this.readJson('record', TransferRecordSchema);
    if (stored && stored.sourceProjectId === source.id && stored.destinationRepo === destination.fullName) {
      return stored;
    }
    return createRecord(source, destination, now);
  }

  async saveRecord(record: TransferRecord): Promise<string> {
    return this.writeJson('record', record);
  }

  // ─── Reports ───────────────────────────────────────────────

  async writeText(file: ExportFile, content: string): Promise<string> {
    return this.writeAtomic(this.path(file), content);
  }

  // ─── Internals ─────────────────────────────────────────────

  private async readJson<T>(file: ExportFile, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const filePath = this.path(file);
    if (!existsSync(filePath)) {
      return null;
    }

    const text = await readFile(filePath, 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new SnapshotIntegrityError(`${filePath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new SnapshotIntegrityError(`${filePath} is malformed${where}: ${issue?.message ?? 'invalid content'}`);
    }
    return parsed.data;
  }

  private async writeJson(file: ExportFile, value: unknown): Promise<string> {
    return this.writeAtomic(this.path(file), `${JSON.stringify(value, null, 2)}\n`);
  }

  private async writeAtomic(filePath: string, content: string): Promise<string> {
    await mkdir(this.dir, { recursive: true });

    const tempPath = `${filePath}.tmp.${randomBytes(4).toString('hex')}`;
    try {
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, filePath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
    return filePath;
  }
}
