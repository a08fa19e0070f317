/**
 * Metadata Transfer Types
 *
 * Defines the core types for the transfer pipeline:
 * Validate → Export → Reconcile users → Import
 */

import type { RateLimiter } from './rate-limiter.js';

// ─── Platforms ───────────────────────────────────────────────

export type SourcePlatform = 'gitlab';

export type DestinationPlatform = 'github';

// ─── Identities ──────────────────────────────────────────────

/**
 * A user as known on the source platform, with an optional resolved
 * counterpart on the destination platform.
 */
export interface Identity {
  /** User id on the source (unique) */
  sourceId: number;
  /** Username on the source */
  sourceUsername: string;
  /** Display name, used when no destination user is mapped */
  fallbackName: string;
  email?: string;
  /** Destination login (set by the mapping file or auto-resolution) */
  destinationUsername?: string;
  /** Destination user id (resolved lazily) */
  destinationId?: number;
}

/**
 * User reference as embedded in source payloads.
 */
export interface UserRef {
  id: number;
  username?: string;
  name?: string;
}

// ─── Entities ────────────────────────────────────────────────

export interface Label {
  /** Natural key within the project */
  name: string;
  /** Six hex digits, no leading '#' */
  color: string;
  description: string;
}

export type MilestoneState = 'open' | 'closed';

export interface Milestone {
  /** Natural key within the project */
  title: string;
  description: string;
  dueDate?: string;
  state: MilestoneState;
  createdAt?: string;
  updatedAt?: string;
}

export interface Comment {
  /** Order within the parent issue (0-based) */
  position: number;
  sourceId: number;
  authorId: number;
  createdAt: string;
  updatedAt?: string;
  body: string;
  sourceUrl: string;
}

export type IssueState = 'open' | 'closed';

export interface Issue {
  sourceId: number;
  /** Project-scoped number on the source */
  iid: number;
  title: string;
  body: string;
  authorId: number;
  assigneeIds: number[];
  state: IssueState;
  labels: string[];
  milestone?: string;
  comments: Comment[];
  createdAt: string;
  updatedAt?: string;
  closedAt?: string;
  sourceUrl: string;
}

/**
 * Reference-only: exported for archival, never created at the destination.
 */
export interface MergeRequest extends Omit<Issue, 'state'> {
  state: 'closed' | 'merged';
  mergedAt?: string;
  sourceBranch: string;
  targetBranch: string;
  sha?: string;
}

// ─── Source payload shapes ───────────────────────────────────

/**
 * Entities as yielded by a MetadataSource: users are still embedded
 * references, resolved into Identities by the Export Stage.
 */
export interface SourceComment extends Omit<Comment, 'authorId'> {
  author: UserRef;
}

export interface SourceIssue extends Omit<Issue, 'authorId' | 'assigneeIds' | 'comments'> {
  author: UserRef;
  assignees: UserRef[];
  comments: SourceComment[];
}

export interface SourceMergeRequest
  extends Omit<MergeRequest, 'authorId' | 'assigneeIds' | 'comments'> {
  author: UserRef;
  assignees: UserRef[];
  comments: SourceComment[];
}

// ─── Project handles ─────────────────────────────────────────

export interface SourceProject {
  id: number;
  name: string;
  pathWithNamespace: string;
  webUrl: string;
}

export interface DestinationRepository {
  /** owner/name */
  fullName: string;
  name: string;
  htmlUrl: string;
  defaultBranch?: string;
}

export interface ScopeCounts {
  issues: number;
  mergeRequests: number;
  labels: number;
  milestones: number;
}

// ─── Snapshot ────────────────────────────────────────────────

export const SNAPSHOT_SCHEMA_VERSION = 1;

/**
 * Point-in-time export of all metadata for one project pair.
 * The unit of persistence that enables resume.
 */
export interface Snapshot {
  schemaVersion: typeof SNAPSHOT_SCHEMA_VERSION;
  exportedAt: string;
  source: SourceProject;
  destination: DestinationRepository;
  labels: Label[];
  milestones: Milestone[];
  issues: Issue[];
  mergeRequests: MergeRequest[];
  identities: Identity[];
}

// ─── Mapping file ────────────────────────────────────────────

export interface MappingEntry {
  gitlab_id: number;
  gitlab_username: string;
  fallback_name: string;
  email: string | null;
  /** Human-editable, empty by default */
  github_username: string;
  /** Auto-resolved */
  github_id: number | null;
}

/** Keyed by source username */
export type MappingFile = Record<string, MappingEntry>;

export type AutoResolveMode = 'off' | 'email' | 'email+username';

// ─── Transfer Record ─────────────────────────────────────────

export interface IssueRecord {
  number: number;
  url: string;
  /** Comment position → destination comment id */
  comments: Record<string, number>;
  closed: boolean;
}

/**
 * Per-entity destination ids, recorded incrementally during Import.
 */
export interface TransferRecord {
  schemaVersion: 1;
  sourceProjectId: number;
  destinationRepo: string;
  startedAt: string;
  updatedAt: string;
  /** Label name → destination id */
  labels: Record<string, number>;
  /** Milestone title → destination number */
  milestones: Record<string, number>;
  /** Source issue id → destination issue */
  issues: Record<string, IssueRecord>;
}

// ─── Capability interfaces ───────────────────────────────────

/**
 * Read-only access to a source forge's project metadata.
 *
 * List operations are lazy and restartable: each call starts a fresh
 * paginated read.
 */
export interface MetadataSource {
  readonly platform: SourcePlatform;
  /** Quota guard, when the adapter talks to a rate-limited API */
  readonly limiter?: RateLimiter;

  getProject(ref: string): Promise<SourceProject>;
  listLabels(project: SourceProject): AsyncIterable<Label>;
  listMilestones(project: SourceProject): AsyncIterable<Milestone>;
  listIssues(project: SourceProject): AsyncIterable<SourceIssue>;
  listMergeRequests(project: SourceProject): AsyncIterable<SourceMergeRequest>;
  /** Returns null when the user cannot be found */
  resolveUser(id: number): Promise<Identity | null>;
  countEntities(project: SourceProject): Promise<ScopeCounts>;
}

export interface EnsureResult {
  id: number;
  /** false when the entity already existed at the destination */
  created: boolean;
}

export interface IssueInput {
  title: string;
  body: string;
  labels: string[];
  milestone?: number;
}

export interface CreatedIssue {
  number: number;
  url: string;
}

export interface UserQuery {
  username?: string;
  email?: string;
}

export interface DestinationUser {
  username: string;
  id: number;
}

/**
 * Create/update access to a destination forge. `ensure*` operations are
 * idempotent on their natural key.
 */
export interface MetadataSink {
  readonly platform: DestinationPlatform;
  /** Every call made by the sink passes through this guard */
  readonly limiter?: RateLimiter;

  getRepository(ref: string): Promise<DestinationRepository>;
  hasCommits(repo: DestinationRepository): Promise<boolean>;
  ensureLabel(repo: DestinationRepository, label: Label): Promise<EnsureResult>;
  ensureMilestone(repo: DestinationRepository, milestone: Milestone): Promise<EnsureResult>;
  createIssue(repo: DestinationRepository, input: IssueInput): Promise<CreatedIssue>;
  addComment(repo: DestinationRepository, issueNumber: number, body: string): Promise<{ id: number }>;
  setIssueState(repo: DestinationRepository, issueNumber: number, state: IssueState): Promise<void>;
  /** Returns null when no single user matches */
  findUser(query: UserQuery): Promise<DestinationUser | null>;
  /** Refresh the advertised quota before a write-heavy stage */
  refreshQuota(): Promise<void>;
}

// ─── Import results ──────────────────────────────────────────

export type EntityKind = 'label' | 'milestone' | 'issue' | 'comment' | 'issue-state';

export type EntityOutcome = 'created' | 'skipped' | 'failed';

export interface ImportEntry {
  kind: EntityKind;
  /** Human-readable key: label name, milestone title, #iid, #iid/comment n */
  key: string;
  outcome: EntityOutcome;
  destinationId?: number;
  /** Skip or failure reason */
  reason?: string;
}

export interface OutcomeCounts {
  created: number;
  skipped: number;
  failed: number;
}

export interface ImportResult {
  entries: ImportEntry[];
  counts: Record<EntityKind, OutcomeCounts>;
}

// ─── Validation ──────────────────────────────────────────────

export type CheckStatus = 'pass' | 'warn' | 'fail';

export interface ValidationCheck {
  name: string;
  status: CheckStatus;
  detail: string;
}

export interface ValidationReport {
  passed: boolean;
  checks: ValidationCheck[];
  /** Human-readable reasons for every failed check */
  reasons: string[];
  source?: SourceProject;
  destination?: DestinationRepository;
  scope?: ScopeCounts;
}

// ─── Transfer state & summary ────────────────────────────────

export type TransferStage = 'validating' | 'exporting' | 'reconciling' | 'importing';

export type TransferPhase = 'pending' | TransferStage | 'complete' | 'dry-run' | 'failed' | 'cancelled';

export interface ExportCounts {
  issues: number;
  comments: number;
  mergeRequests: number;
  labels: number;
  milestones: number;
  identities: number;
}

export interface IdentityCounts {
  total: number;
  mapped: number;
  unmapped: number;
}

export interface TransferFiles {
  snapshot: string;
  mapping: string;
  record: string;
  exportSummary: string;
  importSummary?: string;
  mergeRequests: string;
}

export interface TransferSummary {
  phase: 'complete' | 'dry-run';
  dryRun: boolean;
  source: SourceProject;
  destination: DestinationRepository;
  exportDir: string;
  snapshotReused: boolean;
  validation: ValidationReport;
  exported: ExportCounts;
  identities: IdentityCounts;
  /** Absent on dry runs */
  imported?: ImportResult;
  files: TransferFiles;
  warnings: string[];
}

// ─── Events ──────────────────────────────────────────────────

export type TransferEventType =
  | 'stage:start'
  | 'stage:complete'
  | 'progress'
  | 'entity'
  | 'warning'
  | 'checkpoint'
  | 'complete'
  | 'error';

export interface TransferEvent {
  type: TransferEventType;
  stage?: TransferStage;
  message?: string;
  /** Set on 'entity' events */
  entry?: ImportEntry;
  error?: Error;
}

export type TransferEventHandler = (event: TransferEvent) => void;
