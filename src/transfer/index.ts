/**
 * Metadata Transfer
 *
 * GitLab project metadata → GitHub repository.
 * Validate → Export → Reconcile users → Import
 */

// Core types
export type {
  SourcePlatform,
  DestinationPlatform,
  Identity,
  UserRef,
  Label,
  Milestone,
  MilestoneState,
  Comment,
  Issue,
  IssueState,
  MergeRequest,
  SourceComment,
  SourceIssue,
  SourceMergeRequest,
  SourceProject,
  DestinationRepository,
  ScopeCounts,
  Snapshot,
  MappingEntry,
  MappingFile,
  AutoResolveMode,
  IssueRecord,
  TransferRecord,
  MetadataSource,
  MetadataSink,
  EnsureResult,
  IssueInput,
  CreatedIssue,
  UserQuery,
  DestinationUser,
  EntityKind,
  EntityOutcome,
  ImportEntry,
  ImportResult,
  OutcomeCounts,
  CheckStatus,
  ValidationCheck,
  ValidationReport,
  TransferStage,
  TransferPhase,
  ExportCounts,
  IdentityCounts,
  TransferFiles,
  TransferSummary,
  TransferEvent,
  TransferEventType,
  TransferEventHandler,
} from './types.js';
export { SNAPSHOT_SCHEMA_VERSION } from './types.js';

// Errors
export * from './errors.js';

// Orchestrator
export {
  TransferOrchestrator,
  type TransferOrchestratorDeps,
  type TransferRequest,
  type TransferState,
} from './orchestrator.js';

// Stages
export { Validator, namesLookRelated, nameSimilarity, type ValidatorOptions } from './validator.js';
export { ExportStage, type ExportStageOptions } from './export.js';
export { ImportStage, emptyCounts, ALREADY_TRANSFERRED, ALREADY_AT_DESTINATION, type ImportStageOptions } from './import.js';
export { mergeMapping, autoResolve, applyMapping, reconcile, countIdentities } from './users.js';
export { attributionFor, formatIssueBody, formatCommentBody } from './attribution.js';
export { TransferStore, EXPORT_FILES, checkSnapshotIntegrity } from './store.js';
export { formatExportSummary, formatImportSummary, formatMergeRequestReference } from './reports.js';

// Rate limiting
export {
  RateLimiter,
  DEFAULT_RATE_LIMIT,
  systemClock,
  type Clock,
  type RateLimitConfig,
  type RateLimitWait,
  type RetryState,
  type QuotaState,
} from './rate-limiter.js';

// Registries
export { registerSource, getSource, listSources, hasSource } from './sources/registry.js';
export { registerSink, getSink, listSinks, hasSink } from './sinks/registry.js';

// Adapters (for direct instantiation with custom config)
export { GitLabSource, type GitLabSourceConfig } from './sources/gitlab.js';
export { GitHubSink, type GitHubSinkConfig } from './sinks/github.js';
