/**
 * RTM mirror - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { RecordStore } from './lib/record-store';
export type {
  ChildRows,
  ExecutionDetailRow,
  ExecutionRow,
  IdentityHint,
  IdentityResolution,
  IssueCounts,
  IssueEdit,
  MembershipRow,
  RelationRow,
  StepExecutionRow,
  StepRow,
} from './lib/record-store';
export { FieldMapper, LINK_FIELDS, READ_ONLY_FIELDS, stripHtml, toHtml, emptyContent } from './lib/field-mapper';
export { TreeReconciler, parseTreeNode, collectIssueKeys } from './lib/tree-reconciler';
export { DetailReplacer } from './lib/detail-replacer';
export type { ChildEdit } from './lib/detail-replacer';
export { SyncStateTracker } from './lib/sync-state';
export { SyncEngine } from './lib/sync-engine';
export type { PullOptions, PushOptions, MirrorStatus } from './lib/sync-engine';
export { RtmClient } from './lib/rtm-client';
export { ConflictResolver } from './lib/conflict-resolver';
export { loadConfig, ConfigError } from './lib/config';
export { createLogger, silentLogger } from './lib/logger';
export { ReplaceChildrenError, IdentityConflictError, RtmApiError } from './lib/errors';

export * from './lib/types';
