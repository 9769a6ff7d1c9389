/**
 * Shared types for the RTM mirror
 */

export type IssueKind = 'REQUIREMENT' | 'TEST_CASE' | 'TEST_PLAN' | 'TEST_EXECUTION' | 'DEFECT';

export const ISSUE_KINDS: readonly IssueKind[] = [
  'REQUIREMENT',
  'TEST_CASE',
  'TEST_PLAN',
  'TEST_EXECUTION',
  'DEFECT',
];

export function isIssueKind(value: string): value is IssueKind {
  return ISSUE_KINDS.some((kind) => kind === value);
}

/** Project key of the sentinel project that holds local-only records. */
export const LOCAL_PROJECT_KEY = 'LOCAL';

export interface CommonFields {
  summary: string;
  description: string;
  status: string;
  priority: string;
  assignee: string;
  reporter: string;
  labels: string[];
  components: string[];
  versions: string[];
  environment: string;
  timeEstimate: string;
  dueDate: string;
  createdAt: string;
  updatedAt: string;
}

export interface TestStep {
  group: number;
  order: number;
  action: string;
  input: string;
  expected: string;
}

export interface StoredStep extends TestStep {
  uid: string;
}

export interface PlanMembership {
  testCaseKey: string;
  order: number;
}

export interface StepResult {
  group: number;
  order: number;
  status: string;
  actualResult: string;
  comment: string;
}

export interface ExecutionDetail {
  testCaseKey: string;
  executionKey: string;
  order: number;
  assignee: string;
  result: string;
  environment: string;
  defects: string[];
  actualTime: string;
  stepResults: StepResult[];
}

export interface Relation {
  relationType: string;
  targetKey: string;
}

export type KindDetail =
  | { kind: 'REQUIREMENT'; epicName: string }
  | { kind: 'TEST_CASE'; preconditions: string; steps: TestStep[] }
  | { kind: 'TEST_PLAN'; memberships: PlanMembership[] }
  | { kind: 'TEST_EXECUTION'; testPlanKey: string; result: string; details: ExecutionDetail[] }
  | { kind: 'DEFECT'; issueTypeId: string };

export type DetailOf<K extends IssueKind> = Extract<KindDetail, { kind: K }>;

/** The part of a kind's detail held in issue columns; child collections are written by the detail replacer. */
export type DetailColumns =
  | { kind: 'REQUIREMENT'; epicName: string }
  | { kind: 'TEST_CASE'; preconditions: string }
  | { kind: 'TEST_PLAN' }
  | { kind: 'TEST_EXECUTION'; testPlanKey: string; result: string }
  | { kind: 'DEFECT'; issueTypeId: string };

export interface NormalizedContent {
  fields: CommonFields;
  detail: KindDetail;
  relations: Relation[];
}

export interface ProjectRecord {
  id: number;
  key: string;
  remoteId: number | null;
  name: string;
}

export interface FolderRecord {
  id: string;
  projectId: number;
  kind: IssueKind;
  remoteId: string | null;
  parentId: string | null;
  name: string;
  sortOrder: number | null;
  deleted: boolean;
}

export interface IssueHeader {
  id: number;
  projectId: number;
  kind: IssueKind;
  remoteKey: string | null;
  remoteId: number | null;
  folderId: string | null;
  sortOrder: number | null;
  dirty: boolean;
  deleted: boolean;
  lastSyncAt: string | null;
  remoteFingerprint: string | null;
  /** False for placeholders written by a structure-only pull */
  fullContent: boolean;
}

export interface IssueRecord extends IssueHeader {
  content: NormalizedContent;
}

/** Three-verb protocol for link-bearing fields on write. */
export type LinkVerb = 'set' | 'add' | 'remove';

export interface LinkPatch {
  verb: LinkVerb;
  keys: string[];
}

export type RemotePayload = Record<string, unknown>;

export interface RemoteTree {
  kind: IssueKind;
  roots: unknown[];
}

export interface CreatedIssue {
  testKey: string;
  issueId: number;
}

/**
 * Contract of the remote repository. Transport, auth and retries live in
 * the implementation.
 */
export interface RemoteIssueService {
  getTree(kind: IssueKind): Promise<unknown[]>;
  getIssue(kind: IssueKind, key: string): Promise<RemotePayload>;
  createIssue(kind: IssueKind, payload: RemotePayload): Promise<CreatedIssue>;
  updateIssue(kind: IssueKind, key: string, payload: RemotePayload): Promise<void>;
  deleteIssue(kind: IssueKind, key: string): Promise<void>;
}

export interface SyncFailure {
  key: string;
  kind: IssueKind | null;
  error: string;
}

export interface SyncConflict {
  issueId: number;
  key: string;
  kind: IssueKind;
  local: NormalizedContent;
  remote: NormalizedContent;
}

export interface ReconciliationResult {
  created: number;
  updated: number;
  tombstoned: number;
  unchanged: number;
  failed: SyncFailure[];
  conflicts: SyncConflict[];
  warnings: string[];
  cancelled: boolean;
}

export interface SyncReport {
  created: number;
  updated: number;
  tombstoned: number;
  unchanged: number;
  failed: SyncFailure[];
  conflicts: SyncConflict[];
  warnings: string[];
  cancelled: boolean;
}

export type SyncMode = 'full' | 'structure';

export type ConflictPolicy = 'overwrite' | 'keep-local';

export type CheckpointKind = 'full' | 'tree' | 'issue';

export interface SyncCheckpoint {
  lastFullSyncAt: string | null;
  lastTreeSyncAt: string | null;
  lastIssueSyncAt: string | null;
}

export type ConflictResolution = 'local' | 'remote' | 'skip';
