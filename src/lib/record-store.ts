/**
 * Normalized record store backed by SQLite
 *
 * One physical `issues` table holds all five kinds; kind-specific columns
 * are only populated for their kind. Child collections (steps, plan
 * memberships, relations, executions) are owned by an issue and are only
 * ever written wholesale through the detail replacer.
 */

import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { emptyDetail, emptyFields } from './field-mapper';
import {
  CommonFields,
  DetailColumns,
  ExecutionDetail,
  FolderRecord,
  IssueHeader,
  IssueKind,
  IssueRecord,
  KindDetail,
  LOCAL_PROJECT_KEY,
  NormalizedContent,
  PlanMembership,
  ProjectRecord,
  Relation,
  StoredStep,
  SyncCheckpoint,
  isIssueKind,
} from './types';
import { ChildCollection } from './errors';

const schemaSql = `
CREATE TABLE IF NOT EXISTS projects (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_key TEXT NOT NULL UNIQUE,
  remote_id INTEGER,
  name TEXT NOT NULL DEFAULT ''
);

CREATE TABLE IF NOT EXISTS folders (
  id TEXT PRIMARY KEY,
  project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  kind TEXT NOT NULL,
  remote_id TEXT,
  parent_id TEXT REFERENCES folders(id) ON DELETE SET NULL,
  name TEXT NOT NULL,
  sort_order INTEGER,
  deleted INTEGER NOT NULL DEFAULT 0,
  UNIQUE (project_id, kind, remote_id)
);

CREATE TABLE IF NOT EXISTS issues (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  kind TEXT NOT NULL,
  remote_key TEXT,
  remote_id INTEGER,
  folder_id TEXT REFERENCES folders(id) ON DELETE SET NULL,
  sort_order INTEGER,
  summary TEXT NOT NULL DEFAULT '',
  description TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT '',
  priority TEXT NOT NULL DEFAULT '',
  assignee TEXT NOT NULL DEFAULT '',
  reporter TEXT NOT NULL DEFAULT '',
  labels_json TEXT NOT NULL DEFAULT '[]',
  components_json TEXT NOT NULL DEFAULT '[]',
  versions_json TEXT NOT NULL DEFAULT '[]',
  environment TEXT NOT NULL DEFAULT '',
  time_estimate TEXT NOT NULL DEFAULT '',
  due_date TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT '',
  updated_at TEXT NOT NULL DEFAULT '',
  epic_name TEXT,
  preconditions TEXT,
  test_plan_key TEXT,
  execution_result TEXT,
  issue_type_id TEXT,
  remote_fingerprint TEXT,
  full_content INTEGER NOT NULL DEFAULT 1,
  dirty INTEGER NOT NULL DEFAULT 0,
  deleted INTEGER NOT NULL DEFAULT 0,
  last_sync_at TEXT,
  UNIQUE (project_id, remote_key)
);

CREATE INDEX IF NOT EXISTS idx_issues_scope ON issues (project_id, kind);

CREATE TABLE IF NOT EXISTS steps (
  uid TEXT PRIMARY KEY,
  issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
  group_no INTEGER NOT NULL,
  order_no INTEGER NOT NULL,
  action TEXT NOT NULL DEFAULT '',
  input TEXT NOT NULL DEFAULT '',
  expected TEXT NOT NULL DEFAULT '',
  UNIQUE (issue_id, group_no, order_no)
);

-- References keep the remote key of their target; the local id is bound
-- once the target is mirrored
CREATE TABLE IF NOT EXISTS plan_memberships (
  plan_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
  test_case_id INTEGER REFERENCES issues(id) ON DELETE SET NULL,
  test_case_key TEXT,
  order_no INTEGER NOT NULL,
  UNIQUE (plan_id, test_case_id)
);

CREATE TABLE IF NOT EXISTS relations (
  src_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
  dst_id INTEGER REFERENCES issues(id) ON DELETE SET NULL,
  dst_key TEXT,
  relation_type TEXT NOT NULL,
  UNIQUE (src_id, dst_id, relation_type)
);

CREATE INDEX IF NOT EXISTS idx_relations_src ON relations (src_id);

CREATE TABLE IF NOT EXISTS executions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  issue_id INTEGER NOT NULL UNIQUE REFERENCES issues(id) ON DELETE CASCADE,
  test_plan_id INTEGER REFERENCES issues(id) ON DELETE SET NULL
);

CREATE TABLE IF NOT EXISTS execution_details (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  execution_id INTEGER NOT NULL REFERENCES executions(id) ON DELETE CASCADE,
  test_case_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
  execution_key TEXT NOT NULL DEFAULT '',
  order_no INTEGER NOT NULL,
  assignee TEXT NOT NULL DEFAULT '',
  result TEXT NOT NULL DEFAULT '',
  environment TEXT NOT NULL DEFAULT '',
  defects_json TEXT NOT NULL DEFAULT '[]',
  actual_time TEXT NOT NULL DEFAULT '',
  UNIQUE (execution_id, test_case_id)
);

CREATE TABLE IF NOT EXISTS step_executions (
  detail_id INTEGER NOT NULL REFERENCES execution_details(id) ON DELETE CASCADE,
  group_no INTEGER NOT NULL,
  order_no INTEGER NOT NULL,
  step_uid TEXT,
  status TEXT NOT NULL DEFAULT '',
  actual_result TEXT NOT NULL DEFAULT '',
  comment TEXT NOT NULL DEFAULT '',
  PRIMARY KEY (detail_id, group_no, order_no)
);

CREATE TABLE IF NOT EXISTS sync_state (
  project_id INTEGER PRIMARY KEY REFERENCES projects(id) ON DELETE CASCADE,
  last_full_sync_at TEXT,
  last_tree_sync_at TEXT,
  last_issue_sync_at TEXT
);
`;

interface ProjectRow {
  id: number;
  project_key: string;
  remote_id: number | null;
  name: string;
}

interface FolderRow {
  id: string;
  project_id: number;
  kind: string;
  remote_id: string | null;
  parent_id: string | null;
  name: string;
  sort_order: number | null;
  deleted: number;
}

interface IssueRow {
  id: number;
  project_id: number;
  kind: string;
  remote_key: string | null;
  remote_id: number | null;
  folder_id: string | null;
  sort_order: number | null;
  summary: string;
  description: string;
  status: string;
  priority: string;
  assignee: string;
  reporter: string;
  labels_json: string;
  components_json: string;
  versions_json: string;
  environment: string;
  time_estimate: string;
  due_date: string;
  created_at: string;
  updated_at: string;
  epic_name: string | null;
  preconditions: string | null;
  test_plan_key: string | null;
  execution_result: string | null;
  issue_type_id: string | null;
  remote_fingerprint: string | null;
  full_content: number;
  dirty: number;
  deleted: number;
  last_sync_at: string | null;
}

interface ContentColumns {
  summary: string;
  description: string;
  status: string;
  priority: string;
  assignee: string;
  reporter: string;
  labels_json: string;
  components_json: string;
  versions_json: string;
  environment: string;
  time_estimate: string;
  due_date: string;
  created_at: string;
  updated_at: string;
  epic_name: string | null;
  preconditions: string | null;
  test_plan_key: string | null;
  execution_result: string | null;
  issue_type_id: string | null;
}

interface StepRowDb {
  uid: string;
  group_no: number;
  order_no: number;
  action: string;
  input: string;
  expected: string;
}

interface MembershipRowDb {
  test_case_id: number | null;
  test_case_key: string | null;
  order_no: number;
}

interface RelationRowDb {
  dst_id: number | null;
  dst_key: string | null;
  relation_type: string;
}

interface ExecutionRowDb {
  id: number;
  test_plan_id: number | null;
}

interface DetailRowDb {
  id: number;
  test_case_id: number;
  test_case_key: string | null;
  execution_key: string;
  order_no: number;
  assignee: string;
  result: string;
  environment: string;
  defects_json: string;
  actual_time: string;
}

interface StepExecutionRowDb {
  group_no: number;
  order_no: number;
  step_uid: string | null;
  status: string;
  actual_result: string;
  comment: string;
}

export type CheckpointColumn = 'last_full_sync_at' | 'last_tree_sync_at' | 'last_issue_sync_at';

interface SyncStateRow {
  last_full_sync_at: string | null;
  last_tree_sync_at: string | null;
  last_issue_sync_at: string | null;
}

/** Child rows as stored: references are local issue ids. */
export interface StepRow {
  uid: string;
  group: number;
  order: number;
  action: string;
  input: string;
  expected: string;
}

/** A reference names a local issue, a remote key, or both. */
export interface MembershipRow {
  testCaseId: number | null;
  testCaseKey?: string | null;
  order: number;
}

export interface RelationRow {
  targetId: number | null;
  targetKey?: string | null;
  relationType: string;
}

export interface StepExecutionRow {
  group: number;
  order: number;
  stepUid: string | null;
  status: string;
  actualResult: string;
  comment: string;
}

export interface ExecutionDetailRow {
  testCaseId: number;
  executionKey: string;
  order: number;
  assignee: string;
  result: string;
  environment: string;
  defects: string[];
  actualTime: string;
  stepResults: StepExecutionRow[];
}

export interface ExecutionRow {
  testPlanId: number | null;
  details: ExecutionDetailRow[];
}

export interface ChildRows {
  steps: StepRow;
  planMemberships: MembershipRow;
  relations: RelationRow;
  executions: ExecutionRow;
}

/** Which issue kind may own each child collection; null means any kind. */
export const CHILD_OWNER_KIND: Record<ChildCollection, IssueKind | null> = {
  steps: 'TEST_CASE',
  planMemberships: 'TEST_PLAN',
  relations: null,
  executions: 'TEST_EXECUTION',
};

export interface NewRemoteIssue {
  projectId: number;
  kind: IssueKind;
  remoteKey: string;
  remoteId: number | null;
  folderId: string | null;
  sortOrder: number | null;
  content: NormalizedContent;
  fingerprint: string | null;
  /** A structure-only placeholder that holds the summary alone */
  partial?: boolean;
}

export interface RemoteContentUpdate {
  remoteId: number | null;
  folderId: string | null;
  sortOrder: number | null;
  content: NormalizedContent;
  fingerprint: string | null;
}

export interface NewFolder {
  projectId: number;
  kind: IssueKind;
  remoteId: string | null;
  parentId: string | null;
  name: string;
  sortOrder: number | null;
}

/** Column-held content of a local edit; child collections go through `DetailReplacer.editChildren`. */
export interface IssueEdit {
  fields?: Partial<CommonFields>;
  detail?: DetailColumns;
}

export interface IdentityHint {
  localId?: number | null;
  remoteKey?: string | null;
}

export type IdentityResolution =
  | { action: 'update'; issueId: number; via: 'localId' | 'remoteKey' }
  | { action: 'create-local' };

export interface IssueCounts {
  total: number;
  dirty: number;
  localOnly: number;
  tombstoned: number;
}

export type FolderComparator = (a: FolderRecord, b: FolderRecord) => number;

export interface RecordStoreOptions {
  clock?: () => string;
}

const parseList = (json: string): string[] => {
  const value: unknown = JSON.parse(json);
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
};

const toKind = (value: string): IssueKind => {
  if (!isIssueKind(value)) {
    throw new Error(`Unknown issue kind in store: ${value}`);
  }
  return value;
};

const toFolder = (row: FolderRow): FolderRecord => ({
  id: row.id,
  projectId: row.project_id,
  kind: toKind(row.kind),
  remoteId: row.remote_id,
  parentId: row.parent_id,
  name: row.name,
  sortOrder: row.sort_order,
  deleted: row.deleted === 1,
});

const toHeader = (row: IssueRow): IssueHeader => ({
  id: row.id,
  projectId: row.project_id,
  kind: toKind(row.kind),
  remoteKey: row.remote_key,
  remoteId: row.remote_id,
  folderId: row.folder_id,
  sortOrder: row.sort_order,
  dirty: row.dirty === 1,
  deleted: row.deleted === 1,
  lastSyncAt: row.last_sync_at,
  remoteFingerprint: row.remote_fingerprint,
  fullContent: row.full_content === 1,
});

const toProject = (row: ProjectRow): ProjectRecord => ({
  id: row.id,
  key: row.project_key,
  remoteId: row.remote_id,
  name: row.name,
});

const contentColumns = (content: { fields: CommonFields; detail: DetailColumns }): ContentColumns => {
  const { fields, detail } = content;
  return {
    summary: fields.summary,
    description: fields.description,
    status: fields.status,
    priority: fields.priority,
    assignee: fields.assignee,
    reporter: fields.reporter,
    labels_json: JSON.stringify(fields.labels),
    components_json: JSON.stringify(fields.components),
    versions_json: JSON.stringify(fields.versions),
    environment: fields.environment,
    time_estimate: fields.timeEstimate,
    due_date: fields.dueDate,
    created_at: fields.createdAt,
    updated_at: fields.updatedAt,
    epic_name: detail.kind === 'REQUIREMENT' ? detail.epicName : null,
    preconditions: detail.kind === 'TEST_CASE' ? detail.preconditions : null,
    test_plan_key: detail.kind === 'TEST_EXECUTION' ? detail.testPlanKey : null,
    execution_result: detail.kind === 'TEST_EXECUTION' ? detail.result : null,
    issue_type_id: detail.kind === 'DEFECT' ? detail.issueTypeId : null,
  };
};

const CONTENT_ASSIGNMENTS = `
  summary = @summary, description = @description, status = @status, priority = @priority,
  assignee = @assignee, reporter = @reporter, labels_json = @labels_json,
  components_json = @components_json, versions_json = @versions_json,
  environment = @environment, time_estimate = @time_estimate, due_date = @due_date,
  created_at = @created_at, updated_at = @updated_at, epic_name = @epic_name,
  preconditions = @preconditions, test_plan_key = @test_plan_key,
  execution_result = @execution_result, issue_type_id = @issue_type_id`;

const FOLDER_ORDER = `
  CASE WHEN remote_id IS NULL THEN 1 ELSE 0 END,
  CASE WHEN sort_order IS NULL THEN 1 ELSE 0 END,
  sort_order, name, rowid`;

export class RecordStore {
  private readonly db: Database.Database;
  private readonly clock: () => string;

  constructor(filePath: string, options: RecordStoreOptions = {}) {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.db = new Database(filePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(schemaSql);
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  close(): void {
    this.db.close();
  }

  now(): string {
    return this.clock();
  }

  /** Run `fn` in a transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ---------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------

  ensureProject(key: string, remoteId: number | null, name = ''): ProjectRecord {
    this.db
      .prepare<[string, number | null, string]>(
        `INSERT INTO projects (project_key, remote_id, name) VALUES (?, ?, ?)
         ON CONFLICT (project_key) DO UPDATE SET
           remote_id = COALESCE(excluded.remote_id, projects.remote_id),
           name = CASE WHEN excluded.name = '' THEN projects.name ELSE excluded.name END`
      )
      .run(key, remoteId, name);
    const project = this.getProjectByKey(key);
    if (!project) {
      throw new Error(`Project ${key} was not persisted`);
    }
    this.db.prepare<[number]>(`INSERT OR IGNORE INTO sync_state (project_id) VALUES (?)`).run(project.id);
    return project;
  }

  /** Sentinel project that owns records authored without a remote project. */
  localProject(): ProjectRecord {
    return this.ensureProject(LOCAL_PROJECT_KEY, null, 'Local');
  }

  getProject(id: number): ProjectRecord | null {
    const row = this.db.prepare<[number], ProjectRow>(`SELECT * FROM projects WHERE id = ?`).get(id);
    return row ? toProject(row) : null;
  }

  getProjectByKey(key: string): ProjectRecord | null {
    const row = this.db
      .prepare<[string], ProjectRow>(`SELECT * FROM projects WHERE project_key = ?`)
      .get(key);
    return row ? toProject(row) : null;
  }

  // ---------------------------------------------------------------------
  // Folders
  // ---------------------------------------------------------------------

  getFolder(id: string): FolderRecord | null {
    const row = this.db.prepare<[string], FolderRow>(`SELECT * FROM folders WHERE id = ?`).get(id);
    return row ? toFolder(row) : null;
  }

  /** Remote-bound folders with this remote id in the project, across kinds. */
  findFoldersByRemoteId(projectId: number, remoteId: string): FolderRecord[] {
    return this.db
      .prepare<[number, string], FolderRow>(`SELECT * FROM folders WHERE project_id = ? AND remote_id = ?`)
      .all(projectId, remoteId)
      .map(toFolder);
  }

  insertFolder(folder: NewFolder): FolderRecord {
    const id = randomUUID();
    this.db
      .prepare<[string, number, string, string | null, string | null, string, number | null]>(
        `INSERT INTO folders (id, project_id, kind, remote_id, parent_id, name, sort_order)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(id, folder.projectId, folder.kind, folder.remoteId, folder.parentId, folder.name, folder.sortOrder);
    const created = this.getFolder(id);
    if (!created) {
      throw new Error(`Folder ${id} was not persisted`);
    }
    return created;
  }

  /** Overwrite placement and name; clears the tombstone. */
  updateFolder(id: string, update: { parentId: string | null; name: string; sortOrder: number | null }): void {
    this.db
      .prepare<[string | null, string, number | null, string]>(
        `UPDATE folders SET parent_id = ?, name = ?, sort_order = ?, deleted = 0 WHERE id = ?`
      )
      .run(update.parentId, update.name, update.sortOrder, id);
  }

  createLocalFolder(projectId: number, kind: IssueKind, parentId: string | null, name: string): FolderRecord {
    return this.insertFolder({ projectId, kind, remoteId: null, parentId, name, sortOrder: null });
  }

  /**
   * Live folders of a kind scope. Remote folders come first in their remote
   * order and local-only folders follow, unless a comparator is given.
   */
  listFolders(projectId: number, kind: IssueKind, comparator?: FolderComparator): FolderRecord[] {
    const folders = this.db
      .prepare<[number, string], FolderRow>(
        `SELECT * FROM folders WHERE project_id = ? AND kind = ? AND deleted = 0 ORDER BY ${FOLDER_ORDER}`
      )
      .all(projectId, kind)
      .map(toFolder);
    return comparator ? folders.sort(comparator) : folders;
  }

  listRemoteBoundFolders(projectId: number, kind: IssueKind): FolderRecord[] {
    return this.db
      .prepare<[number, string], FolderRow>(
        `SELECT * FROM folders
         WHERE project_id = ? AND kind = ? AND remote_id IS NOT NULL AND deleted = 0`
      )
      .all(projectId, kind)
      .map(toFolder);
  }

  tombstoneFolder(id: string): void {
    this.db.prepare<[string]>(`UPDATE folders SET deleted = 1 WHERE id = ?`).run(id);
  }

  // ---------------------------------------------------------------------
  // Issues
  // ---------------------------------------------------------------------

  getHeader(id: number): IssueHeader | null {
    const row = this.db.prepare<[number], IssueRow>(`SELECT * FROM issues WHERE id = ?`).get(id);
    return row ? toHeader(row) : null;
  }

  getIssue(id: number): IssueRecord | null {
    const row = this.db.prepare<[number], IssueRow>(`SELECT * FROM issues WHERE id = ?`).get(id);
    if (!row) {
      return null;
    }
    return { ...toHeader(row), content: this.assembleContent(row) };
  }

  /** Lookup by remote key within a project, whatever the kind. */
  findIssueByKey(projectId: number, remoteKey: string): IssueHeader | null {
    const row = this.db
      .prepare<[number, string], IssueRow>(`SELECT * FROM issues WHERE project_id = ? AND remote_key = ?`)
      .get(projectId, remoteKey);
    return row ? toHeader(row) : null;
  }

  findIssue(projectId: number, kind: IssueKind, remoteKey: string): IssueHeader | null {
    const header = this.findIssueByKey(projectId, remoteKey);
    return header && header.kind === kind ? header : null;
  }

  listIssues(projectId: number, kind?: IssueKind): IssueHeader[] {
    const rows = kind
      ? this.db
          .prepare<[number, string], IssueRow>(
            `SELECT * FROM issues WHERE project_id = ? AND kind = ? ORDER BY sort_order, id`
          )
          .all(projectId, kind)
      : this.db
          .prepare<[number], IssueRow>(`SELECT * FROM issues WHERE project_id = ? ORDER BY kind, sort_order, id`)
          .all(projectId);
    return rows.map(toHeader);
  }

  listIssuesInFolder(folderId: string): IssueHeader[] {
    return this.db
      .prepare<[string], IssueRow>(
        `SELECT * FROM issues WHERE folder_id = ? AND deleted = 0 ORDER BY sort_order, id`
      )
      .all(folderId)
      .map(toHeader);
  }

  listRemoteBoundIssues(projectId: number, kind: IssueKind): IssueHeader[] {
    return this.db
      .prepare<[number, string], IssueRow>(
        `SELECT * FROM issues
         WHERE project_id = ? AND kind = ? AND remote_key IS NOT NULL AND deleted = 0`
      )
      .all(projectId, kind)
      .map(toHeader);
  }

  listDirty(projectId: number): IssueHeader[] {
    return this.db
      .prepare<[number], IssueRow>(`SELECT * FROM issues WHERE project_id = ? AND dirty = 1 ORDER BY id`)
      .all(projectId)
      .map(toHeader);
  }

  insertRemoteIssue(issue: NewRemoteIssue): number {
    const result = this.db
      .prepare<[ContentColumns & {
        project_id: number;
        kind: string;
        remote_key: string;
        remote_id: number | null;
        folder_id: string | null;
        sort_order: number | null;
        remote_fingerprint: string | null;
        full_content: number;
        last_sync_at: string;
      }]>(
        `INSERT INTO issues (
           project_id, kind, remote_key, remote_id, folder_id, sort_order,
           summary, description, status, priority, assignee, reporter,
           labels_json, components_json, versions_json, environment, time_estimate,
           due_date, created_at, updated_at, epic_name, preconditions, test_plan_key,
           execution_result, issue_type_id, remote_fingerprint, full_content, dirty, deleted, last_sync_at
         ) VALUES (
           @project_id, @kind, @remote_key, @remote_id, @folder_id, @sort_order,
           @summary, @description, @status, @priority, @assignee, @reporter,
           @labels_json, @components_json, @versions_json, @environment, @time_estimate,
           @due_date, @created_at, @updated_at, @epic_name, @preconditions, @test_plan_key,
           @execution_result, @issue_type_id, @remote_fingerprint, @full_content, 0, 0, @last_sync_at
         )`
      )
      .run({
        ...contentColumns(issue.content),
        project_id: issue.projectId,
        kind: issue.kind,
        remote_key: issue.remoteKey,
        remote_id: issue.remoteId,
        folder_id: issue.folderId,
        sort_order: issue.sortOrder,
        remote_fingerprint: issue.fingerprint,
        full_content: issue.partial ? 0 : 1,
        last_sync_at: this.now(),
      });
    const id = Number(result.lastInsertRowid);
    this.bindPendingReferences(issue.projectId, issue.kind, issue.remoteKey, id);
    return id;
  }

  /** Overwrite from a remote payload: clears dirty and the tombstone. */
  applyRemoteContent(id: number, update: RemoteContentUpdate): void {
    this.db
      .prepare<[ContentColumns & {
        id: number;
        remote_id: number | null;
        folder_id: string | null;
        sort_order: number | null;
        remote_fingerprint: string | null;
        last_sync_at: string;
      }]>(
        `UPDATE issues SET ${CONTENT_ASSIGNMENTS},
           remote_id = COALESCE(@remote_id, remote_id), folder_id = @folder_id,
           sort_order = @sort_order, remote_fingerprint = @remote_fingerprint,
           full_content = 1, dirty = 0, deleted = 0, last_sync_at = @last_sync_at
         WHERE id = @id`
      )
      .run({
        ...contentColumns(update.content),
        id,
        remote_id: update.remoteId,
        folder_id: update.folderId,
        sort_order: update.sortOrder,
        remote_fingerprint: update.fingerprint,
        last_sync_at: this.now(),
      });
  }

  /** Structure-only update: placement, plus the summary when one is given. */
  applyRemotePlacement(
    id: number,
    update: { folderId: string | null; sortOrder: number | null; summary: string | null }
  ): void {
    this.db
      .prepare<[string | null, number | null, string | null, string, number]>(
        `UPDATE issues SET folder_id = ?, sort_order = ?, summary = COALESCE(?, summary),
           deleted = 0, last_sync_at = ?
         WHERE id = ?`
      )
      .run(update.folderId, update.sortOrder, update.summary, this.now(), id);
  }

  /** Author a record with no remote identity; it is pushed as a create. */
  createLocalIssue(projectId: number, kind: IssueKind, folderId: string | null, initial: IssueEdit = {}): number {
    const detail = initial.detail ?? emptyDetail(kind);
    if (detail.kind !== kind) {
      throw new Error(`Cannot create ${kind} with ${detail.kind} detail`);
    }
    const result = this.db
      .prepare<[ContentColumns & { project_id: number; kind: string; folder_id: string | null }]>(
        `INSERT INTO issues (
           project_id, kind, folder_id, summary, description, status, priority, assignee,
           reporter, labels_json, components_json, versions_json, environment, time_estimate,
           due_date, created_at, updated_at, epic_name, preconditions, test_plan_key,
           execution_result, issue_type_id, dirty
         ) VALUES (
           @project_id, @kind, @folder_id, @summary, @description, @status, @priority, @assignee,
           @reporter, @labels_json, @components_json, @versions_json, @environment, @time_estimate,
           @due_date, @created_at, @updated_at, @epic_name, @preconditions, @test_plan_key,
           @execution_result, @issue_type_id, 1
         )`
      )
      .run({
        ...contentColumns({ fields: { ...emptyFields(), ...initial.fields }, detail }),
        project_id: projectId,
        kind,
        folder_id: folderId,
      });
    return Number(result.lastInsertRowid);
  }

  /** Local mutation of column-held fields. Marks the record dirty. */
  editIssue(id: number, edit: IssueEdit): void {
    const current = this.getIssue(id);
    if (!current) {
      throw new Error(`Issue ${id} not found`);
    }
    if (edit.detail && edit.detail.kind !== current.kind) {
      throw new Error(`Cannot apply ${edit.detail.kind} detail to ${current.kind} issue ${id}`);
    }
    const columns = contentColumns({
      fields: { ...current.content.fields, ...edit.fields },
      detail: edit.detail ?? current.content.detail,
    });
    this.db
      .prepare<[ContentColumns & { id: number }]>(`UPDATE issues SET ${CONTENT_ASSIGNMENTS}, dirty = 1 WHERE id = @id`)
      .run({ ...columns, id });
  }

  moveIssue(id: number, folderId: string | null): void {
    this.db.prepare<[string | null, number]>(`UPDATE issues SET folder_id = ?, dirty = 1 WHERE id = ?`).run(folderId, id);
  }

  /**
   * Local delete. A local-only record is removed outright; a remote-bound
   * one is tombstoned and left dirty so the next push deletes it remotely.
   */
  deleteIssueLocally(id: number): 'removed' | 'pending-remote-delete' {
    const header = this.getHeader(id);
    if (!header) {
      throw new Error(`Issue ${id} not found`);
    }
    if (header.remoteKey === null) {
      this.transaction(() => {
        // References by id alone would point at nothing
        this.db.prepare<[number]>(`DELETE FROM relations WHERE dst_id = ? AND dst_key IS NULL`).run(id);
        this.db.prepare<[number]>(`DELETE FROM plan_memberships WHERE test_case_id = ? AND test_case_key IS NULL`).run(id);
        this.db.prepare<[number]>(`DELETE FROM issues WHERE id = ?`).run(id);
      });
      return 'removed';
    }
    this.db.prepare<[number]>(`UPDATE issues SET deleted = 1, dirty = 1 WHERE id = ?`).run(id);
    return 'pending-remote-delete';
  }

  tombstoneIssue(id: number): void {
    this.db.prepare<[number]>(`UPDATE issues SET deleted = 1 WHERE id = ?`).run(id);
  }

  bindRemoteIdentity(id: number, remoteKey: string, remoteId: number | null): void {
    const header = this.getHeader(id);
    if (!header) {
      throw new Error(`Issue ${id} not found`);
    }
    this.transaction(() => {
      this.db
        .prepare<[string, number | null, number]>(`UPDATE issues SET remote_key = ?, remote_id = ? WHERE id = ?`)
        .run(remoteKey, remoteId, id);
      this.db.prepare<[string, number]>(`UPDATE relations SET dst_key = ? WHERE dst_id = ?`).run(remoteKey, id);
      this.db
        .prepare<[string, number]>(`UPDATE plan_memberships SET test_case_key = ? WHERE test_case_id = ?`)
        .run(remoteKey, id);
      this.bindPendingReferences(header.projectId, header.kind, remoteKey, id);
    });
  }

  /** Ids of local-only issues this record links to; such links cannot be sent yet. */
  listLocalOnlyReferences(id: number): number[] {
    return this.db
      .prepare<[number, number, number, number], { id: number }>(
        `SELECT i.id FROM relations r JOIN issues i ON i.id = r.dst_id
         WHERE r.src_id = ? AND i.remote_key IS NULL AND i.id <> ?
         UNION
         SELECT i.id FROM plan_memberships m JOIN issues i ON i.id = m.test_case_id
         WHERE m.plan_id = ? AND i.remote_key IS NULL AND i.id <> ?
         ORDER BY 1`
      )
      .all(id, id, id, id)
      .map((row) => row.id);
  }

  /** Forces the next pull to treat the record as changed. */
  invalidateFingerprint(id: number): void {
    this.db.prepare<[number]>(`UPDATE issues SET remote_fingerprint = NULL WHERE id = ?`).run(id);
  }

  setDirty(id: number, dirty: boolean): boolean {
    const result = this.db.prepare<[number, number]>(`UPDATE issues SET dirty = ? WHERE id = ?`).run(dirty ? 1 : 0, id);
    return result.changes > 0;
  }

  touchSyncedAt(id: number): void {
    this.db.prepare<[string, number]>(`UPDATE issues SET last_sync_at = ? WHERE id = ?`).run(this.now(), id);
  }

  /** Physically remove tombstoned records that have nothing left to push. */
  purgeTombstones(projectId: number): { issues: number; folders: number } {
    return this.transaction(() => {
      const issues = this.db
        .prepare<[number]>(`DELETE FROM issues WHERE project_id = ? AND deleted = 1 AND dirty = 0`)
        .run(projectId).changes;
      const folders = this.db
        .prepare<[number]>(`DELETE FROM folders WHERE project_id = ? AND deleted = 1`)
        .run(projectId).changes;
      return { issues, folders };
    });
  }

  countIssues(projectId: number): IssueCounts {
    const row = this.db
      .prepare<[number], { total: number; dirty: number | null; local_only: number | null; tombstoned: number | null }>(
        `SELECT COUNT(*) AS total,
           SUM(CASE WHEN dirty = 1 THEN 1 ELSE 0 END) AS dirty,
           SUM(CASE WHEN remote_key IS NULL THEN 1 ELSE 0 END) AS local_only,
           SUM(CASE WHEN deleted = 1 THEN 1 ELSE 0 END) AS tombstoned
         FROM issues WHERE project_id = ?`
      )
      .get(projectId);
    return {
      total: row?.total ?? 0,
      dirty: row?.dirty ?? 0,
      localOnly: row?.local_only ?? 0,
      tombstoned: row?.tombstoned ?? 0,
    };
  }

  /**
   * Identity rule shared with bulk import: the local id wins when it names
   * an existing record, then the remote key, else a new local-only record.
   */
  resolveIssueIdentity(projectId: number, kind: IssueKind, hint: IdentityHint): IdentityResolution {
    if (hint.localId !== undefined && hint.localId !== null) {
      const header = this.getHeader(hint.localId);
      if (header && header.projectId === projectId && header.kind === kind) {
        return { action: 'update', issueId: header.id, via: 'localId' };
      }
    }
    if (hint.remoteKey) {
      const header = this.findIssue(projectId, kind, hint.remoteKey);
      if (header) {
        return { action: 'update', issueId: header.id, via: 'remoteKey' };
      }
    }
    return { action: 'create-local' };
  }

  // ---------------------------------------------------------------------
  // Child collections
  // ---------------------------------------------------------------------

  listSteps(issueId: number): StoredStep[] {
    return this.db
      .prepare<[number], StepRowDb>(
        `SELECT uid, group_no, order_no, action, input, expected FROM steps
         WHERE issue_id = ? ORDER BY group_no, order_no`
      )
      .all(issueId)
      .map((row) => ({
        uid: row.uid,
        group: row.group_no,
        order: row.order_no,
        action: row.action,
        input: row.input,
        expected: row.expected,
      }));
  }

  listMemberships(planId: number): Array<MembershipRow & { testCaseKey: string | null }> {
    return this.db
      .prepare<[number], MembershipRowDb>(
        `SELECT m.test_case_id, COALESCE(i.remote_key, m.test_case_key) AS test_case_key, m.order_no
         FROM plan_memberships m LEFT JOIN issues i ON i.id = m.test_case_id
         WHERE m.plan_id = ? ORDER BY m.order_no, m.rowid`
      )
      .all(planId)
      .map((row) => ({ testCaseId: row.test_case_id, testCaseKey: row.test_case_key, order: row.order_no }));
  }

  listRelations(issueId: number): Array<RelationRow & { targetKey: string | null }> {
    return this.db
      .prepare<[number], RelationRowDb>(
        `SELECT r.dst_id, COALESCE(i.remote_key, r.dst_key) AS dst_key, r.relation_type
         FROM relations r LEFT JOIN issues i ON i.id = r.dst_id
         WHERE r.src_id = ? ORDER BY r.rowid`
      )
      .all(issueId)
      .map((row) => ({ targetId: row.dst_id, targetKey: row.dst_key, relationType: row.relation_type }));
  }

  getExecution(issueId: number): (ExecutionRow & {
    details: Array<ExecutionDetailRow & { testCaseKey: string | null }>;
  }) | null {
    const execution = this.db
      .prepare<[number], ExecutionRowDb>(`SELECT id, test_plan_id FROM executions WHERE issue_id = ?`)
      .get(issueId);
    if (!execution) {
      return null;
    }
    const stepStmt = this.db.prepare<[number], StepExecutionRowDb>(
      `SELECT group_no, order_no, step_uid, status, actual_result, comment
       FROM step_executions WHERE detail_id = ? ORDER BY group_no, order_no`
    );
    const details = this.db
      .prepare<[number], DetailRowDb>(
        `SELECT d.*, i.remote_key AS test_case_key
         FROM execution_details d JOIN issues i ON i.id = d.test_case_id
         WHERE d.execution_id = ? ORDER BY d.order_no, d.id`
      )
      .all(execution.id)
      .map((row) => ({
        testCaseId: row.test_case_id,
        testCaseKey: row.test_case_key,
        executionKey: row.execution_key,
        order: row.order_no,
        assignee: row.assignee,
        result: row.result,
        environment: row.environment,
        defects: parseList(row.defects_json),
        actualTime: row.actual_time,
        stepResults: stepStmt.all(row.id).map((step) => ({
          group: step.group_no,
          order: step.order_no,
          stepUid: step.step_uid,
          status: step.status,
          actualResult: step.actual_result,
          comment: step.comment,
        })),
      }));
    return { testPlanId: execution.test_plan_id, details };
  }

  /** Delete every row of a collection owned by `ownerId`; returns the count. */
  deleteChildren(ownerId: number, childKind: ChildCollection): number {
    switch (childKind) {
      case 'steps':
        return this.db.prepare<[number]>(`DELETE FROM steps WHERE issue_id = ?`).run(ownerId).changes;
      case 'planMemberships':
        return this.db.prepare<[number]>(`DELETE FROM plan_memberships WHERE plan_id = ?`).run(ownerId).changes;
      case 'relations':
        return this.db.prepare<[number]>(`DELETE FROM relations WHERE src_id = ?`).run(ownerId).changes;
      case 'executions':
        return this.db.prepare<[number]>(`DELETE FROM executions WHERE issue_id = ?`).run(ownerId).changes;
    }
  }

  insertStep(ownerId: number, row: StepRow): void {
    this.db
      .prepare<[string, number, number, number, string, string, string]>(
        `INSERT INTO steps (uid, issue_id, group_no, order_no, action, input, expected)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(row.uid, ownerId, row.group, row.order, row.action, row.input, row.expected);
  }

  insertMembership(ownerId: number, row: MembershipRow): void {
    this.db
      .prepare<[number, number | null, string | null, number]>(
        `INSERT INTO plan_memberships (plan_id, test_case_id, test_case_key, order_no) VALUES (?, ?, ?, ?)`
      )
      .run(ownerId, row.testCaseId, row.testCaseKey ?? null, row.order);
  }

  insertRelation(ownerId: number, row: RelationRow): void {
    this.db
      .prepare<[number, number | null, string | null, string]>(
        `INSERT INTO relations (src_id, dst_id, dst_key, relation_type) VALUES (?, ?, ?, ?)`
      )
      .run(ownerId, row.targetId, row.targetKey ?? null, row.relationType);
  }

  insertExecution(ownerId: number, row: ExecutionRow): void {
    const executionId = Number(
      this.db
        .prepare<[number, number | null]>(`INSERT INTO executions (issue_id, test_plan_id) VALUES (?, ?)`)
        .run(ownerId, row.testPlanId).lastInsertRowid
    );
    const detailStmt = this.db.prepare<[number, number, string, number, string, string, string, string, string]>(
      `INSERT INTO execution_details (
         execution_id, test_case_id, execution_key, order_no, assignee, result,
         environment, defects_json, actual_time
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const stepStmt = this.db.prepare<[number, number, number, string | null, string, string, string]>(
      `INSERT INTO step_executions (detail_id, group_no, order_no, step_uid, status, actual_result, comment)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    for (const detail of row.details) {
      const detailId = Number(
        detailStmt.run(
          executionId,
          detail.testCaseId,
          detail.executionKey,
          detail.order,
          detail.assignee,
          detail.result,
          detail.environment,
          JSON.stringify(detail.defects),
          detail.actualTime
        ).lastInsertRowid
      );
      for (const step of detail.stepResults) {
        stepStmt.run(detailId, step.group, step.order, step.stepUid, step.status, step.actualResult, step.comment);
      }
    }
  }

  // ---------------------------------------------------------------------
  // Sync state
  // ---------------------------------------------------------------------

  getCheckpoint(projectId: number): SyncCheckpoint {
    const row = this.db
      .prepare<[number], SyncStateRow>(
        `SELECT last_full_sync_at, last_tree_sync_at, last_issue_sync_at FROM sync_state WHERE project_id = ?`
      )
      .get(projectId);
    return {
      lastFullSyncAt: row?.last_full_sync_at ?? null,
      lastTreeSyncAt: row?.last_tree_sync_at ?? null,
      lastIssueSyncAt: row?.last_issue_sync_at ?? null,
    };
  }

  setCheckpoint(projectId: number, column: CheckpointColumn, at: string): void {
    this.db.prepare<[number]>(`INSERT OR IGNORE INTO sync_state (project_id) VALUES (?)`).run(projectId);
    this.db.prepare<[string, number]>(`UPDATE sync_state SET ${column} = ? WHERE project_id = ?`).run(at, projectId);
  }

  /**
   * Point references held only by key at the record that now carries the
   * key: relations from any kind, memberships to a test case, and the test
   * plan of an execution.
   */
  private bindPendingReferences(projectId: number, kind: IssueKind, remoteKey: string, id: number): void {
    const inProject = `SELECT id FROM issues WHERE project_id = @project_id`;
    const params = { id, key: remoteKey, project_id: projectId };
    this.db
      .prepare<[typeof params]>(
        `UPDATE OR IGNORE relations SET dst_id = @id
         WHERE dst_id IS NULL AND dst_key = @key AND src_id IN (${inProject})`
      )
      .run(params);
    if (kind === 'TEST_CASE') {
      this.db
        .prepare<[typeof params]>(
          `UPDATE OR IGNORE plan_memberships SET test_case_id = @id
           WHERE test_case_id IS NULL AND test_case_key = @key AND plan_id IN (${inProject})`
        )
        .run(params);
    }
    if (kind === 'TEST_PLAN') {
      this.db
        .prepare<[typeof params]>(
          `UPDATE executions SET test_plan_id = @id
           WHERE test_plan_id IS NULL
             AND issue_id IN (${inProject} AND test_plan_key = @key)`
        )
        .run(params);
    }
  }

  private assembleContent(row: IssueRow): NormalizedContent {
    const fields: CommonFields = {
      summary: row.summary,
      description: row.description,
      status: row.status,
      priority: row.priority,
      assignee: row.assignee,
      reporter: row.reporter,
      labels: parseList(row.labels_json),
      components: parseList(row.components_json),
      versions: parseList(row.versions_json),
      environment: row.environment,
      timeEstimate: row.time_estimate,
      dueDate: row.due_date,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };

    const relations: Relation[] = [];
    for (const relation of this.listRelations(row.id)) {
      if (relation.targetKey !== null) {
        relations.push({ relationType: relation.relationType, targetKey: relation.targetKey });
      }
    }

    return { fields, detail: this.assembleDetail(row), relations };
  }

  private assembleDetail(row: IssueRow): KindDetail {
    const kind = toKind(row.kind);
    switch (kind) {
      case 'REQUIREMENT':
        return { kind, epicName: row.epic_name ?? '' };
      case 'TEST_CASE':
        return {
          kind,
          preconditions: row.preconditions ?? '',
          steps: this.listSteps(row.id).map(({ group, order, action, input, expected }) => ({
            group,
            order,
            action,
            input,
            expected,
          })),
        };
      case 'TEST_PLAN': {
        const memberships: PlanMembership[] = [];
        for (const membership of this.listMemberships(row.id)) {
          if (membership.testCaseKey !== null) {
            memberships.push({ testCaseKey: membership.testCaseKey, order: membership.order });
          }
        }
        return { kind, memberships };
      }
      case 'TEST_EXECUTION': {
        const execution = this.getExecution(row.id);
        const details: ExecutionDetail[] = [];
        for (const detail of execution?.details ?? []) {
          if (detail.testCaseKey === null) continue;
          details.push({
            testCaseKey: detail.testCaseKey,
            executionKey: detail.executionKey,
            order: detail.order,
            assignee: detail.assignee,
            result: detail.result,
            environment: detail.environment,
            defects: detail.defects,
            actualTime: detail.actualTime,
            stepResults: detail.stepResults.map(({ group, order, status, actualResult, comment }) => ({
              group,
              order,
              status,
              actualResult,
              comment,
            })),
          });
        }
        return {
          kind,
          testPlanKey: row.test_plan_key ?? '',
          result: row.execution_result ?? '',
          details,
        };
      }
      case 'DEFECT':
        return { kind, issueTypeId: row.issue_type_id ?? '' };
    }
  }
}
