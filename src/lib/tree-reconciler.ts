/**
 * Walks a remote folder/issue tree against the local mirror and computes
 * create / update / tombstone / unchanged per node
 */

import { DetailReplacer } from './detail-replacer';
import { IdentityConflictError, errorMessage } from './errors';
import { FieldMapper, emptyContent } from './field-mapper';
import { Logger, silentLogger } from './logger';
import { RecordStore } from './record-store';
import {
  ConflictPolicy,
  IssueHeader,
  IssueKind,
  NormalizedContent,
  ReconciliationResult,
  RemoteTree,
  SyncMode,
} from './types';

type Json = Record<string, unknown>;

const isRecord = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Outcome of fetching one issue's full payload ahead of reconciliation. */
export type DetailFetch = { payload: unknown } | { error: string };

export interface ReconcileOptions {
  mode?: SyncMode;
  /** Full payloads keyed by remote key; when absent the tree node itself is mapped */
  details?: Map<string, DetailFetch>;
  signal?: AbortSignal;
  conflictPolicy?: ConflictPolicy;
}

export interface FolderNode {
  type: 'folder';
  remoteId: string;
  name: string;
  sortOrder: number;
  children: unknown[];
}

export interface IssueNode {
  type: 'issue';
  key: string;
  remoteId: number;
  summary: string;
  sortOrder: number;
  raw: Json;
}

export type TreeNode = FolderNode | IssueNode;

export type SingleIssueOutcome = 'created' | 'updated' | 'unchanged' | 'conflict';

/**
 * Classify a raw tree node: folders carry a folder name (or type FOLDER),
 * issues a numeric remote id. Anything else is null.
 */
export function parseTreeNode(node: unknown, index: number): TreeNode | null {
  if (!isRecord(node)) {
    return null;
  }
  const children = Array.isArray(node.children) ? node.children : [];
  const order =
    typeof node.order === 'number' ? node.order : typeof node.position === 'number' ? node.position : index;

  if (typeof node.folderName === 'string' || node.type === 'FOLDER') {
    const id = node.id ?? node.folderId;
    if (typeof id !== 'string' && typeof id !== 'number') {
      return null;
    }
    const name = typeof node.folderName === 'string' ? node.folderName : typeof node.name === 'string' ? node.name : '';
    return { type: 'folder', remoteId: String(id), name, sortOrder: order, children };
  }

  const remoteId = typeof node.issueId === 'number' ? node.issueId : node.jiraId;
  if (typeof remoteId !== 'number') {
    return null;
  }
  const key = [node.testKey, node.jiraKey, node.key].find(
    (candidate): candidate is string => typeof candidate === 'string' && candidate !== ''
  );
  if (!key) {
    return null;
  }
  const summary = typeof node.summary === 'string' ? node.summary : typeof node.name === 'string' ? node.name : '';
  return { type: 'issue', key, remoteId, summary, sortOrder: order, raw: node };
}

/** Remote keys of every issue node in a forest, depth-first. */
export function collectIssueKeys(roots: unknown[]): string[] {
  const keys: string[] = [];
  const walk = (nodes: unknown[]): void => {
    nodes.forEach((raw, index) => {
      const node = parseTreeNode(raw, index);
      if (node?.type === 'issue') keys.push(node.key);
      if (node?.type === 'folder') walk(node.children);
    });
  };
  walk(roots);
  return keys;
}

interface Pass {
  projectId: number;
  kind: IssueKind;
  mode: SyncMode;
  details?: Map<string, DetailFetch>;
  policy: ConflictPolicy;
  result: ReconciliationResult;
  visitedFolders: Set<string>;
  visitedIssues: Set<string>;
}

export class TreeReconciler {
  private readonly store: RecordStore;
  private readonly mapper: FieldMapper;
  private readonly logger: Logger;
  private readonly replacer: DetailReplacer;

  constructor(store: RecordStore, mapper: FieldMapper, logger: Logger = silentLogger) {
    this.store = store;
    this.mapper = mapper;
    this.logger = logger;
    this.replacer = new DetailReplacer(store, logger);
  }

  /**
   * Reconcile one kind scope. Each node is written in its own transaction,
   * together with its child collections and fingerprint. Unvisited
   * remote-bound nodes are tombstoned only after a traversal that was not
   * cancelled.
   */
  reconcile(projectId: number, tree: RemoteTree, options: ReconcileOptions = {}): ReconciliationResult {
    const pass: Pass = {
      projectId,
      kind: tree.kind,
      mode: options.mode ?? 'full',
      details: options.details,
      policy: options.conflictPolicy ?? 'overwrite',
      result: {
        created: 0,
        updated: 0,
        tombstoned: 0,
        unchanged: 0,
        failed: [],
        conflicts: [],
        warnings: [],
        cancelled: false,
      },
      visitedFolders: new Set(),
      visitedIssues: new Set(),
    };

    if (options.signal?.aborted) {
      pass.result.cancelled = true;
    }
    for (let index = 0; index < tree.roots.length && !pass.result.cancelled; index++) {
      if (options.signal?.aborted) {
        pass.result.cancelled = true;
        this.logger.warn(`Reconciliation of ${tree.kind} cancelled after ${index} top-level node(s)`);
        break;
      }
      this.visit(pass, tree.roots[index], index, null);
    }

    if (!pass.result.cancelled) {
      this.tombstoneUnvisited(pass);
    }

    const { created, updated, tombstoned, unchanged, failed } = pass.result;
    this.logger.debug(`Reconciled ${tree.kind}`, {
      created,
      updated,
      tombstoned,
      unchanged,
      failed: failed.length,
    });
    return pass.result;
  }

  /**
   * Reconcile a single issue payload outside a tree pass. Unknown issues are
   * created at the kind root; known ones keep their placement.
   */
  reconcileIssue(
    projectId: number,
    kind: IssueKind,
    key: string,
    payload: unknown,
    conflictPolicy: ConflictPolicy = 'overwrite'
  ): { outcome: SingleIssueOutcome; issueId: number; content: NormalizedContent; warnings: string[] } {
    const existing = this.store.findIssueByKey(projectId, key);
    if (existing && existing.kind !== kind) {
      throw new IdentityConflictError(key, kind, `${key} is already held by a ${existing.kind}`);
    }
    const mapped = this.mapper.toLocal(kind, payload);
    const fingerprint = this.mapper.fingerprint(mapped.content);
    const remoteId = isRecord(payload) && typeof payload.issueId === 'number' ? payload.issueId : null;

    const warnings = [...mapped.warnings];

    return this.store.transaction(() => {
      if (!existing) {
        const issueId = this.store.insertRemoteIssue({
          projectId,
          kind,
          remoteKey: key,
          remoteId,
          folderId: null,
          sortOrder: null,
          content: mapped.content,
          fingerprint,
        });
        this.storeChildren(projectId, issueId, mapped.content, warnings);
        return { outcome: 'created' as const, issueId, content: mapped.content, warnings };
      }
      const outcome = this.overwrite(
        projectId,
        existing,
        {
          remoteId,
          folderId: existing.folderId,
          sortOrder: existing.sortOrder,
          content: mapped.content,
          fingerprint,
          policy: conflictPolicy,
        },
        warnings
      );
      return { outcome, issueId: existing.id, content: mapped.content, warnings };
    });
  }

  /** Take remote content over a local record, as when a conflict is settled for the remote side. */
  acceptRemote(projectId: number, header: IssueHeader, content: NormalizedContent): string[] {
    const warnings: string[] = [];
    this.store.transaction(() => {
      this.store.applyRemoteContent(header.id, {
        remoteId: header.remoteId,
        folderId: header.folderId,
        sortOrder: header.sortOrder,
        content,
        fingerprint: this.mapper.fingerprint(content),
      });
      this.storeChildren(projectId, header.id, content, warnings);
    });
    return warnings;
  }

  private visit(pass: Pass, raw: unknown, index: number, parentId: string | null): void {
    const node = parseTreeNode(raw, index);
    if (!node) {
      pass.result.warnings.push(`${pass.kind} tree: skipped unrecognized node at position ${index}`);
      return;
    }

    try {
      if (node.type === 'folder') {
        const folderId = this.visitFolder(pass, node, parentId);
        node.children.forEach((child, childIndex) => this.visit(pass, child, childIndex, folderId));
      } else {
        this.visitIssue(pass, node, parentId);
      }
    } catch (error) {
      const key = node.type === 'folder' ? `folder:${node.remoteId}` : node.key;
      pass.result.failed.push({ key, kind: pass.kind, error: errorMessage(error) });
      this.logger.warn(`Skipped ${key}: ${errorMessage(error)}`);
      this.protect(pass, node);
    }
  }

  private visitFolder(pass: Pass, node: FolderNode, parentId: string | null): string {
    if (pass.visitedFolders.has(node.remoteId)) {
      throw new IdentityConflictError(node.remoteId, pass.kind, `folder ${node.remoteId} appears twice in the tree`);
    }
    const claims = this.store.findFoldersByRemoteId(pass.projectId, node.remoteId);
    const foreign = claims.find((folder) => folder.kind !== pass.kind);
    if (foreign) {
      throw new IdentityConflictError(
        node.remoteId,
        pass.kind,
        `folder ${node.remoteId} already belongs to the ${foreign.kind} tree`
      );
    }
    pass.visitedFolders.add(node.remoteId);

    const existing = claims.find((folder) => folder.kind === pass.kind);
    return this.store.transaction(() => {
      if (!existing) {
        const created = this.store.insertFolder({
          projectId: pass.projectId,
          kind: pass.kind,
          remoteId: node.remoteId,
          parentId,
          name: node.name,
          sortOrder: node.sortOrder,
        });
        pass.result.created++;
        return created.id;
      }
      if (
        existing.name !== node.name ||
        existing.parentId !== parentId ||
        existing.sortOrder !== node.sortOrder ||
        existing.deleted
      ) {
        this.store.updateFolder(existing.id, { parentId, name: node.name, sortOrder: node.sortOrder });
        pass.result.updated++;
      } else {
        pass.result.unchanged++;
      }
      return existing.id;
    });
  }

  private visitIssue(pass: Pass, node: IssueNode, folderId: string | null): void {
    if (pass.visitedIssues.has(node.key)) {
      throw new IdentityConflictError(node.key, pass.kind, `${node.key} appears twice in the tree`);
    }
    const existing = this.store.findIssueByKey(pass.projectId, node.key);
    if (existing && existing.kind !== pass.kind) {
      throw new IdentityConflictError(node.key, pass.kind, `${node.key} is already held by a ${existing.kind}`);
    }
    pass.visitedIssues.add(node.key);

    if (pass.mode === 'structure') {
      this.store.transaction(() => this.placeIssue(pass, node, folderId, existing));
      return;
    }

    let payload: unknown = node.raw;
    if (pass.details) {
      const fetched = pass.details.get(node.key);
      if (!fetched) {
        throw new Error('no detail payload was fetched');
      }
      if ('error' in fetched) {
        throw new Error(fetched.error);
      }
      payload = fetched.payload;
    }

    const mapped = this.mapper.toLocal(pass.kind, payload);
    pass.result.warnings.push(...mapped.warnings);
    const fingerprint = this.mapper.fingerprint(mapped.content);

    this.store.transaction(() => {
      if (!existing) {
        const issueId = this.store.insertRemoteIssue({
          projectId: pass.projectId,
          kind: pass.kind,
          remoteKey: node.key,
          remoteId: node.remoteId,
          folderId,
          sortOrder: node.sortOrder,
          content: mapped.content,
          fingerprint,
        });
        this.storeChildren(pass.projectId, issueId, mapped.content, pass.result.warnings);
        pass.result.created++;
        return;
      }

      const outcome = this.overwrite(
        pass.projectId,
        existing,
        {
          remoteId: node.remoteId,
          folderId,
          sortOrder: node.sortOrder,
          content: mapped.content,
          fingerprint,
          policy: pass.policy,
        },
        pass.result.warnings
      );
      if (outcome === 'unchanged') {
        pass.result.unchanged++;
      } else if (outcome === 'conflict') {
        const local = this.store.getIssue(existing.id);
        pass.result.conflicts.push({
          issueId: existing.id,
          key: node.key,
          kind: pass.kind,
          local: local ? local.content : emptyContent(pass.kind),
          remote: mapped.content,
        });
      } else {
        pass.result.updated++;
      }
    });
  }

  /**
   * Last-writer-wins overwrite. A dirty record is overwritten too unless the
   * policy keeps local edits; then it is a conflict only if the remote side
   * changed as well.
   */
  private overwrite(
    projectId: number,
    existing: IssueHeader,
    incoming: {
      remoteId: number | null;
      folderId: string | null;
      sortOrder: number | null;
      content: NormalizedContent;
      fingerprint: string;
      policy: ConflictPolicy;
    },
    warnings: string[]
  ): Exclude<SingleIssueOutcome, 'created'> {
    const remoteChanged =
      existing.remoteFingerprint !== incoming.fingerprint ||
      existing.deleted ||
      existing.folderId !== incoming.folderId ||
      existing.sortOrder !== incoming.sortOrder;
    if (existing.dirty && incoming.policy === 'keep-local') {
      return remoteChanged ? 'conflict' : 'unchanged';
    }
    if (!remoteChanged && !existing.dirty) {
      return 'unchanged';
    }
    if (existing.dirty) {
      this.logger.warn(`Local edits to ${existing.remoteKey ?? existing.id} overwritten by remote`);
    }
    this.store.applyRemoteContent(existing.id, {
      remoteId: incoming.remoteId,
      folderId: incoming.folderId,
      sortOrder: incoming.sortOrder,
      content: incoming.content,
      fingerprint: incoming.fingerprint,
    });
    this.storeChildren(projectId, existing.id, incoming.content, warnings);
    return 'updated';
  }

  /**
   * Child collections of a record just written from remote content. When
   * some rows could not be stored the fingerprint is dropped, so the next
   * pull writes the record again.
   */
  private storeChildren(projectId: number, issueId: number, content: NormalizedContent, warnings: string[]): void {
    const applied = this.replacer.applyContent(projectId, issueId, content);
    warnings.push(...applied.warnings);
    if (!applied.complete) {
      this.store.invalidateFingerprint(issueId);
    }
  }

  /** Structure-only pass: placement, and the summary of clean records. */
  private placeIssue(pass: Pass, node: IssueNode, folderId: string | null, existing: IssueHeader | null): void {
    if (!existing) {
      const content = emptyContent(pass.kind);
      content.fields.summary = node.summary;
      this.store.insertRemoteIssue({
        projectId: pass.projectId,
        kind: pass.kind,
        remoteKey: node.key,
        remoteId: node.remoteId,
        folderId,
        sortOrder: node.sortOrder,
        content,
        fingerprint: null,
        partial: true,
      });
      pass.result.created++;
      return;
    }

    const current = this.store.getIssue(existing.id);
    const summaryChanged = !existing.dirty && current !== null && current.content.fields.summary !== node.summary;
    const placementChanged =
      existing.folderId !== folderId || existing.sortOrder !== node.sortOrder || existing.deleted;
    if (!summaryChanged && !placementChanged) {
      pass.result.unchanged++;
      return;
    }
    this.store.applyRemotePlacement(existing.id, {
      folderId,
      sortOrder: node.sortOrder,
      summary: summaryChanged ? node.summary : null,
    });
    pass.result.updated++;
  }

  /** Mark a skipped subtree as seen so it is not tombstoned. */
  private protect(pass: Pass, node: TreeNode): void {
    if (node.type === 'issue') {
      pass.visitedIssues.add(node.key);
      return;
    }
    pass.visitedFolders.add(node.remoteId);
    node.children.forEach((raw, index) => {
      const child = parseTreeNode(raw, index);
      if (child) this.protect(pass, child);
    });
  }

  private tombstoneUnvisited(pass: Pass): void {
    for (const folder of this.store.listRemoteBoundFolders(pass.projectId, pass.kind)) {
      if (folder.remoteId !== null && !pass.visitedFolders.has(folder.remoteId)) {
        this.store.tombstoneFolder(folder.id);
        pass.result.tombstoned++;
      }
    }
    for (const issue of this.store.listRemoteBoundIssues(pass.projectId, pass.kind)) {
      if (issue.remoteKey !== null && !pass.visitedIssues.has(issue.remoteKey)) {
        this.store.tombstoneIssue(issue.id);
        pass.result.tombstoned++;
      }
    }
  }
}
