/**
 * Sync engine: pull (full, structure-only, single issue) and push runs
 * between the local mirror and the remote repository
 */

import { errorMessage } from './errors';
import { FieldMapper } from './field-mapper';
import { Logger, silentLogger } from './logger';
import { IssueCounts, RecordStore } from './record-store';
import { SyncStateTracker } from './sync-state';
import { DetailFetch, TreeReconciler, collectIssueKeys } from './tree-reconciler';
import {
  ConflictPolicy,
  ConflictResolution,
  ISSUE_KINDS,
  IssueHeader,
  IssueKind,
  LOCAL_PROJECT_KEY,
  ProjectRecord,
  RemoteIssueService,
  SyncCheckpoint,
  SyncConflict,
  SyncMode,
  SyncReport,
} from './types';

export interface PullOptions {
  kinds?: readonly IssueKind[];
  mode?: SyncMode;
  conflictPolicy?: ConflictPolicy;
  signal?: AbortSignal;
}

export interface PushOptions {
  signal?: AbortSignal;
}

export interface MirrorStatus {
  project: ProjectRecord;
  counts: IssueCounts;
  checkpoint: SyncCheckpoint;
  dirty: IssueHeader[];
}

const DETAIL_BATCH_SIZE = 10;

const emptyReport = (): SyncReport => ({
  created: 0,
  updated: 0,
  tombstoned: 0,
  unchanged: 0,
  failed: [],
  conflicts: [],
  warnings: [],
  cancelled: false,
});

export class SyncEngine {
  private readonly remote: RemoteIssueService;
  private readonly store: RecordStore;
  private readonly mapper: FieldMapper;
  private readonly logger: Logger;
  private readonly reconciler: TreeReconciler;
  private readonly tracker: SyncStateTracker;

  constructor(
    remote: RemoteIssueService,
    store: RecordStore,
    mapper: FieldMapper = new FieldMapper(),
    logger: Logger = silentLogger
  ) {
    this.remote = remote;
    this.store = store;
    this.mapper = mapper;
    this.logger = logger;
    this.reconciler = new TreeReconciler(store, mapper, logger);
    this.tracker = new SyncStateTracker(store);
  }

  /**
   * Pull every requested kind scope. Links to issues of a scope that is not
   * mirrored yet are kept by key and bound when the target arrives. The
   * checkpoint is only recorded for a run that was neither cancelled nor
   * lost a whole scope.
   */
  async pull(project: ProjectRecord, options: PullOptions = {}): Promise<SyncReport> {
    this.requireRemoteProject(project);
    const kinds = options.kinds ?? ISSUE_KINDS;
    const mode = options.mode ?? 'full';
    const { signal } = options;
    const report = emptyReport();
    let scopeFailed = false;

    for (const kind of kinds) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }

      let roots: unknown[];
      try {
        roots = await this.remote.getTree(kind);
      } catch (error) {
        scopeFailed = true;
        report.failed.push({ key: `tree:${kind}`, kind, error: errorMessage(error) });
        this.logger.warn(`Could not fetch the ${kind} tree: ${errorMessage(error)}`);
        continue;
      }

      const details = mode === 'full' ? await this.fetchDetails(kind, collectIssueKeys(roots), signal) : undefined;
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }

      const result = this.reconciler.reconcile(
        project.id,
        { kind, roots },
        { mode, details, signal, conflictPolicy: options.conflictPolicy }
      );
      report.created += result.created;
      report.updated += result.updated;
      report.tombstoned += result.tombstoned;
      report.unchanged += result.unchanged;
      report.failed.push(...result.failed);
      report.conflicts.push(...result.conflicts);
      report.warnings.push(...result.warnings);
      if (result.cancelled) {
        report.cancelled = true;
        break;
      }
    }

    if (!report.cancelled && !scopeFailed) {
      this.tracker.markSynced(project.id, mode === 'full' ? 'full' : 'tree');
    }
    this.logger.info(
      `Pulled ${project.key}: ${report.created} created, ${report.updated} updated, ` +
        `${report.tombstoned} tombstoned, ${report.unchanged} unchanged, ${report.failed.length} failed`
    );
    return report;
  }

  /**
   * Pull one issue by key. Unknown issues are created at the kind root;
   * known ones are overwritten in place.
   */
  async pullIssue(
    project: ProjectRecord,
    kind: IssueKind,
    key: string,
    conflictPolicy: ConflictPolicy = 'overwrite'
  ): Promise<SyncReport> {
    this.requireRemoteProject(project);
    const report = emptyReport();

    try {
      const payload = await this.remote.getIssue(kind, key);
      const { outcome, issueId, content, warnings } = this.reconciler.reconcileIssue(
        project.id,
        kind,
        key,
        payload,
        conflictPolicy
      );
      report.warnings.push(...warnings);

      switch (outcome) {
        case 'created':
          report.created++;
          break;
        case 'updated':
          report.updated++;
          break;
        case 'unchanged':
          report.unchanged++;
          break;
        case 'conflict': {
          const local = this.store.getIssue(issueId);
          if (local) {
            report.conflicts.push({ issueId, key, kind, local: local.content, remote: content });
          }
          break;
        }
      }
    } catch (error) {
      report.failed.push({ key, kind, error: errorMessage(error) });
      this.logger.warn(`Could not pull ${key}: ${errorMessage(error)}`);
    }

    if (report.failed.length === 0) {
      this.tracker.markSynced(project.id, 'issue');
    }
    return report;
  }

  /**
   * Push every dirty record: local-only ones are created and bound to the
   * returned identity, locally deleted ones are deleted remotely, the rest
   * are updated. Records that others link to go first. A record stays dirty
   * until the remote confirms it, and while it links to a local-only issue.
   */
  async push(project: ProjectRecord, options: PushOptions = {}): Promise<SyncReport> {
    this.requireRemoteProject(project);
    const report = emptyReport();
    const pending = this.tracker.listDirty(project.id);

    while (pending.length > 0) {
      if (options.signal?.aborted) {
        report.cancelled = true;
        break;
      }
      const header = this.takeNext(pending);
      const label = header.remoteKey ?? `local:${header.id}`;
      try {
        const outcome = await this.pushOne(project, header);
        report[outcome]++;
        const unsent = outcome === 'tombstoned' ? [] : this.store.listLocalOnlyReferences(header.id);
        if (unsent.length > 0) {
          const targets = unsent.map((id) => `#${id}`).join(', ');
          report.warnings.push(`${label}: links to local-only ${targets} were not sent; left dirty`);
        } else {
          this.tracker.clearDirty(header.id);
        }
        this.logger.debug(`Pushed ${label}`, { outcome });
      } catch (error) {
        report.failed.push({ key: label, kind: header.kind, error: errorMessage(error) });
        this.logger.warn(`Could not push ${label}: ${errorMessage(error)}`);
      }
    }

    this.logger.info(
      `Pushed ${project.key}: ${report.created} created, ${report.updated} updated, ` +
        `${report.tombstoned} deleted, ${report.failed.length} failed`
    );
    return report;
  }

  status(project: ProjectRecord): MirrorStatus {
    return {
      project,
      counts: this.store.countIssues(project.id),
      checkpoint: this.tracker.getCheckpoint(project.id),
      dirty: this.tracker.listDirty(project.id),
    };
  }

  /**
   * Settle a conflict reported by a keep-local pull. `remote` applies the
   * pulled content, `local` pushes the local record over the remote one.
   */
  async resolveConflict(project: ProjectRecord, conflict: SyncConflict, resolution: ConflictResolution): Promise<void> {
    if (resolution === 'skip') {
      return;
    }
    const header = this.store.getHeader(conflict.issueId);
    if (!header) {
      throw new Error(`Issue ${conflict.issueId} no longer exists`);
    }

    if (resolution === 'remote') {
      for (const warning of this.reconciler.acceptRemote(project.id, header, conflict.remote)) {
        this.logger.warn(warning);
      }
      return;
    }

    this.requireRemoteProject(project);
    await this.pushOne(project, header);
    this.tracker.clearDirty(header.id);
  }

  private async pushOne(project: ProjectRecord, header: IssueHeader): Promise<'created' | 'updated' | 'tombstoned'> {
    if (header.deleted) {
      if (header.remoteKey !== null) {
        await this.remote.deleteIssue(header.kind, header.remoteKey);
      }
      return 'tombstoned';
    }
    if (header.remoteKey !== null && !header.fullContent) {
      // An update carries every writable field; a placeholder would blank them
      throw new Error(`${header.remoteKey} holds only its tree summary; pull it in full before pushing`);
    }

    const record = this.store.getIssue(header.id);
    if (!record) {
      throw new Error(`Issue ${header.id} not found`);
    }
    const links = this.mapper.linkPatchesFor(record.content);

    if (header.remoteKey === null) {
      const folder = header.folderId ? this.store.getFolder(header.folderId) : null;
      const payload = this.mapper.toRemote(header.kind, record.content, {
        links,
        projectKey: project.key,
        parentKey: folder?.remoteId ?? undefined,
      });
      const created = await this.remote.createIssue(header.kind, payload);
      this.store.bindRemoteIdentity(header.id, created.testKey, created.issueId);
      return 'created';
    }

    await this.remote.updateIssue(header.kind, header.remoteKey, this.mapper.toRemote(header.kind, record.content, { links }));
    return 'updated';
  }

  /** Issue payloads for one scope, fetched in batches; failures are kept per key. */
  private async fetchDetails(
    kind: IssueKind,
    keys: string[],
    signal: AbortSignal | undefined
  ): Promise<Map<string, DetailFetch>> {
    const details = new Map<string, DetailFetch>();
    for (const chunk of this.chunkArray(keys, DETAIL_BATCH_SIZE)) {
      if (signal?.aborted) {
        break;
      }
      const fetched = await Promise.all(
        chunk.map(async (key): Promise<[string, DetailFetch]> => {
          try {
            return [key, { payload: await this.remote.getIssue(kind, key) }];
          } catch (error) {
            return [key, { error: errorMessage(error) }];
          }
        })
      );
      for (const [key, detail] of fetched) {
        details.set(key, detail);
      }
    }
    return details;
  }

  /** The first pending record whose link targets all have a remote identity, else the first one. */
  private takeNext(pending: IssueHeader[]): IssueHeader {
    const ready = pending.findIndex(
      (header) => header.deleted || this.store.listLocalOnlyReferences(header.id).length === 0
    );
    const [header] = pending.splice(Math.max(ready, 0), 1);
    return header;
  }

  private requireRemoteProject(project: ProjectRecord): void {
    if (project.key === LOCAL_PROJECT_KEY || project.remoteId === null) {
      throw new Error(`Project ${project.key} has no remote counterpart`);
    }
  }

  private chunkArray<T>(array: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size));
    }
    return chunks;
  }
}
