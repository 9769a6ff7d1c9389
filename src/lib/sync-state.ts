/**
 * Per-project checkpoints and per-issue dirty flags
 *
 * CLEAN → (local edit) → DIRTY → (confirmed push) → CLEAN. Pull never sets
 * the flag; a failed push leaves it set so the record is retried.
 */

import { CheckpointColumn, RecordStore } from './record-store';
import { CheckpointKind, IssueHeader, SyncCheckpoint } from './types';

const CHECKPOINT_COLUMNS: Record<CheckpointKind, CheckpointColumn> = {
  full: 'last_full_sync_at',
  tree: 'last_tree_sync_at',
  issue: 'last_issue_sync_at',
};

export class SyncStateTracker {
  private readonly store: RecordStore;

  constructor(store: RecordStore) {
    this.store = store;
  }

  markSynced(projectId: number, checkpoint: CheckpointKind): string {
    const at = this.store.now();
    this.store.setCheckpoint(projectId, CHECKPOINT_COLUMNS[checkpoint], at);
    return at;
  }

  getCheckpoint(projectId: number): SyncCheckpoint {
    return this.store.getCheckpoint(projectId);
  }

  isDirty(issueId: number): boolean {
    const header = this.store.getHeader(issueId);
    if (!header) {
      throw new Error(`Issue ${issueId} not found`);
    }
    return header.dirty;
  }

  markDirty(issueId: number): void {
    if (!this.store.setDirty(issueId, true)) {
      throw new Error(`Issue ${issueId} not found`);
    }
  }

  /** Call only once the remote has confirmed the push. */
  clearDirty(issueId: number): void {
    if (!this.store.setDirty(issueId, false)) {
      throw new Error(`Issue ${issueId} not found`);
    }
    this.store.touchSyncedAt(issueId);
  }

  listDirty(projectId: number): IssueHeader[] {
    return this.store.listDirty(projectId);
  }
}
