import { RecordStore } from '../../src/lib/record-store';
import { SyncStateTracker } from '../../src/lib/sync-state';
import { ProjectRecord } from '../../src/lib/types';

describe('SyncStateTracker', () => {
  let store: RecordStore;
  let tracker: SyncStateTracker;
  let project: ProjectRecord;
  let now: string;

  beforeEach(() => {
    now = '2024-06-01T00:00:00.000Z';
    store = new RecordStore(':memory:', { clock: () => now });
    tracker = new SyncStateTracker(store);
    project = store.ensureProject('PRJ', 1);
  });

  afterEach(() => {
    store.close();
  });

  it('should record each checkpoint kind in its own column', () => {
    expect(tracker.markSynced(project.id, 'full')).toBe('2024-06-01T00:00:00.000Z');
    now = '2024-06-02T00:00:00.000Z';
    tracker.markSynced(project.id, 'issue');

    expect(tracker.getCheckpoint(project.id)).toEqual({
      lastFullSyncAt: '2024-06-01T00:00:00.000Z',
      lastTreeSyncAt: null,
      lastIssueSyncAt: '2024-06-02T00:00:00.000Z',
    });
  });

  it('should move an issue between clean and dirty', () => {
    const id = store.createLocalIssue(project.id, 'REQUIREMENT', null);
    expect(tracker.isDirty(id)).toBe(true);

    now = '2024-06-03T00:00:00.000Z';
    tracker.clearDirty(id);
    expect(tracker.isDirty(id)).toBe(false);
    expect(store.getHeader(id)?.lastSyncAt).toBe('2024-06-03T00:00:00.000Z');

    tracker.markDirty(id);
    expect(tracker.listDirty(project.id).map((h) => h.id)).toEqual([id]);
  });

  it('should throw for unknown issues', () => {
    expect(() => tracker.isDirty(77)).toThrow('Issue 77 not found');
    expect(() => tracker.markDirty(77)).toThrow('Issue 77 not found');
    expect(() => tracker.clearDirty(77)).toThrow('Issue 77 not found');
  });
});
