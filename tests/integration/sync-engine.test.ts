import { DetailReplacer } from '../../src/lib/detail-replacer';
import { RtmApiError } from '../../src/lib/errors';
import { FieldMapper } from '../../src/lib/field-mapper';
import { RecordStore } from '../../src/lib/record-store';
import { SyncEngine } from '../../src/lib/sync-engine';
import { ProjectRecord } from '../../src/lib/types';
import { FakeRemote, folderNode, issueNode } from '../helpers/fake-remote';

const NOW = '2024-06-01T00:00:00.000Z';

describe('SyncEngine', () => {
  let remote: FakeRemote;
  let store: RecordStore;
  let engine: SyncEngine;
  let project: ProjectRecord;

  beforeEach(() => {
    remote = new FakeRemote();
    remote.trees = {
      REQUIREMENT: [folderNode(1, 'Auth', [issueNode('R-1', 101, 'Login')])],
      TEST_CASE: [issueNode('TC-1', 201, 'Login test')],
    };
    remote.issues.set('R-1', {
      testKey: 'R-1',
      issueId: 101,
      summary: 'Login',
      testCasesCovered: [{ testKey: 'TC-1' }],
    });
    remote.issues.set('TC-1', {
      testKey: 'TC-1',
      issueId: 201,
      summary: 'Login test',
      stepGroups: [{ steps: [{ stepColumns: [{ name: 'Action', value: '<p>Open</p>' }] }] }],
      coveredRequirements: [{ testKey: 'R-1' }],
    });

    store = new RecordStore(':memory:', { clock: () => NOW });
    engine = new SyncEngine(remote, store);
    project = store.ensureProject('PRJ', 10);
  });

  afterEach(() => {
    store.close();
    jest.restoreAllMocks();
  });

  const idOf = (key: string): number => {
    const header = store.findIssueByKey(project.id, key);
    if (!header) {
      throw new Error(`${key} is not mirrored`);
    }
    return header.id;
  };

  describe('pull', () => {
    it('should mirror every kind and resolve links across kinds', async () => {
      const report = await engine.pull(project);

      expect(report).toMatchObject({ created: 3, updated: 0, tombstoned: 0, failed: [], conflicts: [], warnings: [] });
      expect(remote.callsTo('getTree')).toHaveLength(5);
      expect(remote.callsTo('getIssue').map((c) => c.key)).toEqual(['R-1', 'TC-1']);
      expect(store.listRelations(idOf('R-1'))).toEqual([
        { targetId: idOf('TC-1'), targetKey: 'TC-1', relationType: 'covers' },
      ]);
      expect(store.listRelations(idOf('TC-1'))).toEqual([
        { targetId: idOf('R-1'), targetKey: 'R-1', relationType: 'covered-by' },
      ]);
      expect(store.listSteps(idOf('TC-1')).map((s) => s.action)).toEqual(['Open']);
      expect(store.getCheckpoint(project.id).lastFullSyncAt).toBe(NOW);
    });

    it('should find nothing to change on a second pull', async () => {
      await engine.pull(project);

      const report = await engine.pull(project);

      expect(report).toMatchObject({ created: 0, updated: 0, tombstoned: 0, unchanged: 3 });
    });

    it('should isolate a failed tree fetch and skip the checkpoint', async () => {
      await engine.pull(project);
      store.setCheckpoint(project.id, 'last_full_sync_at', 'earlier');
      remote.failures.set('tree:TEST_CASE', new RtmApiError('RTM API error (503)', 503));

      const report = await engine.pull(project);

      expect(report.failed).toEqual([{ key: 'tree:TEST_CASE', kind: 'TEST_CASE', error: 'RTM API error (503)' }]);
      expect(report.tombstoned).toBe(0);
      expect(store.getHeader(idOf('TC-1'))?.deleted).toBe(false);
      expect(store.getCheckpoint(project.id).lastFullSyncAt).toBe('earlier');
    });

    it('should record per-issue fetch failures and still checkpoint', async () => {
      remote.failures.set('TC-1', new Error('timeout'));

      const report = await engine.pull(project);

      expect(report.created).toBe(2);
      expect(report.failed).toEqual([{ key: 'TC-1', kind: 'TEST_CASE', error: 'timeout' }]);
      expect(report.warnings).toEqual([]);
      expect(store.listRelations(idOf('R-1'))).toEqual([{ targetId: null, targetKey: 'TC-1', relationType: 'covers' }]);
      expect(store.getCheckpoint(project.id).lastFullSyncAt).toBe(NOW);
    });

    it('should bind links kept by key once a later pull brings their target', async () => {
      remote.failures.set('TC-1', new Error('timeout'));
      await engine.pull(project);
      remote.failures.delete('TC-1');

      const report = await engine.pull(project);

      expect(report).toMatchObject({ created: 1, updated: 0, unchanged: 2, failed: [] });
      expect(store.listRelations(idOf('R-1'))).toEqual([
        { targetId: idOf('TC-1'), targetKey: 'TC-1', relationType: 'covers' },
      ]);
    });

    it('should stop mid-scope without tombstoning or checkpointing when cancelled', async () => {
      await engine.pull(project);
      store.setCheckpoint(project.id, 'last_full_sync_at', 'earlier');
      remote.trees.REQUIREMENT = [issueNode('R-2', 102, 'Logout'), issueNode('R-3', 103, 'Reset')];
      remote.issues.set('R-2', { testKey: 'R-2', issueId: 102, summary: 'Logout' });
      remote.issues.set('R-3', { testKey: 'R-3', issueId: 103, summary: 'Reset' });
      const controller = new AbortController();
      const mapper = new FieldMapper();
      const toLocal = mapper.toLocal.bind(mapper);
      jest.spyOn(mapper, 'toLocal').mockImplementation((kind, payload) => {
        controller.abort();
        return toLocal(kind, payload);
      });

      const report = await new SyncEngine(remote, store, mapper).pull(project, { signal: controller.signal });

      expect(report).toMatchObject({ created: 1, tombstoned: 0, cancelled: true });
      expect(store.findIssueByKey(project.id, 'R-2')).not.toBeNull();
      expect(store.findIssueByKey(project.id, 'R-3')).toBeNull();
      expect(store.getHeader(idOf('R-1'))?.deleted).toBe(false);
      expect(store.findFoldersByRemoteId(project.id, '1')[0].deleted).toBe(false);
      expect(store.getCheckpoint(project.id).lastFullSyncAt).toBe('earlier');
    });

    it('should mirror only the structure when asked', async () => {
      const report = await engine.pull(project, { mode: 'structure' });

      expect(report.created).toBe(3);
      expect(remote.callsTo('getIssue')).toEqual([]);
      expect(store.listRelations(idOf('R-1'))).toEqual([]);
      expect(store.getCheckpoint(project.id)).toEqual({
        lastFullSyncAt: null,
        lastTreeSyncAt: NOW,
        lastIssueSyncAt: null,
      });
    });

    it('should pull only the requested kinds', async () => {
      await engine.pull(project, { kinds: ['TEST_CASE'] });

      expect(remote.callsTo('getTree').map((c) => c.kind)).toEqual(['TEST_CASE']);
      expect(store.findIssueByKey(project.id, 'R-1')).toBeNull();
    });

    it('should stop before contacting the remote when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const report = await engine.pull(project, { signal: controller.signal });

      expect(report.cancelled).toBe(true);
      expect(remote.calls).toEqual([]);
      expect(store.getCheckpoint(project.id).lastFullSyncAt).toBeNull();
    });

    it('should refuse the local project', async () => {
      await expect(engine.pull(store.localProject())).rejects.toThrow('Project LOCAL has no remote counterpart');
      await expect(engine.push(store.localProject())).rejects.toThrow('Project LOCAL has no remote counterpart');
    });
  });

  describe('pullIssue', () => {
    it('should create an unknown issue at the kind root', async () => {
      remote.issues.set('D-7', { testKey: 'D-7', issueId: 701, summary: 'Crash' });

      const report = await engine.pullIssue(project, 'DEFECT', 'D-7');

      expect(report.created).toBe(1);
      expect(store.getHeader(idOf('D-7'))).toMatchObject({ kind: 'DEFECT', folderId: null, remoteId: 701 });
      expect(store.getCheckpoint(project.id).lastIssueSyncAt).toBe(NOW);
    });

    it('should report a failed fetch without a checkpoint', async () => {
      const report = await engine.pullIssue(project, 'DEFECT', 'D-8');

      expect(report.failed).toEqual([{ key: 'D-8', kind: 'DEFECT', error: 'D-8 not found' }]);
      expect(store.getCheckpoint(project.id).lastIssueSyncAt).toBeNull();
    });
  });

  describe('conflicts', () => {
    beforeEach(async () => {
      await engine.pull(project);
      store.editIssue(idOf('R-1'), { fields: { summary: 'Local edit' } });
      remote.issues.set('R-1', {
        testKey: 'R-1',
        issueId: 101,
        summary: 'Remote edit',
        testCasesCovered: [{ testKey: 'TC-1' }],
      });
    });

    it('should report a conflict instead of overwriting under keep-local', async () => {
      const report = await engine.pullIssue(project, 'REQUIREMENT', 'R-1', 'keep-local');

      expect(report.conflicts).toHaveLength(1);
      expect(report.conflicts[0].local.fields.summary).toBe('Local edit');
      expect(report.conflicts[0].remote.fields.summary).toBe('Remote edit');
      expect(store.getHeader(idOf('R-1'))?.dirty).toBe(true);
    });

    it('should apply the remote side when resolved that way', async () => {
      const report = await engine.pull(project, { conflictPolicy: 'keep-local' });
      expect(report.conflicts.map((c) => c.key)).toEqual(['R-1']);

      await engine.resolveConflict(project, report.conflicts[0], 'remote');

      const issue = store.getIssue(idOf('R-1'));
      expect(issue?.content.fields.summary).toBe('Remote edit');
      expect(issue?.dirty).toBe(false);
      expect(issue?.content.relations).toEqual([{ relationType: 'covers', targetKey: 'TC-1' }]);
    });

    it('should push the local side when resolved that way', async () => {
      const report = await engine.pullIssue(project, 'REQUIREMENT', 'R-1', 'keep-local');

      await engine.resolveConflict(project, report.conflicts[0], 'local');

      const updates = remote.callsTo('updateIssue');
      expect(updates).toHaveLength(1);
      expect(updates[0].key).toBe('R-1');
      expect(updates[0].payload?.summary).toBe('Local edit');
      expect(store.getHeader(idOf('R-1'))?.dirty).toBe(false);
    });

    it('should leave a skipped conflict untouched', async () => {
      const report = await engine.pullIssue(project, 'REQUIREMENT', 'R-1', 'keep-local');

      await engine.resolveConflict(project, report.conflicts[0], 'skip');

      expect(remote.callsTo('updateIssue')).toEqual([]);
      expect(store.getIssue(idOf('R-1'))?.content.fields.summary).toBe('Local edit');
    });
  });

  describe('push', () => {
    it('should create local-only records and bind the returned identity', async () => {
      const id = store.createLocalIssue(project.id, 'REQUIREMENT', null, { fields: { summary: 'New req' } });

      const report = await engine.push(project);

      expect(report.created).toBe(1);
      expect(remote.callsTo('createIssue')[0].payload).toEqual({
        projectKey: 'PRJ',
        summary: 'New req',
        description: '',
        labels: [],
        components: [],
        versions: [],
        testCasesCovered: { set: [] },
      });
      expect(store.getHeader(id)).toMatchObject({ remoteKey: 'NEW-1', remoteId: 9001, dirty: false });
    });

    it('should create inside the remote folder of the local record', async () => {
      await engine.pull(project);
      const folder = store.findFoldersByRemoteId(project.id, '1')[0];
      store.createLocalIssue(project.id, 'REQUIREMENT', folder.id, { fields: { summary: 'Nested' } });

      await engine.push(project);

      expect(remote.callsTo('createIssue')[0].payload?.parentTestKey).toBe('1');
    });

    it('should update remote-bound records with the full link list', async () => {
      await engine.pull(project);
      store.editIssue(idOf('R-1'), { fields: { summary: 'Login v2' } });

      const report = await engine.push(project);

      expect(report.updated).toBe(1);
      const [update] = remote.callsTo('updateIssue');
      expect(update.key).toBe('R-1');
      expect(update.payload?.summary).toBe('Login v2');
      expect(update.payload?.testCasesCovered).toEqual({ set: [{ testKey: 'TC-1' }] });
      expect(store.getHeader(idOf('R-1'))?.dirty).toBe(false);
    });

    it('should send links to issues that are not mirrored locally', async () => {
      await engine.pull(project, { kinds: ['REQUIREMENT'] });
      store.editIssue(idOf('R-1'), { fields: { summary: 'Login v2' } });

      const report = await engine.push(project);

      expect(report.updated).toBe(1);
      const [update] = remote.callsTo('updateIssue');
      expect(update.payload?.testCasesCovered).toEqual({ set: [{ testKey: 'TC-1' }] });
    });

    it('should refuse to push a record that holds only its tree summary', async () => {
      await engine.pull(project, { mode: 'structure' });
      store.editIssue(idOf('TC-1'), { fields: { summary: 'Login test v2' } });

      const report = await engine.push(project);

      expect(report.failed).toEqual([
        {
          key: 'TC-1',
          kind: 'TEST_CASE',
          error: 'TC-1 holds only its tree summary; pull it in full before pushing',
        },
      ]);
      expect(remote.callsTo('updateIssue')).toEqual([]);
      expect(store.getHeader(idOf('TC-1'))?.dirty).toBe(true);
    });

    it('should push locally edited steps', async () => {
      await engine.pull(project);
      new DetailReplacer(store).editChildren(project.id, idOf('TC-1'), {
        steps: [{ group: 1, order: 1, action: 'NEW', input: '', expected: '' }],
      });
      expect(store.getHeader(idOf('TC-1'))?.dirty).toBe(true);

      await engine.push(project);

      const [update] = remote.callsTo('updateIssue');
      expect(update.key).toBe('TC-1');
      expect(update.payload?.stepGroups).toEqual([
        {
          steps: [
            {
              stepColumns: [
                { name: 'Action', value: '<p>NEW</p>' },
                { name: 'Input', value: '' },
                { name: 'Expected result', value: '' },
              ],
            },
          ],
        },
      ]);
    });

    it('should create link targets before the records that link to them', async () => {
      await engine.pull(project);
      const plan = store.createLocalIssue(project.id, 'TEST_PLAN', null, { fields: { summary: 'Smoke' } });
      const testCase = store.createLocalIssue(project.id, 'TEST_CASE', null, { fields: { summary: 'Logout test' } });
      new DetailReplacer(store).replaceChildren(plan, 'planMemberships', [
        { testCaseId: idOf('TC-1'), order: 0 },
        { testCaseId: testCase, order: 1 },
      ]);

      const report = await engine.push(project);

      expect(report.created).toBe(2);
      const creates = remote.callsTo('createIssue');
      expect(creates.map((c) => c.kind)).toEqual(['TEST_CASE', 'TEST_PLAN']);
      expect(creates[1].payload?.includedTestCases).toEqual({ set: [{ testKey: 'TC-1' }, { testKey: 'NEW-1' }] });
      expect(store.listDirty(project.id)).toEqual([]);
    });

    it('should leave a record dirty while it links to an issue that failed to create', async () => {
      await engine.pull(project);
      const plan = store.createLocalIssue(project.id, 'TEST_PLAN', null, { fields: { summary: 'Smoke' } });
      const testCase = store.createLocalIssue(project.id, 'TEST_CASE', null, { fields: { summary: 'Logout test' } });
      new DetailReplacer(store).replaceChildren(plan, 'planMemberships', [
        { testCaseId: idOf('TC-1'), order: 0 },
        { testCaseId: testCase, order: 1 },
      ]);
      remote.failures.set('create:TEST_CASE', new Error('quota'));

      const report = await engine.push(project);

      expect(report.failed).toEqual([{ key: `local:${testCase}`, kind: 'TEST_CASE', error: 'quota' }]);
      expect(report.created).toBe(1);
      const [create] = remote.callsTo('createIssue').filter((c) => c.kind === 'TEST_PLAN');
      expect(create.payload?.includedTestCases).toEqual({ set: [{ testKey: 'TC-1' }] });
      expect(report.warnings).toEqual([`local:${plan}: links to local-only #${testCase} were not sent; left dirty`]);
      expect(store.getHeader(plan)).toMatchObject({ remoteKey: 'NEW-1', dirty: true });
    });

    it('should keep records dirty when the remote rejects them', async () => {
      await engine.pull(project);
      store.editIssue(idOf('R-1'), { fields: { summary: 'Login v2' } });
      remote.failures.set('R-1', new RtmApiError('RTM API error (409): stale', 409));

      const report = await engine.push(project);

      expect(report.failed).toEqual([{ key: 'R-1', kind: 'REQUIREMENT', error: 'RTM API error (409): stale' }]);
      expect(store.getHeader(idOf('R-1'))?.dirty).toBe(true);
    });

    it('should delete remotely and leave a purgeable tombstone', async () => {
      await engine.pull(project);
      const id = idOf('R-1');
      store.deleteIssueLocally(id);

      const report = await engine.push(project);

      expect(report.tombstoned).toBe(1);
      expect(remote.callsTo('deleteIssue').map((c) => c.key)).toEqual(['R-1']);
      expect(store.getHeader(id)).toMatchObject({ deleted: true, dirty: false });
      expect(store.purgeTombstones(project.id)).toEqual({ issues: 1, folders: 0 });
    });

    it('should push nothing once cancelled', async () => {
      store.createLocalIssue(project.id, 'REQUIREMENT', null, { fields: { summary: 'New req' } });
      const controller = new AbortController();
      controller.abort();

      const report = await engine.push(project, { signal: controller.signal });

      expect(report.cancelled).toBe(true);
      expect(remote.calls).toEqual([]);
    });
  });

  describe('status', () => {
    it('should summarize counts, checkpoints and pending records', async () => {
      await engine.pull(project);
      const id = store.createLocalIssue(project.id, 'DEFECT', null);

      const status = engine.status(project);

      expect(status.counts).toEqual({ total: 3, dirty: 1, localOnly: 1, tombstoned: 0 });
      expect(status.checkpoint.lastFullSyncAt).toBe(NOW);
      expect(status.dirty.map((h) => h.id)).toEqual([id]);
    });
  });
});
