import inquirer from 'inquirer';
import { ConflictResolver, renderDetail } from '../../src/lib/conflict-resolver';
import { emptyContent } from '../../src/lib/field-mapper';
import { ConflictResolution, SyncConflict } from '../../src/lib/types';

// Mock inquirer
jest.mock('inquirer');

const conflict = (issueId: number, key: string): SyncConflict => {
  const local = emptyContent('TEST_CASE');
  local.fields.summary = 'Local summary';
  local.fields.labels = ['smoke'];
  local.detail = {
    kind: 'TEST_CASE',
    preconditions: '',
    steps: [{ group: 1, order: 1, action: 'Open', input: '', expected: 'Shown' }],
  };
  const remote = emptyContent('TEST_CASE');
  remote.fields.summary = 'Remote summary';
  remote.fields.priority = 'High';
  remote.fields.updatedAt = '2024-06-01T10:00:00Z';
  remote.relations = [{ relationType: 'covered-by', targetKey: 'R-1' }];
  return { issueId, key, kind: 'TEST_CASE', local, remote };
};

describe('ConflictResolver', () => {
  let resolver: ConflictResolver;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    resolver = new ConflictResolver();
    logSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    (inquirer.prompt as unknown as jest.Mock).mockReset();
  });

  describe('resolveConflicts', () => {
    it('should resolve a single conflict with the remote choice', async () => {
      (inquirer.prompt as unknown as jest.Mock).mockResolvedValueOnce({ action: 'remote' });

      const resolutions = await resolver.resolveConflicts([conflict(1, 'TC-1')]);

      expect(resolutions).toEqual(new Map([[1, 'remote']]));
      expect(inquirer.prompt).toHaveBeenCalledTimes(1);
    });

    it('should resolve each conflict in turn', async () => {
      (inquirer.prompt as unknown as jest.Mock)
        .mockResolvedValueOnce({ action: 'local' })
        .mockResolvedValueOnce({ action: 'skip' });

      const resolutions = await resolver.resolveConflicts([conflict(1, 'TC-1'), conflict(2, 'TC-2')]);

      expect(resolutions.get(1)).toBe('local');
      expect(resolutions.get(2)).toBe('skip');
    });

    it('should skip every remaining conflict after skip-all', async () => {
      (inquirer.prompt as unknown as jest.Mock).mockResolvedValueOnce({ action: 'skip-all' });

      const resolutions = await resolver.resolveConflicts([
        conflict(1, 'TC-1'),
        conflict(2, 'TC-2'),
        conflict(3, 'TC-3'),
      ]);

      expect([...resolutions.values()]).toEqual(['skip', 'skip', 'skip']);
      expect(inquirer.prompt).toHaveBeenCalledTimes(1);
    });

    it('should offer skip-all only while conflicts remain', async () => {
      (inquirer.prompt as unknown as jest.Mock)
        .mockResolvedValueOnce({ action: 'local' })
        .mockResolvedValueOnce({ action: 'local' });

      await resolver.resolveConflicts([conflict(1, 'TC-1'), conflict(2, 'TC-2')]);

      const offersSkipAll = (call: unknown[]): boolean => JSON.stringify(call[0]).includes('"value":"skip-all"');
      const calls = (inquirer.prompt as unknown as jest.Mock).mock.calls;
      expect(offersSkipAll(calls[0])).toBe(true);
      expect(offersSkipAll(calls[1])).toBe(false);
    });

    it('should treat an unexpected answer as skip', async () => {
      (inquirer.prompt as unknown as jest.Mock).mockResolvedValueOnce({ action: 'merge' });

      const resolutions = await resolver.resolveConflicts([conflict(1, 'TC-1')]);

      expect(resolutions.get(1)).toBe('skip');
    });

    it('should show the differing fields', async () => {
      (inquirer.prompt as unknown as jest.Mock).mockResolvedValueOnce({ action: 'skip' });

      await resolver.resolveConflicts([conflict(1, 'TC-1')]);

      const output = logSpy.mock.calls.map((call) => String(call[0])).join('\n');
      expect(output).toContain('Conflict 1/1: TC-1 (TEST_CASE)');
      expect(output).toContain('Local:  Local summary');
      expect(output).toContain('Remote: Remote summary');
      expect(output).toContain('Remote: High');
      expect(output).toContain('- 1.1 Open |  | Shown');
      expect(output).toContain('- smoke');
      expect(output).toContain('+ covered-by R-1');
    });
  });

  describe('showSummary', () => {
    it('should group keys by resolution', () => {
      resolver.showSummary(
        new Map<number, ConflictResolution>([
          [1, 'local'],
          [2, 'skip'],
        ]),
        new Map([[1, 'TC-1']])
      );

      const output = logSpy.mock.calls.map((call) => String(call[0])).join('\n');
      expect(output).toContain('Using local version: TC-1');
      expect(output).toContain('Skipped: #2');
    });
  });

  describe('renderDetail', () => {
    it('should render one line per row', () => {
      expect(
        renderDetail({
          kind: 'TEST_PLAN',
          memberships: [
            { testCaseKey: 'TC-1', order: 0 },
            { testCaseKey: 'TC-2', order: 1 },
          ],
        })
      ).toBe('0. TC-1\n1. TC-2\n');
      expect(
        renderDetail({ kind: 'TEST_EXECUTION', testPlanKey: '', result: 'PASS', details: [] })
      ).toBe('Plan: (none)\nResult: PASS\n');
      expect(renderDetail({ kind: 'DEFECT', issueTypeId: '' })).toBe('');
    });
  });
});
