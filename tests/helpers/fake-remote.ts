import { RtmApiError } from '../../src/lib/errors';
import { CreatedIssue, IssueKind, RemoteIssueService, RemotePayload } from '../../src/lib/types';

export interface RemoteCall {
  method: 'getTree' | 'getIssue' | 'createIssue' | 'updateIssue' | 'deleteIssue';
  kind: IssueKind;
  key?: string;
  payload?: RemotePayload;
}

/**
 * In-process stand-in for the RTM API
 */
export class FakeRemote implements RemoteIssueService {
  trees: Partial<Record<IssueKind, unknown[]>> = {};
  issues = new Map<string, RemotePayload>();
  calls: RemoteCall[] = [];
  /** Errors keyed by issue key, `tree:<KIND>` for a whole tree, or `create:<KIND>` */
  failures = new Map<string, Error>();
  private created = 0;

  async getTree(kind: IssueKind): Promise<unknown[]> {
    this.calls.push({ method: 'getTree', kind });
    this.throwIfFailing(`tree:${kind}`);
    return this.trees[kind] ?? [];
  }

  async getIssue(kind: IssueKind, key: string): Promise<RemotePayload> {
    this.calls.push({ method: 'getIssue', kind, key });
    this.throwIfFailing(key);
    const payload = this.issues.get(key);
    if (!payload) {
      throw new RtmApiError(`${key} not found`, 404);
    }
    return payload;
  }

  async createIssue(kind: IssueKind, payload: RemotePayload): Promise<CreatedIssue> {
    this.calls.push({ method: 'createIssue', kind, payload });
    this.throwIfFailing(`create:${kind}`);
    this.created++;
    const created = { testKey: `NEW-${this.created}`, issueId: 9000 + this.created };
    this.issues.set(created.testKey, { ...payload, ...created });
    return created;
  }

  async updateIssue(kind: IssueKind, key: string, payload: RemotePayload): Promise<void> {
    this.calls.push({ method: 'updateIssue', kind, key, payload });
    this.throwIfFailing(key);
  }

  async deleteIssue(kind: IssueKind, key: string): Promise<void> {
    this.calls.push({ method: 'deleteIssue', kind, key });
    this.throwIfFailing(key);
    this.issues.delete(key);
  }

  callsTo(method: RemoteCall['method']): RemoteCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  private throwIfFailing(key: string): void {
    const failure = this.failures.get(key);
    if (failure) {
      throw failure;
    }
  }
}

export const folderNode = (id: number, name: string, children: unknown[] = [], extra: Record<string, unknown> = {}) => ({
  folderName: name,
  id,
  children,
  ...extra,
});

export const issueNode = (key: string, issueId: number, summary: string, extra: Record<string, unknown> = {}) => ({
  testKey: key,
  issueId,
  summary,
  ...extra,
});
