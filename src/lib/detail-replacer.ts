/**
 * Owner-scoped "replace all children" for steps, plan memberships,
 * relations and executions
 */

import { randomUUID } from 'crypto';
import { ChildCollection, ReplaceChildrenError, errorMessage } from './errors';
import { Logger, silentLogger } from './logger';
import {
  CHILD_OWNER_KIND,
  ExecutionDetailRow,
  ExecutionRow,
  MembershipRow,
  RecordStore,
  RelationRow,
  StepExecutionRow,
} from './record-store';
import { IssueHeader, IssueKind, NormalizedContent, PlanMembership, Relation, StoredStep, TestStep } from './types';

/** A step to store; without a uid one is reused or assigned. */
export type StepInput = TestStep & { uid?: string };

export interface ReplacementRows {
  steps: StepInput;
  planMemberships: MembershipRow;
  relations: RelationRow;
  executions: ExecutionRow;
}

/** Child collections a local author may edit; executions are pull-only. */
export interface ChildEdit {
  relations?: Relation[];
  steps?: TestStep[];
  memberships?: PlanMembership[];
}

export interface ReplaceResult {
  removedCount: number;
  insertedCount: number;
}

type Inserters = { [C in ChildCollection]: (ownerId: number, row: ReplacementRows[C]) => void };

const stepSignature = (step: TestStep): string => [step.action, step.input, step.expected].join('\u0000');

export class DetailReplacer {
  private readonly store: RecordStore;
  private readonly logger: Logger;
  private stepUidPool = new Map<string, string[]>();

  constructor(store: RecordStore, logger: Logger = silentLogger) {
    this.store = store;
    this.logger = logger;
  }

  private readonly inserters: Inserters = {
    steps: (ownerId, row) => {
      const uid = row.uid ?? this.stepUidPool.get(stepSignature(row))?.shift() ?? randomUUID();
      this.store.insertStep(ownerId, {
        uid,
        group: row.group,
        order: row.order,
        action: row.action,
        input: row.input,
        expected: row.expected,
      });
    },
    planMemberships: (ownerId, row) => {
      const testCaseKey = this.referenceKey(row.testCaseId, row.testCaseKey, 'TEST_CASE');
      this.store.insertMembership(ownerId, { ...row, testCaseKey });
    },
    relations: (ownerId, row) => {
      const targetKey = this.referenceKey(row.targetId, row.targetKey, null);
      this.store.insertRelation(ownerId, { ...row, targetKey });
    },
    executions: (ownerId, row) => {
      if (row.testPlanId !== null) {
        this.requireTarget(row.testPlanId, 'TEST_PLAN');
      }
      for (const detail of row.details) {
        this.requireTarget(detail.testCaseId, 'TEST_CASE');
      }
      this.store.insertExecution(ownerId, row);
    },
  };

  /**
   * Replace every row of `childKind` owned by `ownerId` with `rows`, in one
   * transaction. On any failure the previous rows stay in place and a
   * ReplaceChildrenError names the owner and the offending row.
   */
  replaceChildren<C extends ChildCollection>(
    ownerId: number,
    childKind: C,
    rows: ReadonlyArray<ReplacementRows[C]>
  ): ReplaceResult {
    const owner = this.store.getHeader(ownerId);
    if (!owner) {
      throw new ReplaceChildrenError(ownerId, childKind, null, null, 'owner does not exist');
    }
    const ownerKind = CHILD_OWNER_KIND[childKind];
    if (ownerKind !== null && owner.kind !== ownerKind) {
      throw new ReplaceChildrenError(ownerId, childKind, null, null, `owner is a ${owner.kind}, not a ${ownerKind}`);
    }

    const insert: (ownerId: number, row: ReplacementRows[C]) => void = this.inserters[childKind];

    return this.store.transaction(() => {
      if (childKind === 'steps') {
        this.fillStepUidPool(this.store.listSteps(ownerId));
      }
      try {
        const removedCount = this.store.deleteChildren(ownerId, childKind);
        rows.forEach((row, index) => {
          try {
            insert(ownerId, row);
          } catch (error) {
            throw new ReplaceChildrenError(ownerId, childKind, index, row, errorMessage(error));
          }
        });
        this.logger.debug(`Replaced ${childKind} of issue ${ownerId}`, {
          removed: removedCount,
          inserted: rows.length,
        });
        return { removedCount, insertedCount: rows.length };
      } finally {
        this.stepUidPool = new Map();
      }
    });
  }

  /**
   * Write the child collections carried by remote content, resolving remote
   * keys to local ids. Relations and memberships whose target is not
   * mirrored yet are kept by key and bound when it arrives. Execution rows
   * need their test case; without it the result is not `complete`.
   */
  applyContent(
    projectId: number,
    issueId: number,
    content: NormalizedContent
  ): { warnings: string[]; complete: boolean } {
    const warnings: string[] = [];
    let complete = true;
    const label = `issue ${issueId}`;

    this.store.transaction(() => {
      this.replaceChildren(issueId, 'relations', this.relationRows(projectId, content.relations));

      const detail = content.detail;
      switch (detail.kind) {
        case 'TEST_CASE':
          this.replaceChildren(issueId, 'steps', detail.steps);
          break;
        case 'TEST_PLAN':
          this.replaceChildren(
            issueId,
            'planMemberships',
            this.membershipRows(projectId, detail.memberships, (message) => warnings.push(`${label}: ${message}`))
          );
          break;
        case 'TEST_EXECUTION': {
          let testPlanId: number | null = null;
          if (detail.testPlanKey) {
            const plan = this.store.findIssueByKey(projectId, detail.testPlanKey);
            if (plan && plan.kind !== 'TEST_PLAN') {
              warnings.push(`${label}: test plan ${detail.testPlanKey} is a ${plan.kind}`);
            } else if (plan) {
              testPlanId = plan.id;
            }
          }
          const details: ExecutionDetailRow[] = [];
          const seen = new Set<number>();
          for (const item of detail.details) {
            const testCase = this.store.findIssueByKey(projectId, item.testCaseKey);
            if (!testCase || testCase.kind !== 'TEST_CASE') {
              complete = false;
              warnings.push(`${label}: execution of ${item.testCaseKey} has no local test case; skipped`);
              continue;
            }
            if (seen.has(testCase.id)) continue;
            seen.add(testCase.id);
            details.push({
              testCaseId: testCase.id,
              executionKey: item.executionKey,
              order: item.order,
              assignee: item.assignee,
              result: item.result,
              environment: item.environment,
              defects: item.defects,
              actualTime: item.actualTime,
              stepResults: this.alignStepResults(testCase.id, item.stepResults),
            });
          }
          this.replaceChildren(issueId, 'executions', [{ testPlanId, details }]);
          break;
        }
        case 'REQUIREMENT':
        case 'DEFECT':
          break;
      }
    });

    return { warnings, complete };
  }

  /**
   * Local edit of child collections. Only the collections the edit carries
   * are replaced, and the owner is marked dirty.
   */
  editChildren(projectId: number, issueId: number, edit: ChildEdit): { warnings: string[] } {
    const warnings: string[] = [];
    this.store.transaction(() => {
      if (edit.relations) {
        this.replaceChildren(issueId, 'relations', this.relationRows(projectId, edit.relations));
      }
      if (edit.steps) {
        this.replaceChildren(issueId, 'steps', edit.steps);
      }
      if (edit.memberships) {
        this.replaceChildren(
          issueId,
          'planMemberships',
          this.membershipRows(projectId, edit.memberships, (message) => warnings.push(`issue ${issueId}: ${message}`))
        );
      }
      this.store.setDirty(issueId, true);
    });
    return { warnings };
  }

  private relationRows(projectId: number, relations: readonly Relation[]): RelationRow[] {
    const rows: RelationRow[] = [];
    const seen = new Set<string>();
    for (const relation of relations) {
      const identity = `${relation.targetKey}\u0000${relation.relationType}`;
      if (seen.has(identity)) continue;
      seen.add(identity);
      const target = this.store.findIssueByKey(projectId, relation.targetKey);
      rows.push({
        targetId: target ? target.id : null,
        targetKey: relation.targetKey,
        relationType: relation.relationType,
      });
    }
    return rows;
  }

  private membershipRows(
    projectId: number,
    memberships: readonly PlanMembership[],
    warn: (message: string) => void
  ): MembershipRow[] {
    const rows: MembershipRow[] = [];
    const seen = new Set<string>();
    for (const membership of memberships) {
      if (seen.has(membership.testCaseKey)) continue;
      seen.add(membership.testCaseKey);
      const target = this.store.findIssueByKey(projectId, membership.testCaseKey);
      if (target && target.kind !== 'TEST_CASE') {
        warn(`plan membership ${membership.testCaseKey} is a ${target.kind}; kept by key`);
      }
      rows.push({
        testCaseId: target && target.kind === 'TEST_CASE' ? target.id : null,
        testCaseKey: membership.testCaseKey,
        order: membership.order,
      });
    }
    return rows;
  }

  /** Attach the uid of the step currently at each (group, order). */
  private alignStepResults(
    testCaseId: number,
    results: ReadonlyArray<Omit<StepExecutionRow, 'stepUid'>>
  ): StepExecutionRow[] {
    const byPosition = new Map<string, string>();
    for (const step of this.store.listSteps(testCaseId)) {
      byPosition.set(`${step.group}:${step.order}`, step.uid);
    }
    return results.map((result) => ({
      ...result,
      stepUid: byPosition.get(`${result.group}:${result.order}`) ?? null,
    }));
  }

  private fillStepUidPool(previous: StoredStep[]): void {
    this.stepUidPool = new Map();
    for (const step of previous) {
      const signature = stepSignature(step);
      const uids = this.stepUidPool.get(signature) ?? [];
      uids.push(step.uid);
      this.stepUidPool.set(signature, uids);
    }
  }

  /** Key to store with a reference; a local target's own key wins. */
  private referenceKey(
    targetId: number | null,
    targetKey: string | null | undefined,
    kind: IssueKind | null
  ): string | null {
    if (targetId !== null) {
      return this.requireTarget(targetId, kind).remoteKey ?? targetKey ?? null;
    }
    if (!targetKey) {
      throw new Error('row names neither a local issue nor a remote key');
    }
    return targetKey;
  }

  private requireTarget(issueId: number, kind: IssueKind | null): IssueHeader {
    const target = this.store.getHeader(issueId);
    if (!target) {
      throw new Error(`referenced issue ${issueId} does not exist`);
    }
    if (kind !== null && target.kind !== kind) {
      throw new Error(`referenced issue ${issueId} is a ${target.kind}, not a ${kind}`);
    }
    return target;
  }
}
