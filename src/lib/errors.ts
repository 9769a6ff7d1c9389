/**
 * Error types raised by the sync core
 */

import { IssueKind } from './types';

export type ChildCollection = 'steps' | 'planMemberships' | 'relations' | 'executions';

/**
 * Owner-scoped replacement failed; the owner's previous children are intact.
 */
export class ReplaceChildrenError extends Error {
  readonly ownerId: number;
  readonly childKind: ChildCollection;
  readonly rowIndex: number | null;
  readonly row: unknown;

  constructor(
    ownerId: number,
    childKind: ChildCollection,
    rowIndex: number | null,
    row: unknown,
    cause: string
  ) {
    const at = rowIndex === null ? '' : ` at row ${rowIndex} (${JSON.stringify(row)})`;
    super(`Failed to replace ${childKind} of issue ${ownerId}${at}: ${cause}`);
    this.name = 'ReplaceChildrenError';
    this.ownerId = ownerId;
    this.childKind = childKind;
    this.rowIndex = rowIndex;
    this.row = row;
  }
}

/**
 * A remote node's identity clashes with what the store already holds.
 */
export class IdentityConflictError extends Error {
  readonly remoteKey: string;
  readonly kind: IssueKind;

  constructor(remoteKey: string, kind: IssueKind, message: string) {
    super(message);
    this.name = 'IdentityConflictError';
    this.remoteKey = remoteKey;
    this.kind = kind;
  }
}

export class RtmApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'RtmApiError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
