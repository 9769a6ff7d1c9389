/**
 * Bidirectional field mapper between RTM issue payloads and normalized records
 *
 * Step text is rich text remotely and plain text locally. The conversion is
 * lossy: markup is discarded on the way in and rebuilt as one paragraph per
 * line on the way out.
 */

import { createHash } from 'crypto';
import {
  CommonFields,
  ExecutionDetail,
  IssueKind,
  KindDetail,
  LinkPatch,
  NormalizedContent,
  PlanMembership,
  Relation,
  RemotePayload,
  StepResult,
  TestStep,
} from './types';

type Json = Record<string, unknown>;

export interface MappedContent {
  content: NormalizedContent;
  warnings: string[];
}

export interface ToRemoteOptions {
  /** Link field name → patch. Only fields present here are emitted. */
  links?: Record<string, LinkPatch>;
  projectKey?: string;
  parentKey?: string;
}

export interface LinkFieldSpec {
  field: string;
  relationType: string;
  writable: boolean;
}

export const LINK_FIELDS: Record<IssueKind, readonly LinkFieldSpec[]> = {
  REQUIREMENT: [{ field: 'testCasesCovered', relationType: 'covers', writable: true }],
  TEST_CASE: [{ field: 'coveredRequirements', relationType: 'covered-by', writable: true }],
  TEST_PLAN: [{ field: 'executions', relationType: 'plan-execution', writable: false }],
  TEST_EXECUTION: [],
  DEFECT: [
    { field: 'identifyingTestCases', relationType: 'identified-by', writable: true },
    { field: 'detectingExecutions', relationType: 'detected-by', writable: false },
  ],
};

/** Ordered test-case membership of a test plan, written with the link protocol. */
export const MEMBERSHIP_FIELD = 'includedTestCases';

/** Fields the remote computes or owns; never part of a write payload. */
export const READ_ONLY_FIELDS: readonly string[] = [
  'testKey',
  'issueId',
  'created',
  'updated',
  'reporter',
  'result',
  'testCaseExecutions',
  'executions',
  'detectingExecutions',
  'issuelinks',
];

const isRecord = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  amp: '&',
};

/** Named and numeric character references, decoded in one pass. */
const decodeEntities = (text: string): string =>
  text.replace(/&(?:#(\d+)|#x([0-9a-f]+)|([a-z]+));/gi, (reference: string, dec?: string, hex?: string, name?: string) => {
    if (name !== undefined) {
      return NAMED_ENTITIES[name.toLowerCase()] ?? reference;
    }
    const code = dec !== undefined ? Number(dec) : parseInt(hex ?? '', 16);
    return Number.isInteger(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : reference;
  });

/**
 * Rich text → plain text. Line breaks and paragraph boundaries become
 * newlines, other tags are dropped.
 */
export function stripHtml(html: string): string {
  const text = html
    .replace(/\r\n/g, '\n')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>\s*<p[^>]*>/gi, '\n')
    .replace(/<[^>]+>/g, '');
  return decodeEntities(text).trim();
}

const escapeHtml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/** Plain text → rich text, one paragraph per line. */
export function toHtml(text: string): string {
  if (text === '') {
    return '';
  }
  return text
    .split('\n')
    .map((line) => `<p>${escapeHtml(line)}</p>`)
    .join('');
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (isRecord(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function emptyFields(): CommonFields {
  return {
    summary: '',
    description: '',
    status: '',
    priority: '',
    assignee: '',
    reporter: '',
    labels: [],
    components: [],
    versions: [],
    environment: '',
    timeEstimate: '',
    dueDate: '',
    createdAt: '',
    updatedAt: '',
  };
}

export function emptyDetail(kind: IssueKind): KindDetail {
  switch (kind) {
    case 'REQUIREMENT':
      return { kind, epicName: '' };
    case 'TEST_CASE':
      return { kind, preconditions: '', steps: [] };
    case 'TEST_PLAN':
      return { kind, memberships: [] };
    case 'TEST_EXECUTION':
      return { kind, testPlanKey: '', result: '', details: [] };
    case 'DEFECT':
      return { kind, issueTypeId: '' };
  }
}

export function emptyContent(kind: IssueKind): NormalizedContent {
  return { fields: emptyFields(), detail: emptyDetail(kind), relations: [] };
}

export class FieldMapper {
  /**
   * Map a remote payload of the given kind to normalized content.
   * Total over any input: missing fields become neutral values and
   * malformed ones are reported as warnings.
   */
  toLocal(kind: IssueKind, payload: unknown): MappedContent {
    const warnings: string[] = [];
    if (!isRecord(payload)) {
      warnings.push(`${kind} payload is not an object; using empty values`);
      return { content: emptyContent(kind), warnings };
    }

    // Some endpoints nest the descriptive fields under `fields`
    const src: Json = isRecord(payload.fields) ? { ...payload.fields, ...payload } : payload;
    const label = typeof src.testKey === 'string' ? src.testKey : kind;
    const warn = (message: string): void => {
      warnings.push(`${label}: ${message}`);
    };

    if (src.summary === undefined || src.summary === null) {
      warn('summary missing');
    }

    const fields: CommonFields = {
      summary: this.text(src, 'summary', warn),
      description: this.text(src, 'description', warn),
      status: this.named(src, 'status', warn),
      priority: this.named(src, 'priority', warn),
      assignee: this.person(src.assigneeId ?? src.assignee, 'assignee', warn),
      reporter: this.person(src.reporter, 'reporter', warn),
      labels: this.stringList(src, 'labels', warn),
      components: this.idList(src, 'components', warn),
      versions: this.idList(src, 'versions', warn),
      environment: this.text(src, 'environment', warn),
      timeEstimate: this.text(src, 'timeEstimate', warn),
      dueDate: this.text(src, 'dueDate', warn),
      createdAt: this.text(src, 'created', warn),
      updatedAt: this.text(src, 'updated', warn),
    };

    return {
      content: {
        fields,
        detail: this.readDetail(kind, src, warn),
        relations: this.readRelations(kind, src, warn),
      },
      warnings,
    };
  }

  /**
   * Build a write payload. Only writable fields are emitted; link fields are
   * emitted only for the patches the caller passes, with the caller's verb.
   */
  toRemote(kind: IssueKind, content: NormalizedContent, options: ToRemoteOptions = {}): RemotePayload {
    const { fields, detail } = content;
    if (detail.kind !== kind) {
      throw new Error(`Cannot build ${kind} payload from ${detail.kind} content`);
    }

    const payload: RemotePayload = {};
    if (options.projectKey) {
      payload.projectKey = options.projectKey;
    }
    if (options.parentKey) {
      payload.parentTestKey = options.parentKey;
    }

    payload.summary = fields.summary;
    payload.description = fields.description;
    if (fields.assignee) payload.assigneeId = fields.assignee;
    if (fields.priority) payload.priority = { name: fields.priority };
    if (fields.status) payload.status = { name: fields.status };
    payload.labels = [...fields.labels];
    payload.components = fields.components.map((id) => ({ id }));
    payload.versions = fields.versions.map((id) => ({ id }));
    if (fields.environment) payload.environment = fields.environment;
    if (fields.timeEstimate) payload.timeEstimate = fields.timeEstimate;
    if (fields.dueDate) payload.dueDate = fields.dueDate;

    switch (detail.kind) {
      case 'REQUIREMENT':
        if (detail.epicName) payload.epicName = detail.epicName;
        break;
      case 'TEST_CASE':
        payload.preconditions = detail.preconditions;
        payload.stepGroups = this.writeSteps(detail.steps);
        break;
      case 'TEST_EXECUTION':
        if (detail.testPlanKey) payload.testPlan = { testKey: detail.testPlanKey };
        break;
      case 'DEFECT':
        if (detail.issueTypeId) payload.issueTypeId = detail.issueTypeId;
        break;
      case 'TEST_PLAN':
        break;
    }

    const writable = new Set(this.writableLinkFields(kind));
    for (const [field, patch] of Object.entries(options.links ?? {})) {
      if (!writable.has(field)) {
        continue;
      }
      payload[field] = { [patch.verb]: patch.keys.map((testKey) => ({ testKey })) };
    }

    return payload;
  }

  /** Link fields of a kind that accept the set/add/remove protocol. */
  writableLinkFields(kind: IssueKind): string[] {
    const fields = LINK_FIELDS[kind].filter((linkField) => linkField.writable).map((linkField) => linkField.field);
    if (kind === 'TEST_PLAN') {
      fields.push(MEMBERSHIP_FIELD);
    }
    return fields;
  }

  /**
   * `set` patches carrying the complete local list for every writable link
   * field. An empty list clears the remote field.
   */
  linkPatchesFor(content: NormalizedContent): Record<string, LinkPatch> {
    const kind = content.detail.kind;
    const patches: Record<string, LinkPatch> = {};
    for (const linkField of LINK_FIELDS[kind]) {
      if (!linkField.writable) continue;
      patches[linkField.field] = {
        verb: 'set',
        keys: content.relations
          .filter((relation) => relation.relationType === linkField.relationType)
          .map((relation) => relation.targetKey),
      };
    }
    if (content.detail.kind === 'TEST_PLAN') {
      patches[MEMBERSHIP_FIELD] = {
        verb: 'set',
        keys: [...content.detail.memberships]
          .sort((a, b) => a.order - b.order)
          .map((membership) => membership.testCaseKey),
      };
    }
    return patches;
  }

  /** SHA-256 over the canonical JSON form of the content. */
  fingerprint(content: NormalizedContent): string {
    return createHash('sha256').update(canonicalJson(content)).digest('hex');
  }

  private readDetail(kind: IssueKind, src: Json, warn: (message: string) => void): KindDetail {
    switch (kind) {
      case 'REQUIREMENT':
        return { kind, epicName: this.text(src, 'epicName', warn) };
      case 'TEST_CASE':
        return {
          kind,
          preconditions: this.text(src, 'preconditions', warn),
          steps: this.readSteps(src, warn),
        };
      case 'TEST_PLAN':
        return { kind, memberships: this.readMemberships(src, warn) };
      case 'TEST_EXECUTION': {
        const plan = src.testPlan;
        let testPlanKey = '';
        if (isRecord(plan)) {
          testPlanKey = this.keyOf(plan) ?? '';
        } else if (typeof plan === 'string') {
          testPlanKey = plan;
        }
        return {
          kind,
          testPlanKey,
          result: this.named(src, 'result', warn),
          details: this.readExecutionDetails(src, warn),
        };
      }
      case 'DEFECT':
        return { kind, issueTypeId: this.text(src, 'issueTypeId', warn) };
    }
  }

  private readSteps(src: Json, warn: (message: string) => void): TestStep[] {
    const steps: TestStep[] = [];

    if (Array.isArray(src.stepGroups)) {
      src.stepGroups.forEach((group: unknown, groupIndex: number) => {
        if (!isRecord(group)) {
          warn(`stepGroups[${groupIndex}] is not an object`);
          return;
        }
        // A group with only one step may carry its columns directly
        const members: unknown[] = Array.isArray(group.steps)
          ? group.steps
          : Array.isArray(group.stepColumns)
            ? [group]
            : [];
        members.forEach((step, stepIndex) => {
          if (!isRecord(step) || !Array.isArray(step.stepColumns)) {
            warn(`stepGroups[${groupIndex}].steps[${stepIndex}] has no stepColumns`);
            return;
          }
          steps.push({
            group: groupIndex + 1,
            order: stepIndex + 1,
            ...this.readStepColumns(step.stepColumns),
          });
        });
      });
      return steps;
    }

    if (Array.isArray(src.steps)) {
      src.steps.forEach((row: unknown, rowIndex: number) => {
        let cells: string[];
        if (Array.isArray(row)) {
          cells = row.map((cell: unknown) => {
            if (isRecord(cell)) return typeof cell.value === 'string' ? cell.value : '';
            return typeof cell === 'string' ? cell : '';
          });
        } else if (isRecord(row)) {
          cells = [row.action, row.input ?? row.data, row.expected ?? row.result].map((value) =>
            typeof value === 'string' ? value : ''
          );
        } else {
          warn(`steps[${rowIndex}] is neither a row nor an object`);
          return;
        }
        steps.push({
          group: 1,
          order: rowIndex + 1,
          action: stripHtml(cells[0] ?? ''),
          input: stripHtml(cells[1] ?? ''),
          expected: stripHtml(cells[2] ?? ''),
        });
      });
      return steps;
    }

    if (src.steps !== undefined && src.steps !== null) {
      warn('steps is not an array');
    }
    return steps;
  }

  private readStepColumns(columns: unknown[]): Pick<TestStep, 'action' | 'input' | 'expected'> {
    const step = { action: '', input: '', expected: '' };
    columns.forEach((column, index) => {
      if (!isRecord(column)) return;
      const value = typeof column.value === 'string' ? stripHtml(column.value) : '';
      const name = typeof column.name === 'string' ? column.name.toLowerCase() : '';
      if (/expected|result|output/.test(name)) {
        step.expected = value;
      } else if (/input|data/.test(name)) {
        step.input = value;
      } else if (/action|step/.test(name)) {
        step.action = value;
      } else if (index === 0) {
        step.action = value;
      } else if (index === 1) {
        step.input = value;
      } else if (index === 2) {
        step.expected = value;
      }
    });
    return step;
  }

  private writeSteps(steps: TestStep[]): Array<{ steps: Array<{ stepColumns: Array<{ name: string; value: string }> }> }> {
    const groups = new Map<number, TestStep[]>();
    for (const step of steps) {
      const members = groups.get(step.group) ?? [];
      members.push(step);
      groups.set(step.group, members);
    }
    return [...groups.keys()]
      .sort((a, b) => a - b)
      .map((group) => ({
        steps: (groups.get(group) ?? [])
          .sort((a, b) => a.order - b.order)
          .map((step) => ({
            stepColumns: [
              { name: 'Action', value: toHtml(step.action) },
              { name: 'Input', value: toHtml(step.input) },
              { name: 'Expected result', value: toHtml(step.expected) },
            ],
          })),
      }));
  }

  private readMemberships(src: Json, warn: (message: string) => void): PlanMembership[] {
    const raw = src[MEMBERSHIP_FIELD];
    if (raw === undefined || raw === null) return [];
    if (!Array.isArray(raw)) {
      warn(`${MEMBERSHIP_FIELD} is not an array`);
      return [];
    }
    const memberships: PlanMembership[] = [];
    raw.forEach((entry: unknown, index: number) => {
      const key = typeof entry === 'string' ? entry : isRecord(entry) ? this.keyOf(entry) : null;
      if (!key) {
        warn(`${MEMBERSHIP_FIELD}[${index}] has no test key`);
        return;
      }
      const order = isRecord(entry) && typeof entry.order === 'number' ? entry.order : index;
      memberships.push({ testCaseKey: key, order });
    });
    return memberships;
  }

  private readExecutionDetails(src: Json, warn: (message: string) => void): ExecutionDetail[] {
    const raw = src.testCaseExecutions;
    if (raw === undefined || raw === null) return [];
    if (!Array.isArray(raw)) {
      warn('testCaseExecutions is not an array');
      return [];
    }
    const details: ExecutionDetail[] = [];
    raw.forEach((item: unknown, index: number) => {
      if (!isRecord(item)) {
        warn(`testCaseExecutions[${index}] is not an object`);
        return;
      }
      const testCase = item.testCase;
      const testCaseKey =
        (typeof item.testCaseKey === 'string' && item.testCaseKey) ||
        (isRecord(testCase) && this.keyOf(testCase)) ||
        (typeof item.key === 'string' && item.key) ||
        '';
      if (!testCaseKey) {
        warn(`testCaseExecutions[${index}] has no test case key`);
        return;
      }
      const executionKey =
        (typeof item.testCaseExecutionKey === 'string' && item.testCaseExecutionKey) ||
        (typeof item.executionKey === 'string' && item.executionKey) ||
        (typeof item.testKey === 'string' && item.testKey) ||
        '';
      details.push({
        testCaseKey,
        executionKey,
        order: typeof item.order === 'number' ? item.order : index + 1,
        assignee: this.person(item.assigneeId ?? item.assignee, 'assignee', warn),
        result: this.named(item, 'result', warn) || this.named(item, 'status', warn),
        environment: this.text(item, 'environment', warn),
        defects: this.keyList(item.defects),
        actualTime: this.text(item, 'actualTime', warn),
        stepResults: this.readStepResults(item.stepExecutions ?? item.steps),
      });
    });
    return details;
  }

  private readStepResults(raw: unknown): StepResult[] {
    if (!Array.isArray(raw)) return [];
    const results: StepResult[] = [];
    const ignore = (): void => undefined;
    raw.forEach((entry: unknown, index: number) => {
      if (!isRecord(entry)) return;
      results.push({
        group: typeof entry.group === 'number' ? entry.group : 1,
        order: typeof entry.order === 'number' ? entry.order : index + 1,
        status: this.named(entry, 'status', ignore) || this.named(entry, 'result', ignore),
        actualResult: stripHtml(this.text(entry, 'actualResult', ignore)),
        comment: stripHtml(this.text(entry, 'comment', ignore)),
      });
    });
    return results;
  }

  private readRelations(kind: IssueKind, src: Json, warn: (message: string) => void): Relation[] {
    const relations: Relation[] = [];
    for (const linkField of LINK_FIELDS[kind]) {
      const raw = src[linkField.field];
      if (raw === undefined || raw === null) continue;
      if (!Array.isArray(raw)) {
        warn(`${linkField.field} is not an array`);
        continue;
      }
      for (const key of this.keyList(raw)) {
        relations.push({ relationType: linkField.relationType, targetKey: key });
      }
    }

    if (Array.isArray(src.issuelinks)) {
      for (const link of src.issuelinks) {
        if (!isRecord(link)) continue;
        const typeName = isRecord(link.type) && typeof link.type.name === 'string' ? link.type.name : 'Relates';
        if (isRecord(link.outwardIssue)) {
          const key = this.keyOf(link.outwardIssue);
          if (key) relations.push({ relationType: `${typeName} (out)`, targetKey: key });
        }
        if (isRecord(link.inwardIssue)) {
          const key = this.keyOf(link.inwardIssue);
          if (key) relations.push({ relationType: `${typeName} (in)`, targetKey: key });
        }
      }
    }
    return relations;
  }

  private keyOf(entry: Json): string | null {
    for (const name of ['testKey', 'key', 'jiraKey']) {
      const value = entry[name];
      if (typeof value === 'string' && value) return value;
    }
    return null;
  }

  private keyList(raw: unknown): string[] {
    if (!Array.isArray(raw)) return [];
    const keys: string[] = [];
    for (const entry of raw) {
      const key = typeof entry === 'string' ? entry : isRecord(entry) ? this.keyOf(entry) : null;
      if (key) keys.push(key);
    }
    return keys;
  }

  private text(src: Json, name: string, warn: (message: string) => void): string {
    const value = src[name];
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    warn(`${name} is not text`);
    return '';
  }

  /** Objects-with-name (priority, status, result) or bare strings. */
  private named(src: Json, name: string, warn: (message: string) => void): string {
    const value = src[name];
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (isRecord(value)) {
      for (const candidate of [value.name, value.statusName]) {
        if (typeof candidate === 'string' && candidate) return candidate;
      }
      return '';
    }
    warn(`${name} has an unexpected shape`);
    return '';
  }

  private person(value: unknown, name: string, warn: (message: string) => void): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (isRecord(value)) {
      for (const candidate of [value.accountId, value.name, value.key, value.displayName]) {
        if (typeof candidate === 'string' && candidate) return candidate;
      }
      return '';
    }
    warn(`${name} has an unexpected shape`);
    return '';
  }

  private stringList(src: Json, name: string, warn: (message: string) => void): string[] {
    const value = src[name];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      warn(`${name} is not an array`);
      return [];
    }
    return value.filter((item: unknown): item is string => typeof item === 'string');
  }

  /** Arrays of `{id}` / `{id, name}`; stored by id, name as fallback. */
  private idList(src: Json, name: string, warn: (message: string) => void): string[] {
    const value = src[name];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      warn(`${name} is not an array`);
      return [];
    }
    const ids: string[] = [];
    for (const item of value) {
      if (typeof item === 'string') {
        ids.push(item);
      } else if (isRecord(item)) {
        const id = item.id ?? item.name;
        if (typeof id === 'string' || typeof id === 'number') ids.push(String(id));
      }
    }
    return ids;
  }
}
