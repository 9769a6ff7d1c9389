/**
 * RTM REST client
 */

import { RtmApiError } from './errors';
import { Logger, silentLogger } from './logger';
import { CreatedIssue, IssueKind, RemoteIssueService, RemotePayload } from './types';

export interface RtmClientConfig {
  baseUrl: string;
  token: string;
  /** With a username requests use Basic auth, otherwise a bearer token */
  username?: string | null;
  projectId: number;
  retry?: Partial<RetryConfig>;
  /** Injected for tests */
  sleep?: (delayMs: number) => Promise<void>;
  logger?: Logger;
}

interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
}

const API_ROOT = '/rest/rtm/1.0/api';

const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
};

const ENTITY_PATHS: Record<IssueKind, string> = {
  REQUIREMENT: 'requirement',
  TEST_CASE: 'test-case',
  TEST_PLAN: 'test-plan',
  TEST_EXECUTION: 'test-execution',
  DEFECT: 'defect',
};

const TREE_TYPES: Record<IssueKind, string> = {
  REQUIREMENT: 'requirements',
  TEST_CASE: 'test-cases',
  TEST_PLAN: 'test-plans',
  TEST_EXECUTION: 'test-executions',
  DEFECT: 'defects',
};

const defaultSleep = (delayMs: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, delayMs));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || status === 500 || status === 502 || status === 503 || status === 504;

const parseRetryAfterMs = (value: string | null): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const timestamp = Date.parse(value);
  if (!Number.isNaN(timestamp)) {
    return Math.max(0, timestamp - Date.now());
  }
  return null;
};

export class RtmClient implements RemoteIssueService {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly projectId: number;
  private readonly retry: RetryConfig;
  private readonly sleep: (delayMs: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(config: RtmClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.authorization = config.username
      ? `Basic ${Buffer.from(`${config.username}:${config.token}`).toString('base64')}`
      : `Bearer ${config.token}`;
    this.projectId = config.projectId;
    this.retry = {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_RETRY.maxRetries,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
    };
    this.sleep = config.sleep ?? defaultSleep;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Root nodes of one kind's tree. Some server versions wrap the list in
   * an object with `roots` or `children`.
   */
  async getTree(kind: IssueKind): Promise<unknown[]> {
    const body = await this.request('GET', `tree/${this.projectId}/${TREE_TYPES[kind]}`);
    if (Array.isArray(body)) {
      return body;
    }
    if (isRecord(body)) {
      const roots = body.roots ?? body.children;
      if (Array.isArray(roots)) {
        return roots;
      }
    }
    throw new RtmApiError(`Unexpected ${TREE_TYPES[kind]} tree response`, 200);
  }

  async getIssue(kind: IssueKind, key: string): Promise<RemotePayload> {
    const body = await this.request('GET', `${ENTITY_PATHS[kind]}/${encodeURIComponent(key)}`);
    if (!isRecord(body)) {
      throw new RtmApiError(`Unexpected response for ${key}`, 200);
    }
    return body;
  }

  async createIssue(kind: IssueKind, payload: RemotePayload): Promise<CreatedIssue> {
    const body = await this.request('POST', ENTITY_PATHS[kind], payload);
    if (!isRecord(body)) {
      throw new RtmApiError(`Create ${kind} returned no body`, 200);
    }
    const testKey = typeof body.testKey === 'string' ? body.testKey : body.key;
    const issueId = typeof body.issueId === 'number' ? body.issueId : body.id;
    if (typeof testKey !== 'string' || typeof issueId !== 'number') {
      throw new RtmApiError(`Create ${kind} response carried no key`, 200);
    }
    return { testKey, issueId };
  }

  async updateIssue(kind: IssueKind, key: string, payload: RemotePayload): Promise<void> {
    await this.request('PUT', `${ENTITY_PATHS[kind]}/${encodeURIComponent(key)}`, payload);
  }

  async deleteIssue(kind: IssueKind, key: string): Promise<void> {
    await this.request('DELETE', `${ENTITY_PATHS[kind]}/${encodeURIComponent(key)}`);
  }

  private async request(method: string, path: string, payload?: RemotePayload): Promise<unknown> {
    const url = `${this.baseUrl}${API_ROOT}/${path}`;
    const { maxRetries, baseDelayMs } = this.retry;
    let attempts = 0;

    while (attempts <= maxRetries) {
      let response: Response;
      try {
        response = await fetch(url, {
          method,
          headers: {
            Authorization: this.authorization,
            Accept: 'application/json',
            ...(payload ? { 'Content-Type': 'application/json' } : {}),
          },
          body: payload ? JSON.stringify(payload) : undefined,
        });
      } catch (error) {
        if (attempts < maxRetries) {
          await this.sleep(baseDelayMs * 2 ** attempts);
          attempts += 1;
          continue;
        }
        const message = error instanceof Error ? error.message : String(error);
        const suffix = attempts > 0 ? ` after ${attempts} ${attempts === 1 ? 'retry' : 'retries'}` : '';
        throw new Error(`RTM request failed${suffix}: ${message}`);
      }

      this.logger.debug(`${method} ${path}`, { status: response.status });

      if (!response.ok) {
        const status = response.status;
        if (status === 401 || status === 403) {
          throw new RtmApiError(`RTM rejected the credentials (${status})`, status);
        }
        let detail = '';
        try {
          detail = (await response.text()).trim();
        } catch {
          detail = '';
        }
        const message = detail ? `RTM API error (${status}): ${detail}` : `RTM API error (${status})`;

        if (isRetryableStatus(status) && attempts < maxRetries) {
          const retryAfterMs = status === 429 ? parseRetryAfterMs(response.headers.get('retry-after')) : null;
          const backoffMs = baseDelayMs * 2 ** attempts;
          await this.sleep(retryAfterMs ? Math.max(backoffMs, retryAfterMs) : backoffMs);
          attempts += 1;
          continue;
        }
        if (attempts > 0 && isRetryableStatus(status)) {
          throw new RtmApiError(`${message} after ${attempts} ${attempts === 1 ? 'retry' : 'retries'}`, status);
        }
        throw new RtmApiError(message, status);
      }

      if (response.status === 204) {
        return undefined;
      }
      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.includes('application/json')) {
        return undefined;
      }
      return response.json();
    }

    throw new Error('RTM request failed: retry loop exited unexpectedly');
  }
}
