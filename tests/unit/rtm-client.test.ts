import { RtmApiError } from '../../src/lib/errors';
import { RtmClient } from '../../src/lib/rtm-client';

const json = (body: unknown, status = 200, headers: Record<string, string> = {}): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });

describe('RtmClient', () => {
  let fetchSpy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;
  let sleep: jest.Mock<Promise<void>, [number]>;

  const client = (overrides: { username?: string; maxRetries?: number } = {}): RtmClient =>
    new RtmClient({
      baseUrl: 'https://jira.example.test/',
      token: 'test-secret',
      username: overrides.username,
      projectId: 7,
      retry: { maxRetries: overrides.maxRetries ?? 2, baseDelayMs: 100 },
      sleep,
    });

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should fetch a tree with a bearer token', async () => {
    fetchSpy.mockResolvedValue(json([{ folderName: 'F1', id: 1 }]));

    const roots = await client().getTree('TEST_CASE');

    expect(roots).toEqual([{ folderName: 'F1', id: 1 }]);
    expect(fetchSpy).toHaveBeenCalledWith('https://jira.example.test/rest/rtm/1.0/api/tree/7/test-cases', {
      method: 'GET',
      headers: { Authorization: 'Bearer test-secret', Accept: 'application/json' },
      body: undefined,
    });
  });

  it('should use basic auth when a username is configured', async () => {
    fetchSpy.mockResolvedValue(json({ testKey: 'R-1', summary: 'x' }));

    await client({ username: 'tester' }).getIssue('REQUIREMENT', 'R-1');

    const init = fetchSpy.mock.calls[0][1];
    expect(fetchSpy.mock.calls[0][0]).toBe('https://jira.example.test/rest/rtm/1.0/api/requirement/R-1');
    expect(init?.headers).toEqual({
      Authorization: `Basic ${Buffer.from('tester:test-secret').toString('base64')}`,
      Accept: 'application/json',
    });
  });

  it('should unwrap trees nested under roots', async () => {
    fetchSpy.mockResolvedValue(json({ roots: [{ testKey: 'D-1', issueId: 1 }] }));

    await expect(client().getTree('DEFECT')).resolves.toEqual([{ testKey: 'D-1', issueId: 1 }]);
  });

  it('should reject a tree response that holds no list', async () => {
    fetchSpy.mockResolvedValue(json({ total: 0 }));

    await expect(client().getTree('DEFECT')).rejects.toThrow('Unexpected defects tree response');
  });

  it('should post creates and read the new identity', async () => {
    fetchSpy.mockResolvedValue(json({ key: 'TC-5', id: 55 }, 201));

    const created = await client().createIssue('TEST_CASE', { summary: 'New' });

    expect(created).toEqual({ testKey: 'TC-5', issueId: 55 });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://jira.example.test/rest/rtm/1.0/api/test-case');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"summary":"New"}');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      Accept: 'application/json',
      'Content-Type': 'application/json',
    });
  });

  it('should fail a create whose response has no key', async () => {
    fetchSpy.mockResolvedValue(json({ id: 55 }));

    await expect(client().createIssue('DEFECT', {})).rejects.toThrow('Create DEFECT response carried no key');
  });

  it('should accept an empty response to an update', async () => {
    fetchSpy.mockResolvedValue(new Response(null, { status: 204 }));

    await expect(client().updateIssue('TEST_PLAN', 'P-1', { summary: 'x' })).resolves.toBeUndefined();
    expect(fetchSpy.mock.calls[0][0]).toBe('https://jira.example.test/rest/rtm/1.0/api/test-plan/P-1');
    expect(fetchSpy.mock.calls[0][1]?.method).toBe('PUT');
  });

  it('should retry server errors with exponential backoff', async () => {
    fetchSpy
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(json({ testKey: 'R-1' }));

    await expect(client().getIssue('REQUIREMENT', 'R-1')).resolves.toEqual({ testKey: 'R-1' });
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should honor Retry-After on rate limiting', async () => {
    fetchSpy
      .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } }))
      .mockResolvedValueOnce(json({ testKey: 'R-1' }));

    await client().getIssue('REQUIREMENT', 'R-1');

    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it('should not retry rejected credentials', async () => {
    fetchSpy.mockResolvedValue(new Response('nope', { status: 401 }));

    await expect(client().getTree('REQUIREMENT')).rejects.toThrow('RTM rejected the credentials (401)');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should surface client errors with the response text', async () => {
    fetchSpy.mockResolvedValue(new Response(' missing \n', { status: 404 }));

    const error = await client()
      .getIssue('DEFECT', 'D-9')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RtmApiError);
    expect(error).toMatchObject({ message: 'RTM API error (404): missing', status: 404 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should report the retry count once retries are exhausted', async () => {
    fetchSpy.mockImplementation(async () => new Response('boom', { status: 500 }));

    await expect(client().getTree('TEST_PLAN')).rejects.toThrow('RTM API error (500): boom after 2 retries');
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it('should retry network failures', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(client({ maxRetries: 1 }).getTree('TEST_PLAN')).rejects.toThrow(
      'RTM request failed after 1 retry: fetch failed'
    );
    expect(sleep.mock.calls).toEqual([[100]]);
  });
});
