import { describe, it, expect, vi } from 'vitest';
import { GitHubClient, parseJsonObject } from '../client';

describe('GitHubClient', () => {
  it('should send authenticated JSON requests to the API base', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);
    const client = new GitHubClient({ token: 'test-token', apiUrl: 'https://github.example.com/api/v3/' });

    const response = await client.request('PUT', '/repos/o/r/actions/secrets/NAME', { key_id: '1' }, 'publish');

    expect(response).toEqual({ status: 200, ok: true, body: '{"ok":true}' });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://github.example.com/api/v3/repos/o/r/actions/secrets/NAME');
    expect(init.method).toBe('PUT');
    expect(init.body).toBe('{"key_id":"1"}');
    expect(init.headers).toEqual({
      Authorization: 'Bearer test-token',
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'Content-Type': 'application/json'
    });
    expect(init.signal).toBeUndefined();
  });

  it('should omit the body and content type on GET', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('{}', { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);
    const client = new GitHubClient({ token: 'test-token' });

    await client.request('GET', '/repos/o/r/actions/secrets/public-key', undefined, 'publish');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.github.com/repos/o/r/actions/secrets/public-key');
    expect(init.body).toBeUndefined();
    expect(init.headers['Content-Type']).toBeUndefined();
  });

  it('should attach a timeout signal when configured', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('{}', { status: 200 }));
    vi.stubGlobal('fetch', mockFetch);
    const client = new GitHubClient({ token: 'test-token', timeoutMs: 1000 });

    await client.request('GET', '/rate_limit', undefined, 'publish');

    expect(mockFetch.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });

  it('should report transport failures as RequestFailed', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
    const client = new GitHubClient({ token: 'test-token' });

    await expect(client.request('GET', '/repos/o/r/actions/secrets/public-key', undefined, 'publish')).rejects.toMatchObject({
      code: 'RequestFailed',
      stage: 'publish',
      message: 'GitHub request GET /repos/o/r/actions/secrets/public-key failed: fetch failed'
    });
  });

  describe('secretsPath', () => {
    it('should encode each path segment', () => {
      expect(GitHubClient.secretsPath('my org', 'repo', 'public-key')).toBe('/repos/my%20org/repo/actions/secrets/public-key');
    });
  });
});

describe('parseJsonObject', () => {
  it('should treat an empty body as an empty object', () => {
    expect(parseJsonObject('')).toEqual({});
  });

  it('should return undefined for non-object JSON and invalid JSON', () => {
    expect(parseJsonObject('[1,2]')).toBeUndefined();
    expect(parseJsonObject('<html>')).toBeUndefined();
  });

  it('should parse JSON objects', () => {
    expect(parseJsonObject('{"message":"Not Found"}')).toEqual({ message: 'Not Found' });
  });
});
