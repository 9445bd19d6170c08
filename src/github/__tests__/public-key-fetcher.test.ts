import { describe, it, expect, vi } from 'vitest';
import { GitHubClient } from '../client';
import { PublicKeyFetcher } from '../public-key-fetcher';

function stubResponse(body: string, status: number) {
  const mockFetch = vi.fn().mockResolvedValue(new Response(body, { status }));
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

describe('PublicKeyFetcher', () => {
  const fetcher = new PublicKeyFetcher(new GitHubClient({ token: 'test-token' }));
  const repository = { owner: 'example-org', repo: 'example-repo' };

  it('should return the key and key id from one response', async () => {
    const mockFetch = stubResponse(JSON.stringify({ key_id: '568250167242549743', key: 'dGVzdC1rZXk=' }), 200);

    const publicKey = await fetcher.fetchPublicKey(repository);

    expect(publicKey).toEqual({ key: 'dGVzdC1rZXk=', keyId: '568250167242549743' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe('https://api.github.com/repos/example-org/example-repo/actions/secrets/public-key');
    expect(mockFetch.mock.calls[0][1].method).toBe('GET');
  });

  it('should fail with AuthError when the token is rejected', async () => {
    stubResponse('{"message":"Bad credentials"}', 401);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({
      code: 'AuthError',
      details: '{"message":"Bad credentials"}'
    });
  });

  it('should fail with AuthError on forbidden', async () => {
    stubResponse('{"message":"Resource not accessible by personal access token"}', 403);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({ code: 'AuthError' });
  });

  it('should fail with MalformedResponse when key_id is missing', async () => {
    stubResponse('{"key":"dGVzdC1rZXk="}', 200);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({
      code: 'MalformedResponse',
      details: '{"key":"dGVzdC1rZXk="}'
    });
  });

  it('should fail with MalformedResponse when the key is empty', async () => {
    stubResponse('{"key":"","key_id":"42"}', 200);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({ code: 'MalformedResponse' });
  });

  it('should fail with MalformedResponse for a non-JSON body', async () => {
    stubResponse('<html>maintenance</html>', 200);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({ code: 'MalformedResponse' });
  });

  it('should fail with RequestFailed for other error statuses', async () => {
    stubResponse('{"message":"Not Found"}', 404);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({
      code: 'RequestFailed',
      message: 'Failed to fetch the public key of example-org/example-repo (HTTP 404); no key or key_id was returned',
      details: '{"message":"Not Found"}'
    });
  });

  it('should fail with MalformedResponse when key_id is not a string', async () => {
    stubResponse('{"key":"dGVzdC1rZXk=","key_id":42}', 200);

    await expect(fetcher.fetchPublicKey(repository)).rejects.toMatchObject({
      code: 'MalformedResponse',
      details: '{"key":"dGVzdC1rZXk=","key_id":42}'
    });
  });
});
