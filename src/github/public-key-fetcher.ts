import { ProvisioningError } from '../errors';
import { RepositoryPublicKey, RepositoryRef } from '../types';
import { GitHubClient, parseJsonObject } from './client';
import { PublicKeyFetcherPort, PublicKeyResponse } from './types';

/**
 * Reads the public key that GitHub Actions secrets for a repository must be
 * encrypted with. The key and its id come from one response.
 */
export class PublicKeyFetcher implements PublicKeyFetcherPort {
  constructor(private readonly client: GitHubClient) {}

  async fetchPublicKey(repository: RepositoryRef): Promise<RepositoryPublicKey> {
    const { owner, repo } = repository;
    const response = await this.client.request(
      'GET',
      GitHubClient.secretsPath(owner, repo, 'public-key'),
      undefined,
      'publish'
    );

    if (response.status === 401 || response.status === 403) {
      throw new ProvisioningError('AuthError', `GitHub rejected the token for ${owner}/${repo} (HTTP ${response.status})`, {
        stage: 'publish',
        details: response.body
      });
    }

    if (!response.ok) {
      throw new ProvisioningError('RequestFailed', `Failed to fetch the public key of ${owner}/${repo} (HTTP ${response.status}); no key or key_id was returned`, {
        stage: 'publish',
        details: response.body
      });
    }

    const { key, key_id: keyId } = readPublicKeyResponse(response.body);

    if (!key || !keyId) {
      throw new ProvisioningError('MalformedResponse', `Public key response for ${owner}/${repo} is missing key or key_id`, {
        stage: 'publish',
        details: response.body
      });
    }

    return { key, keyId };
  }
}

function readPublicKeyResponse(body: string): PublicKeyResponse {
  const payload = parseJsonObject(body);
  return {
    key: typeof payload?.key === 'string' ? payload.key : undefined,
    key_id: typeof payload?.key_id === 'string' ? payload.key_id : undefined
  };
}
