import { ProvisioningError } from '../errors';
import { GitHubClient, parseJsonObject } from './client';
import { PublishRequest, PutSecretRequest, SecretPublisherPort } from './types';

/**
 * Creates or replaces one encrypted repository secret. Publishing the same
 * name twice leaves the store holding the last value, so a failed publish can
 * be repeated as a whole.
 */
export class SecretPublisher implements SecretPublisherPort {
  constructor(private readonly client: GitHubClient) {}

  async publish(request: PublishRequest): Promise<void> {
    const { owner, repo, secretName } = request;
    const payload: PutSecretRequest = {
      key_id: request.keyId,
      encrypted_value: request.encryptedValue
    };

    const response = await this.client.request(
      'PUT',
      GitHubClient.secretsPath(owner, repo, secretName),
      payload,
      'publish'
    );

    // GitHub answers 201 (created) or 204 (updated) with no error message
    const body = parseJsonObject(response.body);
    if (!response.ok || !body || 'message' in body) {
      throw new ProvisioningError('PublishFailed', `Error pushing secret ${secretName} to ${owner}/${repo} (HTTP ${response.status})`, {
        stage: 'publish',
        details: response.body
      });
    }
  }
}
