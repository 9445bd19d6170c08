import { RepositoryPublicKey, RepositoryRef, SecretName } from '../types';

export interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
}

export interface GitHubResponse {
  status: number;
  ok: boolean;
  body: string;
}

/** Body of `GET /repos/{owner}/{repo}/actions/secrets/public-key`. */
export interface PublicKeyResponse {
  key_id?: string;
  key?: string;
}

/** Body of `PUT /repos/{owner}/{repo}/actions/secrets/{name}`. */
export interface PutSecretRequest {
  key_id: string;
  encrypted_value: string;
}

export interface PublishRequest extends RepositoryRef {
  secretName: SecretName;
  encryptedValue: string;
  keyId: string;
}

export interface PublicKeyFetcherPort {
  fetchPublicKey(repository: RepositoryRef): Promise<RepositoryPublicKey>;
}

export interface SecretPublisherPort {
  publish(request: PublishRequest): Promise<void>;
}
