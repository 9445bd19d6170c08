// Core type definitions for the CI secret provisioner

/**
 * Names of the secrets published to the CI secret store, in publish order.
 */
export const SECRET_NAMES = [
  'AWS_ACCESS_KEY_ID',
  'AWS_SECRET_ACCESS_KEY',
  'AWS_ACCOUNT_ID',
  'AWS_REGION'
] as const;

export type SecretName = typeof SECRET_NAMES[number];

export interface Credential {
  accessKeyId: string;
  secretAccessKey: string;
}

export interface SecretRecord {
  name: SecretName;
  value: string;
}

export interface RepositoryRef {
  owner: string;
  repo: string;
}

/**
 * Encryption key of a repository secret store. `keyId` must travel with every
 * ciphertext produced under `key`.
 */
export interface RepositoryPublicKey {
  key: string;
  keyId: string;
}

export type StackOutcome = 'created' | 'updated' | 'unchanged';

export interface StackDeployResult {
  stackName: string;
  stackId?: string;
  outcome: StackOutcome;
  status: string;
}

export type PipelineStage = 'deploy' | 'issue' | 'publish';
