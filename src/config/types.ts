// Configuration-specific types

export type OaepHash = 'sha1' | 'sha256';

export interface AwsSettings {
  region: string;
  profile?: string;
  iam_username: string;
}

export interface StackSettings {
  name: string;
  template: string;
  poll_interval_ms: number;
  max_wait_ms: number;
}

export interface GitHubSettings {
  owner?: string;
  repo?: string;
  token?: string;
  api_url: string;
}

export interface CredentialSettings {
  prune_existing_keys: boolean;
  max_active_keys: number;
}

export interface EncryptionSettings {
  oaep_hash: OaepHash;
}

export interface NetworkSettings {
  timeout_ms?: number;
}

export interface ProvisionerConfig {
  readonly aws: Readonly<AwsSettings>;
  readonly stack: Readonly<StackSettings>;
  readonly github: Readonly<GitHubSettings>;
  readonly credentials: Readonly<CredentialSettings>;
  readonly encryption: Readonly<EncryptionSettings>;
  readonly network: Readonly<NetworkSettings>;
}

/** Partial configuration as read from a file or built from CLI flags. */
export type ConfigOverrides = {
  [K in keyof ProvisionerConfig]?: Partial<ProvisionerConfig[K]>;
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface LoadOptions {
  /** Explicit configuration file; when omitted the default locations are searched. */
  path?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
}
