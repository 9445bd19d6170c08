// Provisioning-specific types
import { Credential, StackDeployResult } from '../types';

export interface AwsClientOptions {
  region: string;
  profile?: string;
  /** Socket timeout for each AWS request; the SDK default applies when unset. */
  requestTimeoutMs?: number;
}

export interface StackDeployRequest {
  templatePath: string;
  stackName: string;
}

export interface StackDeployerPort {
  deploy(request: StackDeployRequest): Promise<StackDeployResult>;
}

export interface CredentialIssuerPort {
  issue(username: string): Promise<Credential>;
}

export interface AccountResolverPort {
  resolveAccountId(): Promise<string>;
}
