// Orchestration-specific types
import { ProvisioningErrorCode, ErrorStage } from '../errors';
import { AccountResolverPort, CredentialIssuerPort, StackDeployerPort } from '../provisioning/types';
import { PublicKeyFetcherPort, SecretPublisherPort } from '../github/types';
import { SecretEncryptorPort } from '../crypto/secret-encryptor';
import { Credential, PipelineStage, SecretName, StackDeployResult } from '../types';

/**
 * What the caller asked for. The intents are independent of each other; the
 * only dependency is that publishing needs a credential.
 */
export interface PipelineIntents {
  deploy: boolean;
  issueCredential: boolean;
  publishSecrets: boolean;
}

export interface PipelineServices {
  stackDeployer: StackDeployerPort;
  credentialIssuer: CredentialIssuerPort;
  accountResolver: AccountResolverPort;
  publicKeyFetcher: PublicKeyFetcherPort;
  secretEncryptor: SecretEncryptorPort;
  secretPublisher: SecretPublisherPort;
}

export interface RunOptions {
  /** Credential supplied out-of-band, used when no key is issued in this run. */
  credential?: Credential;
  /** Resolve the plan without calling any remote service. */
  dryRun?: boolean;
}

export type StageStatus = 'succeeded' | 'failed' | 'skipped';

export interface StageReport {
  stage: PipelineStage;
  status: StageStatus;
  duration?: number;
  detail?: string;
}

export interface PipelineError {
  code: ProvisioningErrorCode;
  stage?: ErrorStage;
  message: string;
  details?: string;
  remediation: string;
}

export interface PipelineMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
  region: string;
  stackName: string;
  dryRun: boolean;
}

export interface PipelineResult {
  success: boolean;
  stages: StageReport[];
  published: SecretName[];
  deployment?: StackDeployResult;
  issuedAccessKeyId?: string;
  error?: PipelineError;
  metadata: PipelineMetadata;
}
