// Main entry point for the CI secret provisioner
export * from './types';
export * from './errors';
export * from './config/types';
export { ProvisionerConfigLoader, createConfigLoader, loadConfig, DEFAULT_CONFIG_PATHS } from './config/loader';
export { validateConfig, validateAndNormalizeConfig, getConfigSchema } from './config/validator';
export type { Logger } from './logging/logger';
export { createConsoleLogger, createSpinnerLogger, silentLogger, maskIdentifier } from './logging/logger';
export * from './provisioning/types';
export type { StackDeployerOptions } from './provisioning/stack-deployer';
export { StackDeployer, findTemplateProblem } from './provisioning/stack-deployer';
export type { CredentialIssuerOptions } from './provisioning/credential-issuer';
export { CredentialIssuer } from './provisioning/credential-issuer';
export { AccountResolver } from './provisioning/account-resolver';
export * from './github/types';
export { GitHubClient } from './github/client';
export { PublicKeyFetcher } from './github/public-key-fetcher';
export { SecretPublisher } from './github/secret-publisher';
export type { SecretEncryptorPort, SecretEncryptorOptions } from './crypto/secret-encryptor';
export { SecretEncryptor, parseRsaPublicKey } from './crypto/secret-encryptor';
export * from './orchestration/types';
export { PipelineOrchestrator, createPipelineOrchestrator, buildSecretRecords } from './orchestration/pipeline-orchestrator';
export * from './templates/types';
export * from './templates/baseline-template';
export { renderConfigFile } from './templates/config-template';
