import { v4 as uuidv4 } from 'uuid';
import { ProvisionerConfig } from '../config/types';
import { ProvisioningError, ProvisioningErrorCode, describeError, isProvisioningError, remediationFor } from '../errors';
import { Logger, silentLogger, maskIdentifier } from '../logging/logger';
import { StackDeployer } from '../provisioning/stack-deployer';
import { CredentialIssuer } from '../provisioning/credential-issuer';
import { AccountResolver } from '../provisioning/account-resolver';
import { AwsClientOptions } from '../provisioning/types';
import { GitHubClient } from '../github/client';
import { PublicKeyFetcher } from '../github/public-key-fetcher';
import { SecretPublisher } from '../github/secret-publisher';
import { SecretEncryptor } from '../crypto/secret-encryptor';
import { Credential, PipelineStage, RepositoryRef, SECRET_NAMES, SecretName, SecretRecord, StackDeployResult } from '../types';
import {
  PipelineIntents,
  PipelineMetadata,
  PipelineResult,
  PipelineServices,
  RunOptions,
  StageReport
} from './types';

const STAGE_ORDER: readonly PipelineStage[] = ['deploy', 'issue', 'publish'];

const STAGE_INTENT: Record<PipelineStage, keyof PipelineIntents> = {
  deploy: 'deploy',
  issue: 'issueCredential',
  publish: 'publishSecrets'
};

// Code for unexpected errors escaping a stage
const STAGE_FAILURE_CODE: Record<PipelineStage, ProvisioningErrorCode> = {
  deploy: 'DeployFailed',
  issue: 'IssueFailed',
  publish: 'PublishFailed'
};

interface RunContext {
  credential?: Credential;
  published: SecretName[];
  deployment?: StackDeployResult;
  issuedAccessKeyId?: string;
}

/**
 * Runs deploy, issue and publish in that order, for whichever intents are
 * set. The first failing stage ends the run; work already committed by
 * earlier stages stays in place.
 */
export class PipelineOrchestrator {
  private readonly config: ProvisionerConfig;
  private readonly services: PipelineServices;
  private readonly logger: Logger;

  constructor(config: ProvisionerConfig, services: PipelineServices, logger: Logger = silentLogger) {
    this.config = config;
    this.services = services;
    this.logger = logger;
  }

  /**
   * Ordered stages for the given intents.
   * @throws ProvisioningError with NoActionSpecified, MissingCredential or
   * InvalidConfiguration; no remote service has been called at that point
   */
  plan(intents: PipelineIntents, credential?: Credential): PipelineStage[] {
    const stages = STAGE_ORDER.filter(stage => intents[STAGE_INTENT[stage]]);

    if (stages.length === 0) {
      throw new ProvisioningError('NoActionSpecified', 'No action specified', { stage: 'plan' });
    }

    if (intents.publishSecrets) {
      if (!intents.issueCredential && !isCompleteCredential(credential)) {
        throw new ProvisioningError(
          'MissingCredential',
          'AWS access keys are not generated or provided; publishing secrets needs a credential',
          { stage: 'plan' }
        );
      }

      const missing = (['owner', 'repo', 'token'] as const).filter(key => !this.config.github[key]);
      if (missing.length > 0) {
        throw new ProvisioningError(
          'InvalidConfiguration',
          `Publishing secrets requires GitHub settings: ${missing.map(key => `github.${key}`).join(', ')}`,
          { stage: 'plan' }
        );
      }
    }

    return stages;
  }

  async run(intents: PipelineIntents, options: RunOptions = {}): Promise<PipelineResult> {
    const startTime = Date.now();
    const metadata: PipelineMetadata = {
      runId: uuidv4(),
      timestamp: new Date(),
      region: this.config.aws.region,
      stackName: this.config.stack.name,
      dryRun: options.dryRun ?? false
    };
    const context: RunContext = { credential: options.credential, published: [] };

    let stages: PipelineStage[];
    try {
      stages = this.plan(intents, options.credential);
    } catch (error) {
      return this.buildResult(context, [], metadata, startTime, toProvisioningError(error, 'InvalidConfiguration'));
    }

    if (options.dryRun) {
      const reports = stages.map((stage): StageReport => ({ stage, status: 'skipped', detail: 'dry run' }));
      return this.buildResult(context, reports, metadata, startTime);
    }

    const reports: StageReport[] = [];
    for (const [index, stage] of stages.entries()) {
      const stageStart = Date.now();
      try {
        const detail = await this.executeStage(stage, context);
        reports.push({ stage, status: 'succeeded', duration: Date.now() - stageStart, detail });
      } catch (error) {
        const failure = toProvisioningError(error, STAGE_FAILURE_CODE[stage]).withStage(stage);
        this.logger.error(`Stage ${stage} failed: ${failure.message}`);
        reports.push({ stage, status: 'failed', duration: Date.now() - stageStart });
        for (const skipped of stages.slice(index + 1)) {
          reports.push({ stage: skipped, status: 'skipped', detail: `${stage} failed` });
        }
        return this.buildResult(context, reports, metadata, startTime, failure);
      }
    }

    return this.buildResult(context, reports, metadata, startTime);
  }

  private async executeStage(stage: PipelineStage, context: RunContext): Promise<string> {
    switch (stage) {
      case 'deploy':
        return this.deployStack(context);
      case 'issue':
        return this.issueCredential(context);
      case 'publish':
        return this.publishSecrets(context);
    }
  }

  private async deployStack(context: RunContext): Promise<string> {
    const { name, template } = this.config.stack;
    this.logger.info(`Deploying CloudFormation template '${template}' as stack ${name}...`);

    const deployment = await this.services.stackDeployer.deploy({ templatePath: template, stackName: name });
    context.deployment = deployment;

    this.logger.success(`Stack ${name} ${deployment.outcome} (${deployment.status})`);
    return deployment.outcome;
  }

  private async issueCredential(context: RunContext): Promise<string> {
    const username = this.config.aws.iam_username;
    this.logger.info(`Generating new AWS IAM access key for ${username}...`);

    const credential = await this.services.credentialIssuer.issue(username);
    context.credential = credential;
    context.issuedAccessKeyId = credential.accessKeyId;

    this.logger.success(`AWS IAM access key ${maskIdentifier(credential.accessKeyId)} generated`);
    return maskIdentifier(credential.accessKeyId);
  }

  private async publishSecrets(context: RunContext): Promise<string> {
    const credential = context.credential;
    if (!isCompleteCredential(credential)) {
      throw new ProvisioningError('MissingCredential', 'No AWS credential available to publish', { stage: 'publish' });
    }

    const repository = this.repository();
    const target = `${repository.owner}/${repository.repo}`;
    this.logger.info(`Updating GitHub secrets of ${target}...`);

    const accountId = await this.services.accountResolver.resolveAccountId();
    const records = buildSecretRecords(credential, accountId, this.config.aws.region);

    for (const record of records) {
      // A fresh key per secret; the key id must come from the same fetch
      const publicKey = await this.services.publicKeyFetcher.fetchPublicKey(repository);
      const encryptedValue = this.services.secretEncryptor.encrypt(record.value, publicKey.key);

      await this.services.secretPublisher.publish({
        ...repository,
        secretName: record.name,
        encryptedValue,
        keyId: publicKey.keyId
      });
      context.published.push(record.name);
      this.logger.success(`Secret ${record.name} pushed to ${target}`);
    }

    return `${context.published.length} secrets published`;
  }

  private repository(): RepositoryRef {
    const { owner, repo } = this.config.github;
    if (!owner || !repo) {
      throw new ProvisioningError('InvalidConfiguration', 'GitHub repository owner and name are required', { stage: 'publish' });
    }
    return { owner, repo };
  }

  private buildResult(
    context: RunContext,
    stages: StageReport[],
    metadata: PipelineMetadata,
    startTime: number,
    failure?: ProvisioningError
  ): PipelineResult {
    return {
      success: failure === undefined,
      stages,
      published: [...context.published],
      deployment: context.deployment,
      issuedAccessKeyId: context.issuedAccessKeyId,
      error: failure
        ? {
            code: failure.code,
            stage: failure.stage,
            message: failure.message,
            details: failure.details,
            remediation: remediationFor(failure.code)
          }
        : undefined,
      metadata: { ...metadata, duration: Date.now() - startTime }
    };
  }
}

/**
 * The secrets published for a credential, in publish order.
 */
export function buildSecretRecords(credential: Credential, accountId: string, region: string): SecretRecord[] {
  const values: Record<SecretName, string> = {
    AWS_ACCESS_KEY_ID: credential.accessKeyId,
    AWS_SECRET_ACCESS_KEY: credential.secretAccessKey,
    AWS_ACCOUNT_ID: accountId,
    AWS_REGION: region
  };
  return SECRET_NAMES.map(name => ({ name, value: values[name] }));
}

function isCompleteCredential(credential: Credential | undefined): credential is Credential {
  return Boolean(credential?.accessKeyId && credential.secretAccessKey);
}

function toProvisioningError(error: unknown, fallback: ProvisioningErrorCode): ProvisioningError {
  if (isProvisioningError(error)) {
    return error;
  }
  return new ProvisioningError(fallback, describeError(error).message, { cause: error });
}

/**
 * Build an orchestrator with the AWS and GitHub services described by `config`.
 */
export function createPipelineOrchestrator(config: ProvisionerConfig, logger: Logger = silentLogger): PipelineOrchestrator {
  const clientOptions: AwsClientOptions = {
    region: config.aws.region,
    profile: config.aws.profile,
    requestTimeoutMs: config.network.timeout_ms
  };
  const github = new GitHubClient({
    token: config.github.token ?? '',
    apiUrl: config.github.api_url,
    timeoutMs: config.network.timeout_ms
  });

  return new PipelineOrchestrator(
    config,
    {
      stackDeployer: new StackDeployer(clientOptions, {
        pollIntervalMs: config.stack.poll_interval_ms,
        maxWaitMs: config.stack.max_wait_ms,
        logger
      }),
      credentialIssuer: new CredentialIssuer(clientOptions, {
        pruneExistingKeys: config.credentials.prune_existing_keys,
        maxActiveKeys: config.credentials.max_active_keys,
        logger
      }),
      accountResolver: new AccountResolver(clientOptions),
      publicKeyFetcher: new PublicKeyFetcher(github),
      secretEncryptor: new SecretEncryptor({ oaepHash: config.encryption.oaep_hash }),
      secretPublisher: new SecretPublisher(github)
    },
    logger
  );
}
