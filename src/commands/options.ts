// Translation of command-line flags into pipeline inputs
import { InvalidArgumentError } from 'commander';
import { ConfigOverrides, ProvisionerConfig } from '../config/types';
import { ProvisioningError, isUsageError } from '../errors';
import { maskIdentifier } from '../logging/logger';
import { PipelineIntents, PipelineResult } from '../orchestration/types';
import { Credential } from '../types';

export interface RunCommandOptions {
  deployPreApply?: boolean;
  generateKey?: boolean;
  updateSecrets?: boolean;
  ghToken?: string;
  repoOwner?: string;
  repoName?: string;
  profile?: string;
  region?: string;
  iamUser?: string;
  template?: string;
  stackName?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  pruneKeys?: boolean;
  timeout?: number;
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function buildIntents(options: RunCommandOptions): PipelineIntents {
  return {
    deploy: options.deployPreApply ?? false,
    issueCredential: options.generateKey ?? false,
    publishSecrets: options.updateSecrets ?? false
  };
}

export function buildOverrides(options: RunCommandOptions): ConfigOverrides {
  return {
    aws: {
      region: options.region,
      profile: options.profile,
      iam_username: options.iamUser
    },
    stack: {
      name: options.stackName,
      template: options.template
    },
    github: {
      owner: options.repoOwner,
      repo: options.repoName,
      token: options.ghToken
    },
    credentials: {
      prune_existing_keys: options.pruneKeys ? true : undefined
    },
    network: {
      timeout_ms: options.timeout
    }
  };
}

/**
 * Credential passed on the command line. Both halves must be present.
 */
export function buildCredential(options: RunCommandOptions): Credential | undefined {
  const { accessKeyId, secretAccessKey } = options;
  if (!accessKeyId && !secretAccessKey) {
    return undefined;
  }
  if (!accessKeyId || !secretAccessKey) {
    throw new ProvisioningError(
      'MissingCredential',
      '--access-key-id and --secret-access-key must be given together',
      { stage: 'plan' }
    );
  }
  return { accessKeyId, secretAccessKey };
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Diagnostic for a failed run. `details` holds the raw body of the failing
 * remote call, when there was one.
 */
export interface FailureReport {
  headline: string;
  details?: string;
  remediation: string;
  notes: string[];
}

export function formatFailure(result: PipelineResult): FailureReport | undefined {
  if (!result.error) {
    return undefined;
  }

  const { code, stage, message, details, remediation } = result.error;
  const notes: string[] = [];

  const completed = result.stages.filter(report => report.status === 'succeeded');
  if (completed.length > 0) {
    notes.push(`Completed before the failure: ${completed.map(report => report.stage).join(', ')}`);
  }
  if (result.published.length > 0) {
    notes.push(`Secrets already published: ${result.published.join(', ')}`);
  }

  return {
    headline: `${code}${stage ? ` (${stage})` : ''}: ${message}`,
    details,
    remediation,
    notes
  };
}

export function exitCodeFor(result: PipelineResult): number {
  if (result.success) {
    return EXIT_SUCCESS;
  }
  return result.error && isUsageError(result.error.code) ? EXIT_USAGE : EXIT_FAILURE;
}

/**
 * Configuration as shown by --dry-run, with the token hidden
 */
export function describeConfig(config: ProvisionerConfig): ProvisionerConfig {
  return {
    ...config,
    github: {
      ...config.github,
      token: config.github.token ? maskIdentifier(config.github.token) : undefined
    }
  };
}
