import {
  CloudFormationClient,
  CreateStackCommand,
  UpdateStackCommand,
  DescribeStacksCommand,
  GetTemplateCommand
} from '@aws-sdk/client-cloudformation';
import type { Capability, Stack } from '@aws-sdk/client-cloudformation';
import { readFile } from 'fs/promises';
import { parseDocument } from 'yaml';
import { ProvisioningError, describeError, isProvisioningError } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { StackDeployResult } from '../types';
import { buildClientConfig } from './client-config';
import { AwsClientOptions, StackDeployRequest, StackDeployerPort } from './types';

export const STACK_CAPABILITIES: Capability[] = ['CAPABILITY_IAM', 'CAPABILITY_NAMED_IAM'];

// CloudFormation rejects inline template bodies above this size
const MAX_TEMPLATE_BODY_BYTES = 51200;

export interface StackDeployerOptions {
  pollIntervalMs?: number;
  maxWaitMs?: number;
  logger?: Logger;
}

/**
 * Creates or updates one CloudFormation stack from a template file and waits
 * for the operation to settle.
 */
export class StackDeployer implements StackDeployerPort {
  private client: CloudFormationClient;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly logger: Logger;

  constructor(clientOptions: AwsClientOptions, options: StackDeployerOptions = {}) {
    this.client = new CloudFormationClient(buildClientConfig(clientOptions));
    this.pollIntervalMs = options.pollIntervalMs ?? 10000;
    this.maxWaitMs = options.maxWaitMs ?? 1800000;
    this.logger = options.logger ?? silentLogger;
  }

  async deploy(request: StackDeployRequest): Promise<StackDeployResult> {
    const { templatePath, stackName } = request;
    const templateBody = await this.readTemplate(templatePath);
    this.validateTemplate(templateBody, templatePath);

    try {
      const existingStack = await this.getStackIfExists(stackName);

      if (existingStack) {
        return await this.updateStack(stackName, templateBody, existingStack);
      }

      this.logger.info(`Creating CloudFormation stack: ${stackName}`);
      await this.client.send(new CreateStackCommand({
        StackName: stackName,
        TemplateBody: templateBody,
        Capabilities: STACK_CAPABILITIES,
        Tags: [{ Key: 'ManagedBy', Value: 'ci-secret-provisioner' }]
      }));

      const created = await this.waitForStackOperation(stackName);
      return this.toResult(stackName, created, 'created');
    } catch (error) {
      if (isProvisioningError(error)) {
        throw error;
      }
      const { message } = describeError(error);
      throw new ProvisioningError('DeployFailed', `Failed to deploy stack ${stackName}: ${message}`, {
        stage: 'deploy',
        details: message,
        cause: error
      });
    }
  }

  private async updateStack(stackName: string, templateBody: string, existingStack: Stack): Promise<StackDeployResult> {
    const status = existingStack.StackStatus ?? 'UNKNOWN';
    if (status === 'ROLLBACK_COMPLETE' || status === 'ROLLBACK_FAILED') {
      throw new ProvisioningError(
        'DeployFailed',
        `Stack ${stackName} is in ${status} state and cannot be updated; delete it before deploying again`,
        { stage: 'deploy', details: status }
      );
    }

    if (await this.isTemplateUnchanged(stackName, templateBody)) {
      this.logger.info(`No changes detected in template for stack ${stackName}, skipping update`);
      return this.toResult(stackName, existingStack, 'unchanged');
    }

    this.logger.info(`Updating CloudFormation stack: ${stackName}`);
    try {
      await this.client.send(new UpdateStackCommand({
        StackName: stackName,
        TemplateBody: templateBody,
        Capabilities: STACK_CAPABILITIES
      }));
    } catch (error) {
      if (describeError(error).message.includes('No updates are to be performed')) {
        this.logger.info(`No changes to apply to stack ${stackName}`);
        return this.toResult(stackName, existingStack, 'unchanged');
      }
      throw error;
    }

    const updated = await this.waitForStackOperation(stackName);
    return this.toResult(stackName, updated, 'updated');
  }

  private async readTemplate(templatePath: string): Promise<string> {
    try {
      return await readFile(templatePath, 'utf-8');
    } catch (error) {
      throw new ProvisioningError('TemplateNotFound', `CloudFormation template '${templatePath}' not found`, {
        stage: 'deploy',
        details: describeError(error).message,
        cause: error
      });
    }
  }

  private validateTemplate(templateBody: string, templatePath: string): void {
    const problem = findTemplateProblem(templateBody);
    if (problem) {
      throw new ProvisioningError('TemplateInvalid', `CloudFormation template '${templatePath}' is invalid: ${problem}`, {
        stage: 'deploy'
      });
    }
  }

  private async isTemplateUnchanged(stackName: string, templateBody: string): Promise<boolean> {
    try {
      const result = await this.client.send(new GetTemplateCommand({
        StackName: stackName,
        TemplateStage: 'Original'
      }));
      return result.TemplateBody?.trim() === templateBody.trim();
    } catch (error) {
      this.logger.debug(`Could not read the deployed template of ${stackName}: ${describeError(error).message}`);
      return false;
    }
  }

  private async getStackIfExists(stackName: string): Promise<Stack | null> {
    try {
      const result = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      return result.Stacks?.[0] ?? null;
    } catch (error) {
      const { name, message } = describeError(error);
      if (name === 'ValidationError' && message.includes('does not exist')) {
        return null;
      }
      throw error;
    }
  }

  private async waitForStackOperation(stackName: string): Promise<Stack> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.maxWaitMs) {
      const stack = await this.getStackIfExists(stackName);

      if (!stack) {
        throw new Error(`Stack ${stackName} not found`);
      }

      const status = stack.StackStatus ?? '';

      if (status.endsWith('_COMPLETE')) {
        if (status.includes('FAILED') || status.includes('ROLLBACK')) {
          throw new Error(`Stack operation failed with status: ${status}${stack.StackStatusReason ? ` (${stack.StackStatusReason})` : ''}`);
        }
        return stack;
      }

      if (status.endsWith('_FAILED')) {
        throw new Error(`Stack operation failed with status: ${status}${stack.StackStatusReason ? ` (${stack.StackStatusReason})` : ''}`);
      }

      this.logger.debug(`Stack ${stackName} is ${status}, waiting...`);
      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
    }

    throw new Error(`Stack operation timed out after ${this.maxWaitMs / 1000} seconds`);
  }

  private toResult(stackName: string, stack: Stack, outcome: StackDeployResult['outcome']): StackDeployResult {
    return {
      stackName,
      stackId: stack.StackId,
      outcome,
      status: stack.StackStatus ?? 'UNKNOWN'
    };
  }
}

/**
 * Templates are YAML or JSON. Intrinsic short forms (`!Ref`, `!Sub`, ...) are
 * unknown tags to the parser and only produce warnings.
 */
export function findTemplateProblem(templateBody: string): string | undefined {
  if (Buffer.byteLength(templateBody, 'utf-8') > MAX_TEMPLATE_BODY_BYTES) {
    return `template body exceeds ${MAX_TEMPLATE_BODY_BYTES} bytes`;
  }

  const document = parseDocument(templateBody);
  if (document.errors.length > 0) {
    return document.errors[0].message;
  }

  const parsed: unknown = document.toJS();
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return 'top level must be a mapping';
  }

  const resources = 'Resources' in parsed ? parsed.Resources : undefined;
  if (!resources || typeof resources !== 'object' || Object.keys(resources).length === 0) {
    return 'template must contain at least one resource';
  }

  return undefined;
}
