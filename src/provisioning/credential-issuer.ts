import {
  IAMClient,
  CreateAccessKeyCommand,
  ListAccessKeysCommand,
  DeleteAccessKeyCommand
} from '@aws-sdk/client-iam';
import type { AccessKeyMetadata } from '@aws-sdk/client-iam';
import { ProvisioningError, describeError, isProvisioningError } from '../errors';
import { Logger, silentLogger, maskIdentifier } from '../logging/logger';
import { Credential } from '../types';
import { buildClientConfig } from './client-config';
import { AwsClientOptions, CredentialIssuerPort } from './types';

export interface CredentialIssuerOptions {
  /**
   * Delete the oldest access keys of the user before issuing, so that the new
   * key fits under `maxActiveKeys`. Off by default: quota errors from IAM are
   * then reported as they are.
   */
  pruneExistingKeys?: boolean;
  maxActiveKeys?: number;
  logger?: Logger;
}

/**
 * Issues long-lived IAM access keys. The secret half is only ever returned by
 * IAM at creation time.
 */
export class CredentialIssuer implements CredentialIssuerPort {
  private client: IAMClient;
  private readonly pruneExistingKeys: boolean;
  private readonly maxActiveKeys: number;
  private readonly logger: Logger;

  constructor(clientOptions: AwsClientOptions, options: CredentialIssuerOptions = {}) {
    this.client = new IAMClient(buildClientConfig(clientOptions));
    this.pruneExistingKeys = options.pruneExistingKeys ?? false;
    this.maxActiveKeys = options.maxActiveKeys ?? 2;
    this.logger = options.logger ?? silentLogger;
  }

  async issue(username: string): Promise<Credential> {
    try {
      if (this.pruneExistingKeys) {
        await this.pruneOldestKeys(username);
      }

      const result = await this.client.send(new CreateAccessKeyCommand({ UserName: username }));
      const accessKeyId = result.AccessKey?.AccessKeyId;
      const secretAccessKey = result.AccessKey?.SecretAccessKey;

      if (!accessKeyId || !secretAccessKey) {
        throw new ProvisioningError('IssueFailed', `IAM returned an incomplete access key for user ${username}`, {
          stage: 'issue'
        });
      }

      this.logger.debug(`Issued access key ${maskIdentifier(accessKeyId)} for ${username}`);
      return { accessKeyId, secretAccessKey };
    } catch (error) {
      if (isProvisioningError(error)) {
        throw error;
      }
      const { name, message } = describeError(error);
      const reason = name === 'LimitExceededException' ? `access key quota exceeded: ${message}` : message;
      throw new ProvisioningError('IssueFailed', `Failed to create IAM access key for ${username}: ${reason}`, {
        stage: 'issue',
        details: name,
        cause: error
      });
    }
  }

  private async pruneOldestKeys(username: string): Promise<void> {
    const result = await this.client.send(new ListAccessKeysCommand({ UserName: username }));
    const keys = [...(result.AccessKeyMetadata ?? [])].sort(byCreationDate);

    // One slot must be free for the key about to be created
    const excess = keys.length - this.maxActiveKeys + 1;
    for (const key of keys.slice(0, Math.max(excess, 0))) {
      if (!key.AccessKeyId) {
        continue;
      }
      this.logger.warn(`Deleting access key ${maskIdentifier(key.AccessKeyId)} of ${username} to stay within ${this.maxActiveKeys} active keys`);
      await this.client.send(new DeleteAccessKeyCommand({ UserName: username, AccessKeyId: key.AccessKeyId }));
    }
  }
}

function byCreationDate(a: AccessKeyMetadata, b: AccessKeyMetadata): number {
  return (a.CreateDate?.getTime() ?? 0) - (b.CreateDate?.getTime() ?? 0);
}
