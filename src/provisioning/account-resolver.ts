import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { ProvisioningError, describeError } from '../errors';
import { buildClientConfig } from './client-config';
import { AwsClientOptions, AccountResolverPort } from './types';

// Resolves the account id of the configured AWS identity
export class AccountResolver implements AccountResolverPort {
  private client: STSClient;

  constructor(clientOptions: AwsClientOptions) {
    this.client = new STSClient(buildClientConfig(clientOptions));
  }

  async resolveAccountId(): Promise<string> {
    let account: string | undefined;
    try {
      const result = await this.client.send(new GetCallerIdentityCommand({}));
      account = result.Account;
    } catch (error) {
      const { message } = describeError(error);
      throw new ProvisioningError('AccountLookupFailed', `Failed to resolve AWS account id: ${message}`, {
        stage: 'publish',
        details: message,
        cause: error
      });
    }

    if (!account) {
      throw new ProvisioningError('AccountLookupFailed', 'STS returned no account id for the caller identity', {
        stage: 'publish'
      });
    }
    return account;
  }
}
