import { AwsClientOptions } from './types';

/**
 * Shared constructor options for the AWS SDK clients. Retries are disabled:
 * a failed call fails the run.
 */
export function buildClientConfig(options: AwsClientOptions) {
  return {
    region: options.region,
    ...(options.profile ? { profile: options.profile } : {}),
    maxAttempts: 1,
    ...(options.requestTimeoutMs !== undefined
      ? { requestHandler: { requestTimeout: options.requestTimeoutMs } }
      : {})
  };
}
