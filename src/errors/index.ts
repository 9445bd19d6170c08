/**
 * Error taxonomy for the provisioning pipeline.
 *
 * Every remote call maps its outcome onto one of these codes so callers can
 * branch on `code` instead of inspecting message text.
 */
import { PipelineStage } from '../types';

export type ProvisioningErrorCode =
  | 'TemplateNotFound'
  | 'TemplateInvalid'
  | 'DeployFailed'
  | 'IssueFailed'
  | 'AccountLookupFailed'
  | 'AuthError'
  | 'MalformedResponse'
  | 'RequestFailed'
  | 'InvalidKeyFormat'
  | 'EncryptionFailed'
  | 'PublishFailed'
  | 'MissingCredential'
  | 'NoActionSpecified'
  | 'InvalidConfiguration';

export type ErrorStage = PipelineStage | 'plan';

export interface ProvisioningErrorOptions {
  stage?: ErrorStage;
  details?: string;
  cause?: unknown;
}

export class ProvisioningError extends Error {
  readonly code: ProvisioningErrorCode;
  readonly stage?: ErrorStage;
  readonly details?: string;

  constructor(code: ProvisioningErrorCode, message: string, options: ProvisioningErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProvisioningError';
    this.code = code;
    this.stage = options.stage;
    this.details = options.details;
  }

  /** Copy of this error attributed to `stage`, unless a stage is already set. */
  withStage(stage: ErrorStage): ProvisioningError {
    if (this.stage) {
      return this;
    }
    return new ProvisioningError(this.code, this.message, {
      stage,
      details: this.details,
      cause: this.cause
    });
  }
}

const USAGE_ERRORS: ReadonlySet<ProvisioningErrorCode> = new Set<ProvisioningErrorCode>([
  'NoActionSpecified',
  'MissingCredential',
  'InvalidConfiguration'
]);

export function isUsageError(code: ProvisioningErrorCode): boolean {
  return USAGE_ERRORS.has(code);
}

const REMEDIATIONS: Record<ProvisioningErrorCode, string> = {
  TemplateNotFound: 'Check stack.template or pass --template with the path to an existing template',
  TemplateInvalid: 'The template must be YAML or JSON with a non-empty Resources section',
  DeployFailed: 'Check the AWS CloudFormation console for the stack events of the failed operation',
  IssueFailed: 'An IAM user may hold at most two access keys; delete one or enable credentials.prune_existing_keys',
  AccountLookupFailed: 'Verify the AWS profile has valid credentials (sts:GetCallerIdentity)',
  AuthError: 'Verify the GitHub token is valid and can administer repository secrets',
  MalformedResponse: 'The secret store returned an unexpected response; check github.api_url',
  RequestFailed: 'Check network connectivity and the repository owner and name',
  InvalidKeyFormat: 'The repository public key could not be parsed as an RSA public key',
  EncryptionFailed: 'Secret values must be short strings that fit the key size',
  PublishFailed: 'Verify the token has write access to the repository secrets',
  MissingCredential: 'Use --generate-key, or pass --access-key-id and --secret-access-key',
  NoActionSpecified: 'Use --deploy-pre-apply, --generate-key, or --update-secrets',
  InvalidConfiguration: 'Review the configuration file and command-line options'
};

export function remediationFor(code: ProvisioningErrorCode): string {
  return REMEDIATIONS[code];
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

/**
 * Name and message of an unknown thrown value. AWS SDK service exceptions
 * carry the exception type in `name`.
 */
export function describeError(error: unknown): { name?: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  if (error && typeof error === 'object') {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : undefined;
    const message = 'message' in error && typeof error.message === 'string' ? error.message : name ?? String(error);
    return { name, message };
  }
  return { message: String(error) };
}
