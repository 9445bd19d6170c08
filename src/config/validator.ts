import Joi from 'joi';
import { ProvisionerConfig, ConfigValidationResult } from './types';

// Joi schema for AwsSettings
const awsSettingsSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z]{2}(-[a-z]+)+-\d+$/)
    .default('us-east-1')
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier (e.g., us-east-1)'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    }),
  iam_username: Joi.string()
    .pattern(/^[\w+=,.@-]+$/)
    .min(1)
    .max(64)
    .default('ci-deployer')
    .messages({
      'string.pattern.base': 'IAM user name may contain only alphanumeric characters and +=,.@_-',
      'string.max': 'IAM user name must be no more than 64 characters long'
    })
});

// Joi schema for StackSettings
const stackSettingsSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
    .max(128)
    .default('pre-apply-stack')
    .messages({
      'string.pattern.base': 'Stack name must start with a letter and contain only alphanumeric characters and hyphens',
      'string.max': 'Stack name must be no more than 128 characters long'
    }),
  template: Joi.string()
    .default('./aws/pre_apply.yaml'),
  poll_interval_ms: Joi.number()
    .integer()
    .min(0)
    .default(10000)
    .messages({
      'number.min': 'Poll interval must not be negative'
    }),
  max_wait_ms: Joi.number()
    .integer()
    .min(1000)
    .default(1800000)
    .messages({
      'number.min': 'Maximum wait must be at least 1000 ms'
    })
});

// Joi schema for GitHubSettings
const githubSettingsSchema = Joi.object({
  owner: Joi.string()
    .pattern(/^[A-Za-z0-9-]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Repository owner may contain only alphanumeric characters and hyphens'
    }),
  repo: Joi.string()
    .pattern(/^[A-Za-z0-9_.-]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Repository name may contain only alphanumeric characters, hyphens, underscores and periods'
    }),
  token: Joi.string()
    .optional(),
  api_url: Joi.string()
    .uri({ scheme: ['https', 'http'] })
    .default('https://api.github.com')
    .messages({
      'string.uri': 'GitHub API URL must be an http(s) URL'
    })
});

// Joi schema for CredentialSettings
const credentialSettingsSchema = Joi.object({
  prune_existing_keys: Joi.boolean()
    .default(false)
    .messages({
      'boolean.base': 'prune_existing_keys must be a boolean value'
    }),
  max_active_keys: Joi.number()
    .integer()
    .min(1)
    .max(2)
    .default(2)
    .messages({
      'number.min': 'max_active_keys must be at least 1',
      'number.max': 'IAM allows at most 2 access keys per user'
    })
});

const encryptionSettingsSchema = Joi.object({
  oaep_hash: Joi.string()
    .valid('sha1', 'sha256')
    .default('sha1')
    .messages({
      'any.only': 'OAEP hash must be one of: sha1, sha256'
    })
});

const networkSettingsSchema = Joi.object({
  timeout_ms: Joi.number()
    .integer()
    .min(1)
    .optional()
    .messages({
      'number.min': 'Timeout must be a positive number of milliseconds'
    })
});

// Main ProvisionerConfig schema
const provisionerConfigSchema = Joi.object<ProvisionerConfig>({
  aws: awsSettingsSchema.default(),
  stack: stackSettingsSchema.default(),
  github: githubSettingsSchema.default(),
  credentials: credentialSettingsSchema.default(),
  encryption: encryptionSettingsSchema.default(),
  network: networkSettingsSchema.default()
}).unknown(false);

const VALIDATION_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  allowUnknown: false,
  stripUnknown: false
};

/**
 * Validates a provisioner configuration object against the schema
 * @param config - The configuration object to validate
 * @returns ConfigValidationResult with validation status and any errors
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = provisionerConfigSchema.validate(config ?? {}, VALIDATION_OPTIONS);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration, applies defaults and freezes the result
 * @throws Error listing every validation message if validation fails
 */
export function validateAndNormalizeConfig(config: unknown): ProvisionerConfig {
  const { error, value } = provisionerConfigSchema.validate(config ?? {}, VALIDATION_OPTIONS);

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return freezeConfig(value);
}

export function getConfigSchema(): Joi.ObjectSchema<ProvisionerConfig> {
  return provisionerConfigSchema;
}

function freezeConfig(config: ProvisionerConfig): ProvisionerConfig {
  return Object.freeze({
    aws: Object.freeze({ ...config.aws }),
    stack: Object.freeze({ ...config.stack }),
    github: Object.freeze({ ...config.github }),
    credentials: Object.freeze({ ...config.credentials }),
    encryption: Object.freeze({ ...config.encryption }),
    network: Object.freeze({ ...config.network })
  });
}
