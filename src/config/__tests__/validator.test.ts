import { describe, it, expect } from 'vitest';
import { validateConfig, validateAndNormalizeConfig, getConfigSchema } from '../validator';

describe('Configuration Validator', () => {
  describe('validateConfig', () => {
    it('should validate a complete configuration', () => {
      const config = {
        aws: { region: 'us-west-2', profile: 'default', iam_username: 'ci-deployer' },
        stack: { name: 'pre-apply-stack', template: './aws/pre_apply.yaml', poll_interval_ms: 5000, max_wait_ms: 60000 },
        github: { owner: 'example-org', repo: 'example.repo', token: 'test-token', api_url: 'https://github.example.com/api/v3' },
        credentials: { prune_existing_keys: true, max_active_keys: 2 },
        encryption: { oaep_hash: 'sha256' },
        network: { timeout_ms: 30000 }
      };

      const result = validateConfig(config);

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should accept an empty configuration', () => {
      expect(validateConfig({}).valid).toBe(true);
      expect(validateConfig(undefined).valid).toBe(true);
    });

    it('should reject unknown top-level sections', () => {
      const result = validateConfig({ deployment: {} });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['"deployment" is not allowed']);
    });

    it('should reject an invalid stack name', () => {
      const result = validateConfig({ stack: { name: '1-stack' } });

      expect(result.errors).toEqual([
        'Stack name must start with a letter and contain only alphanumeric characters and hyphens'
      ]);
    });

    it('should reject more than two active keys', () => {
      const result = validateConfig({ credentials: { max_active_keys: 3 } });

      expect(result.errors).toEqual(['IAM allows at most 2 access keys per user']);
    });

    it('should reject an unsupported OAEP hash', () => {
      const result = validateConfig({ encryption: { oaep_hash: 'md5' } });

      expect(result.errors).toEqual(['OAEP hash must be one of: sha1, sha256']);
    });

    it('should report every error at once', () => {
      const result = validateConfig({
        aws: { region: 'nowhere' },
        github: { owner: 'bad owner' },
        network: { timeout_ms: 0 }
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(3);
    });
  });

  describe('validateAndNormalizeConfig', () => {
    it('should fill in defaults for every section', () => {
      const config = validateAndNormalizeConfig({ github: { owner: 'example-org' } });

      expect(config.aws.region).toBe('us-east-1');
      expect(config.aws.iam_username).toBe('ci-deployer');
      expect(config.stack.max_wait_ms).toBe(1800000);
      expect(config.github.owner).toBe('example-org');
      expect(config.github.api_url).toBe('https://api.github.com');
      expect(config.encryption.oaep_hash).toBe('sha1');
    });

    it('should throw with all validation messages', () => {
      expect(() => validateAndNormalizeConfig({ stack: { max_wait_ms: 10 } }))
        .toThrow('Configuration validation failed:\nMaximum wait must be at least 1000 ms');
    });
  });

  describe('getConfigSchema', () => {
    it('should expose the section keys', () => {
      const keys = Object.keys(getConfigSchema().describe().keys ?? {});

      expect(keys).toEqual(['aws', 'stack', 'github', 'credentials', 'encryption', 'network']);
    });
  });
});
