import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  IAMClient,
  CreateAccessKeyCommand,
  ListAccessKeysCommand,
  DeleteAccessKeyCommand
} from '@aws-sdk/client-iam';
import { CredentialIssuer } from '../credential-issuer';

// Mock the AWS SDK
vi.mock('@aws-sdk/client-iam', () => ({
  IAMClient: vi.fn(),
  CreateAccessKeyCommand: vi.fn(),
  ListAccessKeysCommand: vi.fn(),
  DeleteAccessKeyCommand: vi.fn()
}));

describe('CredentialIssuer', () => {
  let mockClient: { send: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    mockClient = { send: vi.fn() };
    vi.mocked(IAMClient).mockImplementation(function () {
      return mockClient as unknown as IAMClient;
    });
  });

  describe('issue', () => {
    it('should create a new access key for the user', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' });
      mockClient.send.mockResolvedValueOnce({
        AccessKey: {
          UserName: 'ci-deployer',
          AccessKeyId: 'AKIAEXAMPLEKEY000001',
          SecretAccessKey: 'test-secret-access-key',
          Status: 'Active'
        }
      });

      const credential = await issuer.issue('ci-deployer');

      expect(credential).toEqual({
        accessKeyId: 'AKIAEXAMPLEKEY000001',
        secretAccessKey: 'test-secret-access-key'
      });
      expect(CreateAccessKeyCommand).toHaveBeenCalledWith({ UserName: 'ci-deployer' });
      expect(ListAccessKeysCommand).not.toHaveBeenCalled();
      expect(mockClient.send).toHaveBeenCalledTimes(1);
    });

    it('should report quota errors as IssueFailed without pruning', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' });
      mockClient.send.mockRejectedValueOnce({
        name: 'LimitExceededException',
        message: 'Cannot exceed quota for AccessKeysPerUser: 2'
      });

      await expect(issuer.issue('ci-deployer')).rejects.toMatchObject({
        code: 'IssueFailed',
        stage: 'issue',
        details: 'LimitExceededException',
        message: 'Failed to create IAM access key for ci-deployer: access key quota exceeded: Cannot exceed quota for AccessKeysPerUser: 2'
      });
      expect(DeleteAccessKeyCommand).not.toHaveBeenCalled();
    });

    it('should fail when IAM returns no secret', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' });
      mockClient.send.mockResolvedValueOnce({ AccessKey: { AccessKeyId: 'AKIAEXAMPLEKEY000001' } });

      await expect(issuer.issue('ci-deployer')).rejects.toMatchObject({
        code: 'IssueFailed',
        message: 'IAM returned an incomplete access key for user ci-deployer'
      });
    });

    it('should surface other service errors as IssueFailed', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' });
      mockClient.send.mockRejectedValueOnce({ name: 'NoSuchEntityException', message: 'The user with name ghost cannot be found.' });

      await expect(issuer.issue('ghost')).rejects.toMatchObject({
        code: 'IssueFailed',
        details: 'NoSuchEntityException'
      });
    });
  });

  describe('pruning existing keys', () => {
    it('should delete the oldest key when the user is at the limit', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' }, { pruneExistingKeys: true, maxActiveKeys: 2 });
      mockClient.send
        .mockResolvedValueOnce({
          AccessKeyMetadata: [
            { AccessKeyId: 'AKIANEWER00000000002', CreateDate: new Date('2024-06-01T00:00:00Z') },
            { AccessKeyId: 'AKIAOLDER00000000001', CreateDate: new Date('2024-01-01T00:00:00Z') }
          ]
        })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({
          AccessKey: { AccessKeyId: 'AKIAFRESH00000000003', SecretAccessKey: 'test-secret' }
        });

      const credential = await issuer.issue('ci-deployer');

      expect(credential.accessKeyId).toBe('AKIAFRESH00000000003');
      expect(DeleteAccessKeyCommand).toHaveBeenCalledTimes(1);
      expect(DeleteAccessKeyCommand).toHaveBeenCalledWith({ UserName: 'ci-deployer', AccessKeyId: 'AKIAOLDER00000000001' });
      expect(mockClient.send).toHaveBeenCalledTimes(3); // ListAccessKeys, DeleteAccessKey, CreateAccessKey
    });

    it('should not delete anything when a slot is free', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' }, { pruneExistingKeys: true });
      mockClient.send
        .mockResolvedValueOnce({
          AccessKeyMetadata: [{ AccessKeyId: 'AKIAONLY000000000001', CreateDate: new Date('2024-01-01T00:00:00Z') }]
        })
        .mockResolvedValueOnce({
          AccessKey: { AccessKeyId: 'AKIAFRESH00000000003', SecretAccessKey: 'test-secret' }
        });

      await issuer.issue('ci-deployer');

      expect(DeleteAccessKeyCommand).not.toHaveBeenCalled();
      expect(mockClient.send).toHaveBeenCalledTimes(2);
    });

    it('should keep at most one key when maxActiveKeys is 1', async () => {
      const issuer = new CredentialIssuer({ region: 'us-east-1' }, { pruneExistingKeys: true, maxActiveKeys: 1 });
      mockClient.send
        .mockResolvedValueOnce({
          AccessKeyMetadata: [
            { AccessKeyId: 'AKIAB000000000000002', CreateDate: new Date('2024-03-01T00:00:00Z') },
            { AccessKeyId: 'AKIAA000000000000001', CreateDate: new Date('2024-02-01T00:00:00Z') }
          ]
        })
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({})
        .mockResolvedValueOnce({
          AccessKey: { AccessKeyId: 'AKIAC000000000000003', SecretAccessKey: 'test-secret' }
        });

      await issuer.issue('ci-deployer');

      expect(vi.mocked(DeleteAccessKeyCommand).mock.calls.map(([input]) => input.AccessKeyId)).toEqual([
        'AKIAA000000000000001',
        'AKIAB000000000000002'
      ]);
    });
  });
});
