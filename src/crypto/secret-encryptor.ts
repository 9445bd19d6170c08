import { createPublicKey, publicEncrypt, constants, KeyObject } from 'crypto';
import { OaepHash } from '../config/types';
import { ProvisioningError, describeError } from '../errors';
import { withKeyMaterial } from './key-material';

export interface SecretEncryptorPort {
  encrypt(plaintext: string | Buffer, publicKeyBase64: string): string;
}

export interface SecretEncryptorOptions {
  oaepHash?: OaepHash;
}

/**
 * RSA-OAEP encryption of secret values under a repository public key
 * delivered as base64 DER.
 *
 * OAEP leaves (key bytes - 2 * hash bytes - 2) bytes for the plaintext, e.g.
 * 214 bytes for a 2048-bit key with SHA-1. Secrets published here are short
 * identifiers and tokens; longer values fail with EncryptionFailed.
 */
export class SecretEncryptor implements SecretEncryptorPort {
  private readonly oaepHash: OaepHash;

  constructor(options: SecretEncryptorOptions = {}) {
    this.oaepHash = options.oaepHash ?? 'sha1';
  }

  encrypt(plaintext: string | Buffer, publicKeyBase64: string): string {
    const publicKey = parseRsaPublicKey(publicKeyBase64);
    const data = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf-8') : plaintext;

    try {
      const ciphertext = publicEncrypt(
        {
          key: publicKey,
          padding: constants.RSA_PKCS1_OAEP_PADDING,
          oaepHash: this.oaepHash
        },
        data
      );
      return ciphertext.toString('base64');
    } catch (error) {
      throw new ProvisioningError('EncryptionFailed', `Failed to encrypt secret value: ${describeError(error).message}`, {
        stage: 'publish',
        cause: error
      });
    } finally {
      if (data !== plaintext) {
        data.fill(0);
      }
    }
  }
}

/**
 * Parse a base64 DER public key, SubjectPublicKeyInfo first, then PKCS#1.
 */
export function parseRsaPublicKey(publicKeyBase64: string): KeyObject {
  const key = withKeyMaterial(publicKeyBase64, material => {
    if (material.length === 0) {
      return undefined;
    }
    for (const type of ['spki', 'pkcs1'] as const) {
      try {
        return createPublicKey({ key: material, format: 'der', type });
      } catch {
        // try the next encoding
      }
    }
    return undefined;
  });

  if (!key) {
    throw new ProvisioningError('InvalidKeyFormat', 'Public key is not a valid base64 DER public key', {
      stage: 'publish'
    });
  }
  if (key.asymmetricKeyType !== 'rsa') {
    throw new ProvisioningError('InvalidKeyFormat', `Public key type ${key.asymmetricKeyType ?? 'unknown'} is not RSA`, {
      stage: 'publish'
    });
  }
  return key;
}
