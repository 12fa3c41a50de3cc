import crypto from 'crypto';
import { getLogger } from './logger';
import { ServiceError } from './errors';
import { isExportKey } from './config';

const logger = getLogger('exportEncryption');

// ─── Constants ────────────────────────────────────────────────────────────────

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_LENGTH = 32;

export interface SealedBytes {
  ciphertext: Uint8Array;
  /** base64 */
  iv: string;
  /** base64 */
  authTag: string;
}

export function parseExportKey(hex: string | null): Buffer {
  if (!isExportKey(hex)) {
    throw new ServiceError(
      'computation',
      'encryption_unavailable',
      `Export encryption needs a ${KEY_LENGTH}-byte key encoded as hex`,
    );
  }
  return Buffer.from(hex, 'hex');
}

export function sealBytes(plaintext: Uint8Array, key: Buffer): SealedBytes {
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const authTag = cipher.getAuthTag();

  logger.debug('Export sealed', { bytes: plaintext.byteLength });
  return {
    ciphertext: new Uint8Array(encrypted),
    iv: iv.toString('base64'),
    authTag: authTag.toString('base64'),
  };
}

export function openBytes(sealed: SealedBytes, key: Buffer): Uint8Array {
  const decipher = crypto.createDecipheriv(ALGORITHM, key, Buffer.from(sealed.iv, 'base64'), {
    authTagLength: AUTH_TAG_LENGTH,
  });
  decipher.setAuthTag(Buffer.from(sealed.authTag, 'base64'));
  return new Uint8Array(Buffer.concat([decipher.update(sealed.ciphertext), decipher.final()]));
}
