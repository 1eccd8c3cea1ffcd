import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from 'node:crypto';

export const KEY_LENGTH = 32;
export const SALT_LENGTH = 16;
export const KEY_ID_LENGTH = 16;
export const IV_LENGTH = 12;
export const TAG_LENGTH = 16;

/**
 * PBKDF2-HMAC-SHA256 work factor for new envelopes. Existing envelopes keep
 * the count they were created with.
 */
export const PBKDF2_ITERATIONS = 600_000;
export const KDF_ALGORITHM = 'pbkdf2-sha256';

export interface SessionKey {
  key: Buffer;
  /** Hex id of the envelope generation the key belongs to. */
  keyId: string;
}

export interface Sealed {
  iv: Buffer;
  tag: Buffer;
  data: Buffer;
}

export const deriveKey = (password: string, salt: Buffer, iterations: number): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    pbkdf2(password.normalize('NFC'), salt, iterations, KEY_LENGTH, 'sha256', (error, derived) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derived);
    });
  });

export const randomSalt = (): Buffer => randomBytes(SALT_LENGTH);

export const randomKeyId = (): string => randomBytes(KEY_ID_LENGTH).toString('hex');

export const seal = (key: Buffer, plaintext: Buffer, aad: Buffer): Sealed => {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv('aes-256-gcm', key, iv, { authTagLength: TAG_LENGTH });
  cipher.setAAD(aad);
  const data = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { iv, tag: cipher.getAuthTag(), data };
};

/** Throws when the tag does not authenticate `sealed` under `key` and `aad`. */
export const open = (key: Buffer, sealed: Sealed, aad: Buffer): Buffer => {
  const decipher = createDecipheriv('aes-256-gcm', key, sealed.iv, { authTagLength: TAG_LENGTH });
  decipher.setAAD(aad);
  decipher.setAuthTag(sealed.tag);
  return Buffer.concat([decipher.update(sealed.data), decipher.final()]);
};
