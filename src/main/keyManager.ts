import path from 'node:path';
import { timingSafeEqual } from 'node:crypto';
import fs from 'fs-extra';
import {
  AlreadyInitializedError,
  AuthenticationFailedError,
  EnvelopeCorruptError,
  SessionLockedError,
  ValidationError
} from '../shared/errors';
import { isRecord } from '../shared/stateHelpers';
import { AtomicFile } from './atomicFile';
import {
  KDF_ALGORITHM,
  PBKDF2_ITERATIONS,
  deriveKey,
  open,
  randomKeyId,
  randomSalt,
  seal,
  type SessionKey
} from './cipher';
import { errorCode } from './retry';

export const ENVELOPE_FILE = 'envelope.json';
export const ENVELOPE_FORMAT_VERSION = 1;
export const MIN_PASSWORD_LENGTH = 6;

const VERIFIER_CANARY = Buffer.from('taskvault:key-verifier:v1', 'utf8');

export interface Envelope {
  formatVersion: number;
  kdf: {
    algorithm: string;
    iterations: number;
    salt: string;
  };
  keyId: string;
  verifier: {
    iv: string;
    tag: string;
    data: string;
  };
  createdAt: string;
}

export interface PreparedRotation {
  session: SessionKey;
  envelope: Envelope;
}

export interface KeyManagerOptions {
  iterations?: number;
  files?: AtomicFile;
  now?: () => Date;
}

const verifierAad = (keyId: string): Buffer => Buffer.from(`envelope:${keyId}`, 'utf8');

const isBase64Field = (value: unknown): value is string => typeof value === 'string' && value.length > 0;

const parseEnvelope = (raw: unknown): Envelope | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const kdf = raw.kdf;
  const verifier = raw.verifier;
  if (!isRecord(kdf) || !isRecord(verifier)) {
    return null;
  }
  if (
    raw.formatVersion !== ENVELOPE_FORMAT_VERSION ||
    kdf.algorithm !== KDF_ALGORITHM ||
    typeof kdf.iterations !== 'number' ||
    !Number.isInteger(kdf.iterations) ||
    kdf.iterations < 1 ||
    !isBase64Field(kdf.salt) ||
    typeof raw.keyId !== 'string' ||
    !isBase64Field(verifier.iv) ||
    !isBase64Field(verifier.tag) ||
    !isBase64Field(verifier.data) ||
    typeof raw.createdAt !== 'string'
  ) {
    return null;
  }
  return {
    formatVersion: raw.formatVersion,
    kdf: { algorithm: kdf.algorithm, iterations: kdf.iterations, salt: kdf.salt },
    keyId: raw.keyId,
    verifier: { iv: verifier.iv, tag: verifier.tag, data: verifier.data },
    createdAt: raw.createdAt
  };
};

const assertPasswordStrength = (password: string, field: string) => {
  if (typeof password !== 'string' || password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(field, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
};

/**
 * Owns the password-derived session key. Only the salt and a verifier are
 * ever written; the key lives in memory until `lock()`.
 */
export class KeyManager {
  private session: SessionKey | null = null;
  private readonly iterations: number;
  private readonly files: AtomicFile;
  private readonly now: () => Date;

  constructor(private readonly root: string, options: KeyManagerOptions = {}) {
    this.iterations = options.iterations ?? PBKDF2_ITERATIONS;
    this.files = options.files ?? new AtomicFile();
    this.now = options.now ?? (() => new Date());
  }

  get envelopePath(): string {
    return path.join(this.root, ENVELOPE_FILE);
  }

  get currentSession(): SessionKey | null {
    return this.session;
  }

  requireSession(): SessionKey {
    if (!this.session) {
      throw new SessionLockedError();
    }
    return this.session;
  }

  async readEnvelope(): Promise<Envelope | null> {
    let text: string;
    try {
      text = await fs.readFile(this.envelopePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new EnvelopeCorruptError(this.envelopePath, { cause: error });
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new EnvelopeCorruptError(this.envelopePath, { cause: error });
    }
    const envelope = parseEnvelope(raw);
    if (!envelope) {
      throw new EnvelopeCorruptError(this.envelopePath);
    }
    return envelope;
  }

  async hasEnvelope(): Promise<boolean> {
    return (await this.readEnvelope()) !== null;
  }

  async initialize(password: string): Promise<SessionKey> {
    if (await this.hasEnvelope()) {
      throw new AlreadyInitializedError();
    }
    assertPasswordStrength(password, 'password');
    const prepared = await this.createEnvelope(password);
    await this.writeEnvelope(prepared.envelope);
    this.session = prepared.session;
    return prepared.session;
  }

  async unlock(password: string): Promise<SessionKey> {
    return this.adopt(await this.authenticate(password));
  }

  /** Derives and checks the key for `password` without touching the current session. */
  async authenticate(password: string): Promise<SessionKey> {
    const envelope = await this.readEnvelope();
    if (!envelope) {
      throw new AuthenticationFailedError();
    }
    return this.verify(envelope, password);
  }

  /** Makes an authenticated key current, zero-filling the one it replaces. */
  adopt(session: SessionKey): SessionKey {
    if (this.session !== session) {
      this.lock();
    }
    this.session = session;
    return session;
  }

  /** Checks `oldPassword` and derives the replacement envelope without writing anything. */
  async prepareRotation(oldPassword: string, newPassword: string): Promise<PreparedRotation> {
    const envelope = await this.readEnvelope();
    if (!envelope) {
      throw new AuthenticationFailedError();
    }
    await this.verify(envelope, oldPassword);
    assertPasswordStrength(newPassword, 'newPassword');
    return this.createEnvelope(newPassword);
  }

  /** The single commit point of a password change. */
  async commitRotation(prepared: PreparedRotation): Promise<void> {
    await this.writeEnvelope(prepared.envelope);
    this.lock();
    this.session = prepared.session;
  }

  lock() {
    this.session?.key.fill(0);
    this.session = null;
  }

  private async createEnvelope(password: string): Promise<PreparedRotation> {
    const salt = randomSalt();
    const key = await deriveKey(password, salt, this.iterations);
    const keyId = randomKeyId();
    const verifier = seal(key, VERIFIER_CANARY, verifierAad(keyId));
    return {
      session: { key, keyId },
      envelope: {
        formatVersion: ENVELOPE_FORMAT_VERSION,
        kdf: {
          algorithm: KDF_ALGORITHM,
          iterations: this.iterations,
          salt: salt.toString('base64')
        },
        keyId,
        verifier: {
          iv: verifier.iv.toString('base64'),
          tag: verifier.tag.toString('base64'),
          data: verifier.data.toString('base64')
        },
        createdAt: this.now().toISOString()
      }
    };
  }

  private async verify(envelope: Envelope, password: string): Promise<SessionKey> {
    const key = await deriveKey(password, Buffer.from(envelope.kdf.salt, 'base64'), envelope.kdf.iterations);
    let canary: Buffer;
    try {
      canary = open(
        key,
        {
          iv: Buffer.from(envelope.verifier.iv, 'base64'),
          tag: Buffer.from(envelope.verifier.tag, 'base64'),
          data: Buffer.from(envelope.verifier.data, 'base64')
        },
        verifierAad(envelope.keyId)
      );
    } catch {
      throw new AuthenticationFailedError();
    }
    if (canary.length !== VERIFIER_CANARY.length || !timingSafeEqual(canary, VERIFIER_CANARY)) {
      throw new AuthenticationFailedError();
    }
    return { key, keyId: envelope.keyId };
  }

  private async writeEnvelope(envelope: Envelope) {
    await fs.ensureDir(this.root);
    await this.files.write(this.envelopePath, `${JSON.stringify(envelope, null, 2)}\n`);
  }
}
