import path from 'node:path';
import fs from 'fs-extra';
import { DecryptionFailedError, ValidationError } from '../shared/errors';
import { AtomicFile, isTempFile } from './atomicFile';
import { IV_LENGTH, KEY_ID_LENGTH, TAG_LENGTH, open, seal, type SessionKey } from './cipher';
import type { KeyManager, PreparedRotation } from './keyManager';
import { LockManager } from './locks';
import { errorCode } from './retry';

export const DOCUMENT_EXTENSION = '.enc';
export const STAGED_SUFFIX = '.next';

const MAGIC = Buffer.from('TVD1', 'ascii');
const HEADER_LENGTH = MAGIC.length + KEY_ID_LENGTH + IV_LENGTH + TAG_LENGTH;
const DOCUMENT_NAME = /^[a-z][a-z0-9-]*$/;

export interface EncryptedStoreOptions {
  files?: AtomicFile;
  locks?: LockManager;
}

export interface RecoveryReport {
  removedTemp: string[];
  rolledForward: string[];
  discarded: string[];
}

export interface RotationResult {
  /** Documents whose re-encrypted copy is still staged; `recover` finishes them. */
  pending: string[];
}

const assertDocumentName = (name: string) => {
  if (!DOCUMENT_NAME.test(name)) {
    throw new ValidationError('document', `Invalid document name "${name}"`);
  }
};

const documentAad = (name: string, keyId: string): Buffer => Buffer.from(`${name}:${keyId}`, 'utf8');

export const readKeyId = (bytes: Buffer): string | null => {
  if (bytes.length < HEADER_LENGTH || !bytes.subarray(0, MAGIC.length).equals(MAGIC)) {
    return null;
  }
  return bytes.subarray(MAGIC.length, MAGIC.length + KEY_ID_LENGTH).toString('hex');
};

export const encodeDocument = (name: string, value: unknown, session: SessionKey): Buffer => {
  const plaintext = Buffer.from(JSON.stringify(value), 'utf8');
  const sealed = seal(session.key, plaintext, documentAad(name, session.keyId));
  return Buffer.concat([MAGIC, Buffer.from(session.keyId, 'hex'), sealed.iv, sealed.tag, sealed.data]);
};

export const decodeDocument = (name: string, bytes: Buffer, session: SessionKey): unknown => {
  if (readKeyId(bytes) !== session.keyId) {
    throw new DecryptionFailedError(name);
  }
  let offset = MAGIC.length + KEY_ID_LENGTH;
  const iv = bytes.subarray(offset, offset + IV_LENGTH);
  offset += IV_LENGTH;
  const tag = bytes.subarray(offset, offset + TAG_LENGTH);
  offset += TAG_LENGTH;
  try {
    const plaintext = open(session.key, { iv, tag, data: bytes.subarray(offset) }, documentAad(name, session.keyId));
    return JSON.parse(plaintext.toString('utf8'));
  } catch (error) {
    throw new DecryptionFailedError(name, { cause: error });
  }
};

/**
 * Named JSON documents, each in its own authenticated-encrypted file under
 * the storage root. Documents are independent: a damaged file only affects
 * its own `load`.
 */
export class EncryptedStore {
  readonly files: AtomicFile;
  readonly locks: LockManager;

  constructor(readonly root: string, private readonly keys: KeyManager, options: EncryptedStoreOptions = {}) {
    this.files = options.files ?? new AtomicFile();
    this.locks = options.locks ?? new LockManager();
  }

  documentPath(name: string): string {
    assertDocumentName(name);
    return path.join(this.root, `${name}${DOCUMENT_EXTENSION}`);
  }

  async save(name: string, value: unknown): Promise<void> {
    const target = this.documentPath(name);
    await this.locks.withDocument(name, async () => {
      const session = this.keys.requireSession();
      await this.files.write(target, encodeDocument(name, value, session));
    });
  }

  /** Resolves `undefined` when the document has never been written. */
  async load(name: string): Promise<unknown> {
    const target = this.documentPath(name);
    const session = this.keys.requireSession();
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(target);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    return decodeDocument(name, bytes, session);
  }

  /** Checks that `filePath` holds document `name` readable under the current key. */
  async verifyFile(name: string, filePath: string): Promise<void> {
    const bytes = await fs.readFile(filePath);
    decodeDocument(name, bytes, this.keys.requireSession());
  }

  async listDocuments(): Promise<string[]> {
    const entries = await fs.readdir(this.root);
    return entries
      .filter((entry) => entry.endsWith(DOCUMENT_EXTENSION))
      .map((entry) => entry.slice(0, -DOCUMENT_EXTENSION.length))
      .filter((name) => DOCUMENT_NAME.test(name))
      .sort();
  }

  /**
   * Cleans up after an interrupted write or password change. Staged rotation
   * files are moved into place only when the committed envelope belongs to
   * them and the live file is still under the previous key.
   */
  async recover(): Promise<RecoveryReport> {
    const report: RecoveryReport = { removedTemp: [], rolledForward: [], discarded: [] };
    await fs.ensureDir(this.root);
    const envelope = await this.keys.readEnvelope();
    const entries = await fs.readdir(this.root);

    for (const entry of entries) {
      const fullPath = path.join(this.root, entry);
      if (isTempFile(entry)) {
        await fs.remove(fullPath);
        report.removedTemp.push(entry);
        continue;
      }
      if (!entry.endsWith(`${DOCUMENT_EXTENSION}${STAGED_SUFFIX}`)) {
        continue;
      }
      const livePath = fullPath.slice(0, -STAGED_SUFFIX.length);
      const stagedKeyId = readKeyId(await fs.readFile(fullPath));
      const liveKeyId = (await fs.pathExists(livePath)) ? readKeyId(await fs.readFile(livePath)) : null;
      if (envelope && stagedKeyId === envelope.keyId && liveKeyId !== envelope.keyId) {
        await this.files.commit(fullPath, livePath, true);
        report.rolledForward.push(entry);
      } else {
        await fs.remove(fullPath);
        report.discarded.push(entry);
      }
    }

    if (report.removedTemp.length > 0) {
      console.warn('Removed leftover temp files from an interrupted write', report.removedTemp);
    }
    if (report.rolledForward.length > 0) {
      console.info('Finished an interrupted password change', report.rolledForward);
    }
    return report;
  }

  /**
   * Re-encrypts every document under the prepared key. Nothing live changes
   * until the envelope commit; a failure before it leaves the old password
   * and ciphertexts in force.
   */
  async rotateKey(prepared: PreparedRotation): Promise<RotationResult> {
    return this.locks.withRoot(async () => {
      const current = this.keys.requireSession();
      const names = await this.listDocuments();
      const staged: Array<{ name: string; stagedPath: string; target: string }> = [];

      try {
        for (const name of names) {
          const target = this.documentPath(name);
          const value = decodeDocument(name, await fs.readFile(target), current);
          const stagedPath = await this.files.stage(
            target,
            encodeDocument(name, value, prepared.session),
            `${target}${STAGED_SUFFIX}`
          );
          staged.push({ name, stagedPath, target });
        }
        await this.keys.commitRotation(prepared);
      } catch (error) {
        await Promise.all(staged.map((entry) => fs.remove(entry.stagedPath)));
        throw error;
      }

      const pending: string[] = [];
      for (const entry of staged) {
        try {
          await this.files.commit(entry.stagedPath, entry.target, true);
        } catch (error) {
          console.error(`Failed to move re-encrypted "${entry.name}" into place; it will be finished on next start`, error);
          pending.push(entry.name);
        }
      }
      return { pending };
    });
  }
}
