import path from 'node:path';
import fs from 'fs-extra';
import { DateTime } from 'luxon';
import { v4 as uuid } from 'uuid';
import { DecryptionFailedError, NotFoundError, VersionMismatchError } from '../shared/errors';
import { BACKUP_TYPES, isRecord } from '../shared/stateHelpers';
import type { BackupInfo, BackupManifest, BackupType } from '../shared/types';
import { DOCUMENT_EXTENSION, type EncryptedStore } from './encryptedStore';
import { ENVELOPE_FILE, type KeyManager } from './keyManager';
import { errorCode, withRetry } from './retry';

export const BACKUP_FORMAT_VERSION = 1;
export const BACKUP_DIR = 'backups';
export const MANIFEST_FILE = 'manifest.json';
export const DEFAULT_BACKUP_KEEP = 10;

interface SnapshotDocument {
  document: string;
  sourcePath: string;
}

const BACKUP_NAME = /^\d{8}T\d{9}-(manual|automatic|pre-update)(-\d+)?$/;
const STAGING_PREFIX = '.staging-';

export interface BackupManagerOptions {
  keep?: number;
  appVersion?: string;
  now?: () => Date;
  /** Writes every dirty in-memory document; runs under the root lock. */
  flushAll?: () => Promise<void>;
  /** Re-reads every document from disk after a restore; runs under the root lock. */
  reloadAll?: () => Promise<void>;
}

const parseManifest = (raw: unknown): BackupManifest | null => {
  if (!isRecord(raw)) {
    return null;
  }
  const type = BACKUP_TYPES.find((candidate) => candidate === raw.type);
  const files = raw.files;
  if (
    typeof raw.formatVersion !== 'number' ||
    type === undefined ||
    typeof raw.createdAt !== 'string' ||
    typeof raw.appVersion !== 'string' ||
    !Array.isArray(files) ||
    !files.every((file): file is string => typeof file === 'string')
  ) {
    return null;
  }
  return { formatVersion: raw.formatVersion, type, createdAt: raw.createdAt, appVersion: raw.appVersion, files };
};

/**
 * Point-in-time copies of the encrypted documents under `<root>/backups`.
 * Snapshots hold ciphertext only; restoring one needs the key it was taken
 * under.
 */
export class BackupManager {
  private readonly keep: number;
  private readonly appVersion: string;
  private readonly now: () => Date;
  private readonly flushAll: () => Promise<void>;
  private readonly reloadAll: () => Promise<void>;

  constructor(
    private readonly store: EncryptedStore,
    private readonly keys: KeyManager,
    options: BackupManagerOptions = {}
  ) {
    this.keep = Math.max(1, options.keep ?? DEFAULT_BACKUP_KEEP);
    this.appVersion = options.appVersion ?? '0.0.0';
    this.now = options.now ?? (() => new Date());
    this.flushAll = options.flushAll ?? (async () => undefined);
    this.reloadAll = options.reloadAll ?? (async () => undefined);
  }

  get backupRoot(): string {
    return path.join(this.store.root, BACKUP_DIR);
  }

  async create(type: BackupType): Promise<string> {
    const name = await this.store.locks.withRoot(async () => {
      await this.flushAll();
      return this.snapshot(type);
    });
    await this.prune();
    return name;
  }

  async list(): Promise<BackupInfo[]> {
    if (!(await fs.pathExists(this.backupRoot))) {
      return [];
    }
    const backups: BackupInfo[] = [];
    for (const entry of await fs.readdir(this.backupRoot)) {
      if (!BACKUP_NAME.test(entry)) {
        continue;
      }
      const manifest = parseManifest(await this.readManifest(entry));
      if (!manifest) {
        console.warn(`Skipping backup "${entry}": manifest is missing or unreadable`);
        continue;
      }
      backups.push({
        name: entry,
        type: manifest.type,
        version: manifest.formatVersion,
        appVersion: manifest.appVersion,
        createdAt: manifest.createdAt
      });
    }
    return backups.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.name.localeCompare(a.name));
  }

  /**
   * Replaces the live documents with the snapshot's. Every snapshot document
   * is authenticated before anything live changes, and the state being
   * replaced is saved as an automatic snapshot first. A failure while
   * swapping files puts that snapshot back before the error surfaces.
   */
  async restore(name: string): Promise<void> {
    if (!BACKUP_NAME.test(name)) {
      throw new NotFoundError('backup', name);
    }
    const source = path.join(this.backupRoot, name);

    await this.store.locks.withRoot(async () => {
      const raw = await this.readManifest(name);
      if (raw === undefined) {
        throw new NotFoundError('backup', name);
      }
      if (isRecord(raw) && raw.formatVersion !== BACKUP_FORMAT_VERSION) {
        throw new VersionMismatchError(raw.formatVersion, BACKUP_FORMAT_VERSION);
      }
      const manifest = parseManifest(raw);
      if (!manifest) {
        throw new NotFoundError('backup', name);
      }

      const documents = this.snapshotDocuments(source, manifest);
      for (const { document, sourcePath } of documents) {
        try {
          await this.store.verifyFile(document, sourcePath);
        } catch (error) {
          if (errorCode(error) === 'ENOENT') {
            throw new DecryptionFailedError(document, { cause: error });
          }
          throw error;
        }
      }

      await this.flushAll();
      const safety = await this.snapshot('automatic');
      console.info(`Saved current state as "${safety}" before restoring "${name}"`);

      try {
        await this.replaceLive(documents);
      } catch (error) {
        console.error(`Failed to restore "${name}"; rolling back to "${safety}"`, error);
        await this.rollBack(safety);
        throw error;
      }
      await this.reloadAll();
    });

    console.info(`Restored backup "${name}"`);
    await this.prune();
  }

  private snapshotDocuments(source: string, manifest: BackupManifest): SnapshotDocument[] {
    return manifest.files
      .filter((file) => file.endsWith(DOCUMENT_EXTENSION))
      .map((file) => ({ document: file.slice(0, -DOCUMENT_EXTENSION.length), sourcePath: path.join(source, file) }));
  }

  /**
   * Stages every document beside its live file before the first rename, then
   * commits them and drops live documents the set does not contain.
   */
  private async replaceLive(documents: SnapshotDocument[]) {
    const staged: Array<{ stagedPath: string; target: string }> = [];
    try {
      for (const { document, sourcePath } of documents) {
        const target = this.store.documentPath(document);
        staged.push({ stagedPath: await this.store.files.stage(target, await fs.readFile(sourcePath)), target });
      }
      for (const { stagedPath, target } of staged) {
        await this.store.files.commit(stagedPath, target);
      }
      const kept = new Set(documents.map((entry) => entry.document));
      for (const live of await this.store.listDocuments()) {
        if (!kept.has(live)) {
          await fs.remove(this.store.documentPath(live));
        }
      }
    } finally {
      await Promise.all(staged.map((entry) => fs.remove(entry.stagedPath)));
    }
  }

  /** Puts the live files back from the snapshot taken at the start of a restore. */
  private async rollBack(safety: string) {
    try {
      const manifest = parseManifest(await this.readManifest(safety));
      if (!manifest) {
        throw new NotFoundError('backup', safety);
      }
      await this.replaceLive(this.snapshotDocuments(path.join(this.backupRoot, safety), manifest));
      console.info(`Rolled back to "${safety}"`);
    } catch (error) {
      console.error(`Failed to roll back; the previous state is kept in backup "${safety}"`, error);
    }
  }

  /** Deletes staging directories left by a snapshot that never finished. */
  async removeStaleStaging(): Promise<string[]> {
    if (!(await fs.pathExists(this.backupRoot))) {
      return [];
    }
    const stale = (await fs.readdir(this.backupRoot)).filter((entry) => entry.startsWith(STAGING_PREFIX));
    for (const entry of stale) {
      await fs.remove(path.join(this.backupRoot, entry));
    }
    if (stale.length > 0) {
      console.warn('Removed unfinished backup staging directories', stale);
    }
    return stale;
  }

  private async snapshot(type: BackupType): Promise<string> {
    await fs.ensureDir(this.backupRoot);
    const createdAt = this.now();
    const staging = path.join(this.backupRoot, `${STAGING_PREFIX}${uuid()}`);
    await fs.ensureDir(staging);

    try {
      const files: string[] = [];
      for (const document of await this.store.listDocuments()) {
        const file = `${document}${DOCUMENT_EXTENSION}`;
        await this.store.files.copy(this.store.documentPath(document), path.join(staging, file));
        files.push(file);
      }
      if (await fs.pathExists(this.keys.envelopePath)) {
        await this.store.files.copy(this.keys.envelopePath, path.join(staging, ENVELOPE_FILE));
        files.push(ENVELOPE_FILE);
      }
      const manifest: BackupManifest = {
        formatVersion: BACKUP_FORMAT_VERSION,
        type,
        createdAt: createdAt.toISOString(),
        appVersion: this.appVersion,
        files
      };
      await this.store.files.write(path.join(staging, MANIFEST_FILE), `${JSON.stringify(manifest, null, 2)}\n`);

      const name = await this.freeName(createdAt, type);
      await withRetry(() => fs.rename(staging, path.join(this.backupRoot, name)));
      console.info(`Created ${type} backup "${name}"`);
      return name;
    } catch (error) {
      await fs.remove(staging);
      throw error;
    }
  }

  private async freeName(createdAt: Date, type: BackupType): Promise<string> {
    const base = `${DateTime.fromJSDate(createdAt).toFormat("yyyyLLdd'T'HHmmssSSS")}-${type}`;
    let name = base;
    for (let suffix = 2; await fs.pathExists(path.join(this.backupRoot, name)); suffix += 1) {
      name = `${base}-${suffix}`;
    }
    return name;
  }

  /** Resolves `undefined` when the manifest is absent and `null` when it is not JSON. */
  private async readManifest(name: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.backupRoot, name, MANIFEST_FILE), 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT' || errorCode(error) === 'ENOTDIR') {
        return undefined;
      }
      throw error;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      console.warn(`Backup manifest for "${name}" is not valid JSON`, error);
      return null;
    }
  }

  private async prune() {
    try {
      const backups = await this.list();
      for (const stale of backups.slice(this.keep)) {
        await fs.remove(path.join(this.backupRoot, stale.name));
        console.info(`Pruned old backup "${stale.name}"`);
      }
    } catch (error) {
      console.error('Failed to prune old backups', error);
    }
  }
}
