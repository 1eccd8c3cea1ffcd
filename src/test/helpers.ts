import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import { EncryptedStore } from '../main/encryptedStore';
import { KeyManager } from '../main/keyManager';
import { LockManager } from '../main/locks';

export const TEST_PASSWORD = 'test-secret';
export const TEST_ITERATIONS = 1000;

export const makeTempDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'taskvault-test-'));

export const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

export const createGate = () => {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
};

export const fsError = (code: string, message = code): Error => Object.assign(new Error(message), { code });

/** An initialized, unlocked key manager and store over `root`. */
export const openStore = async (root: string, password = TEST_PASSWORD, lockTimeoutMs = 2000) => {
  const keys = new KeyManager(root, { iterations: TEST_ITERATIONS });
  if (await keys.hasEnvelope()) {
    await keys.unlock(password);
  } else {
    await keys.initialize(password);
  }
  const store = new EncryptedStore(root, keys, { locks: new LockManager(lockTimeoutMs) });
  return { keys, store };
};
