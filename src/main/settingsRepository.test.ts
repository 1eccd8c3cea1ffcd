import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../shared/errors';
import { DEFAULT_SETTINGS } from '../shared/stateHelpers';
import { makeTempDir, openStore } from '../test/helpers';
import type { EncryptedStore } from './encryptedStore';
import { SettingsRepository } from './settingsRepository';

describe('SettingsRepository', () => {
  let root: string;
  let store: EncryptedStore;
  let settings: SettingsRepository;

  beforeEach(async () => {
    root = await makeTempDir();
    ({ store } = await openStore(root));
    settings = new SettingsRepository(store);
    await settings.reload();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('starts from defaults when nothing is stored', () => {
    expect(settings.get()).toEqual(DEFAULT_SETTINGS);
    expect(settings.isDirty).toBe(false);
  });

  it('merges patches, notifies listeners and defers the write', async () => {
    const listener = vi.fn();
    settings.onChange(listener);

    const next = await settings.update({ theme: 'dark', updates: { channel: 'beta' } });

    expect(next).toEqual({ ...DEFAULT_SETTINGS, theme: 'dark', updates: { channel: 'beta', checkOnStartup: true } });
    expect(listener).toHaveBeenCalledWith(next, DEFAULT_SETTINGS);
    expect(settings.isDirty).toBe(true);
    await expect(store.load('settings')).resolves.toBeUndefined();

    await settings.flush();
    const reloaded = new SettingsRepository(store);
    await reloaded.reload();
    expect(reloaded.get().theme).toBe('dark');
  });

  it('rejects unknown or out-of-range values without changing anything', async () => {
    const listener = vi.fn();
    settings.onChange(listener);

    await expect(settings.update({ fontSize: 12 })).rejects.toBeInstanceOf(ValidationError);
    await expect(settings.update({ autosaveIntervalSeconds: 1 })).rejects.toBeInstanceOf(ValidationError);

    expect(settings.get()).toEqual(DEFAULT_SETTINGS);
    expect(settings.isDirty).toBe(false);
    expect(listener).not.toHaveBeenCalled();
  });

  it('records the automatic backup time on disk and keeps it out of patches', async () => {
    await settings.recordAutomaticBackup(new Date('2026-03-10T08:00:00.000Z'));

    expect(settings.isDirty).toBe(false);
    const reloaded = new SettingsRepository(store);
    await reloaded.reload();
    expect(reloaded.get().lastAutomaticBackupAt).toBe('2026-03-10T08:00:00.000Z');
    await expect(settings.update({ lastAutomaticBackupAt: null })).rejects.toBeInstanceOf(ValidationError);
  });

  it('stops notifying after unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = settings.onChange(listener);
    unsubscribe();

    await settings.update({ displayScale: 125 });
    expect(listener).not.toHaveBeenCalled();
  });
});
