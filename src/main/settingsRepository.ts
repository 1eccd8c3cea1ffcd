import { DEFAULT_SETTINGS, rehydrateSettings } from '../shared/stateHelpers';
import type { Settings } from '../shared/types';
import { parseSettingsPatch } from '../shared/validation';
import type { EncryptedStore } from './encryptedStore';
import { PersistedDocument } from './persistedDocument';

export const SETTINGS_DOCUMENT = 'settings';

export type SettingsListener = (next: Settings, previous: Settings) => void;

export class SettingsRepository extends PersistedDocument<Settings> {
  private readonly listeners = new Set<SettingsListener>();

  constructor(store: EncryptedStore, now: () => Date = () => new Date()) {
    super(store, SETTINGS_DOCUMENT, now);
  }

  protected empty(): Settings {
    return { ...DEFAULT_SETTINGS, updates: { ...DEFAULT_SETTINGS.updates } };
  }

  protected hydrate(raw: unknown): Settings {
    return rehydrateSettings(raw);
  }

  get(): Settings {
    this.assertAvailable();
    return this.state;
  }

  async update(patch: unknown): Promise<Settings> {
    const parsed = parseSettingsPatch(patch);
    let previous = this.state;
    const next = await this.mutate((current) => {
      previous = current;
      return {
        ...current,
        ...parsed,
        updates: { ...current.updates, ...(parsed.updates ?? {}) }
      };
    }, 'deferred');
    for (const listener of this.listeners) {
      listener(next, previous);
    }
    return next;
  }

  /** Written through at once so a restart does not repeat the backup. */
  async recordAutomaticBackup(at: Date): Promise<void> {
    await this.mutate((current) => ({ ...current, lastAutomaticBackupAt: at.toISOString() }), 'write-through');
  }

  onChange(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
