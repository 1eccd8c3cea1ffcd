import { DEFAULT_BACKUP_KEEP } from './backupManager';
import { DEFAULT_BACKUP_INTERVAL_DAYS } from './backupScheduler';

export const LOOPBACK_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8989;
export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const APP_VERSION = process.env.npm_package_version ?? '1.0.0';

const LOOPBACK_HOSTS = new Set(['127.0.0.1', '::1', 'localhost']);

export interface ServerConfig {
  host: string;
  port: number;
  dataDir: string | null;
  backupKeep: number;
  /** Days between automatic backups; 0 turns them off. */
  backupIntervalDays: number;
  lockTimeoutMs: number;
}

const readInteger = (value: string | undefined, name: string, fallback: number, min: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < min) {
    console.warn(`Ignoring ${name}=${value}; using ${fallback}`);
    return fallback;
  }
  return parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  let host = env.TASKVAULT_HOST?.trim() || LOOPBACK_HOST;
  if (!LOOPBACK_HOSTS.has(host)) {
    console.warn(`Refusing to listen on non-loopback host "${host}"; using ${LOOPBACK_HOST}`);
    host = LOOPBACK_HOST;
  }
  return {
    host,
    port: readInteger(env.TASKVAULT_PORT, 'TASKVAULT_PORT', DEFAULT_PORT, 0),
    dataDir: env.TASKVAULT_DATA_DIR?.trim() || null,
    backupKeep: readInteger(env.TASKVAULT_BACKUP_KEEP, 'TASKVAULT_BACKUP_KEEP', DEFAULT_BACKUP_KEEP, 1),
    backupIntervalDays: readInteger(
      env.TASKVAULT_BACKUP_INTERVAL_DAYS,
      'TASKVAULT_BACKUP_INTERVAL_DAYS',
      DEFAULT_BACKUP_INTERVAL_DAYS,
      0
    ),
    lockTimeoutMs: readInteger(env.TASKVAULT_LOCK_TIMEOUT_MS, 'TASKVAULT_LOCK_TIMEOUT_MS', DEFAULT_LOCK_TIMEOUT_MS, 1)
  };
};
