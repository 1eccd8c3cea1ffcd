export type VaultErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'AUTHENTICATION_FAILED'
  | 'SESSION_LOCKED'
  | 'ALREADY_INITIALIZED'
  | 'ENVELOPE_CORRUPT'
  | 'DECRYPTION_FAILED'
  | 'LIMIT_EXCEEDED'
  | 'SLOT_CONFLICT'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'VERSION_MISMATCH'
  | 'LOCK_TIMEOUT';

export abstract class VaultError extends Error {
  abstract readonly code: VaultErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields the UI layer needs to explain the failure. */
  get details(): Record<string, unknown> {
    return {};
  }
}

export type StorageFailureReason =
  | 'permission denied'
  | 'read-only filesystem'
  | 'path too long'
  | 'disk full'
  | 'not a directory'
  | 'read-back mismatch'
  | `unexpected error (${string})`;

export interface StorageAttempt {
  label: string;
  path: string;
  reason: StorageFailureReason;
  detail: string;
}

export class StorageUnavailableError extends VaultError {
  readonly code = 'STORAGE_UNAVAILABLE';

  constructor(readonly attempts: StorageAttempt[]) {
    super(
      `No writable storage location found. Tried:\n${attempts
        .map((attempt) => `  - ${attempt.label} (${attempt.path}): ${attempt.reason}`)
        .join('\n')}`
    );
  }

  get details() {
    return { attempts: this.attempts };
  }
}

export class AuthenticationFailedError extends VaultError {
  readonly code = 'AUTHENTICATION_FAILED';

  constructor() {
    super('Incorrect password');
  }
}

export class SessionLockedError extends VaultError {
  readonly code = 'SESSION_LOCKED';

  constructor() {
    super('The vault is locked; log in first');
  }
}

export class AlreadyInitializedError extends VaultError {
  readonly code = 'ALREADY_INITIALIZED';

  constructor() {
    super('A password has already been set up for this storage root');
  }
}

export class EnvelopeCorruptError extends VaultError {
  readonly code = 'ENVELOPE_CORRUPT';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Encryption envelope at ${path} is unreadable`, options);
  }

  get details() {
    return { path: this.path };
  }
}

export class DecryptionFailedError extends VaultError {
  readonly code = 'DECRYPTION_FAILED';

  constructor(readonly document: string, options?: { cause?: unknown }) {
    super(`Document "${document}" could not be decrypted (wrong key or corrupted file)`, options);
  }

  get details() {
    return { document: this.document };
  }
}

export class LimitExceededError extends VaultError {
  readonly code = 'LIMIT_EXCEEDED';

  constructor(readonly taskId: string, readonly limit: number, readonly date: string) {
    super(`Task ${taskId} already has ${limit} strikes for ${date}`);
  }

  get details() {
    return { taskId: this.taskId, limit: this.limit, date: this.date };
  }
}

export class SlotConflictError extends VaultError {
  readonly code = 'SLOT_CONFLICT';

  constructor(
    readonly conflictingTaskId: string,
    readonly conflictingTitle: string,
    readonly date: string,
    readonly hour: string
  ) {
    super(`The slot ${date} ${hour} overlaps "${conflictingTitle}"`);
  }

  get details() {
    return {
      conflictingTaskId: this.conflictingTaskId,
      conflictingTitle: this.conflictingTitle,
      date: this.date,
      hour: this.hour
    };
  }
}

export class ValidationError extends VaultError {
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly field: string, message: string) {
    super(message);
  }

  get details() {
    return { field: this.field };
  }
}

export class NotFoundError extends VaultError {
  readonly code = 'NOT_FOUND';

  constructor(readonly kind: 'task' | 'backup', readonly id: string) {
    super(`${kind === 'task' ? 'Task' : 'Backup'} "${id}" not found`);
  }

  get details() {
    return { kind: this.kind, id: this.id };
  }
}

export class VersionMismatchError extends VaultError {
  readonly code = 'VERSION_MISMATCH';

  constructor(readonly found: unknown, readonly expected: number) {
    super(`Backup format version ${String(found)} is not supported (expected ${expected})`);
  }

  get details() {
    return { found: this.found, expected: this.expected };
  }
}

export class LockTimeoutError extends VaultError {
  readonly code = 'LOCK_TIMEOUT';

  constructor(readonly resource: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${resource}`);
  }

  get details() {
    return { resource: this.resource, timeoutMs: this.timeoutMs };
  }
}

export const isVaultError = (error: unknown): error is VaultError => error instanceof VaultError;
