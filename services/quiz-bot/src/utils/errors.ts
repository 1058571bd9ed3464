/**
 * Error taxonomy for the quiz bot.
 *
 * Store errors come from the spreadsheet adapter and are handled by the quiz
 * engine (retry, skip, reload). Session errors are user-facing and never fatal.
 */

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network, auth or quota failure talking to the spreadsheet. Transient. */
export class StoreUnavailableError extends StoreError {}

/** A row could not be turned into a domain object. */
export class StoreFormatError extends StoreError {
  readonly row?: number;

  constructor(message: string, row?: number) {
    super(message);
    this.row = row;
  }
}

/** The target row was changed by someone else since it was last read. */
export class StoreConflictError extends StoreError {
  readonly learnerId: string;
  readonly itemKey: string;

  constructor(learnerId: string, itemKey: string, message?: string) {
    super(message ?? `Row for ${learnerId}/${itemKey} was modified externally`);
    this.learnerId = learnerId;
    this.itemKey = itemKey;
  }
}

export class NoActiveSessionError extends Error {
  readonly learnerId: string;

  constructor(learnerId: string) {
    super(`No active quiz round for learner ${learnerId}`);
    this.name = 'NoActiveSessionError';
    this.learnerId = learnerId;
  }
}

export class SessionTimeoutError extends Error {
  readonly learnerId: string;
  readonly idleMs: number;

  constructor(learnerId: string, idleMs: number) {
    super(`Quiz round for learner ${learnerId} timed out after ${Math.round(idleMs / 1000)}s of inactivity`);
    this.name = 'SessionTimeoutError';
    this.learnerId = learnerId;
    this.idleMs = idleMs;
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: string, action: string) {
    super(`Cannot ${action} while session is ${from}`);
    this.name = 'InvalidTransitionError';
  }
}

export class MissingConfigError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
    this.name = 'MissingConfigError';
    this.missing = missing;
  }
}

export class InvalidConfigError extends Error {
  readonly setting: string;

  constructor(setting: string, reason: string) {
    super(`Invalid configuration for ${setting}: ${reason}`);
    this.name = 'InvalidConfigError';
    this.setting = setting;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
