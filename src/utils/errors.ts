export type ErrorKind =
  | 'MissingField'
  | 'InvalidPhone'
  | 'InvalidEmail'
  | 'DuplicateKey'
  | 'NoSelection'
  | 'PersistenceError'
  | 'ImportError';

export type ValidationKind = Extract<ErrorKind, 'MissingField' | 'InvalidPhone' | 'InvalidEmail'>;

/** Base class for every recoverable, user-facing failure. */
export abstract class ContactBookError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends ContactBookError {
  readonly kind: ValidationKind;

  constructor(kind: ValidationKind, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
  }
}

export class DuplicateKeyError extends ContactBookError {
  readonly kind = 'DuplicateKey' as const;

  constructor(name: string, phone: string) {
    super(`A contact with the same name and phone already exists: ${name} (${phone})`);
    this.name = 'DuplicateKeyError';
  }
}

export class NoSelectionError extends ContactBookError {
  readonly kind = 'NoSelection' as const;

  constructor(action: string, staleId?: string) {
    super(staleId
      ? `Selected record no longer exists (${staleId}); cannot ${action}`
      : `Please select a record to ${action}.`);
    this.name = 'NoSelectionError';
  }
}

export class PersistenceError extends ContactBookError {
  readonly kind = 'PersistenceError' as const;

  constructor(filePath: string, message: string) {
    super(`${filePath}: ${message}`);
    this.name = 'PersistenceError';
  }
}

export class ImportError extends ContactBookError {
  readonly kind = 'ImportError' as const;

  constructor(filePath: string, message: string) {
    super(`Failed to import ${filePath}: ${message}`);
    this.name = 'ImportError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
