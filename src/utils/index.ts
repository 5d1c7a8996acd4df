import { randomUUID } from 'node:crypto';

export { logger } from './logger.js';
export {
  ContactBookError, ValidationError, DuplicateKeyError, NoSelectionError,
  PersistenceError, ImportError, errorMessage,
} from './errors.js';
export type { ErrorKind, ValidationKind } from './errors.js';

export function generateId(): string {
  return randomUUID();
}
