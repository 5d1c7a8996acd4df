import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { PersistenceError } from '../utils/index.js';
import { errorMessage } from '../utils/index.js';

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(err: unknown): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
    isError: true,
  };
}

/** Attach a save failure to an otherwise successful payload. */
export function withSaveWarning<T extends object>(payload: T, persistError?: PersistenceError): T | (T & { warning: string }) {
  return persistError
    ? { ...payload, warning: `Change kept in memory but not saved: ${persistError.message}` }
    : payload;
}
