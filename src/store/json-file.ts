import * as fs from 'node:fs/promises';
import type { z } from 'zod';
import type { LoadResult } from '../types/index.js';
import { PersistenceError, errorMessage, logger } from '../utils/index.js';

export type RecordListSchema<T> = z.ZodType<T[], z.ZodTypeDef, unknown>;

/**
 * Read a JSON array of records. A missing file yields an empty list. An
 * unreadable or malformed file also yields an empty list, plus a warning;
 * the file itself is left as it is.
 */
export async function loadRecords<T>(filePath: string, schema: RecordListSchema<T>): Promise<LoadResult<T>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      logger.debug('No data file yet at', filePath);
      return { records: [] };
    }
    return degrade(filePath, `could not read file: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return degrade(filePath, `malformed JSON: ${errorMessage(err)}`);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    return degrade(filePath, `unexpected content${where}: ${issue?.message ?? 'invalid'}`);
  }

  return { records: parsed.data };
}

/** Write records as a 2-space indented JSON array. */
export async function saveRecords(filePath: string, records: readonly unknown[]): Promise<void> {
  await writeTextFile(filePath, JSON.stringify(records, null, 2));
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  try {
    await fs.writeFile(filePath, text, 'utf-8');
  } catch (err) {
    throw new PersistenceError(filePath, `failed to write: ${errorMessage(err)}`);
  }
}

function degrade<T>(filePath: string, reason: string): LoadResult<T> {
  const warning = new PersistenceError(filePath, `${reason}; starting with an empty list`);
  logger.warn(warning.message);
  return { records: [], warning };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
