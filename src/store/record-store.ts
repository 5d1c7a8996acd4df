import type { LoadResult } from '../types/index.js';
import { PersistenceError, generateId, logger } from '../utils/index.js';
import { loadRecords, saveRecords, type RecordListSchema } from './json-file.js';

export type Stored<T> = T & { readonly id: string };

export interface RecordStoreOptions<T> {
  filePath: string;
  schema: RecordListSchema<T>;
  /** Shape a record for disk; must drop the in-memory id. */
  toRecord: (record: T) => T;
}

/**
 * Ordered, insertion-order list of records mirrored to one JSON file.
 * Ids are assigned in memory on load or append and never persisted.
 */
export class RecordStore<T extends object> {
  readonly filePath: string;
  private readonly schema: RecordListSchema<T>;
  private readonly toRecord: (record: T) => T;
  private entries: Stored<T>[] = [];
  private version = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RecordStoreOptions<T>) {
    this.filePath = options.filePath;
    this.schema = options.schema;
    this.toRecord = options.toRecord;
  }

  async load(): Promise<LoadResult<Stored<T>>> {
    const { records, warning } = await loadRecords(this.filePath, this.schema);
    this.entries = records.map(r => withId(r));
    this.version++;
    logger.debug('Loaded', this.entries.length, 'records from', this.filePath);
    return { records: [...this.entries], warning };
  }

  /** Bumped on every change, so derived views know when to recompute. */
  get revision(): number {
    return this.version;
  }

  list(): readonly Stored<T>[] {
    return this.entries;
  }

  get(id: string): Stored<T> | undefined {
    return this.entries.find(e => e.id === id);
  }

  append(records: readonly T[]): Stored<T>[] {
    const added = records.map(r => withId(r));
    this.entries.push(...added);
    this.version++;
    return added;
  }

  /** Replace the fields of a record in place; its position and id are kept. */
  replace(id: string, record: T): Stored<T> | undefined {
    const index = this.entries.findIndex(e => e.id === id);
    if (index === -1) return undefined;
    const next = withId(record, id);
    this.entries[index] = next;
    this.version++;
    return next;
  }

  remove(id: string): Stored<T> | undefined {
    const index = this.entries.findIndex(e => e.id === id);
    if (index === -1) return undefined;
    const [removed] = this.entries.splice(index, 1);
    this.version++;
    return removed;
  }

  /**
   * Save the whole list. A failure is returned, not thrown: the in-memory
   * state stays as it is until the next successful save.
   */
  async persist(): Promise<PersistenceError | undefined> {
    try {
      await saveRecords(this.filePath, this.entries.map(e => this.toRecord(e)));
      return undefined;
    } catch (err) {
      const persistError = err instanceof PersistenceError
        ? err
        : new PersistenceError(this.filePath, String(err));
      logger.error('Save failed:', persistError.message);
      return persistError;
    }
  }

  /** Run a mutate-then-save step after every step queued before it has settled. */
  withLock<R>(fn: () => Promise<R>): Promise<R> {
    const run = this.queue.then(fn);
    // The caller sees the rejection through `run`; the queue only tracks completion.
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }
}

function withId<T extends object>(record: T, id: string = generateId()): Stored<T> {
  return { ...record, id };
}
