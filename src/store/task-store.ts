import { z } from 'zod';
import type { Task, StoredTask, Selection, LoadResult, MutationOutcome } from '../types/index.js';
import { NoSelectionError, ValidationError, logger } from '../utils/index.js';
import { RecordStore } from './record-store.js';

const taskFileSchema = z.array(z.object({
  title: z.string(),
  status: z.enum(['pending', 'done']).default('pending'),
}));

/** To-do list: the same CRUD-and-save pattern over tasks. Titles may repeat. */
export class TaskStore {
  private records: RecordStore<Task>;

  constructor(filePath: string) {
    this.records = new RecordStore<Task>({
      filePath,
      schema: taskFileSchema,
      toRecord: task => ({ title: task.title, status: task.status }),
    });
  }

  get filePath(): string {
    return this.records.filePath;
  }

  async init(): Promise<LoadResult<StoredTask>> {
    const loaded = await this.records.load();
    logger.info('Loaded', loaded.records.length, 'tasks from', this.filePath);
    return loaded;
  }

  list(): readonly StoredTask[] {
    return this.records.list();
  }

  async add(title: string): Promise<MutationOutcome<StoredTask>> {
    return this.records.withLock(async () => {
      const trimmed = title.trim();
      if (!trimmed) {
        throw new ValidationError('MissingField', 'Please enter a task.');
      }
      const [added] = this.records.append([{ title: trimmed, status: 'pending' }]);
      const persistError = await this.records.persist();
      logger.info('Added task:', added.id, added.title);
      return { result: added, persistError };
    });
  }

  async markDone(selection: Selection): Promise<MutationOutcome<StoredTask>> {
    return this.records.withLock(async () => {
      const target = this.resolve(selection, 'mark as done');
      const updated = this.records.replace(target.id, { title: target.title, status: 'done' });
      if (!updated) throw new NoSelectionError('mark as done', target.id);
      const persistError = await this.records.persist();
      return { result: updated, persistError };
    });
  }

  async remove(selection: Selection): Promise<MutationOutcome<StoredTask>> {
    return this.records.withLock(async () => {
      const target = this.resolve(selection, 'remove');
      const removed = this.records.remove(target.id);
      if (!removed) throw new NoSelectionError('remove', target.id);
      const persistError = await this.records.persist();
      logger.info('Removed task:', removed.id, removed.title);
      return { result: removed, persistError };
    });
  }

  private resolve(selection: Selection, action: string): StoredTask {
    if (selection === null) throw new NoSelectionError(action);
    const task = this.records.get(selection);
    if (!task) throw new NoSelectionError(action, selection);
    return task;
  }
}
