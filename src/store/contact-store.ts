import * as fs from 'node:fs/promises';
import { z } from 'zod';
import type {
  Contact, ContactDraft, StoredContact, Selection, Confirmer, LoadResult,
  MutationOutcome, ImportSummary, ExportFormat,
} from '../types/index.js';
import { toRecord } from '../types/index.js';
import { validateDraft } from '../contacts/validate.js';
import { naturalKey } from '../contacts/model.js';
import { filterContacts } from '../contacts/search.js';
import { coerceImportDocument, type CoercedImport } from '../contacts/import.js';
import { serializeContacts } from '../contacts/export.js';
import {
  DuplicateKeyError, ImportError, NoSelectionError, ValidationError, errorMessage, logger,
} from '../utils/index.js';
import { RecordStore } from './record-store.js';
import { writeTextFile } from './json-file.js';

const contactFileSchema = z.array(z.object({
  name: z.string(),
  phone: z.string(),
  email: z.string().default(''),
  address: z.string().default(''),
}));

export interface DeleteResult {
  deleted: boolean;
  contact: StoredContact;
}

/**
 * The canonical contact list: validated CRUD, duplicate rejection on the
 * (name, phone) natural key, import merge and export. Every mutation saves
 * the whole list to the backing JSON file.
 */
export class ContactStore {
  private records: RecordStore<Contact>;

  constructor(filePath: string) {
    this.records = new RecordStore<Contact>({ filePath, schema: contactFileSchema, toRecord });
  }

  get filePath(): string {
    return this.records.filePath;
  }

  get revision(): number {
    return this.records.revision;
  }

  async init(): Promise<LoadResult<StoredContact>> {
    const loaded = await this.records.load();
    logger.info('Loaded', loaded.records.length, 'contacts from', this.filePath);
    return loaded;
  }

  list(): readonly StoredContact[] {
    return this.records.list();
  }

  /** Resolve a selection to the live record, or `undefined` when it is empty or stale. */
  find(selection: Selection): StoredContact | undefined {
    return selection === null ? undefined : this.records.get(selection);
  }

  get(id: string): StoredContact {
    return this.resolve(id, 'view');
  }

  filter(query: string): StoredContact[] {
    return filterContacts(this.records.list(), query);
  }

  // --- CRUD ---

  async add(draft: ContactDraft): Promise<MutationOutcome<StoredContact>> {
    return this.records.withLock(async () => {
      const contact = checkDraft(draft);
      const key = naturalKey(contact);
      if (this.records.list().some(c => naturalKey(c) === key)) {
        throw new DuplicateKeyError(contact.name, contact.phone);
      }

      const [added] = this.records.append([contact]);
      const persistError = await this.records.persist();
      logger.info('Added contact:', added.id, added.name);
      return { result: added, persistError };
    });
  }

  /**
   * Replace the selected contact's fields in place. The natural key is not
   * re-checked against other contacts, so an update may produce two
   * contacts sharing a key.
   */
  async update(selection: Selection, draft: ContactDraft): Promise<MutationOutcome<StoredContact>> {
    return this.records.withLock(async () => {
      const target = this.resolve(selection, 'update');
      const contact = checkDraft(draft);

      const updated = this.records.replace(target.id, contact);
      if (!updated) throw new NoSelectionError('update', target.id);
      const persistError = await this.records.persist();
      logger.info('Updated contact:', updated.id, updated.name);
      return { result: updated, persistError };
    });
  }

  /** Ask `confirm` first; only a `true` answer deletes. */
  async requestDelete(selection: Selection, confirm: Confirmer<StoredContact>): Promise<MutationOutcome<DeleteResult>> {
    const target = this.resolve(selection, 'delete');
    if (!(await confirm(target))) {
      logger.debug('Delete declined for', target.id);
      return { result: { deleted: false, contact: target } };
    }
    const { result, persistError } = await this.deleteConfirmed(target.id);
    return { result: { deleted: true, contact: result }, persistError };
  }

  /** Remove the selected contact. Confirmation is the caller's job. */
  async deleteConfirmed(selection: Selection): Promise<MutationOutcome<StoredContact>> {
    return this.records.withLock(async () => {
      const target = this.resolve(selection, 'delete');
      const removed = this.records.remove(target.id);
      if (!removed) throw new NoSelectionError('delete', target.id);
      const persistError = await this.records.persist();
      logger.info('Deleted contact:', removed.id, removed.name);
      return { result: removed, persistError };
    });
  }

  // --- Import / Export ---

  /**
   * Merge contacts from a JSON file. Entries missing a name or phone are
   * skipped, as are entries whose natural key is already present (in the
   * store or earlier in the same file). The rest are appended in file order.
   */
  async importMerge(filePath: string): Promise<MutationOutcome<ImportSummary>> {
    return this.records.withLock(async () => {
      let raw: string;
      try {
        raw = await fs.readFile(filePath, 'utf-8');
      } catch (err) {
        throw new ImportError(filePath, errorMessage(err));
      }

      let coerced: CoercedImport;
      try {
        coerced = coerceImportDocument(JSON.parse(raw));
      } catch (err) {
        throw new ImportError(filePath, errorMessage(err));
      }

      const keys = new Set(this.records.list().map(naturalKey));
      const fresh: Contact[] = [];
      let skippedDuplicates = 0;
      for (const contact of coerced.contacts) {
        const key = naturalKey(contact);
        if (keys.has(key)) {
          skippedDuplicates++;
          continue;
        }
        keys.add(key);
        fresh.push(contact);
      }

      this.records.append(fresh);
      const persistError = await this.records.persist();
      logger.info('Imported', fresh.length, 'contacts from', filePath);
      return {
        result: { added: fresh.length, skippedInvalid: coerced.skippedInvalid, skippedDuplicates },
        persistError,
      };
    });
  }

  /** Write every contact to `filePath`. Returns how many were written. */
  async export(filePath: string, format: ExportFormat = 'json'): Promise<number> {
    const contacts = [...this.records.list()];
    await writeTextFile(filePath, serializeContacts(contacts, format));
    logger.info('Exported', contacts.length, 'contacts to', filePath, `(${format})`);
    return contacts.length;
  }

  private resolve(selection: Selection, action: string): StoredContact {
    if (selection === null) throw new NoSelectionError(action);
    const contact = this.records.get(selection);
    if (!contact) throw new NoSelectionError(action, selection);
    return contact;
  }
}

function checkDraft(draft: ContactDraft): Contact {
  const validation = validateDraft(draft);
  if (!validation.ok) {
    throw new ValidationError(validation.kind, validation.message);
  }
  return validation.contact;
}
