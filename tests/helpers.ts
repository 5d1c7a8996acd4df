import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ContactStore } from '../src/store/contact-store.js';
import { createContact } from '../src/contacts/model.js';
import type { Contact, StoredContact } from '../src/types/contact.js';

/** Create a temp directory for data files. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'contact-book-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Create an initialized ContactStore backed by a file in a temp directory. */
export async function createTestStore(): Promise<{ store: ContactStore; filePath: string; dir: string; cleanup: () => Promise<void> }> {
  const { dir, cleanup } = await createTempDir();
  const filePath = path.join(dir, 'contacts.json');
  const store = new ContactStore(filePath);
  await store.init();
  return { store, filePath, dir, cleanup };
}

/** Build a stored contact with empty optional fields. */
export function makeContact(fields: Partial<Contact> & Pick<Contact, 'name' | 'phone'>): StoredContact {
  return createContact({ email: '', address: '', ...fields });
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf-8'));
}
