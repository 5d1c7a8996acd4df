import type { Contact, StoredContact } from '../types/index.js';
import { generateId } from '../utils/index.js';

export function createContact(fields: Contact & { id?: string }): StoredContact {
  return {
    id: fields.id ?? generateId(),
    name: fields.name,
    phone: fields.phone,
    email: fields.email,
    address: fields.address,
  };
}

/** Natural key used for duplicate detection: case-insensitive name, exact phone. */
export function naturalKey(contact: Pick<Contact, 'name' | 'phone'>): string {
  return JSON.stringify([contact.name.trim().toLowerCase(), contact.phone.trim()]);
}
