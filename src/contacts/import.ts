import { z } from 'zod';
import type { Contact } from '../types/index.js';

const importDocumentSchema = z.array(z.record(z.string(), z.unknown()));

export interface CoercedImport {
  contacts: Contact[];
  skippedInvalid: number;
}

/**
 * Turn a parsed import document into contacts. Only presence of name and
 * phone is checked here; phone and email formats are not.
 *
 * @throws {Error} when the document is not an array of objects
 */
export function coerceImportDocument(data: unknown): CoercedImport {
  const parsed = importDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error('expected a JSON array of contact objects');
  }

  const contacts: Contact[] = [];
  let skippedInvalid = 0;

  for (const item of parsed.data) {
    const contact: Contact = {
      name: coerceText(item.name).trim(),
      phone: coerceText(item.phone).trim(),
      email: coerceText(item.email).trim(),
      address: coerceText(item.address).trim(),
    };
    if (!contact.name || !contact.phone) {
      skippedInvalid++;
      continue;
    }
    contacts.push(contact);
  }

  return { contacts, skippedInvalid };
}

function coerceText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}
